export interface LogEntry {
  id: number;
  timestamp: string;
  latitude: number | null;
  longitude: number | null;
  locationName: string;
}

export interface NewLogEntry {
  timestamp: string;
  latitude: number | null;
  longitude: number | null;
  locationName: string;
}

// Entry as shown on the log page, with the timestamp rendered in the user's zone
export interface DisplayLogEntry extends LogEntry {
  displayTime: string;
}

export interface LogPayload {
  latitude: number | null;
  longitude: number | null;
}

export interface LogResponse {
  success: boolean;
  error?: string;
}

export interface LogResult {
  status: number;
  body: LogResponse;
}
