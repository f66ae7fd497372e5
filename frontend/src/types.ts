export interface LastKnownPosition {
  latitude: number;
  longitude: number;
  accuracy: number;
}

export interface LogPayload {
  latitude: number | null;
  longitude: number | null;
}

export interface LogResponse {
  success: boolean;
  error?: string;
}

export interface LogEntry {
  id: number;
  timestamp: string;
  displayTime: string;
  latitude: number | null;
  longitude: number | null;
  locationName: string;
}

export type StatusKind = 'idle' | 'ok' | 'error';

export interface Status {
  message: string;
  kind: StatusKind;
}
