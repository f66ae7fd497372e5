import axios from 'axios';
import type { LogEntry, LogPayload, LogResponse } from '../types';

// Same-origin: the backend serves this client and owns /log and /api
export const api = axios.create();

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const toCoord = (value: unknown): number | null => {
  if (value === null || value === undefined || value === '') return null;
  const n = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(n) ? n : null;
};

const toLogEntry = (raw: unknown): LogEntry | null => {
  if (!isRecord(raw) || typeof raw.timestamp !== 'string') return null;
  return {
    id: Number(raw.id),
    timestamp: raw.timestamp,
    displayTime: typeof raw.displayTime === 'string' ? raw.displayTime : raw.timestamp,
    latitude: toCoord(raw.latitude),
    longitude: toCoord(raw.longitude),
    locationName: typeof raw.locationName === 'string' ? raw.locationName : '',
  };
};

export const normalizeLogEntries = (data: unknown): LogEntry[] =>
  Array.isArray(data) ? data.map(toLogEntry).filter((e): e is LogEntry => e !== null) : [];

export const apiService = {
  // Any HTTP response is read as a result; only transport failures reject
  async submitLog(payload: LogPayload): Promise<LogResponse> {
    const response = await api.post('/log', payload, { validateStatus: () => true });
    const data: unknown = response.data;
    if (!isRecord(data)) return { success: false };
    return {
      success: data.success === true,
      error: typeof data.error === 'string' ? data.error : undefined,
    };
  },

  async getLogs(limit?: number): Promise<LogEntry[]> {
    const response = await api.get('/api/logs', {
      params: limit ? { limit } : undefined,
      timeout: 20000,
    });
    return normalizeLogEntries(response.data);
  },

  toLogEntry,
};
