import { isValid, parseISO } from 'date-fns';
import { formatInTimeZone } from 'date-fns-tz';
import { LogStore } from './database';
import { ReverseGeocode } from './geocoder';
import { parseLogPayload } from './validation';
import { DisplayLogEntry, LogEntry, LogResult } from './types';

export const DISPLAY_TIME_FORMAT = 'dd MMM yyyy, HH:mm:ss';

export interface LogNotifier {
  publish(entry: DisplayLogEntry): void;
}

export interface LogServiceOptions {
  store: LogStore;
  geocode: ReverseGeocode;
  maxRows: number;
  timezone: string;
  notifier?: LogNotifier;
  now?: () => Date;
}

/** Renders an ISO timestamp in the given zone; anything unparseable is returned as-is. */
export function formatDisplayTime(timestamp: string, timezone: string): string {
  const date = parseISO(timestamp);
  if (!isValid(date)) return timestamp;
  return formatInTimeZone(date, timezone, DISPLAY_TIME_FORMAT);
}

const failure = (status: number, error: string): LogResult => ({ status, body: { success: false, error } });

export class LogService {
  private store: LogStore;
  private geocode: ReverseGeocode;
  private maxRows: number;
  private timezone: string;
  private notifier?: LogNotifier;
  private now: () => Date;

  constructor(options: LogServiceOptions) {
    this.store = options.store;
    this.geocode = options.geocode;
    this.maxRows = options.maxRows;
    this.timezone = options.timezone;
    this.notifier = options.notifier;
    this.now = options.now || (() => new Date());
  }

  /**
   * Validates and stores one entry. Outcomes are returned as an HTTP status
   * and JSON body rather than thrown.
   */
  async record(body: unknown): Promise<LogResult> {
    let count: number;
    try {
      count = await this.store.countEntries();
    } catch (error) {
      console.error('Error counting log entries:', error);
      return failure(500, 'Internal error');
    }

    if (count >= this.maxRows) {
      return failure(
        429,
        `Log is full (${this.maxRows} entries). Please archive or delete entries before logging more.`
      );
    }

    const parsed = parseLogPayload(body);
    if (!parsed.ok) {
      return failure(400, parsed.error);
    }

    const { latitude, longitude } = parsed.payload;
    const locationName = latitude !== null && longitude !== null ? await this.geocode(latitude, longitude) : '';

    let entry: LogEntry;
    try {
      entry = await this.store.addEntry({
        timestamp: this.now().toISOString(),
        latitude,
        longitude,
        locationName,
      });
    } catch (error) {
      console.error('Error storing log entry:', error);
      return failure(500, 'Internal error');
    }

    console.log(`[LOG] #${entry.id} @ ${entry.latitude ?? '-'},${entry.longitude ?? '-'} ${locationName || '(no place name)'}`);
    this.notifier?.publish(this.toDisplay(entry));
    return { status: 200, body: { success: true } };
  }

  async list(limit?: number): Promise<DisplayLogEntry[]> {
    const entries = await this.store.getEntries(limit ?? this.maxRows);
    return entries.map(entry => this.toDisplay(entry));
  }

  async count(): Promise<number> {
    return this.store.countEntries();
  }

  toDisplay(entry: LogEntry): DisplayLogEntry {
    return { ...entry, displayTime: formatDisplayTime(entry.timestamp, this.timezone) };
  }
}
