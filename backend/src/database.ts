import sqlite3 from 'sqlite3';
import path from 'path';
import fs from 'fs';
import { LogEntry, NewLogEntry } from './types';

export interface LogStore {
  addEntry(entry: NewLogEntry): Promise<LogEntry>;
  countEntries(): Promise<number>;
  getEntries(limit?: number): Promise<LogEntry[]>;
}

interface LogEntryRow {
  id: number;
  server_timestamp_utc: string;
  latitude: number | null;
  longitude: number | null;
  location_name: string | null;
}

const toEntry = (row: LogEntryRow): LogEntry => ({
  id: row.id,
  timestamp: row.server_timestamp_utc,
  latitude: row.latitude,
  longitude: row.longitude,
  locationName: row.location_name || '',
});

// Coordinates are kept to six decimal places (~0.1 m)
const roundCoord = (value: number | null): number | null =>
  value === null ? null : Number(value.toFixed(6));

export class Database implements LogStore {
  private db: sqlite3.Database;
  private dbPath: string;
  private ready: Promise<void>;

  constructor(dbPath: string = './data/geolog.db') {
    this.dbPath = dbPath;

    if (dbPath !== ':memory:') {
      const dataDir = path.dirname(dbPath);
      if (!fs.existsSync(dataDir)) {
        fs.mkdirSync(dataDir, { recursive: true });
      }
    }

    this.db = new sqlite3.Database(dbPath);
    this.ready = this.initTables();
  }

  private initTables(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.db.run(
        `
        CREATE TABLE IF NOT EXISTS log_entries (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          server_timestamp_utc TEXT NOT NULL,
          latitude REAL,
          longitude REAL,
          location_name TEXT NOT NULL DEFAULT ''
        )
      `,
        (err: Error | null) => (err ? reject(err) : resolve())
      );
    });
  }

  async addEntry(entry: NewLogEntry): Promise<LogEntry> {
    await this.ready;
    const latitude = roundCoord(entry.latitude);
    const longitude = roundCoord(entry.longitude);
    const { timestamp, locationName } = entry;

    return new Promise((resolve, reject) => {
      this.db.run(
        'INSERT INTO log_entries (server_timestamp_utc, latitude, longitude, location_name) VALUES (?, ?, ?, ?)',
        [timestamp, latitude, longitude, locationName],
        function (this: sqlite3.RunResult, err: Error | null) {
          if (err) {
            reject(err);
          } else {
            resolve({ id: this.lastID, timestamp, latitude, longitude, locationName });
          }
        }
      );
    });
  }

  async countEntries(): Promise<number> {
    await this.ready;
    return new Promise((resolve, reject) => {
      this.db.get(
        'SELECT COUNT(*) AS count FROM log_entries',
        (err: Error | null, row: { count: number } | undefined) => {
          if (err) {
            reject(err);
          } else {
            resolve(row ? Number(row.count) : 0);
          }
        }
      );
    });
  }

  async getEntries(limit: number = 1000): Promise<LogEntry[]> {
    await this.ready;
    return new Promise((resolve, reject) => {
      this.db.all(
        'SELECT * FROM log_entries ORDER BY id DESC LIMIT ?',
        [limit],
        (err: Error | null, rows: LogEntryRow[]) => {
          if (err) {
            reject(err);
          } else {
            resolve(rows.map(toEntry));
          }
        }
      );
    });
  }

  getPath(): string {
    return this.dbPath;
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.db.close((err: Error | null) => (err ? reject(err) : resolve()));
    });
  }
}
