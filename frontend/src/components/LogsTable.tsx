import React from 'react';
import { formatDistanceToNow, isValid, parseISO } from 'date-fns';
import type { LogEntry } from '../types';

export interface LogsTableProps {
  entries: LogEntry[];
}

const relativeAge = (timestamp: string): string => {
  const date = parseISO(timestamp);
  return isValid(date) ? formatDistanceToNow(date, { addSuffix: true }) : '';
};

export const formatCoordinates = (entry: LogEntry): string =>
  entry.latitude !== null && entry.longitude !== null
    ? `${entry.latitude.toFixed(6)}, ${entry.longitude.toFixed(6)}`
    : 'Unknown';

// Entries arrive newest first; the newest is #1
export const LogsTable: React.FC<LogsTableProps> = ({ entries }) => {
  if (entries.length === 0) {
    return <p className="empty">No log entries yet</p>;
  }

  return (
    <table className="logs-table">
      <thead>
        <tr>
          <th>#</th>
          <th>Time</th>
          <th>Coordinates</th>
          <th>Location</th>
        </tr>
      </thead>
      <tbody>
        {entries.map((entry, idx) => (
          <tr key={entry.id} className="log-row">
            <td className="badge">{idx + 1}</td>
            <td>
              <div className="time">{entry.displayTime}</div>
              <div className="age">{relativeAge(entry.timestamp)}</div>
            </td>
            <td className="coords">{formatCoordinates(entry)}</td>
            <td className="place">{entry.locationName || '—'}</td>
          </tr>
        ))}
      </tbody>
    </table>
  );
};
