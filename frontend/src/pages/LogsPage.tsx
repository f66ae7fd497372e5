import React, { useEffect, useState } from 'react';
import type { LogEntry } from '../types';
import { apiService } from '../services/api';
import { websocketService } from '../services/websocket';
import { LogsTable } from '../components/LogsTable';
import { navigateTo } from '../components/LocationLogger';

interface LogsPageProps {
  onNavigate?: (path: string) => void;
}

export const LogsPage: React.FC<LogsPageProps> = ({ onNavigate = navigateTo }) => {
  const [entries, setEntries] = useState<LogEntry[]>([]);
  const [isLoading, setIsLoading] = useState(true);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    let mounted = true;
    const load = async () => {
      try {
        const data = await apiService.getLogs();
        if (mounted) {
          // Keep anything that arrived live while the request was in flight
          setEntries(prev => [...prev.filter(p => !data.some(d => d.id === p.id)), ...data]);
          setError(null);
        }
      } catch (err) {
        console.error('Error loading log entries:', err);
        if (mounted) setError('Failed to load log entries');
      } finally {
        if (mounted) setIsLoading(false);
      }
    };
    load();

    const unsubscribe = websocketService.onLogEntry((entry) => {
      setEntries(prev => (prev.some(p => p.id === entry.id) ? prev : [entry, ...prev]));
    });

    return () => {
      mounted = false;
      unsubscribe();
    };
  }, []);

  return (
    <div className="logs-page">
      <div className="panel-header">
        <h2>📜 Log</h2>
        <span className="count">{entries.length} {entries.length === 1 ? 'entry' : 'entries'}</span>
        <button id="backButton" className="link-button" onClick={() => onNavigate('/')}>
          ← Back
        </button>
      </div>

      {isLoading && <div className="loading">Loading…</div>}
      {error && <div className="error-message">{error}</div>}
      {!isLoading && !error && <LogsTable entries={entries} />}
    </div>
  );
};
