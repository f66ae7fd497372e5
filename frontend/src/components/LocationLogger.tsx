import React, { useCallback, useEffect, useState } from 'react';
import type { LastKnownPosition, Status } from '../types';
import { apiService } from '../services/api';
import {
  GeolocationUnsupportedError,
  getPositionSource,
  PositionSource,
  requestPosition,
  toLogPayload,
} from '../services/geolocation';
import { StatusArea } from './StatusArea';

export const MESSAGES = {
  locating: 'Getting your location…',
  located: 'Location ready ✔️',
  locateFailed: 'Could not get location.',
  unsupported: 'Geolocation not supported.',
  logged: 'Logged! 🎧',
  logFailed: 'Error logging.',
  unreachable: 'Server unreachable.',
} as const;

export const navigateTo = (path: string) => window.location.assign(path);

interface LocationLoggerProps {
  // null means the browser has no geolocation support
  geolocation?: PositionSource | null;
  onNavigate?: (path: string) => void;
}

export const LocationLogger: React.FC<LocationLoggerProps> = ({
  geolocation = getPositionSource(),
  onNavigate = navigateTo,
}) => {
  const [position, setPosition] = useState<LastKnownPosition | null>(null);
  const [status, setStatus] = useState<Status>({ message: '', kind: 'idle' });
  const [isSubmitting, setIsSubmitting] = useState(false);

  const fetchLocation = useCallback(() => {
    setStatus({ message: MESSAGES.locating, kind: 'idle' });
    requestPosition(geolocation).then(
      (pos) => {
        setPosition(pos);
        setStatus({ message: MESSAGES.located, kind: 'ok' });
      },
      (error: unknown) => {
        setPosition(null);
        const unsupported = error instanceof GeolocationUnsupportedError;
        setStatus({ message: unsupported ? MESSAGES.unsupported : MESSAGES.locateFailed, kind: 'error' });
      }
    );
  }, [geolocation]);

  // Ask once on load; further attempts only through the retry button
  useEffect(() => {
    fetchLocation();
  }, [fetchLocation]);

  const sendLog = async () => {
    setIsSubmitting(true);
    try {
      const result = await apiService.submitLog(toLogPayload(position));
      setStatus(result.success
        ? { message: MESSAGES.logged, kind: 'ok' }
        : { message: MESSAGES.logFailed, kind: 'error' });
    } catch (error) {
      console.error('Error submitting log:', error);
      setStatus({ message: MESSAGES.unreachable, kind: 'error' });
    } finally {
      setIsSubmitting(false);
    }
  };

  return (
    <div className="logger">
      <h1>📍 GeoLog</h1>
      <p className="intro">Log where you are right now.</p>

      <StatusArea status={status} />

      {position && (
        <div className="coordinates">
          {position.latitude.toFixed(5)}, {position.longitude.toFixed(5)}
          <span className="accuracy"> (±{Math.round(position.accuracy)} m)</span>
        </div>
      )}

      <div className="actions">
        <button id="logButton" className="primary-button" onClick={sendLog} disabled={isSubmitting}>
          {isSubmitting ? 'Logging…' : '📝 Log it'}
        </button>
        <button id="retryLocationButton" className="link-button" onClick={fetchLocation}>
          🔄 Retry location
        </button>
        <button id="viewLogButton" className="link-button" onClick={() => onNavigate('/logs')}>
          📜 View log
        </button>
      </div>
    </div>
  );
};
