import { io, Socket } from 'socket.io-client';
import type { LogEntry } from '../types';
import { apiService } from './api';

// Debug logging: enabled in development, with ?debug=1, or window.__GEOLOG_DEBUG__ = true
const isDebug = (() => {
  try {
    const params = new URLSearchParams(window.location.search);
    const byEnv = process.env.NODE_ENV !== 'production';
    const byParam = params.has('debug');
    const byGlobal = Reflect.get(window, '__GEOLOG_DEBUG__') === true;
    return byEnv || byParam || byGlobal;
  } catch {
    return false;
  }
})();

type LogEntryHandler = (entry: LogEntry) => void;

class WebSocketService {
  private socket: Socket | null = null;
  private handlers = new Set<LogEntryHandler>();
  private maxReconnectAttempts = 5;

  connect(): Socket {
    if (this.socket) {
      return this.socket;
    }

    if (isDebug) console.log('🔌 Connecting to live log updates');

    const socket = io({
      path: '/socket.io',
      transports: ['polling', 'websocket'],
      reconnection: true,
      reconnectionAttempts: this.maxReconnectAttempts,
      reconnectionDelay: 1000,
    });

    socket.on('connect', () => {
      if (isDebug) console.log('🔌 Connected to GeoLog backend');
    });

    socket.on('disconnect', (reason) => {
      if (isDebug) console.log('🔌 Disconnected from backend:', reason);
    });

    socket.on('connect_error', (error) => {
      console.error('🔌 Connection error:', error.message);
    });

    socket.on('log_entry', (raw: unknown) => {
      const entry = apiService.toLogEntry(raw);
      if (!entry) return;
      this.handlers.forEach(handler => handler(entry));
    });

    this.socket = socket;
    return socket;
  }

  /** Subscribes to entries logged after this call. Returns the unsubscribe function. */
  onLogEntry(handler: LogEntryHandler): () => void {
    this.handlers.add(handler);
    this.connect();
    return () => {
      this.handlers.delete(handler);
      if (this.handlers.size === 0) this.disconnect();
    };
  }

  disconnect() {
    if (this.socket) {
      this.socket.disconnect();
      this.socket = null;
    }
  }
}

export const websocketService = new WebSocketService();
