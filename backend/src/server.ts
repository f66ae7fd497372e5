import { createServer } from 'http';
import { Server } from 'socket.io';
import { createApp, isOriginAllowed } from './app';
import { loadConfig, loadEnvFiles } from './config';
import { Database } from './database';
import { createReverseGeocoder, disabledGeocoder } from './geocoder';
import { LogNotifier, LogService } from './logService';

const envLoadedFrom = loadEnvFiles();
if (envLoadedFrom.length > 0) {
  console.log('🔎 Loaded .env from:', envLoadedFrom.join(', '));
} else {
  console.log('ℹ️  No .env file found; relying on process env');
}

const config = loadConfig();
const db = new Database(config.databasePath);
const connectedClients = new Set<string>();

const geocode = config.geocodingEnabled
  ? createReverseGeocoder({ url: config.geocoderUrl, userAgent: config.geocoderUserAgent })
  : disabledGeocoder;

const notifier: LogNotifier = {
  publish: entry => io.emit('log_entry', entry),
};

const service = new LogService({
  store: db,
  geocode,
  maxRows: config.maxRows,
  timezone: config.userTimezone,
  notifier,
});

const app = createApp({
  service,
  staticDir: config.staticDir,
  corsOrigins: config.corsOrigins,
  connectedClients: () => connectedClients.size,
});
const server = createServer(app);

const io = new Server(server, {
  cors: {
    origin: (origin, callback) => callback(null, isOriginAllowed(config.corsOrigins, origin || undefined)),
    methods: ['GET', 'POST'],
  },
});

io.on('connection', (socket) => {
  console.log('Client connected:', socket.id);
  connectedClients.add(socket.id);

  socket.on('disconnect', () => {
    console.log('Client disconnected:', socket.id);
    connectedClients.delete(socket.id);
  });
});

server.listen(config.port, () => {
  console.log(`📍 GeoLog server running on port ${config.port}`);
  console.log(`🗄️  Database: ${db.getPath()} (max ${config.maxRows} entries)`);
  console.log(`🕒 Display time zone: ${config.userTimezone}`);
  console.log(`🌍 Reverse geocoding: ${config.geocodingEnabled ? config.geocoderUrl : 'disabled'}`);
  console.log(`📂 Serving client from: ${config.staticDir}`);
});

const shutdown = () => {
  console.log('🛑 Shutting down gracefully...');
  // Closing socket.io also closes the underlying HTTP server
  io.close(() => {
    db.close()
      .then(() => {
        console.log('✅ Server closed');
        process.exit(0);
      })
      .catch((error: unknown) => {
        console.error('Error closing database:', error);
        process.exit(1);
      });
  });
};

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);
