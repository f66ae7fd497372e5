import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import path from 'path';
import { LogService } from './logService';
import { NOT_AN_OBJECT } from './validation';

export interface AppDependencies {
  service: LogService;
  staticDir: string;
  corsOrigins: string[];
  connectedClients?: () => number;
}

const localhostOrigin = /^https?:\/\/localhost(:\d+)?$/;

export const isOriginAllowed = (allowed: string[], origin?: string): boolean => {
  if (!origin) return true; // non-browser clients
  if (allowed.includes(origin)) return true;
  return localhostOrigin.test(origin);
};

// body-parser errors carry a type such as 'entity.too.large' or 'request.aborted'
const isBodyReadError = (err: unknown): boolean =>
  typeof err === 'object' && err !== null && 'type' in err && typeof err.type === 'string' &&
  (err.type.startsWith('entity.') || err.type.startsWith('request.'));

/**
 * Decodes a raw request body. Anything that is not a non-empty JSON document
 * (no body, an empty one, malformed JSON) becomes undefined, which the log
 * service rejects as not an object once it has checked capacity.
 */
export const decodeJsonBody = (raw: unknown): unknown => {
  if (typeof raw !== 'string' || raw.trim() === '') return undefined;
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
};

export const ROBOTS_TXT = 'User-agent: *\nDisallow: /logs\n';

export function createApp({ service, staticDir, corsOrigins, connectedClients = () => 0 }: AppDependencies) {
  const app = express();
  const indexHtml = path.join(staticDir, 'index.html');

  // The client may be served over plain HTTP on a LAN host
  app.use(helmet({ contentSecurityPolicy: { directives: { upgradeInsecureRequests: null } } }));
  // Unlisted origins get no CORS headers; same-origin requests from the served client still go through
  app.use(cors({
    origin: (origin, callback) => callback(null, isOriginAllowed(corsOrigins, origin)),
  }));

  // Bodies are read as JSON whatever the declared content type
  app.post('/log', express.text({ type: () => true }), async (req, res) => {
    try {
      const result = await service.record(decodeJsonBody(req.body));
      res.status(result.status).json(result.body);
    } catch (error) {
      console.error('Error logging location:', error);
      res.status(500).json({ success: false, error: 'Internal error' });
    }
  });

  app.get('/api/logs', async (req, res) => {
    try {
      const limitParam = typeof req.query.limit === 'string' ? parseInt(req.query.limit, 10) : NaN;
      const entries = await service.list(Number.isInteger(limitParam) && limitParam > 0 ? limitParam : undefined);
      res.json(entries);
    } catch (error) {
      console.error('Error fetching log entries:', error);
      res.status(500).json({ error: 'Failed to fetch log entries' });
    }
  });

  app.get('/robots.txt', (req, res) => {
    res.type('text/plain').send(ROBOTS_TXT);
  });

  app.get('/health', async (req, res) => {
    try {
      res.json({
        status: 'ok',
        timestamp: new Date().toISOString(),
        connectedClients: connectedClients(),
        entries: await service.count(),
      });
    } catch (error) {
      console.error('Error in /health:', error);
      res.status(500).json({ status: 'error' });
    }
  });

  app.use(express.static(staticDir, { index: false }));

  // The client decides which page to show from the path
  app.get(['/', '/logs'], (req, res, next) => {
    res.sendFile(indexHtml, err => {
      if (err) next(err);
    });
  });

  app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (isBodyReadError(err)) {
      res.status(400).json({ success: false, error: NOT_AN_OBJECT });
      return;
    }
    console.error('Unhandled error:', err);
    res.status(500).json({ success: false, error: 'Internal server error' });
  });

  return app;
}
