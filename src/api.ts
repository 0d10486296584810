import express, { NextFunction, Request, Response } from 'express';
import { Server } from 'http';
import { z } from 'zod';
import { config } from './config';
import { ErrorCode, isManagerError } from './errors';
import { errorMessage, log } from './logger';
import { checkProfileHealth } from './health';
import { ProfileManager } from './manager';

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  'profile-not-found': 404,
  'config-missing': 404,
  'profile-running': 409,
  'duplicate-name': 409,
  'artifact-exists': 409,
  'port-contended': 409,
  'port-busy': 409,
  'invalid-config': 400,
  'port-out-of-range': 400,
  'limit-reached': 503,
  'executable-not-found': 500,
  'launch-failed': 500
};

const portNumber = z.number().int().min(1).max(65535);

const ImportSchema = z.union([
  z.object({ name: z.string().min(1), content: z.string().min(1) }),
  z.object({ url: z.string().url() })
]);

const UpdateSchema = z.object({
  name: z.string().min(1).optional(),
  content: z.string().optional()
});

const ConnectSchema = z.object({
  port: portNumber.optional(),
  override: z.boolean().optional()
});

const AutoConnectSchema = z.object({
  names: z.array(z.string()).optional(),
  from: z.string().optional(),
  startPort: portNumber.optional()
});

const SettingsSchema = z.object({
  portLimit: z.number().int().min(0).optional(),
  proxyType: z.enum(['socks', 'http']).optional(),
  wireproxyPath: z.string().min(1).optional(),
  loggingEnabled: z.boolean().optional()
});

type Handler = (req: Request, res: Response) => Promise<void> | void;

/** Forward rejections to the error middleware. */
const route = (handler: Handler) => (req: Request, res: Response, next: NextFunction) => {
  Promise.resolve()
    .then(() => handler(req, res))
    .catch(next);
};

export function createApp(manager: ProfileManager): express.Express {
  const app = express();

  app.use(express.json());

  app.get('/profiles', route((_req, res) => {
    res.json(manager.list());
  }));

  app.post('/profiles', route(async (req, res) => {
    const body = ImportSchema.parse(req.body);
    const profile = 'url' in body
      ? await manager.importUrl(body.url)
      : manager.importText(body.name, body.content);
    res.status(201).json(manager.view(profile));
  }));

  app.patch('/profiles/:name', route((req, res) => {
    const body = UpdateSchema.parse(req.body);
    const profile = manager.update(req.params.name, body.name ?? req.params.name, body.content);
    res.json(manager.view(profile));
  }));

  app.delete('/profiles/:name', route(async (req, res) => {
    await manager.delete(req.params.name);
    res.status(204).send();
  }));

  app.post('/profiles/:name/connect', route(async (req, res) => {
    const body = ConnectSchema.parse(req.body ?? {});
    const result = await manager.connect(req.params.name, {
      port: body.port,
      confirmOverride: () => body.override === true
    });
    res.json(result);
  }));

  app.post('/profiles/:name/disconnect', route(async (req, res) => {
    await manager.disconnect(req.params.name);
    res.json(manager.view(manager.get(req.params.name)));
  }));

  app.get('/profiles/:name/health', route(async (req, res) => {
    res.json(await checkProfileHealth(manager, req.params.name));
  }));

  app.post('/auto-connect', route(async (req, res) => {
    const body = AutoConnectSchema.parse(req.body ?? {});
    const started = await manager.startAutoConnect(body);
    if (!started) {
      res.status(409).json({ error: 'Auto-connect is already running' });
      return;
    }
    res.status(202).json({ started: true });
  }));

  app.get('/settings', route((_req, res) => {
    res.json({ ...manager.getSettings(), ...manager.status() });
  }));

  app.put('/settings', route((req, res) => {
    res.json(manager.updateSettings(SettingsSchema.parse(req.body)));
  }));

  app.get('/events', (req, res) => {
    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive'
    });
    res.write(': connected\n\n');

    const unsubscribe = manager.events.onAny((event) => {
      res.write(`event: ${event.type}\ndata: ${JSON.stringify(event)}\n\n`);
    });
    req.on('close', unsubscribe);
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof z.ZodError) {
      res.status(400).json({ error: 'Invalid request', issues: err.issues.map((i) => i.message) });
      return;
    }
    if (isManagerError(err)) {
      res.status(STATUS_BY_CODE[err.code]).json({ error: err.message, code: err.code });
      return;
    }
    log.error('Unhandled API error', { error: errorMessage(err) });
    res.status(500).json({ error: errorMessage(err) });
  });

  return app;
}

export function startApi(manager: ProfileManager, port: number = config.restPort): Server {
  return createApp(manager).listen(port, '127.0.0.1', () => {
    log.api(`REST API listening on http://127.0.0.1:${port}`);
  });
}
