import { randomUUID } from 'crypto';
import express, { NextFunction, Request, Response } from 'express';
import http from 'http';
import WebSocket, { WebSocketServer } from 'ws';
import { env } from './env';
import { SessionManager } from './calls/sessionManager';
import { log } from './log';
import { metricsHandler, metricsMiddleware } from './metrics';
import { createCallsRouter, type CallsRouterOptions } from './routes/calls';
import { healthRouter } from './routes/health';
import { WsSpeechSession } from './speech/wsSpeechSession';

type RequestWithId = Request & { id?: string };

function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incomingId = req.header('x-request-id');
  const requestId = incomingId && incomingId.trim() !== '' ? incomingId : randomUUID();
  res.setHeader('x-request-id', requestId);
  (req as RequestWithId).id = requestId;
  next();
}

function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  log.error({ err }, 'unhandled error');
  res.status(500).json({ error: 'internal_server_error' });
}

const SPEECH_PATH = /^\/v1\/calls\/([^/]+)\/speech$/;

export function parseSpeechRequest(request: http.IncomingMessage): { callId: string; token: string | null } | null {
  if (!request.url) {
    return null;
  }

  // Malformed urls and escapes are rejected like any other unknown path.
  try {
    const url = new URL(request.url, 'http://localhost');
    const match = SPEECH_PATH.exec(url.pathname);
    if (!match) {
      return null;
    }
    return {
      callId: decodeURIComponent(match[1]),
      token: url.searchParams.get('token'),
    };
  } catch {
    return null;
  }
}

function attachSpeechWebSocketServer(
  server: http.Server,
  sessionManager: SessionManager,
): WebSocketServer {
  const wss = new WebSocketServer({ noServer: true });

  server.on('upgrade', (request, socket, head) => {
    const parsed = parseSpeechRequest(request);
    if (!parsed) {
      socket.destroy();
      return;
    }

    if (!parsed.token || parsed.token !== env.SPEECH_CHANNEL_TOKEN) {
      log.warn({ event: 'speech_channel_unauthorized', call_id: parsed.callId }, 'speech channel token rejected');
      socket.destroy();
      return;
    }

    wss.handleUpgrade(request, socket, head, (ws) => {
      (ws as WebSocket & { callId?: string }).callId = parsed.callId;
      wss.emit('connection', ws, request);
    });
  });

  wss.on('connection', (ws: WebSocket) => {
    const callId = (ws as WebSocket & { callId?: string }).callId;

    if (!callId) {
      ws.close(1008, 'invalid_call_id');
      return;
    }

    const speech = new WsSpeechSession(callId, ws);
    const attached = sessionManager.attachSpeech(callId, speech);
    if (!attached.ok) {
      log.warn({ event: 'speech_channel_rejected', call_id: callId, reason: attached.reason }, 'speech channel rejected');
      ws.close(1008, attached.reason);
      return;
    }

    log.info({ event: 'speech_channel_connected', call_id: callId }, 'speech channel connected');
  });

  return wss;
}

export function buildServer(
  options: { sessionManager?: SessionManager; calls?: CallsRouterOptions } = {},
): { app: express.Express; server: http.Server; sessionManager: SessionManager } {
  const app = express();
  const sessionManager =
    options.sessionManager ??
    new SessionManager({
      idleTtlMinutes: env.SESSION_IDLE_TTL_MINUTES,
      drainTimeoutMs: env.CALL_DRAIN_TIMEOUT_MS,
    });

  app.disable('x-powered-by');
  app.use(express.json());
  app.use(requestIdMiddleware);
  app.use(metricsMiddleware);

  app.use('/health', healthRouter);
  app.get('/metrics', (req, res, next) => {
    metricsHandler(req, res).catch(next);
  });
  app.use('/v1/calls', createCallsRouter(sessionManager, options.calls));

  app.use(errorHandler);

  const server = http.createServer(app);
  attachSpeechWebSocketServer(server, sessionManager);

  return { app, server, sessionManager };
}
