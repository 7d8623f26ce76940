import { Request, Response, Router } from 'express';
import { SessionManager } from '../calls/sessionManager';
import { env } from '../env';
import { tryAcquire, type CapacityParams, type CapacityResult } from '../limits/capacity';
import { log } from '../log';
import { SessionInputSchema } from '../screening/types';

type RequestWithId = Request & { id?: string };

export interface CallsRouterOptions {
  acquire?: (params: CapacityParams) => Promise<CapacityResult>;
  /** Read per request so tests can point it elsewhere. */
  speechToken?: () => string;
}

export function buildSpeechUrl(callId: string, token: string, publicBaseUrl: string = env.PUBLIC_BASE_URL): string {
  const trimmedBase = publicBaseUrl.replace(/\/$/, '');
  let wsBase = trimmedBase;
  if (trimmedBase.startsWith('https://')) {
    wsBase = `wss://${trimmedBase.slice('https://'.length)}`;
  } else if (trimmedBase.startsWith('http://')) {
    wsBase = `ws://${trimmedBase.slice('http://'.length)}`;
  } else if (!trimmedBase.startsWith('ws://') && !trimmedBase.startsWith('wss://')) {
    wsBase = `wss://${trimmedBase}`;
  }
  return `${wsBase}/v1/calls/${encodeURIComponent(callId)}/speech?token=${encodeURIComponent(token)}`;
}

export function createCallsRouter(sessionManager: SessionManager, options: CallsRouterOptions = {}): Router {
  const router = Router();
  const acquire = options.acquire ?? tryAcquire;
  const speechToken = options.speechToken ?? (() => env.SPEECH_CHANNEL_TOKEN);

  router.post('/', async (req: Request, res: Response) => {
    const requestId = (req as RequestWithId).id;
    const parsed = SessionInputSchema.safeParse(req.body);
    if (!parsed.success) {
      log.warn(
        { event: 'call_input_invalid', issues: parsed.error.issues.length, requestId },
        'invalid session input',
      );
      res.status(400).json({ error: 'invalid_session_input', issues: parsed.error.issues });
      return;
    }

    const input = parsed.data;
    if (sessionManager.has(input.callId)) {
      res.status(409).json({ error: 'call_exists', call_id: input.callId });
      return;
    }

    let admission: CapacityResult;
    try {
      admission = await acquire({ callId: input.callId, requestId });
    } catch (error) {
      log.error({ err: error, event: 'call_admission_failed', call_id: input.callId, requestId }, 'call admission failed');
      res.status(503).json({ error: 'capacity_unavailable' });
      return;
    }
    if (!admission.ok) {
      res.status(429).json({ error: admission.reason, call_id: input.callId });
      return;
    }

    // Admission is idempotent per call id: the slot stays with the request that registered.
    if (!sessionManager.register(input, { requestId })) {
      res.status(409).json({ error: 'call_exists', call_id: input.callId });
      return;
    }
    res.status(201).json({
      call_id: input.callId,
      speech_url: buildSpeechUrl(input.callId, speechToken()),
    });
  });

  router.get('/:callId', (req: Request, res: Response) => {
    const view = sessionManager.view(req.params.callId);
    if (!view) {
      res.status(404).json({ error: 'call_not_found' });
      return;
    }
    res.status(200).json(view);
  });

  router.delete('/:callId', async (req: Request, res: Response) => {
    const requestId = (req as RequestWithId).id;
    let ended: boolean;
    try {
      ended = await sessionManager.hangup(req.params.callId, { requestId });
    } catch (error) {
      log.error({ err: error, event: 'call_hangup_failed', call_id: req.params.callId, requestId }, 'call hangup failed');
      res.status(500).json({ error: 'internal_server_error' });
      return;
    }
    if (!ended) {
      res.status(404).json({ error: 'call_not_found' });
      return;
    }
    res.status(200).json({ call_id: req.params.callId, ended: true });
  });

  return router;
}
