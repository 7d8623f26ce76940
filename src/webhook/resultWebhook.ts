import { env } from '../env';
import { log } from '../log';
import type { CallResultPayload } from '../screening/outcome';

export const CALL_RESULT_PATH = '/webhook/livekit/call-result';

export interface ResultWebhookOptions {
  baseUrl?: string;
  secret?: string;
  timeoutMs?: number;
}

export type DeliveryOutcome = 'delivered' | 'rejected' | 'failed' | 'not_configured';

export function buildWebhookUrl(base: string): string {
  return `${base.replace(/\/$/, '')}${CALL_RESULT_PATH}`;
}

async function readResponseText(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch {
    return '';
  }
}

/**
 * Posts the final call result to the backend once. Never throws: every
 * failure is logged and reported through the returned outcome.
 */
export async function deliverCallResult(
  payload: CallResultPayload,
  options: ResultWebhookOptions = {},
): Promise<DeliveryOutcome> {
  const baseUrl = options.baseUrl ?? env.BACKEND_WEBHOOK_URL;
  if (!baseUrl) {
    log.warn(
      { event: 'call_result_webhook_not_configured', call_id: payload.call_id },
      'backend webhook url not set, result not delivered',
    );
    return 'not_configured';
  }

  const url = buildWebhookUrl(baseUrl);
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs ?? env.WEBHOOK_TIMEOUT_MS);

  try {
    const response = await fetch(url, {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        'x-webhook-secret': options.secret ?? env.WEBHOOK_SECRET ?? '',
      },
      body: JSON.stringify(payload),
      signal: controller.signal,
    });

    if (!response.ok) {
      const body = await readResponseText(response);
      log.error(
        {
          event: 'call_result_webhook_rejected',
          call_id: payload.call_id,
          status: response.status,
          body_preview: body.slice(0, 200),
        },
        'backend webhook rejected call result',
      );
      return 'rejected';
    }

    log.info(
      {
        event: 'call_result_webhook_delivered',
        call_id: payload.call_id,
        status: response.status,
        call_status: payload.status,
      },
      'call result delivered',
    );
    return 'delivered';
  } catch (error) {
    log.error(
      { err: error, event: 'call_result_webhook_failed', call_id: payload.call_id, url },
      'call result delivery failed',
    );
    return 'failed';
  } finally {
    clearTimeout(timeout);
  }
}
