import { log } from '../log';

/** Milestones of a call, logged under one message so they can be filtered together. */
export type CallEvent =
  | 'call_started'
  | 'stage_entered'
  | 'call_ending'
  | 'call_outcome'
  | 'call_usage'
  | 'call_torn_down';

export function logCallEvent(event: CallEvent, callId: string, payload: Record<string, unknown> = {}): void {
  log.info({ event, call_id: callId, ...payload }, 'call event');
}
