import type { SessionState } from '../screening/sessionState';
import type { AgentActivation, SpeechSession, ToolCall } from '../speech/types';

/**
 * Anything that can be the active agent on the speech side: a stage, or a
 * task pushed on top of it. Only the top responder receives events.
 */
export interface Responder {
  readonly agentId: string;
  activation(): AgentActivation;
  handleToolCall(call: ToolCall): Promise<string | undefined>;
  handleUserTurn(text: string): void;
}

/** What a running task needs from the call that hosts it. */
export interface TaskHost {
  readonly state: SessionState;
  readonly speech: SpeechSession;
  readonly logContext: Record<string, unknown>;
  /** Makes `responder` the active agent. */
  push(responder: Responder): void;
  /** Removes `responder` and re-activates whatever is now on top. */
  pop(responder: Responder): void;
}
