import type { TranscriptEntry } from '../screening/types';

export type UserPresence = 'present' | 'away';

/**
 * `manual`: the speech side commits a turn on its own end-of-utterance signal
 * (closed yes/no questions). `vad`: voice activity with an endpointing delay.
 */
export type TurnDetection = 'manual' | 'vad';

export interface ToolSpec {
  name: string;
  description: string;
  /** String argument names the model must fill. */
  parameters: string[];
}

/** What the LLM side should run as from now on: one per stage or task. */
export interface AgentActivation {
  agentId: string;
  instructions: string;
  tools: ToolSpec[];
  turnDetection: TurnDetection;
  minEndpointingDelaySec?: number;
}

export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
  /** Agent the model was running as when it issued the call. */
  agentId?: string;
}

export interface UsageReport {
  llmPromptTokens: number;
  llmCompletionTokens: number;
  ttsCharacters: number;
  sttAudioSeconds: number;
}

export interface SpeechEventHandlers {
  onUserState: (state: UserPresence) => void;
  /** A committed candidate utterance. */
  onUserTurn: (text: string) => void;
  /** Resolves to the text handed back to the model, if any. */
  onToolCall: (call: ToolCall) => Promise<string | undefined>;
  onConversationItem: (item: TranscriptEntry) => void;
  onUsage: (usage: Partial<UsageReport>) => void;
  onClosed: (reason: string) => void;
}

export interface SpeakOptions {
  allowInterruptions?: boolean;
}

/**
 * Speech and LLM collaborator for one call. Audio, STT, TTS and the model run
 * on the far side; the runtime only steers them.
 */
export interface SpeechSession {
  readonly callId: string;

  bind(handlers: SpeechEventHandlers): void;

  /** Speaks fixed text. Resolves once playback finished or was cut off. */
  say(text: string, options?: SpeakOptions): Promise<void>;
  /** Lets the model speak from instructions. Resolves once playback finished. */
  generateReply(instructions: string, options?: SpeakOptions): Promise<void>;

  activateAgent(activation: AgentActivation): void;
  clearUserTurn(): void;
  setUserAwayTimeout(seconds: number): void;
  setLanguage(language: string): void;

  /** Stops accepting input; with `drain` pending speech finishes first. */
  shutdown(options: { drain: boolean }): Promise<void>;
  close(reason: string): void;
}
