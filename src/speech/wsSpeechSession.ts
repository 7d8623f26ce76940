import { randomUUID } from 'crypto';
import type { EventEmitter } from 'events';
import { z } from 'zod';
import { log } from '../log';
import type {
  AgentActivation,
  SpeakOptions,
  SpeechEventHandlers,
  SpeechSession,
  ToolCall,
} from './types';

const WS_OPEN = 1;

/** The part of a `ws` WebSocket the session uses; tests pass an in-process fake. */
export interface SpeechSocket extends EventEmitter {
  readonly readyState: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

const InboundMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('user_state'), state: z.enum(['present', 'away']) }),
  z.object({ type: z.literal('user_turn'), text: z.string() }),
  z.object({
    type: z.literal('tool_call'),
    id: z.string().min(1),
    name: z.string().min(1),
    arguments: z.record(z.unknown()).default({}),
    agent_id: z.string().optional(),
  }),
  z.object({ type: z.literal('speech_done'), id: z.string().min(1) }),
  z.object({
    type: z.literal('conversation_item'),
    role: z.enum(['user', 'assistant', 'system']),
    message: z.string(),
  }),
  z.object({
    type: z.literal('usage'),
    llm_prompt_tokens: z.number().nonnegative().optional(),
    llm_completion_tokens: z.number().nonnegative().optional(),
    tts_characters: z.number().nonnegative().optional(),
    stt_audio_seconds: z.number().nonnegative().optional(),
  }),
  z.object({ type: z.literal('closed'), reason: z.string().default('remote_closed') }),
]);

export type InboundMessage = z.infer<typeof InboundMessageSchema>;

export type OutboundMessage =
  | { type: 'say'; id: string; text: string; allow_interruptions: boolean }
  | { type: 'generate_reply'; id: string; instructions: string; allow_interruptions: boolean }
  | {
      type: 'set_agent';
      agent_id: string;
      instructions: string;
      tools: AgentActivation['tools'];
      turn_detection: AgentActivation['turnDetection'];
      min_endpointing_delay_s: number | null;
    }
  | { type: 'set_user_away_timeout'; seconds: number }
  | { type: 'clear_user_turn' }
  | { type: 'switch_language'; language: string }
  | { type: 'tool_result'; id: string; output: string | null; error?: string }
  | { type: 'shutdown'; drain: boolean };

function rawToText(data: unknown): string | null {
  if (typeof data === 'string') {
    return data;
  }
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data.filter((chunk): chunk is Buffer => Buffer.isBuffer(chunk))).toString('utf8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf8');
  }
  return null;
}

export function parseInboundMessage(data: unknown): InboundMessage | null {
  const text = rawToText(data);
  if (text === null) {
    return null;
  }
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return null;
  }
  const parsed = InboundMessageSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

/**
 * Speech session over a JSON WebSocket channel. Speech requests carry an id
 * and resolve when the far side reports `speech_done` for it, or when the
 * channel closes.
 */
export class WsSpeechSession implements SpeechSession {
  private handlers?: SpeechEventHandlers;
  private readonly pendingSpeech = new Map<string, { done: Promise<void>; resolve: () => void }>();
  private shuttingDown = false;
  private closed = false;

  constructor(
    public readonly callId: string,
    private readonly socket: SpeechSocket,
  ) {
    socket.on('message', (data: unknown) => this.onMessage(data));
    socket.on('close', () => this.onSocketClosed('hangup'));
    socket.on('error', (error: unknown) => {
      log.error({ err: error, event: 'speech_socket_error', call_id: this.callId }, 'speech websocket error');
    });
  }

  public bind(handlers: SpeechEventHandlers): void {
    this.handlers = handlers;
  }

  public say(text: string, options: SpeakOptions = {}): Promise<void> {
    return this.speak((id) => ({
      type: 'say',
      id,
      text,
      allow_interruptions: options.allowInterruptions ?? true,
    }));
  }

  public generateReply(instructions: string, options: SpeakOptions = {}): Promise<void> {
    return this.speak((id) => ({
      type: 'generate_reply',
      id,
      instructions,
      allow_interruptions: options.allowInterruptions ?? true,
    }));
  }

  public activateAgent(activation: AgentActivation): void {
    this.send({
      type: 'set_agent',
      agent_id: activation.agentId,
      instructions: activation.instructions,
      tools: activation.tools,
      turn_detection: activation.turnDetection,
      min_endpointing_delay_s: activation.minEndpointingDelaySec ?? null,
    });
  }

  public clearUserTurn(): void {
    this.send({ type: 'clear_user_turn' });
  }

  public setUserAwayTimeout(seconds: number): void {
    this.send({ type: 'set_user_away_timeout', seconds });
  }

  public setLanguage(language: string): void {
    this.send({ type: 'switch_language', language });
  }

  public async shutdown(options: { drain: boolean }): Promise<void> {
    if (this.shuttingDown) {
      return;
    }
    this.shuttingDown = true;
    this.send({ type: 'shutdown', drain: options.drain });
    if (options.drain) {
      await Promise.all([...this.pendingSpeech.values()].map((entry) => entry.done));
    } else {
      this.resolveAllSpeech();
    }
  }

  public close(reason: string): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.resolveAllSpeech();
    if (this.socket.readyState === WS_OPEN) {
      this.socket.close(1000, reason);
    }
  }

  public pendingSpeechCount(): number {
    return this.pendingSpeech.size;
  }

  private speak(build: (id: string) => OutboundMessage): Promise<void> {
    if (this.closed || this.shuttingDown || this.socket.readyState !== WS_OPEN) {
      return Promise.resolve();
    }
    const id = randomUUID();
    let resolve: () => void = () => undefined;
    const done = new Promise<void>((res) => {
      resolve = res;
    });
    this.pendingSpeech.set(id, { done, resolve });
    this.send(build(id));
    return done;
  }

  private send(message: OutboundMessage): void {
    if (this.closed || this.socket.readyState !== WS_OPEN) {
      return;
    }
    try {
      this.socket.send(JSON.stringify(message));
    } catch (error) {
      log.warn(
        { err: error, event: 'speech_send_failed', type: message.type, call_id: this.callId },
        'speech message send failed',
      );
    }
  }

  private resolveAllSpeech(): void {
    for (const entry of this.pendingSpeech.values()) {
      entry.resolve();
    }
    this.pendingSpeech.clear();
  }

  private onSocketClosed(reason: string): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.resolveAllSpeech();
    this.handlers?.onClosed(reason);
  }

  private onMessage(data: unknown): void {
    const message = parseInboundMessage(data);
    if (!message) {
      log.warn({ event: 'speech_message_invalid', call_id: this.callId }, 'invalid speech message ignored');
      return;
    }
    if (message.type === 'speech_done') {
      const entry = this.pendingSpeech.get(message.id);
      this.pendingSpeech.delete(message.id);
      entry?.resolve();
      return;
    }

    const handlers = this.handlers;
    if (!handlers) {
      log.warn(
        { event: 'speech_message_unbound', type: message.type, call_id: this.callId },
        'speech message before bind ignored',
      );
      return;
    }

    switch (message.type) {
      case 'user_state':
        handlers.onUserState(message.state);
        return;
      case 'user_turn':
        handlers.onUserTurn(message.text);
        return;
      case 'tool_call':
        this.runToolCall(handlers, {
          id: message.id,
          name: message.name,
          arguments: message.arguments,
          agentId: message.agent_id,
        });
        return;
      case 'conversation_item':
        handlers.onConversationItem({ role: message.role, message: message.message });
        return;
      case 'usage':
        handlers.onUsage({
          llmPromptTokens: message.llm_prompt_tokens,
          llmCompletionTokens: message.llm_completion_tokens,
          ttsCharacters: message.tts_characters,
          sttAudioSeconds: message.stt_audio_seconds,
        });
        return;
      case 'closed':
        this.onSocketClosed(message.reason);
        return;
    }
  }

  private runToolCall(handlers: SpeechEventHandlers, call: ToolCall): void {
    void handlers.onToolCall(call).then(
      (output) => this.send({ type: 'tool_result', id: call.id, output: output ?? null }),
      (error: unknown) => {
        log.error(
          { err: error, event: 'tool_call_failed', tool: call.name, call_id: this.callId },
          'tool call failed',
        );
        this.send({ type: 'tool_result', id: call.id, output: null, error: 'tool_failed' });
      },
    );
  }
}
