import { setTimeout as delay } from 'timers/promises';
import { DialogueTask } from '../dialogue/dialogueTask';
import { isCallEnded } from '../dialogue/errors';
import type { Responder } from '../dialogue/types';
import { message, type MessageKey } from '../i18n/messages';
import { log } from '../log';
import { incStageError, incToolCall, recordCallMetrics, startStageTimer } from '../metrics';
import { logCallEvent } from '../observability/callLogs';
import { buildCallResult, type CallResultPayload } from '../screening/outcome';
import { createSessionState, withSilenceSuppressed, type SessionState } from '../screening/sessionState';
import type { CallStatus, SessionInput, StageName, TranscriptEntry } from '../screening/types';
import type { SpeechSession, ToolCall, UserPresence } from '../speech/types';
import { createStage, startTarget } from '../stages/registry';
import type {
  EndReason,
  StageAgent,
  StageContext,
  StageRuntime,
  StageTarget,
  StageTransition,
} from '../stages/stageAgent';
import { UsageTracker, type UsageSummary } from '../usage/usageTracker';

/** Silence events tolerated before the call is closed. */
export const MAX_SILENCE_PROMPTS = 2;

/** Closing line plus drain; a speech side that never acks must not hold the call. */
export const DRAIN_TIMEOUT_MS = 15_000;

export type CallPhase = 'created' | 'active' | 'ending' | 'ended';

/** Resolves true when `work` was still running after `ms`. */
async function finishWithin(work: Promise<void>, ms: number): Promise<boolean> {
  const timer = new AbortController();
  const expired = delay(ms, true, { signal: timer.signal }).catch(() => false);
  try {
    return await Promise.race([work.then(() => false), expired]);
  } finally {
    timer.abort();
  }
}

export interface CallEndSummary {
  callId: string;
  reason: EndReason;
  status?: CallStatus;
  result?: CallResultPayload;
  usage: UsageSummary;
  durationMs: number;
}

export interface ScreeningCallOptions {
  input: SessionInput;
  speech: SpeechSession;
  runtime: StageRuntime;
  /** Result delivery; not called for playground calls. */
  deliverResult?: (payload: CallResultPayload) => Promise<unknown>;
  /** Usage persistence; failures are logged only. */
  saveUsage?: (summary: UsageSummary) => Promise<unknown>;
  /** Last teardown step: capacity release and registry removal. */
  onEnded?: (summary: CallEndSummary) => Promise<void> | void;
  requestId?: string;
  /** Upper bound on the closing line and speech drain before teardown goes ahead. */
  drainTimeoutMs?: number;
}

export interface CallSnapshot {
  call_id: string;
  phase: CallPhase;
  stage: StageName | null;
  active_agent: string | null;
  language: string;
  silence_count: number;
  irrelevant_count: number;
  knockout_answers: number;
  open_answers: number;
  end_reason: EndReason | null;
  status: CallStatus | null;
}

function responderKind(agentId: string): string {
  const [kind, detail] = agentId.split(':');
  return kind === 'stage' && detail ? detail : kind;
}

/**
 * Runs one screening call: exactly one stage is active at a time, with the
 * tasks it started stacked on top. Every way out of the call goes through
 * `end`, which plays an optional closing line, drains speech and tears down.
 */
export class ScreeningCall implements StageContext {
  public readonly state: SessionState;
  public readonly speech: SpeechSession;
  public readonly runtime: StageRuntime;
  public readonly logContext: Record<string, unknown>;

  private readonly options: ScreeningCallOptions;
  private readonly usage = new UsageTracker();
  private readonly transcript: TranscriptEntry[] = [];
  private readonly createdAt = Date.now();

  private responders: Responder[] = [];
  private stage?: StageAgent;
  private stopStageTimer?: () => void;
  private phase: CallPhase = 'created';
  private transitioning = false;
  private speechOpen = true;
  private turns = 0;
  private lastActivityAt = Date.now();
  private endReason?: EndReason;
  private status?: CallStatus;
  private ending?: Promise<CallEndSummary>;
  private resolveEnded: (summary: CallEndSummary) => void = () => undefined;
  private readonly ended = new Promise<CallEndSummary>((resolve) => {
    this.resolveEnded = resolve;
  });

  constructor(options: ScreeningCallOptions) {
    this.options = options;
    this.state = createSessionState(options.input);
    this.speech = options.speech;
    this.runtime = options.runtime;
    this.logContext = { call_id: options.input.callId, requestId: options.requestId };
  }

  public get callId(): string {
    return this.state.input.callId;
  }

  /** Binds the speech channel and activates the first stage. */
  public start(): void {
    if (this.phase !== 'created') {
      throw new Error(`call ${this.callId} already started`);
    }
    this.phase = 'active';
    this.speech.bind({
      onUserState: (presence) => this.onUserState(presence),
      onUserTurn: (text) => this.onUserTurn(text),
      onToolCall: (call) => this.onToolCall(call),
      onConversationItem: (item) => this.onConversationItem(item),
      onUsage: (report) => this.usage.add(report),
      onClosed: (reason) => this.onSpeechClosed(reason),
    });
    this.speech.setUserAwayTimeout(this.runtime.userAwayTimeoutS);

    const target = startTarget(this);
    logCallEvent('call_started', this.callId, {
      start_stage: target.stage,
      playground: this.state.input.isPlayground,
      requestId: this.options.requestId,
    });
    void this.enterStage(target);
  }

  /** Resolves once teardown finished. */
  public whenEnded(): Promise<CallEndSummary> {
    return this.ended;
  }

  public getPhase(): CallPhase {
    return this.phase;
  }

  public getActiveStage(): StageName | undefined {
    return this.stage?.name;
  }

  public getLastActivityAt(): Date {
    return new Date(this.lastActivityAt);
  }

  public getTranscript(): TranscriptEntry[] {
    return [...this.transcript];
  }

  public snapshot(): CallSnapshot {
    const top = this.top();
    return {
      call_id: this.callId,
      phase: this.phase,
      stage: this.stage?.name ?? null,
      active_agent: top?.agentId ?? null,
      language: this.state.language,
      silence_count: this.state.silenceCount,
      irrelevant_count: this.state.irrelevantCount,
      knockout_answers: this.state.knockoutAnswers.length,
      open_answers: this.state.openAnswers.length,
      end_reason: this.endReason ?? null,
      status: this.status ?? null,
    };
  }

  // ---------- TaskHost ----------

  public push(responder: Responder): void {
    this.responders.push(responder);
    if (this.phase === 'active') {
      this.speech.activateAgent(responder.activation());
    }
  }

  public pop(responder: Responder): void {
    const index = this.responders.lastIndexOf(responder);
    if (index === -1) {
      return;
    }
    this.responders.splice(index, 1);
    const top = this.top();
    if (top && this.phase === 'active') {
      this.speech.activateAgent(top.activation());
    }
  }

  // ---------- StageContext ----------

  public transition(from: StageAgent, transition: StageTransition): void {
    if (transition.type === 'stay') {
      return;
    }
    if (from !== this.stage || this.phase !== 'active') {
      log.warn(
        { event: 'stage_transition_stale', from: from.name, transition: transition.type, ...this.logContext },
        'transition from inactive stage ignored',
      );
      return;
    }
    if (this.transitioning) {
      log.warn(
        { event: 'stage_transition_duplicate', from: from.name, transition: transition.type, ...this.logContext },
        'transition already in progress',
      );
      return;
    }
    this.transitioning = true;
    void this.applyTransition(from, transition);
  }

  public continueWith(from: StageAgent, work: () => Promise<StageTransition>): void {
    if (from !== this.stage || this.phase !== 'active') {
      return;
    }
    void work().then(
      (next) => this.transition(from, next),
      (error: unknown) => this.onStageError(from, error),
    );
  }

  // ---------- ending ----------

  /** Hangs up without a closing line (operator hang-up, idle sweep). */
  public hangup(reason: EndReason = 'hangup'): Promise<CallEndSummary> {
    return this.end(reason);
  }

  public end(reason: EndReason, options: { closing?: string; pauseMs?: number } = {}): Promise<CallEndSummary> {
    if (!this.ending) {
      this.ending = this.runEnd(reason, options);
    }
    return this.ending;
  }

  private async runEnd(reason: EndReason, options: { closing?: string; pauseMs?: number }): Promise<CallEndSummary> {
    this.phase = 'ending';
    this.endReason = reason;
    this.finishStage();
    logCallEvent('call_ending', this.callId, { reason, stage: this.stage?.name });

    for (const responder of [...this.responders].reverse()) {
      if (responder instanceof DialogueTask) {
        responder.abandon(reason);
      }
    }

    if (this.speechOpen) {
      const drainTimeoutMs = this.options.drainTimeoutMs ?? DRAIN_TIMEOUT_MS;
      try {
        const timedOut = await finishWithin(this.drainSpeech(options), drainTimeoutMs);
        if (timedOut) {
          log.warn(
            { event: 'call_drain_timeout', reason, timeout_ms: drainTimeoutMs, ...this.logContext },
            'speech drain timed out',
          );
        }
      } catch (error) {
        log.warn({ err: error, event: 'call_drain_failed', reason, ...this.logContext }, 'speech drain failed');
      }
    }

    return this.teardown(reason);
  }

  private async drainSpeech(options: { closing?: string; pauseMs?: number }): Promise<void> {
    const closing = options.closing;
    if (closing) {
      await withSilenceSuppressed(this.state, () => this.speech.say(closing, { allowInterruptions: false }));
    }
    if (!this.speechOpen) {
      return;
    }
    if (options.pauseMs) {
      await delay(options.pauseMs);
    }
    await this.speech.shutdown({ drain: true });
  }

  /** Each step runs even when an earlier one failed. */
  private async teardown(reason: EndReason): Promise<CallEndSummary> {
    let result: CallResultPayload | undefined;
    try {
      result = buildCallResult(this.state);
      this.status = result.status;
      logCallEvent('call_outcome', this.callId, { status: result.status, reason });
    } catch (error) {
      log.error({ err: error, event: 'call_outcome_failed', ...this.logContext }, 'outcome resolution failed');
    }

    const usage = this.usage.summary();
    try {
      if (result) {
        result.transcript = this.getTranscript();
      }
      logCallEvent('call_usage', this.callId, { ...usage, transcript_messages: this.transcript.length });
      const saveUsage = this.options.saveUsage;
      if (saveUsage) {
        void Promise.resolve()
          .then(() => saveUsage(usage))
          .catch((error: unknown) => {
            log.warn({ err: error, event: 'usage_save_failed', ...this.logContext }, 'usage save failed');
          });
      }
    } catch (error) {
      log.error({ err: error, event: 'call_usage_failed', ...this.logContext }, 'usage summary failed');
    }

    try {
      if (!result) {
        log.warn({ event: 'call_result_missing', ...this.logContext }, 'no call result to deliver');
      } else if (this.state.input.isPlayground) {
        log.info({ event: 'call_result_skipped_playground', ...this.logContext }, 'playground call, result not delivered');
      } else if (this.options.deliverResult) {
        await this.options.deliverResult(result);
      }
    } catch (error) {
      log.error({ err: error, event: 'call_result_delivery_failed', ...this.logContext }, 'result delivery failed');
    }

    const durationMs = Date.now() - this.createdAt;
    const summary: CallEndSummary = {
      callId: this.callId,
      reason,
      status: this.status,
      result,
      usage,
      durationMs,
    };

    try {
      this.speechOpen = false;
      this.speech.close(reason);
    } catch (error) {
      log.warn({ err: error, event: 'speech_close_failed', ...this.logContext }, 'speech close failed');
    }
    try {
      await this.options.onEnded?.(summary);
    } catch (error) {
      log.error({ err: error, event: 'call_release_failed', ...this.logContext }, 'call release failed');
    }

    this.phase = 'ended';
    this.responders = [];
    recordCallMetrics({ status: this.status, reason, durationMs, turns: this.turns });
    logCallEvent('call_torn_down', this.callId, {
      reason,
      status: this.status,
      turns: this.turns,
      session_duration_ms: durationMs,
    });
    this.resolveEnded(summary);
    return summary;
  }

  // ---------- stages ----------

  private async applyTransition(from: StageAgent, transition: StageTransition): Promise<void> {
    try {
      if (transition.type === 'end') {
        this.transitioning = false;
        await this.end(transition.reason, { closing: transition.closing, pauseMs: transition.pauseMs });
        return;
      }
      if (transition.type === 'handoff') {
        const closing = transition.closing;
        if (closing) {
          await withSilenceSuppressed(this.state, () => this.speech.say(closing, { allowInterruptions: false }));
        }
        if (this.phase !== 'active') {
          return;
        }
        log.info(
          { event: 'stage_handoff', from: from.name, to: transition.target.stage, ...this.logContext },
          'stage hand-off',
        );
        await this.enterStage(transition.target);
      }
    } catch (error) {
      this.onStageError(from, error);
    }
  }

  private async enterStage(target: StageTarget): Promise<void> {
    let stage: StageAgent;
    try {
      stage = createStage(target, this);
    } catch (error) {
      log.error({ err: error, event: 'stage_create_failed', stage: target.stage, ...this.logContext }, 'stage creation failed');
      await this.end('error');
      return;
    }

    this.finishStage();
    for (const responder of this.responders) {
      if (responder instanceof DialogueTask) {
        responder.abandon('stage_replaced');
      }
    }
    this.stage = stage;
    this.responders = [stage];
    this.transitioning = false;
    this.state.silenceCount = 0;
    this.stopStageTimer = startStageTimer(stage.name);
    this.speech.activateAgent(stage.activation());
    logCallEvent('stage_entered', this.callId, { stage: stage.name, tools: stage.toolNames() });

    try {
      const next = await stage.onEnter();
      this.transition(stage, next);
    } catch (error) {
      this.onStageError(stage, error);
    }
  }

  private onStageError(stage: StageAgent, error: unknown): void {
    this.transitioning = false;
    if (isCallEnded(error)) {
      log.debug({ event: 'stage_abandoned', stage: stage.name, reason: error.reason, ...this.logContext }, 'stage abandoned');
      return;
    }
    incStageError(stage.name);
    log.error({ err: error, event: 'stage_failed', stage: stage.name, ...this.logContext }, 'stage failed');
    if (stage === this.stage) {
      void this.end('error');
    }
  }

  private finishStage(): void {
    this.stopStageTimer?.();
    this.stopStageTimer = undefined;
  }

  private top(): Responder | undefined {
    return this.responders[this.responders.length - 1];
  }

  private msg(key: MessageKey): string {
    return message(this.state.language, key);
  }

  // ---------- speech events ----------

  private onUserState(presence: UserPresence): void {
    if (this.phase !== 'active') {
      return;
    }
    if (presence === 'present') {
      this.lastActivityAt = Date.now();
      this.state.silenceCount = 0;
      return;
    }
    if (this.state.suppressSilence) {
      return;
    }

    this.state.silenceCount += 1;
    log.info(
      { event: 'candidate_silent', silence_count: this.state.silenceCount, stage: this.stage?.name, ...this.logContext },
      'candidate silent',
    );
    if (this.state.silenceCount < MAX_SILENCE_PROMPTS) {
      void this.speech.say(this.msg('silence_prompt')).catch((error: unknown) => {
        log.warn({ err: error, event: 'silence_prompt_failed', ...this.logContext }, 'silence prompt failed');
      });
      return;
    }
    void this.end('silence', { closing: this.msg('silence_shutdown') });
  }

  private onUserTurn(text: string): void {
    if (this.phase !== 'active') {
      return;
    }
    this.turns += 1;
    this.lastActivityAt = Date.now();
    this.top()?.handleUserTurn(text);
  }

  private async onToolCall(call: ToolCall): Promise<string | undefined> {
    const top = this.top();
    if (this.phase !== 'active' || !top) {
      incToolCall(top ? responderKind(top.agentId) : 'none', 'call_ended');
      log.warn({ event: 'tool_call_after_end', tool: call.name, ...this.logContext }, 'tool call after call ended');
      return undefined;
    }
    if (call.agentId !== undefined && call.agentId !== top.agentId) {
      incToolCall(responderKind(call.agentId), 'stale_agent');
      log.warn(
        { event: 'tool_call_stale_agent', tool: call.name, agent_id: call.agentId, active_agent: top.agentId, ...this.logContext },
        'tool call for inactive agent ignored',
      );
      return undefined;
    }

    this.lastActivityAt = Date.now();
    incToolCall(responderKind(top.agentId), 'handled');
    return top.handleToolCall(call);
  }

  private onConversationItem(item: TranscriptEntry): void {
    if (item.message.trim() === '') {
      return;
    }
    this.transcript.push(item);
  }

  private onSpeechClosed(reason: string): void {
    this.speechOpen = false;
    if (this.phase !== 'active') {
      return;
    }
    log.info({ event: 'speech_closed', reason, ...this.logContext }, 'speech channel closed');
    void this.end(reason === 'hangup' ? 'hangup' : 'speech_closed');
  }
}
