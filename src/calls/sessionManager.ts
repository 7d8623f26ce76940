import { release, type ReleaseParams } from '../limits/capacity';
import { log } from '../log';
import { setActiveCalls } from '../metrics';
import type { SessionInput } from '../screening/types';
import type { SpeechSession } from '../speech/types';
import { createCallDependencyFactory, type CallDependencyFactory } from './callDependencies';
import { ScreeningCall, type CallEndSummary, type CallSnapshot } from './screeningCall';

const DEFAULT_IDLE_TTL_MINUTES = 10;
const DEFAULT_SWEEP_INTERVAL_MS = 60_000;

export interface SessionLogContext {
  requestId?: string;
}

/** Admitted call still waiting for its speech channel. */
interface PendingCall {
  input: SessionInput;
  requestId?: string;
  createdAt: number;
}

export type CallView = CallSnapshot | { call_id: string; phase: 'pending' };

export type AttachResult =
  | { ok: true; call: ScreeningCall }
  | { ok: false; reason: 'not_found' | 'already_attached' };

/**
 * Registry of the calls this process holds. A call is registered when it is
 * admitted and starts once its speech channel connects; idle calls and
 * channels that never connect are swept.
 */
export class SessionManager {
  private readonly pending = new Map<string, PendingCall>();
  private readonly calls = new Map<string, ScreeningCall>();
  private readonly idleTtlMs: number;
  private readonly drainTimeoutMs?: number;
  private readonly sweepTimer: NodeJS.Timeout;
  private readonly capacityRelease: (params: ReleaseParams) => Promise<void>;
  private readonly dependencies: CallDependencyFactory;

  constructor(
    options: {
      idleTtlMinutes?: number;
      sweepIntervalMs?: number;
      drainTimeoutMs?: number;
      capacityRelease?: (params: ReleaseParams) => Promise<void>;
      dependencies?: CallDependencyFactory;
    } = {},
  ) {
    const idleMinutes = options.idleTtlMinutes ?? DEFAULT_IDLE_TTL_MINUTES;
    this.idleTtlMs = Math.max(idleMinutes, 1) * 60_000;
    this.drainTimeoutMs = options.drainTimeoutMs;
    this.capacityRelease = options.capacityRelease ?? release;
    this.dependencies = options.dependencies ?? createCallDependencyFactory();

    const sweepInterval = options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
    this.sweepTimer = setInterval(() => this.sweepIdleSessions(), sweepInterval);
    this.sweepTimer.unref?.();
  }

  /** Returns false when the call id is already known. */
  public register(input: SessionInput, context: SessionLogContext = {}): boolean {
    if (this.has(input.callId)) {
      log.info(
        { event: 'call_session_exists', call_id: input.callId, requestId: context.requestId },
        'call session exists',
      );
      return false;
    }

    this.pending.set(input.callId, { input, requestId: context.requestId, createdAt: Date.now() });
    log.info(
      {
        event: 'call_session_registered',
        call_id: input.callId,
        start_stage: input.startAgent ?? 'greeting',
        requestId: context.requestId,
      },
      'call session registered',
    );
    return true;
  }

  public has(callId: string): boolean {
    return this.pending.has(callId) || this.calls.has(callId);
  }

  public getCall(callId: string): ScreeningCall | undefined {
    return this.calls.get(callId);
  }

  public view(callId: string): CallView | undefined {
    const call = this.calls.get(callId);
    if (call) {
      return call.snapshot();
    }
    return this.pending.has(callId) ? { call_id: callId, phase: 'pending' } : undefined;
  }

  public size(): number {
    return this.pending.size + this.calls.size;
  }

  /** Starts a registered call on its speech channel. A call takes one channel only. */
  public attachSpeech(callId: string, speech: SpeechSession): AttachResult {
    if (this.calls.has(callId)) {
      return { ok: false, reason: 'already_attached' };
    }
    const pending = this.pending.get(callId);
    if (!pending) {
      return { ok: false, reason: 'not_found' };
    }
    this.pending.delete(callId);

    const dependencies = this.dependencies(pending.input);
    const call = new ScreeningCall({
      input: pending.input,
      speech,
      runtime: dependencies.runtime,
      deliverResult: dependencies.deliverResult,
      saveUsage: dependencies.saveUsage,
      requestId: pending.requestId,
      drainTimeoutMs: this.drainTimeoutMs,
      onEnded: (summary) => this.onCallEnded(summary, pending.requestId),
    });
    this.calls.set(callId, call);
    setActiveCalls(this.calls.size);
    call.start();

    log.info(
      { event: 'call_session_started', call_id: callId, requestId: pending.requestId },
      'call session started',
    );
    return { ok: true, call };
  }

  /** Ends a running call or drops a pending one. Resolves false for unknown ids. */
  public async hangup(callId: string, context: SessionLogContext = {}): Promise<boolean> {
    const call = this.calls.get(callId);
    if (call) {
      await call.hangup('hangup');
      return true;
    }
    if (this.pending.delete(callId)) {
      log.info(
        { event: 'call_session_dropped', call_id: callId, requestId: context.requestId },
        'pending call dropped',
      );
      await this.capacityRelease({ callId, requestId: context.requestId });
      return true;
    }
    log.warn(
      { event: 'call_session_hangup_missing', call_id: callId, requestId: context.requestId },
      'call session missing on hangup',
    );
    return false;
  }

  /** Hangs up every call; used on process shutdown. */
  public async shutdown(): Promise<void> {
    clearInterval(this.sweepTimer);
    const ids = [...this.pending.keys(), ...this.calls.keys()];
    await Promise.all(ids.map((callId) => this.hangup(callId)));
  }

  /** Drops channels that never connected and hangs up calls idle past the TTL. */
  public sweepIdleSessions(nowMs: number = Date.now()): void {
    for (const [callId, pending] of this.pending.entries()) {
      if (nowMs - pending.createdAt <= this.idleTtlMs) {
        continue;
      }
      log.warn({ event: 'call_session_never_connected', call_id: callId }, 'speech channel never connected');
      void this.hangup(callId, { requestId: pending.requestId }).catch((error: unknown) => {
        log.warn({ err: error, event: 'call_session_sweep_failed', call_id: callId }, 'pending call sweep failed');
      });
    }

    for (const [callId, call] of this.calls.entries()) {
      const idleMs = nowMs - call.getLastActivityAt().getTime();
      if (idleMs <= this.idleTtlMs) {
        continue;
      }
      log.warn({ event: 'call_session_idle', call_id: callId, idle_ms: idleMs }, 'idle call swept');
      void call.hangup('idle_timeout');
    }
  }

  private async onCallEnded(summary: CallEndSummary, requestId?: string): Promise<void> {
    this.calls.delete(summary.callId);
    setActiveCalls(this.calls.size);
    await this.capacityRelease({ callId: summary.callId, requestId });
    log.info(
      {
        event: 'call_session_teardown',
        call_id: summary.callId,
        reason: summary.reason,
        status: summary.status,
        session_duration_ms: summary.durationMs,
        requestId,
      },
      'call session teardown',
    );
  }
}
