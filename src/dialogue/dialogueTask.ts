import { log } from '../log';
import { withSilenceSuppressed } from '../screening/sessionState';
import type { AgentActivation, ToolCall, TurnDetection } from '../speech/types';
import { CallEndedError } from './errors';
import { Toolbox, type ToolBinding } from './tools';
import type { Responder, TaskHost } from './types';

export type TaskStatus = 'awaiting_entry' | 'awaiting_turn' | 'completed';

interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: Error) => void;
}

function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: Error) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

let taskSequence = 0;

/**
 * One bounded sub-dialogue that yields a typed result. While running it sits
 * on top of its stage and receives every candidate turn and tool call.
 *
 * Completion is one-shot: the first terminal decision wins, later ones are
 * ignored. After `maxTurns` candidate turns without a decision the task
 * completes with whatever `onTurnCapReached` returns.
 */
export abstract class DialogueTask<R> implements Responder {
  public readonly agentId: string;

  protected abstract readonly turnDetection: TurnDetection;
  protected readonly minEndpointingDelaySec?: number;

  private status: TaskStatus = 'awaiting_entry';
  private turns = 0;
  private readonly outcome = createDeferred<R>();
  private toolbox?: Toolbox;
  private boundHost?: TaskHost;

  protected constructor(
    kind: string,
    private readonly maxTurns: number,
  ) {
    taskSequence += 1;
    this.agentId = `${kind}:${taskSequence}`;
  }

  protected abstract instructions(host: TaskHost): string;
  protected abstract tools(): ToolBinding[];
  protected abstract enter(host: TaskHost): Promise<void>;
  protected abstract onTurnCapReached(): R;

  public getStatus(): TaskStatus {
    return this.status;
  }

  public turnCount(): number {
    return this.turns;
  }

  public isDone(): boolean {
    return this.status === 'completed';
  }

  public async run(host: TaskHost): Promise<R> {
    if (this.boundHost) {
      throw new Error(`task ${this.agentId} already started`);
    }
    this.boundHost = host;
    host.push(this);
    try {
      // Both branches are awaited together so an abandon during entry speech
      // never leaves a rejected promise without a handler.
      const [, result] = await Promise.all([this.runEntry(host), this.outcome.promise]);
      return result;
    } finally {
      host.pop(this);
    }
  }

  public activation(): AgentActivation {
    return {
      agentId: this.agentId,
      instructions: this.instructions(this.host),
      tools: this.getToolbox().specs(),
      turnDetection: this.turnDetection,
      minEndpointingDelaySec: this.minEndpointingDelaySec,
    };
  }

  public async handleToolCall(call: ToolCall): Promise<string | undefined> {
    if (this.status === 'completed') {
      log.warn(
        { event: 'task_tool_call_after_completion', agent_id: this.agentId, tool: call.name, ...this.logContext() },
        'tool call on completed task ignored',
      );
      return undefined;
    }
    return this.getToolbox().dispatch(call, { agent_id: this.agentId, ...this.logContext() });
  }

  public handleUserTurn(_text: string): void {
    if (this.status === 'completed') {
      return;
    }
    this.turns += 1;
    if (this.turns >= this.maxTurns) {
      log.info(
        { event: 'task_turn_cap_reached', agent_id: this.agentId, turns: this.turns, ...this.logContext() },
        'task turn cap reached',
      );
      this.complete(this.onTurnCapReached());
    }
  }

  /** Returns false when the task had already completed. */
  public complete(result: R): boolean {
    if (this.status === 'completed') {
      return false;
    }
    this.status = 'completed';
    this.outcome.resolve(result);
    return true;
  }

  /** Fails a pending run with CallEndedError. */
  public abandon(reason: string): void {
    if (this.status === 'completed') {
      return;
    }
    this.status = 'completed';
    this.outcome.reject(new CallEndedError(reason));
  }

  protected get host(): TaskHost {
    if (!this.boundHost) {
      throw new Error(`task ${this.agentId} used before run`);
    }
    return this.boundHost;
  }

  /** Entry speech: silence counter reset, silence handler muted while speaking. */
  protected async speakEntry(host: TaskHost, speak: () => Promise<void>): Promise<void> {
    host.state.silenceCount = 0;
    await withSilenceSuppressed(host.state, speak);
  }

  private async runEntry(host: TaskHost): Promise<void> {
    await this.enter(host);
    if (this.status === 'awaiting_entry') {
      this.status = 'awaiting_turn';
    }
  }

  private logContext(): Record<string, unknown> {
    return this.boundHost?.logContext ?? {};
  }

  private getToolbox(): Toolbox {
    if (!this.toolbox) {
      this.toolbox = new Toolbox(this.tools());
    }
    return this.toolbox;
  }
}
