import { z } from 'zod';
import { Toolbox, defineTool, type ToolBinding } from '../dialogue/tools';
import type { Responder, TaskHost } from '../dialogue/types';
import { isSupportedLanguage, message, SUPPORTED_LANGUAGES, type MessageKey } from '../i18n/messages';
import { log } from '../log';
import { IRRELEVANT_LIMIT_REACHED, checkIrrelevant } from '../screening/irrelevance';
import type { StageName } from '../screening/types';
import type { SchedulingService } from '../scheduling/types';
import type { AgentActivation, ToolCall, TurnDetection } from '../speech/types';

export type StageTarget =
  | { stage: 'greeting' }
  | { stage: 'screening' }
  | { stage: 'open_questions' }
  | { stage: 'scheduling' }
  | { stage: 'alternative'; failedQuestion: string }
  | { stage: 'recruiter' };

export type EndReason =
  | 'voicemail'
  | 'proxy'
  | 'not_available'
  | 'irrelevant'
  | 'unclear'
  | 'ready_check_declined'
  | 'existing_booking'
  | 'scheduled'
  | 'scheduling_preference'
  | 'alternatives_recorded'
  | 'alternatives_declined'
  | 'recruiter_done'
  | 'silence'
  | 'hangup'
  | 'speech_closed'
  | 'idle_timeout'
  | 'error';

export type StageTransition =
  | { type: 'stay' }
  | { type: 'handoff'; target: StageTarget; closing?: string }
  | { type: 'end'; reason: EndReason; closing?: string; pauseMs?: number };

export const STAY: StageTransition = { type: 'stay' };

/** Collaborators and settings shared by every stage of a call. */
export interface StageRuntime {
  scheduling: SchedulingService;
  agentName: string;
  companyName: string;
  userAwayTimeoutS: number;
  openQuestionsAwayTimeoutS: number;
  /** Time zone the recruiter's calendar days are counted in. */
  timeZone: string;
  now: () => Date;
}

export interface StageContext extends TaskHost {
  readonly runtime: StageRuntime;
  /** Applied only while `from` is still the active stage. */
  transition(from: StageAgent, transition: StageTransition): void;
  /** Runs `work` off the event path and applies the transition it resolves to. */
  continueWith(from: StageAgent, work: () => Promise<StageTransition>): void;
}

/**
 * One conversation phase. Every stage carries the shared tools for language
 * switching, escalation and irrelevance on top of its own.
 */
export abstract class StageAgent implements Responder {
  public abstract readonly name: StageName;
  protected readonly turnDetection: TurnDetection = 'manual';
  protected readonly allowEscalation: boolean;

  private toolbox?: Toolbox;

  constructor(protected readonly ctx: StageContext, options: { allowEscalation?: boolean } = {}) {
    this.allowEscalation = options.allowEscalation ?? ctx.state.input.allowEscalation;
  }

  public get agentId(): string {
    return `stage:${this.name}`;
  }

  protected abstract instructions(): string;
  protected abstract stageTools(): ToolBinding[];

  /** Runs once when the stage becomes active. */
  public async onEnter(): Promise<StageTransition> {
    return STAY;
  }

  public activation(): AgentActivation {
    return {
      agentId: this.agentId,
      instructions: this.instructions(),
      tools: this.getToolbox().specs(),
      turnDetection: this.turnDetection,
    };
  }

  public handleToolCall(call: ToolCall): Promise<string | undefined> {
    return this.getToolbox().dispatch(call, { stage: this.name, ...this.ctx.logContext });
  }

  public handleUserTurn(_text: string): void {
    // Stages react through tool calls only.
  }

  public toolNames(): string[] {
    return this.getToolbox().names();
  }

  protected msg(key: MessageKey, vars: Record<string, string> = {}): string {
    return message(this.ctx.state.language, key, vars);
  }

  protected transition(transition: StageTransition): void {
    this.ctx.transition(this, transition);
  }

  protected baseTools(): ToolBinding[] {
    return [
      defineTool({
        name: 'switch_language',
        description: `Switch the conversation language when the candidate speaks another one. Supported: ${SUPPORTED_LANGUAGES.join(', ')}.`,
        args: { language: z.string() },
        handler: ({ language }) => {
          const code = language.trim().toLowerCase();
          if (!isSupportedLanguage(code)) {
            return `Language '${code}' is not supported. Supported: ${SUPPORTED_LANGUAGES.join(', ')}`;
          }
          this.ctx.state.language = code;
          this.ctx.speech.setLanguage(code);
          log.info({ event: 'language_switched', language: code, ...this.ctx.logContext }, 'language switched');
          return `Language switched to ${code}. Continue the conversation in this language.`;
        },
      }),
      defineTool({
        name: 'escalate_to_recruiter',
        description: 'The candidate wants to talk to a real recruiter.',
        args: {},
        handler: () => {
          if (!this.allowEscalation) {
            log.info(
              { event: 'escalation_disabled', stage: this.name, ...this.ctx.logContext },
              'escalation request ignored',
            );
            return;
          }
          this.transition({
            type: 'handoff',
            target: { stage: 'recruiter' },
            closing: this.msg('recruiter_handoff'),
          });
        },
      }),
      defineTool({
        name: 'end_conversation_irrelevant',
        description: 'The candidate answers off-topic or with nonsense. Call at once on every irrelevant answer.',
        args: {},
        handler: () => {
          const check = checkIrrelevant(this.ctx.state, 'to stay on topic');
          if (check === IRRELEVANT_LIMIT_REACHED) {
            this.transition({ type: 'end', reason: 'irrelevant', closing: this.msg('irrelevant_shutdown') });
            return;
          }
          return check;
        },
      }),
    ];
  }

  private getToolbox(): Toolbox {
    if (!this.toolbox) {
      this.toolbox = new Toolbox([...this.baseTools(), ...this.stageTools()]);
    }
    return this.toolbox;
  }
}
