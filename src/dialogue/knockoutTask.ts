import { z } from 'zod';
import { log } from '../log';
import { IRRELEVANT_LIMIT_REACHED, checkIrrelevant, resetIrrelevant } from '../screening/irrelevance';
import type { QuestionResult } from '../screening/types';
import { DialogueTask } from './dialogueTask';
import { escalationRule, joinRules, languageRule } from './prompts';
import { defineTool, type ToolBinding } from './tools';
import type { TaskHost } from './types';

/** The question plus at most three candidate turns. */
export const KNOCKOUT_MAX_TURNS = 4;

export interface KnockoutTaskResult {
  result: QuestionResult;
  rawAnswer: string;
  candidateNote: string;
}

export interface KnockoutTaskOptions {
  questionId: string;
  questionText: string;
  /** Spoken before the question, e.g. "Next question." */
  transition?: string;
  /** Background for clarifications; never read out. */
  context?: string;
  allowEscalation: boolean;
}

export class KnockoutTask extends DialogueTask<KnockoutTaskResult> {
  protected readonly turnDetection = 'manual';

  private candidateNote = '';

  constructor(private readonly options: KnockoutTaskOptions) {
    super(`knockout:${options.questionId}`, KNOCKOUT_MAX_TURNS);
  }

  protected instructions(host: TaskHost): string {
    const { questionText, context, allowEscalation } = this.options;
    return joinRules([
      'You ask the candidate one yes/no knockout question.',
      `Question: "${questionText}"`,
      context ? `Background for clarifications only, never read it out: ${context}` : '',
      '# Rules',
      '- Yes: call `mark_pass` with a short summary.',
      '- No: repeat the concrete answer back as a confirmation question. Confirmed: call `confirm_fail`. Changed to yes: call `mark_pass`.',
      '- Never ask for details. If the answer is unclear, ask for yes or no.',
      '- Off-topic or nonsense answers: call `mark_irrelevant` at once.',
      '- Questions you cannot answer from the background: call `note_for_recruiter`, say you noted it, and ask again.',
      '- Never call two tools in the same turn.',
      escalationRule(allowEscalation),
      languageRule(host.state),
    ]);
  }

  protected async enter(host: TaskHost): Promise<void> {
    const { transition, questionText } = this.options;
    const intro = transition
      ? `${transition} Then ask this question naturally: ${questionText}`
      : `Ask this question naturally: ${questionText}`;
    await this.speakEntry(host, () => host.speech.generateReply(intro, { allowInterruptions: false }));
  }

  protected onTurnCapReached(): KnockoutTaskResult {
    return {
      result: 'unclear',
      rawAnswer: 'Candidate could not answer the question',
      candidateNote: this.candidateNote,
    };
  }

  protected tools(): ToolBinding[] {
    return [
      defineTool({
        name: 'note_for_recruiter',
        description: 'Store a question or remark of the candidate for the recruiter. Call before mark_pass or confirm_fail.',
        args: { note: z.string() },
        handler: ({ note }) => {
          this.candidateNote = note;
          return 'Noted. Tell the candidate you noted it for the recruiter and continue with the question.';
        },
      }),
      defineTool({
        name: 'mark_pass',
        description: 'The candidate answered YES to the knockout question.',
        args: { answer_summary: z.string() },
        handler: ({ answer_summary }) => {
          this.decide('pass', answer_summary, true);
        },
      }),
      defineTool({
        name: 'confirm_fail',
        description: 'The candidate answered NO and confirmed it.',
        args: { answer_summary: z.string() },
        handler: ({ answer_summary }) => {
          this.decide('fail', answer_summary, true);
        },
      }),
      defineTool({
        name: 'escalate_to_recruiter',
        description: 'The candidate wants to talk to a real recruiter.',
        args: {},
        handler: () => {
          if (!this.options.allowEscalation) {
            log.info(
              { event: 'escalation_disabled', agent_id: this.agentId, ...this.host.logContext },
              'escalation request ignored',
            );
            return;
          }
          this.decide('recruiter_requested', 'Candidate wants to talk to the recruiter', false);
        },
      }),
      defineTool({
        name: 'mark_irrelevant',
        description: 'The candidate answers off-topic or with nonsense. Call at once on every irrelevant answer.',
        args: { answer_summary: z.string() },
        handler: ({ answer_summary }) => {
          const check = checkIrrelevant(this.host.state);
          if (check === IRRELEVANT_LIMIT_REACHED) {
            this.decide('irrelevant', answer_summary, false);
            return;
          }
          return check;
        },
      }),
    ];
  }

  private decide(result: QuestionResult, rawAnswer: string, accepted: boolean): void {
    if (this.isDone()) {
      return;
    }
    if (accepted) {
      resetIrrelevant(this.host.state);
    }
    log.info(
      {
        event: 'knockout_decided',
        question_id: this.options.questionId,
        result,
        ...this.host.logContext,
      },
      'knockout question decided',
    );
    this.complete({ result, rawAnswer, candidateNote: this.candidateNote });
  }
}
