import { z } from 'zod';
import { log } from '../log';
import {
  IRRELEVANT_LIMIT_REACHED,
  checkIrrelevant,
  irrelevantLimitReached,
  resetIrrelevant,
} from '../screening/irrelevance';
import { DialogueTask } from './dialogueTask';
import { escalationRule, joinRules, languageRule } from './prompts';
import { defineTool, type ToolBinding } from './tools';
import type { TaskHost } from './types';

export const OPEN_QUESTION_MAX_TURNS = 6;
export const OPEN_QUESTION_ENDPOINTING_DELAY_S = 2.0;

export interface OpenQuestionTaskResult {
  answerSummary: string;
  candidateNote: string;
  recruiterRequested: boolean;
  /** False only when the question was skipped without being asked. */
  answered: boolean;
}

export interface RevisitTarget {
  id: string;
  text: string;
}

export interface OpenQuestionTaskOptions {
  questionId: string;
  questionText: string;
  allowEscalation: boolean;
  /** Spoken as-is once the answer is recorded. */
  responseMessage?: string;
  /** Earlier questions the candidate may go back to. */
  revisitTargets?: RevisitTarget[];
  /** Returns the note for the model, accepted or not. */
  onRevisit?: (questionId: string) => string;
}

export class OpenQuestionTask extends DialogueTask<OpenQuestionTaskResult> {
  protected readonly turnDetection = 'vad';
  protected readonly minEndpointingDelaySec = OPEN_QUESTION_ENDPOINTING_DELAY_S;

  private candidateNote = '';
  /** Set before the response message is spoken, so a repeated record_answer is a no-op. */
  private answerRecorded = false;

  constructor(private readonly options: OpenQuestionTaskOptions) {
    super(`open:${options.questionId}`, OPEN_QUESTION_MAX_TURNS);
  }

  protected instructions(host: TaskHost): string {
    const targets = this.options.revisitTargets ?? [];
    return joinRules([
      'You ask the candidate one open question and listen to the answer.',
      `Question: "${this.options.questionText}"`,
      '# Rules',
      '- When the candidate is done answering, call `record_answer` with a short summary.',
      '- Ask no follow-up questions. One answer is enough.',
      '- Short or vague answers like "I don\'t know" are not irrelevant: record them.',
      '- Off-topic or nonsense answers: call `mark_irrelevant` at once.',
      '- Use `note_for_recruiter` for questions or remarks the recruiter should see.',
      targets.length > 0
        ? `- If the candidate wants to change an earlier answer, call \`revisit_question\` with one of: ${targets
            .map((target) => `${target.id} ("${target.text}")`)
            .join(', ')}.`
        : '',
      escalationRule(this.options.allowEscalation),
      languageRule(host.state),
    ]);
  }

  protected async enter(host: TaskHost): Promise<void> {
    if (irrelevantLimitReached(host.state)) {
      this.complete({
        answerSummary: 'Conversation ended because of irrelevant answers',
        candidateNote: '',
        recruiterRequested: false,
        answered: false,
      });
      return;
    }

    await this.speakEntry(host, async () => {
      // Leftover audio from the previous answer must not count as this one.
      host.speech.clearUserTurn();
      await host.speech.generateReply(
        `Ask this open question in a natural, conversational way: ${this.options.questionText}`,
        { allowInterruptions: false },
      );
    });
  }

  protected onTurnCapReached(): OpenQuestionTaskResult {
    return {
      answerSummary: 'Candidate could not answer the question',
      candidateNote: this.candidateNote,
      recruiterRequested: false,
      answered: true,
    };
  }

  protected tools(): ToolBinding[] {
    const tools: ToolBinding[] = [
      defineTool({
        name: 'note_for_recruiter',
        description: 'Store a question or remark of the candidate for the recruiter.',
        args: { note: z.string() },
        handler: ({ note }) => {
          this.candidateNote = note;
        },
      }),
      defineTool({
        name: 'record_answer',
        description: 'Store the answer of the candidate as soon as there is a usable answer.',
        args: { answer_summary: z.string() },
        handler: async ({ answer_summary }) => {
          if (this.answerRecorded || this.isDone()) {
            return;
          }
          this.answerRecorded = true;
          if (this.options.responseMessage) {
            await this.host.speech.say(this.options.responseMessage, { allowInterruptions: false });
          }
          resetIrrelevant(this.host.state);
          this.finish({ answerSummary: answer_summary, recruiterRequested: false });
        },
      }),
      defineTool({
        name: 'escalate_to_recruiter',
        description: 'The candidate wants to talk to a real recruiter.',
        args: {},
        handler: () => {
          if (!this.options.allowEscalation) {
            return;
          }
          this.finish({ answerSummary: 'Candidate wants to talk to the recruiter', recruiterRequested: true });
        },
      }),
      defineTool({
        name: 'mark_irrelevant',
        description: 'The candidate answers off-topic or with nonsense. Call at once on every irrelevant answer.',
        args: { answer_summary: z.string() },
        handler: ({ answer_summary }) => {
          const check = checkIrrelevant(this.host.state);
          if (check === IRRELEVANT_LIMIT_REACHED) {
            this.finish({ answerSummary: answer_summary, recruiterRequested: false });
            return;
          }
          return check;
        },
      }),
    ];

    const { onRevisit, revisitTargets } = this.options;
    if (onRevisit && revisitTargets && revisitTargets.length > 0) {
      tools.push(
        defineTool({
          name: 'revisit_question',
          description: 'The candidate wants to go back to an earlier question and change the answer.',
          args: { question_id: z.string() },
          handler: ({ question_id }) => onRevisit(question_id),
        }),
      );
    }

    return tools;
  }

  private finish(result: { answerSummary: string; recruiterRequested: boolean }): void {
    if (this.isDone()) {
      return;
    }
    log.info(
      {
        event: 'open_question_answered',
        question_id: this.options.questionId,
        recruiter_requested: result.recruiterRequested,
        ...this.host.logContext,
      },
      'open question answered',
    );
    this.complete({ ...result, candidateNote: this.candidateNote, answered: true });
  }
}
