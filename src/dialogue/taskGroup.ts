import { log } from '../log';
import {
  OpenQuestionTask,
  type OpenQuestionTaskResult,
  type RevisitTarget,
} from './openQuestionTask';
import type { TaskHost } from './types';

export interface GroupQuestion {
  id: string;
  text: string;
  description: string;
  /** Spoken once the answer is recorded. */
  responseMessage?: string;
}

export interface TaskGroupOptions {
  allowEscalation: boolean;
}

/**
 * Runs open questions in order and writes the answered ones to the session.
 * The candidate may go back to an earlier question; it is asked again right
 * after the current one and its new answer replaces the old.
 */
export class TaskGroup {
  private readonly results = new Map<string, OpenQuestionTaskResult>();
  private readonly revisitQueue: string[] = [];
  private current?: string;

  constructor(
    private readonly questions: GroupQuestion[],
    private readonly options: TaskGroupOptions,
  ) {}

  /** Resolves to true when the candidate asked for the recruiter. */
  public async run(host: TaskHost): Promise<boolean> {
    let escalated: boolean;
    try {
      escalated = await this.askAll(host);
    } finally {
      // Answers given before a hang-up still count.
      this.record(host);
    }
    if (escalated) {
      log.info(
        { event: 'task_group_escalated', answered: this.results.size, ...host.logContext },
        'task group stopped for recruiter',
      );
    }
    return escalated;
  }

  public resultFor(questionId: string): OpenQuestionTaskResult | undefined {
    return this.results.get(questionId);
  }

  private async askAll(host: TaskHost): Promise<boolean> {
    for (const question of this.questions) {
      if (await this.ask(host, question)) {
        return true;
      }

      let revisitId = this.revisitQueue.shift();
      while (revisitId !== undefined) {
        const target = this.questions.find((candidate) => candidate.id === revisitId);
        if (target && (await this.ask(host, target))) {
          return true;
        }
        revisitId = this.revisitQueue.shift();
      }
    }
    return false;
  }

  /** Returns true when the answer asks for the recruiter. */
  private async ask(host: TaskHost, question: GroupQuestion): Promise<boolean> {
    this.current = question.id;
    const task = new OpenQuestionTask({
      questionId: question.id,
      questionText: question.text,
      allowEscalation: this.options.allowEscalation,
      responseMessage: question.responseMessage,
      revisitTargets: this.revisitTargets(question.id),
      onRevisit: (questionId) => this.requestRevisit(host, questionId),
    });
    const result = await task.run(host);
    this.current = undefined;
    this.results.set(question.id, result);
    return result.recruiterRequested;
  }

  private revisitTargets(currentId: string): RevisitTarget[] {
    return this.questions
      .filter((question) => question.id !== currentId && this.results.get(question.id)?.answered)
      .map((question) => ({ id: question.id, text: question.description || question.text }));
  }

  private requestRevisit(host: TaskHost, questionId: string): string {
    const answered = this.results.get(questionId)?.answered === true;
    if (!answered || questionId === this.current) {
      return `Question "${questionId}" cannot be revisited. Continue with the current question.`;
    }
    if (!this.revisitQueue.includes(questionId)) {
      this.revisitQueue.push(questionId);
    }
    log.info(
      { event: 'task_group_revisit_requested', question_id: questionId, ...host.logContext },
      'revisit requested',
    );
    return 'Tell the candidate you will come back to that question right after this one, then continue with the current question.';
  }

  private record(host: TaskHost): void {
    for (const question of this.questions) {
      const result = this.results.get(question.id);
      if (!result?.answered) {
        continue;
      }
      host.state.openAnswers.push({
        questionId: question.id,
        questionText: question.text,
        answerSummary: result.answerSummary,
        candidateNote: result.candidateNote,
      });
    }
  }
}
