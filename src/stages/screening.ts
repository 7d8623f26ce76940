import { KnockoutTask } from '../dialogue/knockoutTask';
import { escalationRule, joinRules, languageRule } from '../dialogue/prompts';
import type { ToolBinding } from '../dialogue/tools';
import { log } from '../log';
import { knownCandidateRecord } from '../screening/sessionState';
import type { KnockoutQuestion, StageName } from '../screening/types';
import { StageAgent, type StageTransition } from './stageAgent';

const FIRST_TRANSITION = "Say briefly 'ok great, let's start with a first question.' and go straight to the first question.";
const ACKNOWLEDGE =
  "Acknowledge the previous answer with one short word as a recruiter would ('Ok, great.', 'Fine.'), naming at most one key word from it.";
const MIDDLE_TRANSITION = `${ACKNOWLEDGE} Lead into the next question naturally.`;
const LAST_TRANSITION = `${ACKNOWLEDGE} Say this is the last question.`;

export function transitionFor(position: { firstAsked: boolean; remaining: number }): string {
  if (position.firstAsked) {
    return FIRST_TRANSITION;
  }
  return position.remaining === 1 ? LAST_TRANSITION : MIDDLE_TRANSITION;
}

/** Asks the knockout questions in order; the first non-pass result decides the route. */
export class ScreeningStage extends StageAgent {
  public readonly name: StageName = 'screening';

  protected instructions(): string {
    return joinRules([
      `You screen the candidate for the vacancy "${this.ctx.state.input.jobTitle}" with short yes/no questions.`,
      escalationRule(this.allowEscalation),
      languageRule(this.ctx.state),
    ]);
  }

  protected stageTools(): ToolBinding[] {
    return [];
  }

  public async onEnter(): Promise<StageTransition> {
    const { state } = this.ctx;
    const questions = state.input.knockoutQuestions;
    const knownAnswers = knownCandidateRecord(state)?.knownAnswers ?? {};
    const knownValue = (question: KnockoutQuestion): string | undefined =>
      question.dataKey ? knownAnswers[question.dataKey] : undefined;

    const toAsk = questions.filter((question) => knownValue(question) === undefined);
    let firstAsked = true;

    for (const question of questions) {
      const known = knownValue(question);
      if (known !== undefined) {
        state.knockoutAnswers.push({
          questionId: question.id,
          questionText: question.text,
          result: 'pass',
          rawAnswer: `(known beforehand: ${known})`,
          candidateNote: '',
        });
        continue;
      }

      const remaining = toAsk.length - toAsk.indexOf(question);
      const outcome = await new KnockoutTask({
        questionId: question.id,
        questionText: question.text,
        transition: transitionFor({ firstAsked, remaining }),
        context: question.context,
        allowEscalation: this.allowEscalation,
      }).run(this.ctx);
      firstAsked = false;

      state.knockoutAnswers.push({
        questionId: question.id,
        questionText: question.text,
        result: outcome.result,
        rawAnswer: outcome.rawAnswer,
        candidateNote: outcome.candidateNote,
      });

      switch (outcome.result) {
        case 'pass':
          continue;
        case 'fail':
          return { type: 'handoff', target: { stage: 'alternative', failedQuestion: question.text } };
        case 'unclear':
          return { type: 'end', reason: 'unclear', closing: this.msg('screening_unclear') };
        case 'irrelevant':
          return { type: 'end', reason: 'irrelevant', closing: this.msg('irrelevant_shutdown') };
        case 'recruiter_requested':
          return { type: 'handoff', target: { stage: 'recruiter' }, closing: this.msg('recruiter_handoff') };
      }
    }

    state.passedKnockout = true;
    log.info(
      {
        event: 'knockout_passed',
        asked: toAsk.length,
        known: questions.length - toAsk.length,
        ...this.ctx.logContext,
      },
      'knockout screening passed',
    );
    return { type: 'handoff', target: { stage: 'open_questions' } };
  }
}
