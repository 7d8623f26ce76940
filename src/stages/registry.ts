import { AlternativeStage } from './alternative';
import { GreetingStage } from './greeting';
import { OpenQuestionsStage } from './openQuestions';
import { RecruiterStage } from './recruiter';
import { SchedulingStage } from './scheduling';
import { ScreeningStage } from './screening';
import type { StageAgent, StageContext, StageTarget } from './stageAgent';

/** The only place stages are constructed, so no stage imports another. */
export function createStage(target: StageTarget, ctx: StageContext): StageAgent {
  switch (target.stage) {
    case 'greeting':
      return new GreetingStage(ctx);
    case 'screening':
      return new ScreeningStage(ctx);
    case 'open_questions':
      return new OpenQuestionsStage(ctx);
    case 'scheduling':
      return new SchedulingStage(ctx);
    case 'alternative':
      return new AlternativeStage(ctx, target.failedQuestion);
    case 'recruiter':
      return new RecruiterStage(ctx);
  }
}

/**
 * Start target for a debug start phase. Alternative needs a failed question;
 * the first knockout question stands in for it.
 */
export function startTarget(ctx: StageContext): StageTarget {
  const { input } = ctx.state;
  const stage = input.startAgent ?? 'greeting';
  if (stage === 'alternative') {
    return { stage, failedQuestion: input.knockoutQuestions[0]?.text ?? '' };
  }
  return { stage };
}
