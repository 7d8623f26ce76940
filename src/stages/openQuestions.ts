import { escalationRule, joinRules, languageRule } from '../dialogue/prompts';
import { ReadyCheckTask } from '../dialogue/readyCheckTask';
import { TaskGroup } from '../dialogue/taskGroup';
import type { ToolBinding } from '../dialogue/tools';
import { irrelevantLimitReached } from '../screening/irrelevance';
import { knownCandidateRecord, withSilenceSuppressed } from '../screening/sessionState';
import type { StageName } from '../screening/types';
import type { TurnDetection } from '../speech/types';
import { StageAgent, type StageTransition } from './stageAgent';

export class OpenQuestionsStage extends StageAgent {
  public readonly name: StageName = 'open_questions';
  protected readonly turnDetection: TurnDetection = 'vad';

  protected instructions(): string {
    return joinRules([
      `You ask the candidate for the vacancy "${this.ctx.state.input.jobTitle}" a few open questions about motivation and experience.`,
      escalationRule(this.allowEscalation),
      languageRule(this.ctx.state),
    ]);
  }

  protected stageTools(): ToolBinding[] {
    return [];
  }

  public async onEnter(): Promise<StageTransition> {
    const { state, speech, runtime } = this.ctx;

    speech.setUserAwayTimeout(runtime.openQuestionsAwayTimeoutS);
    let escalated: boolean;
    try {
      const ready = await new ReadyCheckTask(this.msg('ready_check')).run(this.ctx);
      if (!ready) {
        return irrelevantLimitReached(state)
          ? { type: 'end', reason: 'irrelevant', closing: this.msg('irrelevant_shutdown') }
          : { type: 'end', reason: 'ready_check_declined', closing: this.msg('ready_check_decline') };
      }

      const group = new TaskGroup(
        state.input.openQuestions.map((question) => ({
          id: question.id,
          text: question.text,
          description: question.description || question.text,
        })),
        { allowEscalation: this.allowEscalation },
      );
      escalated = await group.run(this.ctx);
    } finally {
      speech.setUserAwayTimeout(runtime.userAwayTimeoutS);
    }

    if (irrelevantLimitReached(state)) {
      return { type: 'end', reason: 'irrelevant', closing: this.msg('irrelevant_shutdown') };
    }
    if (escalated) {
      return { type: 'handoff', target: { stage: 'recruiter' }, closing: this.msg('recruiter_handoff') };
    }

    await withSilenceSuppressed(state, () =>
      speech.say(this.msg('open_questions_thanks'), { allowInterruptions: false }),
    );

    const booking = knownCandidateRecord(state)?.existingBookingDate;
    if (booking) {
      return {
        type: 'end',
        reason: 'existing_booking',
        closing: this.msg('existing_booking', { date: booking }),
      };
    }
    return { type: 'handoff', target: { stage: 'scheduling' } };
  }
}
