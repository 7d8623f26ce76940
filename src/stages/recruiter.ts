import { joinRules, languageRule } from '../dialogue/prompts';
import { defineTool, type ToolBinding } from '../dialogue/tools';
import { withSilenceSuppressed } from '../screening/sessionState';
import type { StageName } from '../screening/types';
import { STAY, StageAgent, type StageContext, type StageTransition } from './stageAgent';

/** Stand-in for the human recruiter; there is nowhere further to escalate. */
export class RecruiterStage extends StageAgent {
  public readonly name: StageName = 'recruiter';

  constructor(ctx: StageContext) {
    super(ctx, { allowEscalation: false });
  }

  protected instructions(): string {
    return joinRules([
      `You are the recruiter for the vacancy "${this.ctx.state.input.jobTitle}". Answer the candidate's questions briefly and honestly.`,
      '- Never invent facts about the vacancy; say you will check and get back to them.',
      '- When the candidate has nothing more to discuss, call `end_conversation`.',
      languageRule(this.ctx.state),
    ]);
  }

  public async onEnter(): Promise<StageTransition> {
    const { state, speech } = this.ctx;
    state.recruiterRequested = true;
    speech.setLanguage(state.language);
    await withSilenceSuppressed(state, () =>
      speech.say(this.msg('recruiter_greeting', { name: state.input.candidateName }), {
        allowInterruptions: false,
      }),
    );
    return STAY;
  }

  protected stageTools(): ToolBinding[] {
    return [
      defineTool({
        name: 'end_conversation',
        description: 'The conversation with the recruiter is finished.',
        args: {},
        handler: () => {
          this.transition({ type: 'end', reason: 'recruiter_done', closing: this.msg('recruiter_goodbye') });
        },
      }),
    ];
  }
}
