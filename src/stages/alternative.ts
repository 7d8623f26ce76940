import { escalationRule, joinRules, languageRule } from '../dialogue/prompts';
import { TaskGroup, type GroupQuestion } from '../dialogue/taskGroup';
import { defineTool, type ToolBinding } from '../dialogue/tools';
import { resetIrrelevant } from '../screening/irrelevance';
import type { StageName } from '../screening/types';
import { STAY, StageAgent, type StageContext, type StageTransition } from './stageAgent';

/** Asked when the candidate wants to hear about other openings. */
export const ALTERNATIVE_QUESTIONS: readonly GroupQuestion[] = [
  {
    id: 'alt1',
    text: 'In welke regio zoek je werk?',
    description: 'In welke regio zoek je werk?',
    responseMessage: 'Ok, goed, in die regio hebben we meer dan 50 vacatures.',
  },
  {
    id: 'alt2',
    text: 'Zoek je fulltime, parttime of flex?',
    description: 'Zoek je fulltime, parttime of flex?',
  },
  {
    id: 'alt3',
    text: 'Heb je ervaring in een bepaalde sector? Bijvoorbeeld logistiek, productie, retail?',
    description: 'Heb je ervaring in een bepaalde sector?',
  },
];

export class AlternativeStage extends StageAgent {
  public readonly name: StageName = 'alternative';

  constructor(
    ctx: StageContext,
    private readonly failedQuestion: string,
  ) {
    super(ctx);
  }

  protected instructions(): string {
    return joinRules([
      `The candidate does not meet a requirement for the vacancy "${this.ctx.state.input.jobTitle}".`,
      '- Interested in other openings: call `candidate_interested`.',
      '- Not interested: call `candidate_not_interested`.',
      '- Off-topic or nonsense answers: call `end_conversation_irrelevant`.',
      escalationRule(this.allowEscalation),
      languageRule(this.ctx.state),
    ]);
  }

  public async onEnter(): Promise<StageTransition> {
    await this.ctx.speech.generateReply(
      `The candidate did not meet the requirement: '${this.failedQuestion}'. ` +
        'Say that is a pity but that you would like to look at other possibilities. ' +
        'Ask whether the candidate is interested in other vacancies.',
    );
    return STAY;
  }

  protected stageTools(): ToolBinding[] {
    const { state } = this.ctx;
    return [
      defineTool({
        name: 'candidate_interested',
        description: 'The candidate is interested in other vacancies.',
        args: {},
        handler: () => {
          resetIrrelevant(state);
          state.interestedInAlternatives = true;
          this.ctx.continueWith(this, () => this.askAlternatives());
          return 'Great. The follow-up questions start now.';
        },
      }),
      defineTool({
        name: 'candidate_not_interested',
        description: 'The candidate is not interested in other vacancies.',
        args: {},
        handler: () => {
          this.transition({
            type: 'end',
            reason: 'alternatives_declined',
            closing: this.msg('alternative_not_interested'),
          });
        },
      }),
    ];
  }

  private async askAlternatives(): Promise<StageTransition> {
    const escalated = await new TaskGroup([...ALTERNATIVE_QUESTIONS], {
      allowEscalation: this.allowEscalation,
    }).run(this.ctx);
    if (escalated) {
      return { type: 'handoff', target: { stage: 'recruiter' }, closing: this.msg('recruiter_handoff') };
    }
    return { type: 'end', reason: 'alternatives_recorded', closing: this.msg('alternative_thanks') };
  }
}
