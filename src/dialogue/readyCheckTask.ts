import { z } from 'zod';
import { IRRELEVANT_LIMIT_REACHED, checkIrrelevant, resetIrrelevant } from '../screening/irrelevance';
import { DialogueTask } from './dialogueTask';
import { joinRules, languageRule } from './prompts';
import { defineTool, type ToolBinding } from './tools';
import type { TaskHost } from './types';

export const READY_CHECK_MAX_TURNS = 3;

/** Asks whether the candidate is ready to go on; resolves to their answer. */
export class ReadyCheckTask extends DialogueTask<boolean> {
  protected readonly turnDetection = 'manual';

  constructor(private readonly prompt: string) {
    super('ready_check', READY_CHECK_MAX_TURNS);
  }

  protected instructions(host: TaskHost): string {
    return joinRules([
      'You wait for the candidate to confirm they are ready.',
      '# Rules',
      '- Yes, ok, sure or anything confirming: call `confirm_ready`.',
      '- Questions about the process: answer very briefly and ask again whether they are ready.',
      '- No, a refusal, or an off-topic answer: call `mark_irrelevant` at once.',
      '- Do not go into other topics and ask nothing else.',
      '- Never call two tools in the same turn.',
      languageRule(host.state),
    ]);
  }

  protected async enter(host: TaskHost): Promise<void> {
    await this.speakEntry(host, () => host.speech.say(this.prompt, { allowInterruptions: false }));
  }

  protected onTurnCapReached(): boolean {
    return false;
  }

  protected tools(): ToolBinding[] {
    return [
      defineTool({
        name: 'confirm_ready',
        description: 'The candidate is ready to continue.',
        args: {},
        handler: () => {
          resetIrrelevant(this.host.state);
          this.complete(true);
        },
      }),
      defineTool({
        name: 'mark_irrelevant',
        description: 'The candidate answers off-topic, with nonsense or refuses. Call at once.',
        args: { answer_summary: z.string() },
        handler: () => {
          const check = checkIrrelevant(this.host.state, 'whether they are ready');
          if (check === IRRELEVANT_LIMIT_REACHED) {
            this.complete(false);
            return;
          }
          return check;
        },
      }),
    ];
  }
}
