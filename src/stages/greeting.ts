import { defineTool, type ToolBinding } from '../dialogue/tools';
import { escalationRule, joinRules, languageRule } from '../dialogue/prompts';
import { resetIrrelevant } from '../screening/irrelevance';
import type { StageName } from '../screening/types';
import { STAY, StageAgent, type StageTransition } from './stageAgent';

/** Pause after the voicemail message so it is not cut off. */
export const VOICEMAIL_PAUSE_MS = 500;

export class GreetingStage extends StageAgent {
  public readonly name: StageName = 'greeting';

  protected instructions(): string {
    const { input } = this.ctx.state;
    const { agentName, companyName } = this.ctx.runtime;
    const who = input.candidateName ? `the candidate ${input.candidateName}` : 'the candidate';
    return joinRules([
      `You are ${agentName}, a digital recruiter at ${companyName}, calling ${who} about the vacancy "${input.jobTitle}".`,
      input.candidateKnown ? '- The candidate is already known to us; do not introduce the company at length.' : '',
      input.requireConsent
        ? '- Ask whether the call may be recorded. Yes: call `record_consent`. No: call `record_no_consent`. Then continue.'
        : '',
      '- Ask whether the candidate has a few minutes for some short questions. Yes: call `candidate_ready`.',
      '- No time or no interest: call `candidate_not_available`.',
      '- Someone else answers on behalf of the candidate: call `candidate_is_proxy`.',
      '- A voicemail or answering machine: wait for the greeting to end, then call `detected_voicemail`.',
      '- Off-topic or nonsense answers: call `end_conversation_irrelevant`.',
      escalationRule(this.allowEscalation),
      languageRule(this.ctx.state),
    ]);
  }

  public async onEnter(): Promise<StageTransition> {
    await this.ctx.speech.generateReply('Greet the candidate and introduce yourself briefly.', {
      allowInterruptions: false,
    });
    return STAY;
  }

  protected stageTools(): ToolBinding[] {
    const { state } = this.ctx;
    return [
      defineTool({
        name: 'record_consent',
        description: 'The candidate agrees to the call being recorded.',
        args: {},
        handler: () => {
          state.consentGiven = true;
          return 'Consent noted. Continue with the introduction.';
        },
      }),
      defineTool({
        name: 'record_no_consent',
        description: 'The candidate does not want the call to be recorded.',
        args: {},
        handler: () => {
          state.consentGiven = false;
          return 'Noted. Continue with the introduction.';
        },
      }),
      defineTool({
        name: 'candidate_ready',
        description: 'The candidate confirmed having time for the screening.',
        args: {},
        handler: () => {
          resetIrrelevant(state);
          this.transition({ type: 'handoff', target: { stage: 'screening' } });
        },
      }),
      defineTool({
        name: 'detected_voicemail',
        description: 'A voicemail system or answering machine picked up. Call after its greeting.',
        args: {},
        handler: () => {
          state.voicemailDetected = true;
          const vars = {
            name: state.input.candidateName,
            agent: this.ctx.runtime.agentName,
            company: this.ctx.runtime.companyName,
          };
          this.transition({
            type: 'end',
            reason: 'voicemail',
            closing: this.msg(state.input.candidateName ? 'voicemail_with_name' : 'voicemail_without_name', vars),
            pauseMs: VOICEMAIL_PAUSE_MS,
          });
        },
      }),
      defineTool({
        name: 'candidate_is_proxy',
        description: 'The person on the line is not the candidate but calls on their behalf.',
        args: {},
        handler: () => {
          this.transition({ type: 'end', reason: 'proxy', closing: this.msg('proxy_detected') });
        },
      }),
      defineTool({
        name: 'candidate_not_available',
        description: 'The candidate has no time or is not interested.',
        args: {},
        handler: () => {
          this.transition({ type: 'end', reason: 'not_available', closing: this.msg('candidate_not_available') });
        },
      }),
    ];
  }
}
