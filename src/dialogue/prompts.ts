import type { SessionState } from '../screening/sessionState';

export function languageRule(state: SessionState): string {
  return `- Speak only in the conversation language "${state.language}" unless the candidate switches.`;
}

export function escalationRule(allowEscalation: boolean): string {
  return allowEscalation
    ? '- If the candidate asks for a real person or the recruiter, call `escalate_to_recruiter` right away. Do not try to keep them with you.'
    : '';
}

export function joinRules(lines: string[]): string {
  return lines.filter((line) => line.trim() !== '').join('\n');
}
