import type { CandidateRecord, KnockoutAnswer, OpenAnswer, SessionInput } from './types';

export const DEFAULT_LANGUAGE = 'nl';

/**
 * Mutable record of one call. Created once per call by the orchestrator and
 * passed by reference into every stage and task; never shared between calls.
 */
export interface SessionState {
  readonly input: SessionInput;

  knockoutAnswers: KnockoutAnswer[];
  openAnswers: OpenAnswer[];

  /** `null` until the candidate is asked. */
  consentGiven: boolean | null;
  voicemailDetected: boolean;

  passedKnockout: boolean;
  interestedInAlternatives: boolean;

  chosenTimeslot?: string;
  schedulingPreference?: string;
  calendarEventId?: string;
  /** YYYY-MM-DD */
  scheduledDate?: string;
  /** Spoken form, e.g. "10 uur". */
  scheduledTime?: string;

  silenceCount: number;
  suppressSilence: boolean;

  /** Shared by every stage and task; reset by any accepted answer. */
  irrelevantCount: number;

  recruiterRequested: boolean;

  language: string;
}

export function createSessionState(input: SessionInput): SessionState {
  return {
    input,
    knockoutAnswers: [],
    openAnswers: [],
    consentGiven: null,
    voicemailDetected: false,
    passedKnockout: false,
    interestedInAlternatives: false,
    silenceCount: 0,
    suppressSilence: false,
    irrelevantCount: 0,
    recruiterRequested: false,
    language: DEFAULT_LANGUAGE,
  };
}

/** The CRM record only counts for candidates the caller marked as known. */
export function knownCandidateRecord(state: SessionState): CandidateRecord | undefined {
  return state.input.candidateKnown ? state.input.candidateRecord : undefined;
}

/**
 * Runs `speak` with the silence handler muted, so a quiet candidate during
 * system speech is not counted as absent.
 */
export async function withSilenceSuppressed<T>(
  state: SessionState,
  speak: () => Promise<T>,
): Promise<T> {
  state.suppressSilence = true;
  try {
    return await speak();
  } finally {
    state.suppressSilence = false;
  }
}
