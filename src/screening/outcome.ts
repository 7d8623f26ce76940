import { MAX_IRRELEVANT } from './irrelevance';
import type { SessionState } from './sessionState';
import type { CallStatus, QuestionResult, TranscriptEntry } from './types';

export interface KnockoutAnswerPayload {
  question_id: string;
  internal_id: string;
  question_text: string;
  result: QuestionResult;
  raw_answer: string;
  candidate_note: string;
}

export interface OpenAnswerPayload {
  question_id: string;
  internal_id: string;
  question_text: string;
  answer_summary: string;
  candidate_note: string;
}

/** Wire shape of the result delivered to the backend webhook. */
export interface CallResultPayload {
  call_id: string;
  status: CallStatus;
  consent_given: boolean | null;
  voicemail_detected: boolean;
  passed_knockout: boolean;
  interested_in_alternatives: boolean;
  knockout_answers: KnockoutAnswerPayload[];
  open_answers: OpenAnswerPayload[];
  chosen_timeslot: string | null;
  scheduling_preference: string | null;
  calendar_event_id: string | null;
  scheduled_date: string | null;
  scheduled_time: string | null;
  transcript?: TranscriptEntry[];
}

/** First match wins. */
export function resolveStatus(state: SessionState): CallStatus {
  if (state.voicemailDetected) {
    return 'voicemail';
  }
  if (state.consentGiven === false) {
    return 'not_interested';
  }
  if (state.irrelevantCount >= MAX_IRRELEVANT) {
    return 'irrelevant';
  }

  const results = new Set(state.knockoutAnswers.map((answer) => answer.result));
  if (results.has('unclear')) {
    return 'unclear';
  }
  if (results.has('recruiter_requested') || state.recruiterRequested) {
    return 'escalated';
  }
  if (results.has('fail')) {
    return state.interestedInAlternatives ? 'knockout_failed' : 'not_interested';
  }

  if (state.chosenTimeslot || state.schedulingPreference) {
    return 'completed';
  }
  return 'incomplete';
}

export function buildCallResult(state: SessionState): CallResultPayload {
  const knockoutIds = new Map(state.input.knockoutQuestions.map((q) => [q.id, q.internalId]));
  const openIds = new Map(state.input.openQuestions.map((q) => [q.id, q.internalId]));

  return {
    call_id: state.input.callId,
    status: resolveStatus(state),
    consent_given: state.consentGiven,
    voicemail_detected: state.voicemailDetected,
    passed_knockout: state.passedKnockout,
    interested_in_alternatives: state.interestedInAlternatives,
    knockout_answers: state.knockoutAnswers.map((answer) => ({
      question_id: answer.questionId,
      internal_id: knockoutIds.get(answer.questionId) ?? '',
      question_text: answer.questionText,
      result: answer.result,
      raw_answer: answer.rawAnswer,
      candidate_note: answer.candidateNote,
    })),
    open_answers: state.openAnswers.map((answer) => ({
      question_id: answer.questionId,
      internal_id: openIds.get(answer.questionId) ?? '',
      question_text: answer.questionText,
      answer_summary: answer.answerSummary,
      candidate_note: answer.candidateNote,
    })),
    chosen_timeslot: state.chosenTimeslot ?? null,
    scheduling_preference: state.schedulingPreference ?? null,
    calendar_event_id: state.calendarEventId ?? null,
    scheduled_date: state.scheduledDate ?? null,
    scheduled_time: state.scheduledTime ?? null,
  };
}
