import assert from 'node:assert/strict';
import { test } from 'node:test';
import type { KnockoutAnswer, QuestionResult } from '../src/screening/types';
import { makeState } from './fakes';
import { setTestEnv } from './testEnv';

setTestEnv();

function answer(questionId: string, result: QuestionResult): KnockoutAnswer {
  return { questionId, questionText: `text ${questionId}`, result, rawAnswer: 'raw', candidateNote: '' };
}

test('resolveStatus applies the rules in order', async () => {
  const { resolveStatus } = await import('../src/screening/outcome');

  const voicemail = makeState();
  voicemail.voicemailDetected = true;
  voicemail.consentGiven = false;
  assert.equal(resolveStatus(voicemail), 'voicemail');

  const noConsent = makeState();
  noConsent.consentGiven = false;
  noConsent.irrelevantCount = 3;
  assert.equal(resolveStatus(noConsent), 'not_interested');

  const irrelevant = makeState();
  irrelevant.irrelevantCount = 3;
  irrelevant.knockoutAnswers.push(answer('k1', 'unclear'));
  assert.equal(resolveStatus(irrelevant), 'irrelevant');

  const unclear = makeState();
  unclear.knockoutAnswers.push(answer('k1', 'recruiter_requested'), answer('k2', 'unclear'));
  assert.equal(resolveStatus(unclear), 'unclear');

  const escalated = makeState();
  escalated.recruiterRequested = true;
  escalated.knockoutAnswers.push(answer('k1', 'fail'));
  assert.equal(resolveStatus(escalated), 'escalated');
});

test('resolveStatus separates failed knockouts by interest in alternatives', async () => {
  const { resolveStatus } = await import('../src/screening/outcome');

  const declined = makeState();
  declined.knockoutAnswers.push(answer('k1', 'fail'));
  assert.equal(resolveStatus(declined), 'not_interested');

  const interested = makeState();
  interested.knockoutAnswers.push(answer('k1', 'fail'));
  interested.interestedInAlternatives = true;
  assert.equal(resolveStatus(interested), 'knockout_failed');
});

test('resolveStatus is completed only with a timeslot or a preference', async () => {
  const { resolveStatus } = await import('../src/screening/outcome');

  const scheduled = makeState();
  scheduled.chosenTimeslot = 'dinsdag om 10 uur';
  assert.equal(resolveStatus(scheduled), 'completed');

  const preference = makeState();
  preference.schedulingPreference = 'liefst in de namiddag';
  assert.equal(resolveStatus(preference), 'completed');

  assert.equal(resolveStatus(makeState()), 'incomplete');
});

test('buildCallResult echoes internal ids and nulls missing scheduling fields', async () => {
  const { buildCallResult } = await import('../src/screening/outcome');
  const state = makeState();
  state.consentGiven = true;
  state.passedKnockout = true;
  state.knockoutAnswers.push(answer('k1', 'pass'), answer('unknown', 'pass'));
  state.openAnswers.push({ questionId: 'o1', questionText: 'Waarom deze job?', answerSummary: 'passie', candidateNote: 'vraagt naar loon' });
  state.chosenTimeslot = 'dinsdag om 10 uur';
  state.scheduledDate = '2026-03-03';

  const result = buildCallResult(state);

  assert.equal(result.call_id, 'call-test');
  assert.equal(result.status, 'completed');
  assert.equal(result.consent_given, true);
  assert.deepEqual(
    result.knockout_answers.map((item) => item.internal_id),
    ['int-k1', ''],
  );
  assert.deepEqual(result.open_answers, [
    {
      question_id: 'o1',
      internal_id: 'int-o1',
      question_text: 'Waarom deze job?',
      answer_summary: 'passie',
      candidate_note: 'vraagt naar loon',
    },
  ]);
  assert.equal(result.scheduled_date, '2026-03-03');
  assert.equal(result.scheduled_time, null);
  assert.equal(result.calendar_event_id, null);
  assert.equal(result.scheduling_preference, null);
});
