import assert from 'node:assert/strict';
import { test } from 'node:test';
import type { CallEndSummary, ScreeningCall } from '../src/calls/screeningCall';
import type { CallResultPayload } from '../src/screening/outcome';
import { parseSessionInput, type SessionInputPayload } from '../src/screening/types';
import type { UsageSummary } from '../src/usage/usageTracker';
import { BASE_INPUT, FakeSpeechSession, StalledSpeechSession, makeRuntime, settle } from './fakes';
import { setTestEnv } from './testEnv';

setTestEnv();

interface Harness {
  call: ScreeningCall;
  speech: FakeSpeechSession;
  delivered: CallResultPayload[];
  saved: UsageSummary[];
  ended: CallEndSummary[];
}

async function startCall(
  overrides: Partial<SessionInputPayload> = {},
  options: {
    speech?: FakeSpeechSession;
    drainTimeoutMs?: number;
    deliverResult?: (payload: CallResultPayload) => Promise<unknown>;
  } = {},
): Promise<Harness> {
  const { ScreeningCall } = await import('../src/calls/screeningCall');
  const speech = options.speech ?? new FakeSpeechSession();
  const delivered: CallResultPayload[] = [];
  const saved: UsageSummary[] = [];
  const ended: CallEndSummary[] = [];

  const call = new ScreeningCall({
    input: parseSessionInput({ ...BASE_INPUT, ...overrides }),
    speech,
    runtime: makeRuntime(),
    deliverResult:
      options.deliverResult ??
      (async (payload) => {
        delivered.push(payload);
      }),
    saveUsage: async (summary) => {
      saved.push(summary);
    },
    onEnded: (summary) => {
      ended.push(summary);
    },
    drainTimeoutMs: options.drainTimeoutMs,
  });
  call.start();
  await settle();
  return { call, speech, delivered, saved, ended };
}

test('a call runs from greeting to a scheduled interview', async () => {
  const { call, speech, delivered, ended } = await startCall();

  assert.deepEqual(speech.awayTimeouts, [4]);
  assert.equal(speech.activeAgentId(), 'stage:greeting');
  await speech.tool('record_consent');
  await speech.tool('candidate_ready');
  await settle();

  assert.equal(call.getActiveStage(), 'screening');
  await speech.tool('mark_pass', { answer_summary: 'ja' });
  await settle();
  await speech.tool('mark_pass', { answer_summary: 'ja' });
  await settle();

  assert.equal(call.getActiveStage(), 'open_questions');
  await speech.tool('confirm_ready');
  await settle();
  await speech.tool('record_answer', { answer_summary: 'houdt van logistiek' });
  await settle();
  await speech.tool('record_answer', { answer_summary: 'volgende maand' });
  await settle();

  assert.equal(call.getActiveStage(), 'scheduling');
  assert.equal(speech.activeAgentId(), 'stage:scheduling');
  await speech.tool('confirm_timeslot', { timeslot: 'dinsdag 3 maart om 10 uur', date: '2026-03-03', time: '10 uur' });
  const summary = await call.whenEnded();

  assert.equal(summary.reason, 'scheduled');
  assert.equal(summary.status, 'completed');
  assert.equal(call.getPhase(), 'ended');
  assert.match(speech.said[speech.said.length - 1] ?? '', /^Super, dan staat je gesprek gepland op dinsdag 3 maart om 10 uur/);
  assert.deepEqual(speech.shutdowns, [{ drain: true }]);
  assert.equal(speech.closedReason, 'scheduled');
  assert.equal(delivered.length, 1);
  assert.equal(delivered[0]?.consent_given, true);
  assert.equal(delivered[0]?.passed_knockout, true);
  assert.equal(delivered[0]?.scheduled_date, '2026-03-03');
  assert.deepEqual(
    delivered[0]?.open_answers.map((answer) => answer.answer_summary),
    ['houdt van logistiek', 'volgende maand'],
  );
  assert.equal(ended.length, 1);
});

test('irrelevant answers count across stages and end the call at the limit', async () => {
  const { message } = await import('../src/i18n/messages');
  const { call, speech, delivered } = await startCall();

  assert.equal(
    await speech.tool('end_conversation_irrelevant'),
    '[SYSTEM] Irrelevant answer 1/3. 2 chance(s) left. Politely but clearly ask the candidate to stay on topic.',
  );
  await speech.tool('escalate_to_recruiter');
  await settle();

  assert.equal(call.getActiveStage(), 'recruiter');
  assert.equal(call.state.irrelevantCount, 1);
  assert.equal(
    await speech.tool('end_conversation_irrelevant'),
    '[SYSTEM] Irrelevant answer 2/3. 1 chance(s) left. Politely but clearly ask the candidate to stay on topic.',
  );
  await speech.tool('end_conversation_irrelevant');
  const summary = await call.whenEnded();

  assert.equal(summary.reason, 'irrelevant');
  assert.equal(summary.status, 'irrelevant');
  assert.equal(call.state.irrelevantCount, 3);
  assert.equal(speech.said[speech.said.length - 1], message('nl', 'irrelevant_shutdown'));
  assert.equal(delivered[0]?.status, 'irrelevant');
});

test('an accepted answer resets the irrelevance count between stages', async () => {
  const { call, speech } = await startCall();

  await speech.tool('end_conversation_irrelevant');
  await speech.tool('record_consent');
  await speech.tool('candidate_ready');
  await settle();
  assert.equal(call.getActiveStage(), 'screening');
  assert.equal(call.state.irrelevantCount, 0);

  await speech.tool('mark_irrelevant', { answer_summary: 'over het weer' });
  await speech.tool('mark_irrelevant', { answer_summary: 'over voetbal' });
  assert.equal(call.state.irrelevantCount, 2);
  await speech.tool('mark_pass', { answer_summary: 'ja' });
  await settle();
  assert.equal(call.state.irrelevantCount, 0);

  await speech.tool('mark_irrelevant', { answer_summary: 'over het weer' });
  await speech.tool('mark_irrelevant', { answer_summary: 'over voetbal' });
  assert.equal(call.getPhase(), 'active');
  await speech.tool('mark_pass', { answer_summary: 'ja' });
  await settle();

  assert.equal(call.getActiveStage(), 'open_questions');
  assert.equal(call.snapshot().irrelevant_count, 0);
  assert.deepEqual(
    call.state.knockoutAnswers.map((answer) => answer.result),
    ['pass', 'pass'],
  );
  await call.hangup();
});

test('a speech side that never finishes speaking does not hold the call', async () => {
  const speech = new StalledSpeechSession();
  const { call, delivered, ended } = await startCall({}, { speech, drainTimeoutMs: 20 });

  await speech.tool('candidate_not_available');
  const summary = await call.whenEnded();

  assert.equal(summary.reason, 'not_available');
  assert.equal(call.getPhase(), 'ended');
  assert.equal(speech.said.length, 1);
  assert.deepEqual(speech.shutdowns, []);
  assert.equal(speech.closedReason, 'not_available');
  assert.equal(delivered.length, 1);
  assert.equal(ended.length, 1);
});

test('silence prompts once, then closes the call', async () => {
  const { message } = await import('../src/i18n/messages');
  const { call, speech } = await startCall();

  speech.userState('away');
  assert.deepEqual(speech.said, [message('nl', 'silence_prompt')]);
  assert.equal(call.state.silenceCount, 1);

  speech.userState('present');
  assert.equal(call.state.silenceCount, 0);

  speech.userState('away');
  speech.userState('away');
  const summary = await call.whenEnded();

  assert.equal(summary.reason, 'silence');
  assert.equal(summary.status, 'incomplete');
  assert.equal(speech.said[speech.said.length - 1], message('nl', 'silence_shutdown'));
});

test('silence is not counted while the system speaks', async () => {
  const { call, speech } = await startCall();

  call.state.suppressSilence = true;
  speech.userState('away');
  speech.userState('away');

  assert.equal(call.state.silenceCount, 0);
  assert.equal(call.getPhase(), 'active');
  await call.hangup();
});

test('tool calls for an agent that is no longer active are ignored', async () => {
  const { call, speech } = await startCall();

  assert.equal(await speech.tool('record_consent', {}, 'knockout:k1:1'), undefined);
  assert.equal(call.state.consentGiven, null);
  assert.equal(await speech.tool('record_consent', {}, 'stage:greeting'), 'Consent noted. Continue with the introduction.');
  assert.equal(call.state.consentGiven, true);
  await call.hangup();
});

test('escalation hands off to the recruiter and resolves as escalated', async () => {
  const { message } = await import('../src/i18n/messages');
  const { call, speech } = await startCall();

  await speech.tool('escalate_to_recruiter');
  await settle();

  assert.equal(call.getActiveStage(), 'recruiter');
  assert.deepEqual(speech.said, [
    message('nl', 'recruiter_handoff'),
    'Hallo Test Kandidaat, je spreekt nu met de recruiter. Hoe kan ik je helpen?',
  ]);
  assert.equal(call.snapshot().active_agent, 'stage:recruiter');

  await speech.tool('end_conversation');
  const summary = await call.whenEnded();
  assert.equal(summary.reason, 'recruiter_done');
  assert.equal(summary.status, 'escalated');
});

test('voicemail plays the message, pauses, then ends', async () => {
  const { call, speech, delivered } = await startCall();

  await speech.tool('detected_voicemail');
  const summary = await call.whenEnded();

  assert.equal(summary.status, 'voicemail');
  assert.match(speech.said[0] ?? '', /^Hallo Test Kandidaat, je spreekt met Anna van Jobline\./);
  assert.equal(delivered[0]?.voicemail_detected, true);
});

test('playground calls are not delivered but still released', async () => {
  const { call, delivered, ended } = await startCall({ is_playground: true });

  const summary = await call.hangup();

  assert.equal(summary.reason, 'hangup');
  assert.deepEqual(delivered, []);
  assert.equal(ended.length, 1);
  assert.equal(ended[0]?.result?.call_id, 'call-test');
});

test('teardown goes on when delivery fails and carries usage and transcript', async () => {
  const speech = new FakeSpeechSession();
  const { call, saved, ended } = await startCall(
    {},
    {
      speech,
      deliverResult: async () => {
        throw new Error('webhook down');
      },
    },
  );

  speech.handlers?.onUsage({ llmPromptTokens: 1_000_000, llmCompletionTokens: 500_000 });
  speech.handlers?.onUsage({ ttsCharacters: 1000, sttAudioSeconds: 3600 });
  speech.handlers?.onConversationItem({ role: 'assistant', message: 'Hallo!' });
  speech.handlers?.onConversationItem({ role: 'user', message: '  ' });
  speech.handlers?.onConversationItem({ role: 'user', message: 'Hallo' });

  const summary = await call.hangup();
  await settle();

  assert.deepEqual(summary.usage.cost_usd, { llm: 1.2, tts: 0.01125, stt: 0.462, total: 1.67325 });
  assert.deepEqual(saved, [summary.usage]);
  assert.deepEqual(summary.result?.transcript, [
    { role: 'assistant', message: 'Hallo!' },
    { role: 'user', message: 'Hallo' },
  ]);
  assert.equal(ended.length, 1);
  assert.equal(call.getPhase(), 'ended');
});

test('a remote hang-up ends the call without draining speech', async () => {
  const { call, speech } = await startCall();

  speech.handlers?.onClosed('hangup');
  const summary = await call.whenEnded();

  assert.equal(summary.reason, 'hangup');
  assert.deepEqual(speech.shutdowns, []);
  assert.equal(await speech.tool('record_consent'), undefined);
});

test('end is idempotent and a second start is refused', async () => {
  const { call } = await startCall();

  const first = call.end('not_available');
  const second = call.hangup();
  assert.equal(first, second);
  assert.equal((await first).reason, 'not_available');
  assert.throws(() => call.start(), /already started/);
});

test('a failing stage ends the call with an error', async () => {
  class BrokenSpeech extends FakeSpeechSession {
    async generateReply(): Promise<void> {
      throw new Error('speech backend unavailable');
    }
  }
  const { call } = await startCall({}, { speech: new BrokenSpeech() });

  const summary = await call.whenEnded();
  assert.equal(summary.reason, 'error');
});

test('snapshot and debug start stage', async () => {
  const { call } = await startCall({ start_agent: 'scheduling' });

  assert.deepEqual(call.snapshot(), {
    call_id: 'call-test',
    phase: 'active',
    stage: 'scheduling',
    active_agent: 'stage:scheduling',
    language: 'nl',
    silence_count: 0,
    irrelevant_count: 0,
    knockout_answers: 0,
    open_answers: 0,
    end_reason: null,
    status: null,
  });
  await call.hangup();
});
