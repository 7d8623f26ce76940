import assert from 'node:assert/strict';
import { test } from 'node:test';
import type { StageAgent } from '../src/stages/stageAgent';
import { FakeScheduling, FakeStageContext, makeRuntime, makeState, settle } from './fakes';
import { setTestEnv } from './testEnv';

setTestEnv();

function call(stage: StageAgent, name: string, args: Record<string, unknown> = {}): Promise<string | undefined> {
  return stage.handleToolCall({ id: `${name}-1`, name, arguments: args });
}

test('greeting opens the call and records consent', async () => {
  const { GreetingStage } = await import('../src/stages/greeting');
  const ctx = new FakeStageContext();
  const stage = new GreetingStage(ctx);

  assert.deepEqual(await stage.onEnter(), { type: 'stay' });
  assert.deepEqual(ctx.speech.replies, ['Greet the candidate and introduce yourself briefly.']);
  assert.deepEqual(stage.toolNames(), [
    'switch_language',
    'escalate_to_recruiter',
    'end_conversation_irrelevant',
    'record_consent',
    'record_no_consent',
    'candidate_ready',
    'detected_voicemail',
    'candidate_is_proxy',
    'candidate_not_available',
  ]);

  assert.equal(await call(stage, 'record_consent'), 'Consent noted. Continue with the introduction.');
  assert.equal(ctx.state.consentGiven, true);
  assert.equal(await call(stage, 'record_no_consent'), 'Noted. Continue with the introduction.');
  assert.equal(ctx.state.consentGiven, false);

  ctx.state.irrelevantCount = 2;
  await call(stage, 'candidate_ready');
  assert.equal(ctx.state.irrelevantCount, 0);
  assert.deepEqual(ctx.transitions, [{ type: 'handoff', target: { stage: 'screening' } }]);
});

test('greeting leaves a voicemail message with or without a name', async () => {
  const { GreetingStage, VOICEMAIL_PAUSE_MS } = await import('../src/stages/greeting');

  const named = new FakeStageContext();
  await call(new GreetingStage(named), 'detected_voicemail');
  assert.equal(named.state.voicemailDetected, true);
  assert.deepEqual(named.lastTransition(), {
    type: 'end',
    reason: 'voicemail',
    closing:
      'Hallo Test Kandidaat, je spreekt met Anna van Jobline. We belden je in verband met je sollicitatie. Bel ons gerust terug wanneer het je past. Nog een fijne dag.',
    pauseMs: VOICEMAIL_PAUSE_MS,
  });

  const anonymous = new FakeStageContext(makeState({ candidate_name: '' }));
  await call(new GreetingStage(anonymous), 'detected_voicemail');
  const transition = anonymous.lastTransition();
  assert.equal(transition?.type, 'end');
  if (transition?.type === 'end') {
    assert.match(transition.closing ?? '', /^Hallo, je spreekt met Anna van Jobline\./);
  }
});

test('greeting ends politely for a proxy or an unavailable candidate', async () => {
  const { GreetingStage } = await import('../src/stages/greeting');
  const { message } = await import('../src/i18n/messages');
  const ctx = new FakeStageContext();
  const stage = new GreetingStage(ctx);

  await call(stage, 'candidate_is_proxy');
  await call(stage, 'candidate_not_available');

  assert.deepEqual(ctx.transitions, [
    { type: 'end', reason: 'proxy', closing: message('nl', 'proxy_detected') },
    { type: 'end', reason: 'not_available', closing: message('nl', 'candidate_not_available') },
  ]);
});

test('shared tools switch language, escalate and count irrelevant answers', async () => {
  const { GreetingStage } = await import('../src/stages/greeting');
  const { message } = await import('../src/i18n/messages');
  const ctx = new FakeStageContext();
  const stage = new GreetingStage(ctx);

  assert.equal(await call(stage, 'switch_language', { language: 'es' }), "Language 'es' is not supported. Supported: nl, en, fr, de");
  assert.equal(ctx.state.language, 'nl');
  assert.equal(
    await call(stage, 'switch_language', { language: ' EN ' }),
    'Language switched to en. Continue the conversation in this language.',
  );
  assert.equal(ctx.state.language, 'en');
  assert.deepEqual(ctx.speech.languages, ['en']);

  await call(stage, 'escalate_to_recruiter');
  assert.deepEqual(ctx.lastTransition(), {
    type: 'handoff',
    target: { stage: 'recruiter' },
    closing: message('en', 'recruiter_handoff'),
  });

  assert.equal(
    await call(stage, 'end_conversation_irrelevant'),
    '[SYSTEM] Irrelevant answer 1/3. 2 chance(s) left. Politely but clearly ask the candidate to stay on topic.',
  );
  await call(stage, 'end_conversation_irrelevant');
  assert.equal(await call(stage, 'end_conversation_irrelevant'), undefined);
  assert.deepEqual(ctx.lastTransition(), {
    type: 'end',
    reason: 'irrelevant',
    closing: message('en', 'irrelevant_shutdown'),
  });
});

test('escalation is ignored when the session disables it', async () => {
  const { GreetingStage } = await import('../src/stages/greeting');
  const ctx = new FakeStageContext(makeState({ allow_escalation: false }));

  assert.equal(await call(new GreetingStage(ctx), 'escalate_to_recruiter'), undefined);
  assert.deepEqual(ctx.transitions, []);
});

test('open questions run the ready check, then the group, then hand off to scheduling', async () => {
  const { OpenQuestionsStage } = await import('../src/stages/openQuestions');
  const { message } = await import('../src/i18n/messages');
  const ctx = new FakeStageContext();
  const entering = new OpenQuestionsStage(ctx).onEnter();

  await settle();
  assert.deepEqual(ctx.speech.awayTimeouts, [6]);
  assert.deepEqual(ctx.speech.said, [message('nl', 'ready_check')]);
  await ctx.tool('confirm_ready');
  await settle();
  await ctx.tool('record_answer', { answer_summary: 'graag met mensen werken' });
  await settle();
  await ctx.tool('record_answer', { answer_summary: 'vanaf maandag' });

  assert.deepEqual(await entering, { type: 'handoff', target: { stage: 'scheduling' } });
  assert.deepEqual(ctx.speech.awayTimeouts, [6, 4]);
  assert.equal(ctx.speech.said[1], 'Super, bedankt voor je antwoorden.');
  assert.deepEqual(
    ctx.state.openAnswers.map((answer) => answer.answerSummary),
    ['graag met mensen werken', 'vanaf maandag'],
  );
});

test('open questions end on a declined ready check', async () => {
  const { OpenQuestionsStage } = await import('../src/stages/openQuestions');
  const { READY_CHECK_MAX_TURNS } = await import('../src/dialogue/readyCheckTask');
  const { message } = await import('../src/i18n/messages');
  const ctx = new FakeStageContext();
  const entering = new OpenQuestionsStage(ctx).onEnter();

  await settle();
  for (let turn = 0; turn < READY_CHECK_MAX_TURNS; turn += 1) {
    ctx.top().handleUserTurn('euh');
  }

  assert.deepEqual(await entering, {
    type: 'end',
    reason: 'ready_check_declined',
    closing: message('nl', 'ready_check_decline'),
  });
  assert.deepEqual(ctx.speech.awayTimeouts, [6, 4]);
  assert.deepEqual(ctx.state.openAnswers, []);
});

test('open questions skip scheduling when a booking already exists', async () => {
  const { OpenQuestionsStage } = await import('../src/stages/openQuestions');
  const ctx = new FakeStageContext(
    makeState({
      open_questions: [],
      candidate_known: true,
      candidate_record: { existing_booking_date: 'maandag 9 maart om 10 uur' },
    }),
  );
  const entering = new OpenQuestionsStage(ctx).onEnter();

  await settle();
  await ctx.tool('confirm_ready');

  assert.deepEqual(await entering, {
    type: 'end',
    reason: 'existing_booking',
    closing:
      'Je hebt al een afspraak staan op maandag 9 maart om 10 uur. Je kan dit dan meteen bespreken tijdens dat gesprek. Bedankt voor je tijd en nog een fijne dag.',
  });
});

test('open questions hand off to the recruiter when the candidate asks', async () => {
  const { OpenQuestionsStage } = await import('../src/stages/openQuestions');
  const ctx = new FakeStageContext();
  const entering = new OpenQuestionsStage(ctx).onEnter();

  await settle();
  await ctx.tool('confirm_ready');
  await settle();
  await ctx.tool('escalate_to_recruiter');

  const transition = await entering;
  assert.equal(transition.type, 'handoff');
  if (transition.type === 'handoff') {
    assert.deepEqual(transition.target, { stage: 'recruiter' });
  }
  assert.equal(ctx.state.openAnswers.length, 1);
});

test('scheduling invites, offers slots and confirms a slot for tomorrow', async () => {
  const { SchedulingStage } = await import('../src/stages/scheduling');
  const scheduling = new FakeScheduling();
  const ctx = new FakeStageContext(makeState(), makeRuntime({ scheduling }));
  const stage = new SchedulingStage(ctx);

  assert.deepEqual(await stage.onEnter(), { type: 'stay' });
  assert.deepEqual(ctx.speech.said, [
    'We willen je graag uitnodigen voor een kort gesprek met de recruiter op ons kantoor in Teststad. Even kijken wanneer dat zou passen.',
  ]);
  assert.deepEqual(ctx.speech.replies, ['Call `get_available_timeslots` now to fetch the available moments.']);

  assert.equal(
    await call(stage, 'get_available_timeslots'),
    'Available moments:\n- morgen dinsdag 3 maart om 10 uur (date 2026-03-03)',
  );
  assert.equal(
    await call(stage, 'get_timeslots_for_date', { date: '2026-03-07' }),
    'Er zijn helaas geen beschikbare momenten op die dag. Ask the candidate for their preferred days and times, then call `schedule_with_recruiter`.',
  );
  assert.deepEqual(scheduling.dateQueries, ['2026-03-07']);

  await call(stage, 'confirm_timeslot', { timeslot: 'dinsdag 3 maart om 10 uur', date: '2026-03-03', time: '10 uur' });
  await settle();

  assert.equal(ctx.state.chosenTimeslot, 'dinsdag 3 maart om 10 uur');
  assert.equal(ctx.state.scheduledDate, '2026-03-03');
  assert.equal(ctx.state.scheduledTime, '10 uur');
  assert.equal(ctx.state.calendarEventId, 'evt-1');
  assert.deepEqual(scheduling.created, [
    { candidateName: 'Test Kandidaat', date: '2026-03-03', time: '10 uur', vacancyTitle: 'Testfunctie' },
  ]);
  assert.deepEqual(ctx.lastTransition(), {
    type: 'end',
    reason: 'scheduled',
    closing:
      'Super, dan staat je gesprek gepland op dinsdag 3 maart om 10 uur, met de recruiter op ons kantoor in Teststad aan de Teststraat 1. Je ontvangt zo meteen nog een bevestiging via WhatsApp. Bedankt voor het gesprek, veel succes en nog een fijne dag.',
  });
});

test('scheduling a later day promises a reminder and survives a failed booking', async () => {
  const { SchedulingStage } = await import('../src/stages/scheduling');
  const scheduling = new FakeScheduling();
  scheduling.eventResult = { ok: false, error: 'calendar not configured' };
  const ctx = new FakeStageContext(makeState(), makeRuntime({ scheduling }));
  const stage = new SchedulingStage(ctx);

  await call(stage, 'confirm_timeslot', { timeslot: 'donderdag 5 maart om 11 uur', date: '2026-03-05', time: '11 uur' });
  await settle();

  assert.equal(ctx.state.calendarEventId, undefined);
  const transition = ctx.lastTransition();
  assert.equal(transition?.type, 'end');
  if (transition?.type === 'end') {
    assert.match(transition.closing ?? '', /Je ontvangt een bevestiging en later ook een reminder via WhatsApp\./);
  }
});

test('scheduling stores a preference when nothing fits', async () => {
  const { SchedulingStage } = await import('../src/stages/scheduling');
  const { message } = await import('../src/i18n/messages');
  const ctx = new FakeStageContext();

  await call(new SchedulingStage(ctx), 'schedule_with_recruiter', { preference: 'woensdagnamiddag' });

  assert.equal(ctx.state.schedulingPreference, 'woensdagnamiddag');
  assert.deepEqual(ctx.lastTransition(), {
    type: 'end',
    reason: 'scheduling_preference',
    closing: message('nl', 'scheduling_preference'),
  });
});

test('alternative stage asks the follow-up questions when the candidate is interested', async () => {
  const { AlternativeStage, ALTERNATIVE_QUESTIONS } = await import('../src/stages/alternative');
  const { message } = await import('../src/i18n/messages');
  const ctx = new FakeStageContext();
  const stage = new AlternativeStage(ctx, 'Heb je een rijbewijs?');

  await stage.onEnter();
  assert.match(ctx.speech.replies[0] ?? '', /^The candidate did not meet the requirement: 'Heb je een rijbewijs\?'\./);

  assert.equal(await call(stage, 'candidate_interested'), 'Great. The follow-up questions start now.');
  assert.equal(ctx.state.interestedInAlternatives, true);

  for (const question of ALTERNATIVE_QUESTIONS) {
    await settle();
    assert.match(ctx.top().agentId, new RegExp(`^open:${question.id}:`));
    await ctx.tool('record_answer', { answer_summary: `antwoord ${question.id}` });
  }
  await Promise.all(ctx.background);

  assert.deepEqual(ctx.speech.said, ['Ok, goed, in die regio hebben we meer dan 50 vacatures.']);
  assert.deepEqual(
    ctx.state.openAnswers.map((answer) => answer.questionId),
    ['alt1', 'alt2', 'alt3'],
  );
  assert.deepEqual(ctx.lastTransition(), {
    type: 'end',
    reason: 'alternatives_recorded',
    closing: message('nl', 'alternative_thanks'),
  });
});

test('alternative stage closes when the candidate is not interested', async () => {
  const { AlternativeStage } = await import('../src/stages/alternative');
  const { message } = await import('../src/i18n/messages');
  const ctx = new FakeStageContext();

  await call(new AlternativeStage(ctx, 'Heb je een rijbewijs?'), 'candidate_not_interested');

  assert.equal(ctx.state.interestedInAlternatives, false);
  assert.deepEqual(ctx.transitions, [
    { type: 'end', reason: 'alternatives_declined', closing: message('nl', 'alternative_not_interested') },
  ]);
});

test('recruiter stage greets by name and cannot escalate further', async () => {
  const { RecruiterStage } = await import('../src/stages/recruiter');
  const { message } = await import('../src/i18n/messages');
  const ctx = new FakeStageContext();
  const stage = new RecruiterStage(ctx);

  assert.deepEqual(await stage.onEnter(), { type: 'stay' });
  assert.equal(ctx.state.recruiterRequested, true);
  assert.deepEqual(ctx.speech.languages, ['nl']);
  assert.deepEqual(ctx.speech.said, ['Hallo Test Kandidaat, je spreekt nu met de recruiter. Hoe kan ik je helpen?']);

  assert.equal(await call(stage, 'escalate_to_recruiter'), undefined);
  assert.deepEqual(ctx.transitions, []);

  await call(stage, 'end_conversation');
  assert.deepEqual(ctx.transitions, [
    { type: 'end', reason: 'recruiter_done', closing: message('nl', 'recruiter_goodbye') },
  ]);
});

test('registry starts at the greeting unless a start stage is given', async () => {
  const { createStage, startTarget } = await import('../src/stages/registry');

  const plain = new FakeStageContext();
  assert.deepEqual(startTarget(plain), { stage: 'greeting' });
  assert.equal(createStage(startTarget(plain), plain).agentId, 'stage:greeting');

  const debug = new FakeStageContext(makeState({ start_agent: 'alternative' }));
  assert.deepEqual(startTarget(debug), { stage: 'alternative', failedQuestion: 'Heb je een rijbewijs?' });
  assert.equal(createStage({ stage: 'recruiter' }, debug).name, 'recruiter');
});
