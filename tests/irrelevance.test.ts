import assert from 'node:assert/strict';
import { test } from 'node:test';
import { makeState } from './fakes';
import { setTestEnv } from './testEnv';

setTestEnv();

test('checkIrrelevant warns with the remaining chances until the limit', async () => {
  const { checkIrrelevant, IRRELEVANT_LIMIT_REACHED } = await import('../src/screening/irrelevance');
  const state = makeState();

  assert.equal(
    checkIrrelevant(state),
    '[SYSTEM] Irrelevant answer 1/3. 2 chance(s) left. Politely but clearly ask the candidate to answer the question.',
  );
  assert.equal(
    checkIrrelevant(state, 'to stay on topic'),
    '[SYSTEM] Irrelevant answer 2/3. 1 chance(s) left. Politely but clearly ask the candidate to stay on topic.',
  );
  assert.equal(checkIrrelevant(state), IRRELEVANT_LIMIT_REACHED);
  assert.equal(state.irrelevantCount, 3);
});

test('resetIrrelevant clears the shared counter', async () => {
  const { checkIrrelevant, irrelevantLimitReached, resetIrrelevant } = await import('../src/screening/irrelevance');
  const state = makeState();

  checkIrrelevant(state);
  checkIrrelevant(state);
  resetIrrelevant(state);

  assert.equal(state.irrelevantCount, 0);
  assert.equal(irrelevantLimitReached(state), false);
  assert.match(String(checkIrrelevant(state)), /^\[SYSTEM\] Irrelevant answer 1\/3\./);
});
