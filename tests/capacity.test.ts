import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';

setTestEnv();

class MockRedis {
  public evalshaCalls: Array<{ sha: string; numKeys: number; keys: string[]; args: string[] }> = [];
  public evalCalls: Array<{ script: string; numKeys: number; keys: string[]; args: string[] }> = [];
  public sremCalls: Array<{ key: string; member: string }> = [];
  public noScriptFailures = 0;
  public scriptLoadFails = false;
  public sremFails = false;

  constructor(private readonly result: string) {}

  async script(_command: string, _script: string): Promise<string> {
    if (this.scriptLoadFails) {
      throw new Error('ERR script loading disabled');
    }
    return 'mock-sha';
  }

  async evalsha(sha: string, numKeys: number, ...rest: string[]): Promise<string> {
    if (this.noScriptFailures > 0) {
      this.noScriptFailures -= 1;
      throw new Error('NOSCRIPT No matching script. Please use EVAL.');
    }
    const keys = rest.slice(0, numKeys);
    const args = rest.slice(numKeys);
    this.evalshaCalls.push({ sha, numKeys, keys, args });
    return this.result;
  }

  async eval(script: string, numKeys: number, ...rest: string[]): Promise<string> {
    const keys = rest.slice(0, numKeys);
    const args = rest.slice(numKeys);
    this.evalCalls.push({ script, numKeys, keys, args });
    return this.result;
  }

  async srem(key: string, member: string): Promise<number> {
    if (this.sremFails) {
      throw new Error('connection lost');
    }
    this.sremCalls.push({ key, member });
    return 1;
  }
}

test('tryAcquire builds expected keys and args', async () => {
  const { tryAcquire } = await import('../src/limits/capacity');
  const mockRedis = new MockRedis('OK');
  const nowEpochMs = Date.UTC(2024, 0, 2, 3, 4, 5);

  const result = await tryAcquire({
    callId: 'call-2',
    redis: mockRedis as never,
    nowEpochMs,
  });

  assert.deepEqual(result, { ok: true });
  assert.equal(mockRedis.evalshaCalls.length, 1);

  const call = mockRedis.evalshaCalls[0];
  assert.equal(call?.sha, 'mock-sha');
  assert.deepEqual(call?.keys, ['cap:global:active', 'cap:global:rpm:202401020304']);
  assert.deepEqual(call?.args, ['call-2', '30', '10', '600']);
});

test('tryAcquire takes caps passed by the caller', async () => {
  const { tryAcquire } = await import('../src/limits/capacity');
  const mockRedis = new MockRedis('OK');

  await tryAcquire({
    callId: 'call-3',
    redis: mockRedis as never,
    nowEpochMs: Date.UTC(2024, 0, 2, 3, 4, 5),
    caps: { globalConcurrency: 2, callsPerMinute: 1 },
  });

  assert.deepEqual(mockRedis.evalshaCalls[0]?.args, ['call-3', '2', '1', '600']);
});

test('tryAcquire maps denial results', async () => {
  const { tryAcquire } = await import('../src/limits/capacity');

  const full = await tryAcquire({ callId: 'call-1', redis: new MockRedis('global_at_capacity') as never });
  assert.deepEqual(full, { ok: false, reason: 'global_at_capacity' });

  const limited = await tryAcquire({ callId: 'call-1', redis: new MockRedis('rate_limited') as never });
  assert.deepEqual(limited, { ok: false, reason: 'rate_limited' });

  const unknown = await tryAcquire({ callId: 'call-1', redis: new MockRedis('WAT') as never });
  assert.deepEqual(unknown, { ok: false, reason: 'rate_limited' });
});

test('tryAcquire reloads the script after NOSCRIPT and falls back to eval', async () => {
  const { tryAcquire } = await import('../src/limits/capacity');

  const flushed = new MockRedis('OK');
  flushed.noScriptFailures = 1;
  assert.deepEqual(await tryAcquire({ callId: 'call-4', redis: flushed as never }), { ok: true });
  assert.equal(flushed.evalshaCalls.length, 1);
  assert.equal(flushed.evalCalls.length, 0);

  const noScripts = new MockRedis('OK');
  noScripts.noScriptFailures = 1;
  noScripts.scriptLoadFails = true;
  assert.deepEqual(await tryAcquire({ callId: 'call-5', redis: noScripts as never }), { ok: true });
  assert.equal(noScripts.evalCalls.length, 1);
  assert.deepEqual(noScripts.evalCalls[0]?.keys.slice(0, 1), ['cap:global:active']);
});

test('release removes the call from the active set and never throws', async () => {
  const { release } = await import('../src/limits/capacity');
  const mockRedis = new MockRedis('OK');

  await release({ callId: 'call-6', redis: mockRedis as never });
  assert.deepEqual(mockRedis.sremCalls, [{ key: 'cap:global:active', member: 'call-6' }]);

  const broken = new MockRedis('OK');
  broken.sremFails = true;
  await release({ callId: 'call-7', redis: broken as never });
  assert.deepEqual(broken.sremCalls, []);
});
