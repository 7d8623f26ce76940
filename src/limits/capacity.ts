import { env } from '../env';
import { log } from '../log';
import { getRedisClient, RedisClient } from '../redis/client';

const LUA_CAPACITY_SCRIPT = `
local activeKey = KEYS[1]
local rpmKey = KEYS[2]

local callId = ARGV[1]
local globalCap = tonumber(ARGV[2])
local rpmCap = tonumber(ARGV[3])
local ttlSeconds = tonumber(ARGV[4])

if redis.call('SISMEMBER', activeKey, callId) == 1 then
  redis.call('EXPIRE', activeKey, ttlSeconds)
  return 'OK'
end

local activeCount = redis.call('SCARD', activeKey)
if activeCount >= globalCap then
  return 'global_at_capacity'
end

local rpmCount = tonumber(redis.call('GET', rpmKey) or '0')
if rpmCount >= rpmCap then
  return 'rate_limited'
end

redis.call('SADD', activeKey, callId)
redis.call('EXPIRE', activeKey, ttlSeconds)
local nextCount = redis.call('INCR', rpmKey)
if nextCount == 1 then
  redis.call('EXPIRE', rpmKey, 120)
end

return 'OK'
`;

const FAILURE_REASONS = ['global_at_capacity', 'rate_limited'] as const;
export type CapacityFailureReason = (typeof FAILURE_REASONS)[number];

export type CapacityResult = { ok: true } | { ok: false; reason: CapacityFailureReason };

export interface CapacityParams {
  callId: string;
  nowEpochMs?: number;
  requestId?: string;
  redis?: RedisClient;
  caps?: CapacityCaps;
}

export interface ReleaseParams {
  callId: string;
  requestId?: string;
  redis?: RedisClient;
}

export interface CapacityCaps {
  globalConcurrency?: number;
  callsPerMinute?: number;
}

let scriptSha: string | null = null;

function formatMinuteKey(epochMs: number): string {
  const date = new Date(epochMs);
  const pad = (value: number): string => value.toString().padStart(2, '0');
  return `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}${pad(
    date.getUTCHours(),
  )}${pad(date.getUTCMinutes())}`;
}

export function buildCapacityKeys(epochMs: number): { activeKey: string; rpmKey: string } {
  return {
    activeKey: `${env.CAP_PREFIX}:global:active`,
    rpmKey: `${env.CAP_PREFIX}:global:rpm:${formatMinuteKey(epochMs)}`,
  };
}

function isNoScriptError(error: unknown): boolean {
  return error instanceof Error && error.message.toUpperCase().includes('NOSCRIPT');
}

function isFailureReason(value: string): value is CapacityFailureReason {
  return FAILURE_REASONS.some((reason) => reason === value);
}

async function evalCapacityScript(redis: RedisClient, keys: string[], args: string[]): Promise<string> {
  const numKeys = keys.length;

  if (scriptSha) {
    try {
      return String(await redis.evalsha(scriptSha, numKeys, ...keys, ...args));
    } catch (error) {
      if (!isNoScriptError(error)) {
        throw error;
      }
    }
  }

  try {
    const loadedSha = String(await redis.script('LOAD', LUA_CAPACITY_SCRIPT));
    scriptSha = loadedSha;
    return String(await redis.evalsha(loadedSha, numKeys, ...keys, ...args));
  } catch (error) {
    log.warn({ err: error, event: 'capacity_script_load_failed' }, 'capacity script load failed, using eval');
    return String(await redis.eval(LUA_CAPACITY_SCRIPT, numKeys, ...keys, ...args));
  }
}

export async function tryAcquire(params: CapacityParams): Promise<CapacityResult> {
  const redis = params.redis ?? getRedisClient();
  const nowEpochMs = params.nowEpochMs ?? Date.now();
  const keys = buildCapacityKeys(nowEpochMs);
  const args = [
    params.callId,
    (params.caps?.globalConcurrency ?? env.GLOBAL_CONCURRENCY_CAP).toString(),
    (params.caps?.callsPerMinute ?? env.CALLS_PER_MIN_CAP).toString(),
    env.CAPACITY_TTL_SECONDS.toString(),
  ];

  let result: string;
  try {
    result = await evalCapacityScript(redis, [keys.activeKey, keys.rpmKey], args);
  } catch (error) {
    log.error(
      { err: error, event: 'capacity_eval_failed', call_id: params.callId, requestId: params.requestId },
      'capacity evaluation failed',
    );
    throw error;
  }

  if (result === 'OK') {
    log.info(
      { event: 'capacity_acquired', call_id: params.callId, requestId: params.requestId },
      'capacity acquired',
    );
    return { ok: true };
  }

  if (isFailureReason(result)) {
    log.warn(
      { event: 'capacity_denied', reason: result, call_id: params.callId, requestId: params.requestId },
      'capacity denied',
    );
    return { ok: false, reason: result };
  }

  log.error(
    { event: 'capacity_unknown_result', result, call_id: params.callId, requestId: params.requestId },
    'capacity returned unknown result',
  );
  return { ok: false, reason: 'rate_limited' };
}

/** Never throws; a failed release only logs, the set entry expires with its TTL. */
export async function release(params: ReleaseParams): Promise<void> {
  const redis = params.redis ?? getRedisClient();
  const { activeKey } = buildCapacityKeys(Date.now());

  try {
    const removed = await redis.srem(activeKey, params.callId);
    log.info(
      { event: 'capacity_released', call_id: params.callId, removed, requestId: params.requestId },
      'capacity released',
    );
  } catch (error) {
    log.error(
      { event: 'capacity_release_failed', err: error, call_id: params.callId, requestId: params.requestId },
      'capacity release failed',
    );
  }
}
