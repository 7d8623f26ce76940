import { env } from '../env';
import { log } from '../log';
import type { CallResultPayload } from '../screening/outcome';
import type { SessionInput } from '../screening/types';
import { CalendarClient } from '../scheduling/calendarClient';
import { Scheduler } from '../scheduling/scheduler';
import type { StageRuntime } from '../stages/stageAgent';
import { writeUsageLog, type UsageSummary } from '../usage/usageTracker';
import { deliverCallResult } from '../webhook/resultWebhook';

/** Everything a call needs besides its input and speech channel. */
export interface CallDependencies {
  runtime: StageRuntime;
  deliverResult: (payload: CallResultPayload) => Promise<unknown>;
  saveUsage?: (summary: UsageSummary) => Promise<unknown>;
}

export type CallDependencyFactory = (input: SessionInput) => CallDependencies;

function createCalendarClient(): CalendarClient | undefined {
  if (!env.CALENDAR_SERVICE_URL || !env.CALENDAR_EMAIL) {
    log.info({ event: 'calendar_not_configured' }, 'calendar not configured, using fixed slots');
    return undefined;
  }
  return new CalendarClient({
    baseUrl: env.CALENDAR_SERVICE_URL,
    calendarEmail: env.CALENDAR_EMAIL,
    timeZone: env.CALENDAR_TIMEZONE,
    timeoutMs: env.CALENDAR_TIMEOUT_MS,
    poolConnections: env.CALENDAR_POOL_CONNECTIONS,
  });
}

/** The scheduler and its calendar pool are built once and shared by every call. */
export function createCallDependencyFactory(): CallDependencyFactory {
  const now = (): Date => new Date();
  const scheduler = new Scheduler({ client: createCalendarClient(), timeZone: env.CALENDAR_TIMEZONE, now });
  const runtime: StageRuntime = {
    scheduling: scheduler,
    agentName: env.AGENT_NAME,
    companyName: env.COMPANY_NAME,
    userAwayTimeoutS: env.USER_AWAY_TIMEOUT_S,
    openQuestionsAwayTimeoutS: env.OPEN_QUESTIONS_AWAY_TIMEOUT_S,
    timeZone: env.CALENDAR_TIMEZONE,
    now,
  };

  return (input) => ({
    runtime,
    deliverResult: (payload) => deliverCallResult(payload),
    saveUsage: env.USAGE_LOG_ENABLED
      ? async (summary) => {
          const filePath = await writeUsageLog(env.USAGE_LOG_DIR, {
            callId: input.callId,
            candidateName: input.candidateName,
            jobTitle: input.jobTitle,
            summary,
          });
          log.info({ event: 'usage_saved', call_id: input.callId, path: filePath }, 'usage saved');
        }
      : undefined,
  });
}
