import { Pool, fetch } from 'undici';
import { z } from 'zod';
import { log } from '../log';
import type { BusyInterval } from './types';

const FreeBusyResponseSchema = z.object({
  busy: z
    .array(
      z.object({
        start: z.string().datetime({ offset: true }),
        end: z.string().datetime({ offset: true }),
      }),
    )
    .default([]),
});

const CreatedEventSchema = z.object({
  id: z.string().min(1),
  html_link: z.string().optional(),
});

export interface CalendarResponse {
  status: number;
  text(): Promise<string>;
}

/** Posts JSON to a calendar service path. Swappable so tests stay in process. */
export type CalendarTransport = (
  path: string,
  body: unknown,
  signal: AbortSignal,
) => Promise<CalendarResponse>;

export interface CalendarClientOptions {
  baseUrl: string;
  calendarEmail: string;
  timeZone: string;
  timeoutMs: number;
  poolConnections?: number;
  transport?: CalendarTransport;
}

export interface CreateCalendarEvent {
  summary: string;
  description: string;
  start: Date;
  end: Date;
}

let sharedPool: Pool | null = null;
let sharedPoolOrigin: string | null = null;

/** One keep-alive pool per process; every call's calendar traffic shares it. */
export function getCalendarPool(origin: string, connections: number): Pool {
  if (!sharedPool || sharedPoolOrigin !== origin) {
    sharedPool = new Pool(origin, { connections });
    sharedPoolOrigin = origin;
  }
  return sharedPool;
}

export async function closeCalendarPool(): Promise<void> {
  const pool = sharedPool;
  sharedPool = null;
  sharedPoolOrigin = null;
  if (pool) {
    await pool.close();
  }
}

export function createPooledTransport(baseUrl: string, connections: number): CalendarTransport {
  const base = new URL(baseUrl);
  const prefix = base.pathname.replace(/\/$/, '');
  return async (path, body, signal) => {
    const dispatcher = getCalendarPool(base.origin, connections);
    const response = await fetch(`${base.origin}${prefix}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      signal,
      dispatcher,
    });
    return { status: response.status, text: () => response.text() };
  };
}

/** Free/busy lookup and event creation against the recruiter calendar service. */
export class CalendarClient {
  private readonly transport: CalendarTransport;

  constructor(private readonly options: CalendarClientOptions) {
    this.transport =
      options.transport ?? createPooledTransport(options.baseUrl, options.poolConnections ?? 10);
  }

  public get timeZone(): string {
    return this.options.timeZone;
  }

  public async freeBusy(timeMin: Date, timeMax: Date): Promise<BusyInterval[]> {
    const payload = await this.post('/freebusy', {
      calendar: this.options.calendarEmail,
      time_min: timeMin.toISOString(),
      time_max: timeMax.toISOString(),
      time_zone: this.options.timeZone,
    });
    const parsed = FreeBusyResponseSchema.parse(payload);
    log.info(
      { event: 'calendar_freebusy', busy_blocks: parsed.busy.length },
      'calendar free/busy fetched',
    );
    return parsed.busy.map((interval) => ({
      start: new Date(interval.start),
      end: new Date(interval.end),
    }));
  }

  public async createEvent(event: CreateCalendarEvent): Promise<{ id: string; link?: string }> {
    const payload = await this.post('/events', {
      calendar: this.options.calendarEmail,
      summary: event.summary,
      description: event.description,
      start: event.start.toISOString(),
      end: event.end.toISOString(),
      time_zone: this.options.timeZone,
      send_updates: 'none',
    });
    const created = CreatedEventSchema.parse(payload);
    log.info({ event: 'calendar_event_created', event_id: created.id }, 'calendar event created');
    return { id: created.id, link: created.html_link };
  }

  private async post(path: string, body: unknown): Promise<unknown> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);
    try {
      const response = await this.transport(path, body, controller.signal);
      const text = await response.text();
      if (response.status < 200 || response.status >= 300) {
        const preview = text.length > 500 ? `${text.slice(0, 500)}...` : text;
        throw new Error(`calendar ${path} failed ${response.status}: ${preview}`);
      }
      return text ? JSON.parse(text) : {};
    } finally {
      clearTimeout(timeout);
    }
  }
}
