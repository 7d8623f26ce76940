import { addDays, differenceInCalendarDays } from 'date-fns';
import { log } from '../log';
import type { CalendarClient } from './calendarClient';
import {
  INTERVIEW_DURATION_MINUTES,
  buildDaySlots,
  businessDays,
  fallbackSlots,
  fallbackTimes,
  freeTimes,
  parseCalendarDate,
  parseSpokenTime,
  pickQuickSlots,
  todayIn,
  zonedInstant,
} from './slots';
import type {
  DaySlots,
  InterviewEventRequest,
  InterviewEventResult,
  SchedulingService,
  SlotOffer,
} from './types';

export const NO_SLOTS_ON_DATE = 'Er zijn helaas geen beschikbare momenten op die dag.';

export interface SchedulerOptions {
  /** Without a client every lookup uses the fixed weekday offer. */
  client?: CalendarClient;
  timeZone: string;
  now?: () => Date;
}

function toOffer(slots: DaySlots[], source: SlotOffer['source'], emptyNote = ''): SlotOffer {
  if (slots.length === 0) {
    return { slots, formatted: emptyNote, hasAvailability: false, source };
  }
  return {
    slots,
    formatted: slots.map((slot) => slot.text).join(', '),
    hasAvailability: true,
    source,
  };
}

export class Scheduler implements SchedulingService {
  private readonly client?: CalendarClient;
  private readonly timeZone: string;
  private readonly now: () => Date;

  constructor(options: SchedulerOptions) {
    this.client = options.client;
    this.timeZone = options.timeZone;
    this.now = options.now ?? (() => new Date());
  }

  public isCalendarConfigured(): boolean {
    return this.client !== undefined;
  }

  public today(): Date {
    return todayIn(this.timeZone, this.now());
  }

  public async getInitialSlots(offsetDays: number, count: number): Promise<SlotOffer> {
    const today = this.today();
    if (!this.client) {
      return toOffer(fallbackSlots(today, offsetDays, count), 'fallback');
    }

    try {
      // Two spare days in case some are fully booked.
      const days = businessDays(today, offsetDays, count + 2);
      const busy = await this.client.freeBusy(
        zonedInstant(days[0], 0, 0, this.timeZone),
        zonedInstant(addDays(days[days.length - 1], 1), 0, 0, this.timeZone),
      );
      const pools = days.map((day) => ({ day, times: freeTimes(day, busy, this.timeZone) }));
      return toOffer(pickQuickSlots(pools, count, today), 'calendar');
    } catch (error) {
      log.warn({ event: 'calendar_slots_failed', err: error }, 'calendar lookup failed, using fixed slots');
      return toOffer(fallbackSlots(today, offsetDays, count), 'fallback');
    }
  }

  public async getSlotsForDate(date: string): Promise<SlotOffer> {
    const source: SlotOffer['source'] = this.client ? 'calendar' : 'fallback';
    const day = parseCalendarDate(date);
    if (!day) {
      return toOffer([], source, `Invalid date "${date}", expected YYYY-MM-DD.`);
    }

    const today = this.today();
    if (differenceInCalendarDays(day, today) < 1) {
      return toOffer([], source, NO_SLOTS_ON_DATE);
    }

    let times: string[];
    if (!this.client) {
      times = fallbackTimes(day);
    } else {
      try {
        const busy = await this.client.freeBusy(
          zonedInstant(day, 0, 0, this.timeZone),
          zonedInstant(addDays(day, 1), 0, 0, this.timeZone),
        );
        times = freeTimes(day, busy, this.timeZone);
      } catch (error) {
        log.warn({ event: 'calendar_date_lookup_failed', err: error, date }, 'calendar date lookup failed');
        times = [];
      }
    }

    if (times.length === 0) {
      return toOffer([], source, NO_SLOTS_ON_DATE);
    }
    return toOffer([buildDaySlots(day, today, times)], source);
  }

  public async createEvent(request: InterviewEventRequest): Promise<InterviewEventResult> {
    if (!this.client) {
      return { ok: false, error: 'calendar not configured' };
    }
    const day = parseCalendarDate(request.date);
    if (!day) {
      return { ok: false, error: `invalid date: ${request.date}` };
    }
    const time = parseSpokenTime(request.time);
    if (!time) {
      return { ok: false, error: `invalid time: ${request.time}` };
    }

    const start = zonedInstant(day, time.hour, time.minute, this.timeZone);
    const end = new Date(start.getTime() + INTERVIEW_DURATION_MINUTES * 60_000);
    const summary = request.vacancyTitle
      ? `Interview - ${request.candidateName} x ${request.vacancyTitle}`
      : `Interview - ${request.candidateName}`;

    try {
      const created = await this.client.createEvent({
        summary,
        description: `Screening call with ${request.candidateName}`,
        start,
        end,
      });
      return { ok: true, eventId: created.id, link: created.link };
    } catch (error) {
      return { ok: false, error: error instanceof Error ? error.message : String(error) };
    }
  }
}
