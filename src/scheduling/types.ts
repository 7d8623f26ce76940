/** Free interview times on one calendar day. */
export interface DaySlots {
  /** YYYY-MM-DD */
  date: string;
  /** Spoken day, e.g. "morgen dinsdag 3 maart". */
  label: string;
  /** Spoken times, e.g. ["10 uur", "14 uur"]. */
  times: string[];
  /** Spoken day with its times, e.g. "morgen dinsdag 3 maart om 10 uur". */
  text: string;
}

export interface SlotOffer {
  slots: DaySlots[];
  /** All slot texts joined for the model; may hold a note when nothing is free. */
  formatted: string;
  hasAvailability: boolean;
  source: 'calendar' | 'fallback';
}

export interface BusyInterval {
  start: Date;
  end: Date;
}

export interface InterviewEventRequest {
  candidateName: string;
  /** YYYY-MM-DD */
  date: string;
  /** Spoken time: "10 uur", "14u", "10:00". */
  time: string;
  vacancyTitle: string;
}

export type InterviewEventResult =
  | { ok: true; eventId: string; link?: string }
  | { ok: false; error: string };

export interface SchedulingService {
  getInitialSlots(offsetDays: number, count: number): Promise<SlotOffer>;
  getSlotsForDate(date: string): Promise<SlotOffer>;
  createEvent(request: InterviewEventRequest): Promise<InterviewEventResult>;
}
