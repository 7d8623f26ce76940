import { format } from 'date-fns';
import { nl } from 'date-fns/locale';
import { z } from 'zod';
import { escalationRule, joinRules, languageRule } from '../dialogue/prompts';
import { defineTool, type ToolBinding } from '../dialogue/tools';
import { log } from '../log';
import { resetIrrelevant } from '../screening/irrelevance';
import { withSilenceSuppressed } from '../screening/sessionState';
import type { StageName } from '../screening/types';
import { INITIAL_SLOT_COUNT, SLOT_OFFSET_DAYS, isTomorrow, todayIn } from '../scheduling/slots';
import type { SlotOffer } from '../scheduling/types';
import { STAY, StageAgent, type StageTransition } from './stageAgent';

function describeOffer(offer: SlotOffer): string {
  if (!offer.hasAvailability) {
    const note = offer.formatted || 'No moments are available.';
    return `${note} Ask the candidate for their preferred days and times, then call \`schedule_with_recruiter\`.`;
  }
  return `Available moments:\n${offer.slots.map((slot) => `- ${slot.text} (date ${slot.date})`).join('\n')}`;
}

export class SchedulingStage extends StageAgent {
  public readonly name: StageName = 'scheduling';

  protected instructions(): string {
    const today = format(this.today(), 'EEEE d MMMM yyyy', { locale: nl });
    return joinRules([
      `You plan a short interview with the recruiter at the office in ${this.ctx.state.input.officeLocation}. Today is ${today}.`,
      '# Rules',
      '- Fetch moments with `get_available_timeslots` and offer them one by one in spoken form.',
      '- The candidate names another day: call `get_timeslots_for_date` with that date as YYYY-MM-DD.',
      '- The candidate picks a moment: call `confirm_timeslot` with the spoken moment, its date (YYYY-MM-DD) and its time as offered (e.g. "10 uur").',
      '- Nothing fits: ask for a preference and call `schedule_with_recruiter`.',
      '- Off-topic or nonsense answers: call `end_conversation_irrelevant`.',
      escalationRule(this.allowEscalation),
      languageRule(this.ctx.state),
    ]);
  }

  public async onEnter(): Promise<StageTransition> {
    const { state, speech } = this.ctx;
    await withSilenceSuppressed(state, async () => {
      await speech.say(this.msg('scheduling_invite', { location: state.input.officeLocation }), {
        allowInterruptions: false,
      });
      await speech.generateReply('Call `get_available_timeslots` now to fetch the available moments.');
    });
    return STAY;
  }

  protected stageTools(): ToolBinding[] {
    const { state, runtime } = this.ctx;
    return [
      defineTool({
        name: 'get_available_timeslots',
        description: 'Fetch the available moments for an interview.',
        args: {},
        handler: async () => {
          const offer = await runtime.scheduling.getInitialSlots(SLOT_OFFSET_DAYS, INITIAL_SLOT_COUNT);
          log.info(
            {
              event: 'timeslots_offered',
              source: offer.source,
              slots: offer.slots.map((slot) => slot.text),
              ...this.ctx.logContext,
            },
            'timeslots offered',
          );
          return describeOffer(offer);
        },
      }),
      defineTool({
        name: 'get_timeslots_for_date',
        description: 'Fetch the available moments on one specific date (YYYY-MM-DD).',
        args: { date: z.string() },
        handler: async ({ date }) => describeOffer(await runtime.scheduling.getSlotsForDate(date)),
      }),
      defineTool({
        name: 'confirm_timeslot',
        description: 'The candidate picked a moment. Confirm it and close the conversation.',
        args: { timeslot: z.string(), date: z.string(), time: z.string() },
        handler: ({ timeslot, date, time }) => {
          resetIrrelevant(state);
          state.chosenTimeslot = timeslot;
          state.scheduledDate = date;
          state.scheduledTime = time;
          this.bookInBackground(date, time);

          const tomorrow = isTomorrow(date, this.today()) || timeslot.toLowerCase().startsWith('morgen');
          const followup = this.msg(tomorrow ? 'scheduling_followup_tomorrow' : 'scheduling_followup_later');
          this.transition({
            type: 'end',
            reason: 'scheduled',
            closing: this.msg('scheduling_confirm', {
              timeslot,
              location: state.input.officeLocation,
              address: state.input.officeAddress,
              followup,
            }),
          });
        },
      }),
      defineTool({
        name: 'schedule_with_recruiter',
        description: 'No moment fits. Store the preference of the candidate so the recruiter gets in touch.',
        args: { preference: z.string() },
        handler: ({ preference }) => {
          state.schedulingPreference = preference;
          this.transition({
            type: 'end',
            reason: 'scheduling_preference',
            closing: this.msg('scheduling_preference'),
          });
        },
      }),
    ];
  }

  private today(): Date {
    return todayIn(this.ctx.runtime.timeZone, this.ctx.runtime.now());
  }

  /** The calendar write never holds up the conversation; failures are logged only. */
  private bookInBackground(date: string, time: string): void {
    const { state, runtime, logContext } = this.ctx;
    void runtime.scheduling
      .createEvent({
        candidateName: state.input.candidateName,
        date,
        time,
        vacancyTitle: state.input.jobTitle,
      })
      .then((result) => {
        if (result.ok) {
          state.calendarEventId = result.eventId;
          log.info({ event: 'interview_booked', calendar_event_id: result.eventId, ...logContext }, 'interview booked');
          return;
        }
        log.warn({ event: 'interview_booking_failed', error: result.error, ...logContext }, 'interview booking failed');
      })
      .catch((error: unknown) => {
        log.warn({ event: 'interview_booking_failed', err: error, ...logContext }, 'interview booking failed');
      });
  }
}
