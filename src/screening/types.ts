import { z } from 'zod';

export const STAGE_NAMES = [
  'greeting',
  'screening',
  'open_questions',
  'scheduling',
  'alternative',
  'recruiter',
] as const;

export type StageName = (typeof STAGE_NAMES)[number];

const KnockoutQuestionSchema = z.object({
  id: z.string().min(1),
  text: z.string().min(1),
  internal_id: z.string().default(''),
  context: z.string().default(''),
  data_key: z.string().default(''),
});

const OpenQuestionSchema = z.object({
  id: z.string().min(1),
  text: z.string().min(1),
  internal_id: z.string().default(''),
  description: z.string().default(''),
});

const CandidateRecordSchema = z.object({
  known_answers: z.record(z.string()).default({}),
  existing_booking_date: z.string().min(1).nullish(),
});

function uniqueIds(questions: Array<{ id: string }>): boolean {
  return new Set(questions.map((q) => q.id)).size === questions.length;
}

export const SessionInputSchema = z
  .object({
    call_id: z.string().min(1),
    candidate_name: z.string().default(''),
    candidate_known: z.boolean().default(false),
    candidate_record: CandidateRecordSchema.nullish(),
    job_title: z.string().default(''),
    office_location: z.string().default(''),
    office_address: z.string().default(''),
    knockout_questions: z
      .array(KnockoutQuestionSchema)
      .default([])
      .refine(uniqueIds, { message: 'knockout question ids must be unique' }),
    open_questions: z
      .array(OpenQuestionSchema)
      .default([])
      .refine(uniqueIds, { message: 'open question ids must be unique' }),
    start_agent: z.enum(STAGE_NAMES).optional(),
    allow_escalation: z.boolean().default(true),
    require_consent: z.boolean().default(true),
    is_playground: z.boolean().default(false),
  })
  .transform(
    (raw): SessionInput => ({
      callId: raw.call_id,
      candidateName: raw.candidate_name,
      candidateKnown: raw.candidate_known,
      candidateRecord: raw.candidate_record
        ? {
            knownAnswers: raw.candidate_record.known_answers,
            existingBookingDate: raw.candidate_record.existing_booking_date ?? undefined,
          }
        : undefined,
      jobTitle: raw.job_title,
      officeLocation: raw.office_location,
      officeAddress: raw.office_address,
      knockoutQuestions: raw.knockout_questions.map((q) => ({
        id: q.id,
        text: q.text,
        internalId: q.internal_id,
        context: q.context,
        dataKey: q.data_key,
      })),
      openQuestions: raw.open_questions.map((q) => ({
        id: q.id,
        text: q.text,
        internalId: q.internal_id,
        description: q.description,
      })),
      startAgent: raw.start_agent,
      allowEscalation: raw.allow_escalation,
      requireConsent: raw.require_consent,
      isPlayground: raw.is_playground,
    }),
  );

export type SessionInputPayload = z.input<typeof SessionInputSchema>;

export interface KnockoutQuestion {
  id: string;
  text: string;
  internalId: string;
  context: string;
  dataKey: string;
}

export interface OpenQuestion {
  id: string;
  text: string;
  internalId: string;
  description: string;
}

/** Pre-known CRM data, used to skip knockout questions and scheduling. */
export interface CandidateRecord {
  knownAnswers: Record<string, string>;
  existingBookingDate?: string;
}

export interface SessionInput {
  callId: string;
  candidateName: string;
  candidateKnown: boolean;
  candidateRecord?: CandidateRecord;
  jobTitle: string;
  officeLocation: string;
  officeAddress: string;
  knockoutQuestions: KnockoutQuestion[];
  openQuestions: OpenQuestion[];
  startAgent?: StageName;
  allowEscalation: boolean;
  requireConsent: boolean;
  isPlayground: boolean;
}

export type QuestionResult = 'pass' | 'fail' | 'unclear' | 'irrelevant' | 'recruiter_requested';

export interface KnockoutAnswer {
  questionId: string;
  questionText: string;
  result: QuestionResult;
  rawAnswer: string;
  candidateNote: string;
}

export interface OpenAnswer {
  questionId: string;
  questionText: string;
  answerSummary: string;
  candidateNote: string;
}

export type CallStatus =
  | 'completed'
  | 'voicemail'
  | 'not_interested'
  | 'knockout_failed'
  | 'escalated'
  | 'unclear'
  | 'irrelevant'
  | 'incomplete';

export interface TranscriptEntry {
  role: 'user' | 'assistant' | 'system';
  message: string;
}

export function parseSessionInput(payload: unknown): SessionInput {
  return SessionInputSchema.parse(payload);
}
