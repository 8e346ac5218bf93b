import { z } from 'zod';
import { ACTIVE_TIMEZONE } from '@utils/dayjs';

const isoStringSchema = z
  .string()
  .datetime({ offset: true, message: 'Value must be an ISO8601 string with timezone offset' });

export const RawInstantSchema = z.union([
  z.string().trim().min(1, 'Timestamp must not be blank'),
  z.date(),
]);

export type RawInstant = z.infer<typeof RawInstantSchema>;

const BaseRawEventSchema = z.object({
  start: RawInstantSchema,
  end: RawInstantSchema.nullish(),
  duration: z.string().trim().min(1).nullish(),
  durationMinutes: z.number().finite().positive().nullish(),
  title: z.string().nullish(),
});

export const RawEventSchema = BaseRawEventSchema.superRefine(
  (event: z.infer<typeof BaseRawEventSchema>, ctx: z.RefinementCtx) => {
    if (event.duration != null && event.durationMinutes != null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Use either duration or durationMinutes, not both',
        path: ['duration'],
      });
    }
  },
);

export type RawEvent = z.infer<typeof RawEventSchema>;

export const RosterMemberSchema = z
  .object({
    name: z.string().trim().min(1, 'Roster member name is required'),
    url: z.string().url('Calendar url must be a valid URL').optional(),
    format: z.enum(['ics', 'csv']).optional(),
  })
  .strict();

export type RosterMember = z.infer<typeof RosterMemberSchema>;

export const RosterSchema = z
  .array(RosterMemberSchema)
  .superRefine((members: RosterMember[], ctx: z.RefinementCtx) => {
    const seen = new Set<string>();
    members.forEach((member: RosterMember, idx: number) => {
      if (seen.has(member.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate roster member "${member.name}"`,
          path: [idx, 'name'],
        });
      }
      seen.add(member.name);
    });
  });

export type Roster = z.infer<typeof RosterSchema>;

export type Shift = Readonly<{
  id: string;
  owner: string;
  title: string;
  startISO: string;
  endISO: string;
  startMs: number;
  endMs: number;
  eligible: boolean;
}>;

export type Schedules = ReadonlyMap<string, readonly Shift[]>;

export const ShiftViewSchema = z
  .object({
    id: z.string().min(1),
    owner: z.string().min(1),
    title: z.string(),
    start: isoStringSchema,
    end: isoStringSchema,
    eligible: z.boolean(),
  })
  .strict();

export type ShiftView = z.infer<typeof ShiftViewSchema>;

export function toShiftView(shift: Shift): ShiftView {
  return {
    id: shift.id,
    owner: shift.owner,
    title: shift.title,
    start: shift.startISO,
    end: shift.endISO,
    eligible: shift.eligible,
  };
}

export const REASON_CODES = [
  'ok',
  'ineligible-title',
  'same-person',
  'B-not-free-for-A',
  'A-not-free-for-B',
  'A-break-rule',
  'B-break-rule',
  'A-weekly-cap',
  'B-weekly-cap',
] as const;

export type ReasonCode = (typeof REASON_CODES)[number];

export type ReasonCategory =
  | 'ok'
  | 'ineligible-title'
  | 'same-person'
  | 'not-free'
  | 'break-rule'
  | 'weekly-cap';

export function reasonCategory(reason: ReasonCode): ReasonCategory {
  switch (reason) {
    case 'B-not-free-for-A':
    case 'A-not-free-for-B':
      return 'not-free';
    case 'A-break-rule':
    case 'B-break-rule':
      return 'break-rule';
    case 'A-weekly-cap':
    case 'B-weekly-cap':
      return 'weekly-cap';
    default:
      return reason;
  }
}

export type SwapVerdict =
  | { ok: true; reason: 'ok' }
  | { ok: false; reason: Exclude<ReasonCode, 'ok'> };

export type OffRunAdvisory = {
  recipientOnOffRun: boolean;
  giverOnOffRun: boolean;
};

export type TradeCandidate = {
  traderShift: Shift;
  counterpartyOwner: string;
  counterpartyShift: Shift;
  reason: 'ok';
  advisory: OffRunAdvisory;
};

export type OffRunConfig = {
  threshold: number;
  lookbackGuard: number;
  lookaheadGuard: number;
};

export type EngineConfig = {
  timezone: string;
  weeklyCapHours: number;
  offRun: OffRunConfig;
};

export const DEFAULT_WEEKLY_CAP_HOURS = 60;

export const DEFAULT_OFF_RUN_CONFIG: OffRunConfig = {
  threshold: 5,
  lookbackGuard: 12,
  lookaheadGuard: 24,
};

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  timezone: ACTIVE_TIMEZONE,
  weeklyCapHours: DEFAULT_WEEKLY_CAP_HOURS,
  offRun: DEFAULT_OFF_RUN_CONFIG,
};

export type SwapContext = {
  config: EngineConfig;
  schedules: Schedules;
};

export type DatasetIssue =
  | { kind: 'data-source-unavailable'; owner: string; message: string }
  | { kind: 'malformed-event'; owner: string; index: number; message: string };

export type ShiftDataset = {
  people: string[];
  shifts: Shift[];
  schedules: Schedules;
  cutoffISO: string;
  issues: DatasetIssue[];
};
