import { formatZoned } from './calendar';
import { classifyTitle } from './eligibility';
import { DataSourceUnavailableError, MalformedEventError, describeError } from './errors';
import { DEFAULT_SHIFT_DURATION_MS, floorToMinute, normalizeInstant, parseIsoDuration } from './instants';
import { encodeShiftKey } from './shiftKey';
import {
  DatasetIssue,
  EngineConfig,
  RawEvent,
  RawEventSchema,
  Schedules,
  Shift,
  ShiftDataset,
} from './types';
import dayjs from '@utils/dayjs';
import { debugLog, logWarning } from '@utils/debug';

export type ShiftDraft = {
  owner: string;
  title: string;
  startMs: number;
  endMs: number;
  eligible: boolean;
};

export function createShift(draft: ShiftDraft, timezone: string): Shift {
  if (!dayjs(draft.startMs).isValid() || !dayjs(draft.endMs).isValid()) {
    throw new MalformedEventError(
      `Shift for ${draft.owner} has an instant outside the representable range`,
    );
  }
  if (!(draft.endMs > draft.startMs)) {
    throw new MalformedEventError(
      `Shift for ${draft.owner} must end after it starts (${draft.startMs} >= ${draft.endMs})`,
    );
  }
  const startISO = formatZoned(draft.startMs, timezone);
  const endISO = formatZoned(draft.endMs, timezone);
  return Object.freeze({
    id: encodeShiftKey({ owner: draft.owner, startISO, endISO, title: draft.title }),
    owner: draft.owner,
    title: draft.title,
    startISO,
    endISO,
    startMs: draft.startMs,
    endMs: draft.endMs,
    eligible: draft.eligible,
  });
}

/** Copy of `shift` held by `owner`; the id follows the new owner. */
export function reassignShift(shift: Shift, owner: string): Shift {
  return Object.freeze({
    ...shift,
    owner,
    id: encodeShiftKey({
      owner,
      startISO: shift.startISO,
      endISO: shift.endISO,
      title: shift.title,
    }),
  });
}

export function compareByStart(a: Shift, b: Shift): number {
  if (a.startMs !== b.startMs) {
    return a.startMs - b.startMs;
  }
  if (a.owner !== b.owner) {
    return a.owner < b.owner ? -1 : 1;
  }
  if (a.id === b.id) {
    return 0;
  }
  return a.id < b.id ? -1 : 1;
}

export function groupByOwner(shifts: readonly Shift[]): Map<string, Shift[]> {
  const schedules = new Map<string, Shift[]>();
  for (const shift of shifts) {
    const list = schedules.get(shift.owner) ?? [];
    list.push(shift);
    schedules.set(shift.owner, list);
  }
  for (const list of schedules.values()) {
    list.sort(compareByStart);
  }
  return schedules;
}

function resolveEndMs(event: RawEvent, startMs: number, timezone: string): number {
  if (event.end != null) {
    return normalizeInstant(event.end, timezone).valueOf();
  }
  if (event.duration != null) {
    return floorToMinute(startMs + parseIsoDuration(event.duration));
  }
  if (event.durationMinutes != null) {
    return floorToMinute(startMs + event.durationMinutes * 60_000);
  }
  return startMs + DEFAULT_SHIFT_DURATION_MS;
}

export type ShiftFromEventOptions = {
  timezone: string;
  classify?: (title: string) => boolean;
};

export function shiftFromRawEvent(
  owner: string,
  input: unknown,
  options: ShiftFromEventOptions,
): Shift {
  const parsed = RawEventSchema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'event'}: ${issue.message}`)
      .join('; ');
    throw new MalformedEventError(`Malformed event: ${detail}`);
  }
  const event = parsed.data;
  const startMs = normalizeInstant(event.start, options.timezone).valueOf();
  const endMs = resolveEndMs(event, startMs, options.timezone);
  const title = event.title ?? '';
  const classify = options.classify ?? classifyTitle;
  return createShift({ owner, title, startMs, endMs, eligible: classify(title) }, options.timezone);
}

export type BuildShiftDatasetInput = {
  roster: readonly string[];
  eventsByPerson: ReadonlyMap<string, readonly unknown[]>;
  cutoff: number;
  config: Pick<EngineConfig, 'timezone'>;
  classify?: (title: string) => boolean;
  sourceIssues?: readonly DatasetIssue[];
};

function collectMemberShifts(
  owner: string,
  events: readonly unknown[],
  input: BuildShiftDatasetInput,
  issues: DatasetIssue[],
): Shift[] {
  const shifts: Shift[] = [];
  events.forEach((event, index) => {
    try {
      const shift = shiftFromRawEvent(owner, event, {
        timezone: input.config.timezone,
        classify: input.classify,
      });
      if (shift.startMs < input.cutoff) {
        return;
      }
      shifts.push(shift);
    } catch (error) {
      if (!(error instanceof MalformedEventError)) {
        throw error;
      }
      issues.push({ kind: 'malformed-event', owner, index, message: error.message });
      logWarning('schedule.skip-event', { owner, index, reason: error.message });
    }
  });
  return shifts;
}

/**
 * Normalizes every roster member's raw events into future shifts. A bad event or
 * a member whose events could not be produced is reported in `issues`; the rest
 * of the roster still builds.
 */
export function buildShiftDataset(input: BuildShiftDatasetInput): ShiftDataset {
  const issues: DatasetIssue[] = [...(input.sourceIssues ?? [])];
  const people = Array.from(new Set(input.roster)).sort();
  const flat: Shift[] = [];

  for (const owner of people) {
    const events = input.eventsByPerson.get(owner);
    if (!events) {
      continue;
    }
    try {
      flat.push(...collectMemberShifts(owner, events, input, issues));
    } catch (error) {
      const failure = new DataSourceUnavailableError(owner, describeError(error));
      issues.push({ kind: 'data-source-unavailable', owner, message: failure.message });
      logWarning('schedule.skip-source', { owner, reason: failure.message });
    }
  }

  const unknownOwners = [...input.eventsByPerson.keys()].filter((owner) => !people.includes(owner));
  if (unknownOwners.length > 0) {
    debugLog('schedule.unknown-owners', { owners: unknownOwners });
  }

  flat.sort(compareByStart);
  const schedules: Schedules = groupByOwner(flat);
  const dataset: ShiftDataset = {
    people,
    shifts: flat,
    schedules,
    cutoffISO: formatZoned(input.cutoff, input.config.timezone),
    issues,
  };
  debugLog('schedule.build', () => ({
    people: people.length,
    shifts: flat.length,
    issues: issues.length,
    cutoff: dataset.cutoffISO,
  }));
  return dataset;
}
