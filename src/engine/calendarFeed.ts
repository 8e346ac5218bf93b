import { DataSourceUnavailableError, describeError } from '@domain/errors';
import type { DatasetIssue, RosterMember } from '@domain/types';
import { parseEventCsv } from '@utils/csv';
import { debugLog, logWarning } from '@utils/debug';
import { looksLikeIcs, parseEventIcs } from '@utils/ics';

export interface CalendarSource {
  fetchEvents(member: RosterMember): Promise<readonly unknown[]>;
}

export type FetchText = (url: string) => Promise<string>;

export type RosterEvents = {
  eventsByPerson: Map<string, readonly unknown[]>;
  issues: DatasetIssue[];
};

async function fetchTextWithGlobalFetch(url: string): Promise<string> {
  const response = await fetch(url);
  if (!response.ok) {
    throw new Error(`HTTP ${response.status} ${response.statusText}`.trim());
  }
  return response.text();
}

export type CalendarFormat = NonNullable<RosterMember['format']>;

const PARSERS: Record<CalendarFormat, (text: string) => Record<string, unknown>[]> = {
  ics: parseEventIcs,
  csv: parseEventCsv,
};

export function detectCalendarFormat(text: string): CalendarFormat {
  return looksLikeIcs(text) ? 'ics' : 'csv';
}

function createUrlCalendarSource(
  fetchText: FetchText,
  pickFormat: (member: RosterMember, text: string) => CalendarFormat,
): CalendarSource {
  return {
    async fetchEvents(member) {
      if (!member.url) {
        throw new DataSourceUnavailableError(member.name, `No calendar url for ${member.name}`);
      }
      const text = await fetchText(member.url);
      const format = pickFormat(member, text);
      debugLog('calendarFeed.fetched', { owner: member.name, format, bytes: text.length });
      return PARSERS[format](text);
    },
  };
}

export function createIcsCalendarSource(
  fetchText: FetchText = fetchTextWithGlobalFetch,
): CalendarSource {
  return createUrlCalendarSource(fetchText, () => 'ics');
}

export function createCsvCalendarSource(
  fetchText: FetchText = fetchTextWithGlobalFetch,
): CalendarSource {
  return createUrlCalendarSource(fetchText, () => 'csv');
}

/**
 * Reads each member's feed in the roster entry's `format`, or sniffs it from the
 * body when the entry names none: iCalendar when it opens with `BEGIN:VCALENDAR`.
 */
export function createRemoteCalendarSource(
  fetchText: FetchText = fetchTextWithGlobalFetch,
): CalendarSource {
  return createUrlCalendarSource(
    fetchText,
    (member, text) => member.format ?? detectCalendarFormat(text),
  );
}

export function createStaticCalendarSource(
  eventsByName: Readonly<Record<string, readonly unknown[]>>,
): CalendarSource {
  return {
    async fetchEvents(member) {
      const events = eventsByName[member.name];
      if (!events) {
        throw new DataSourceUnavailableError(member.name, `No calendar data for ${member.name}`);
      }
      return events;
    },
  };
}

/**
 * Fetches every member's calendar concurrently. A member whose source fails is
 * reported as an issue and left out of `eventsByPerson`.
 */
export async function collectRosterEvents(
  roster: readonly RosterMember[],
  source: CalendarSource,
): Promise<RosterEvents> {
  const settled = await Promise.allSettled(roster.map((member) => source.fetchEvents(member)));
  const eventsByPerson = new Map<string, readonly unknown[]>();
  const issues: DatasetIssue[] = [];

  settled.forEach((outcome, idx) => {
    const member = roster[idx];
    if (!member) {
      return;
    }
    if (outcome.status === 'fulfilled') {
      eventsByPerson.set(member.name, outcome.value);
      return;
    }
    const message = `Calendar fetch failed for ${member.name}: ${describeError(outcome.reason)}`;
    issues.push({ kind: 'data-source-unavailable', owner: member.name, message });
    logWarning('calendarFeed.skip-source', { owner: member.name, reason: message });
  });

  debugLog('calendarFeed.collected', () => ({
    members: roster.length,
    fetched: eventsByPerson.size,
    failed: issues.length,
  }));
  return { eventsByPerson, issues };
}
