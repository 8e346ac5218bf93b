import ICAL from 'ical.js';
import dayjs, { isKnownTimezone } from './dayjs';
import { debugLog } from './debug';

type IcalComponent = InstanceType<typeof ICAL.Component>;

export class IcsParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IcsParseError';
  }
}

export function looksLikeIcs(text: string): boolean {
  return /^\uFEFF?\s*BEGIN:VCALENDAR/i.test(text);
}

/**
 * DATE values stay date-only and UTC values keep their `Z`; both go through the
 * instant normalizer as text. A TZID with a known IANA name is resolved here,
 * since the normalizer would otherwise read the wall time in the operative zone.
 */
function readInstant(event: IcalComponent, name: 'dtstart' | 'dtend'): string | Date | undefined {
  const property = event.getFirstProperty(name);
  if (!property) {
    return undefined;
  }
  const value = property.getFirstValue();
  if (!(value instanceof ICAL.Time)) {
    return undefined;
  }
  const text = value.toString();
  const tzid = property.getParameter('tzid');
  if (value.isDate || typeof tzid !== 'string' || text.endsWith('Z')) {
    return text;
  }
  if (!isKnownTimezone(tzid)) {
    debugLog('ics.unknown-tzid', { tzid, value: text });
    return text;
  }
  return dayjs.tz(text, tzid).toDate();
}

function readDuration(event: IcalComponent): string | undefined {
  const value = event.getFirstPropertyValue('duration');
  return value instanceof ICAL.Duration ? value.toString() : undefined;
}

function readSummary(event: IcalComponent): string {
  const value = event.getFirstPropertyValue('summary');
  return typeof value === 'string' ? value : '';
}

/**
 * Maps each VEVENT of an iCalendar document to a raw event record. Other
 * components are ignored, and so are events without a DTSTART. Recurrence rules
 * are not expanded.
 */
export function parseEventIcs(text: string): Record<string, unknown>[] {
  let calendar: IcalComponent;
  try {
    calendar = ICAL.Component.fromString(text.replace(/^\uFEFF/, ''));
  } catch (error) {
    throw new IcsParseError(
      `Calendar parse failed: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const events: Record<string, unknown>[] = [];
  calendar.getAllSubcomponents('vevent').forEach((event: IcalComponent) => {
    const start = readInstant(event, 'dtstart');
    if (start === undefined) {
      debugLog('ics.skip-no-start', { uid: event.getFirstPropertyValue('uid') });
      return;
    }
    const record: Record<string, unknown> = { start, title: readSummary(event) };
    const end = readInstant(event, 'dtend');
    const duration = readDuration(event);
    if (end !== undefined) {
      record.end = end;
    } else if (duration !== undefined) {
      record.duration = duration;
    }
    events.push(record);
  });
  return events;
}
