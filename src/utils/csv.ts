import Papa from 'papaparse';

const BOM_PATTERN = /^\uFEFF/;

function stripBom(value: string): string {
  return value.replace(BOM_PATTERN, '');
}

const EVENT_FIELDS = ['start', 'end', 'duration', 'durationMinutes', 'title'] as const;

type EventField = (typeof EVENT_FIELDS)[number];

const HEADER_ALIASES: Record<EventField, string[]> = {
  start: ['start', 'dtstart', 'start time', 'starts'],
  end: ['end', 'dtend', 'end time', 'ends'],
  duration: ['duration'],
  durationMinutes: ['duration minutes', 'duration_minutes', 'durationminutes', 'minutes'],
  title: ['title', 'summary', 'shift'],
};

export type CsvIssue = {
  row: number;
  column?: string;
  message: string;
};

export class CsvValidationError extends Error {
  constructor(public readonly issues: CsvIssue[]) {
    super(
      issues
        .map((issue) => {
          const columnLabel = issue.column ? ` (${issue.column})` : '';
          return `Row ${issue.row}${columnLabel}: ${issue.message}`;
        })
        .join('\n'),
    );
    this.name = 'CsvValidationError';
  }
}

function normalizeHeader(header: string): string {
  return stripBom(header).trim().toLowerCase().replace(/\s+/g, ' ');
}

function resolveColumns(fields: string[], issues: CsvIssue[]): Map<EventField, string> {
  const byNormalized = new Map<string, string>();
  fields.forEach((field) => {
    const normalized = normalizeHeader(field);
    if (!normalized) {
      return;
    }
    if (!byNormalized.has(normalized)) {
      byNormalized.set(normalized, field);
    }
  });

  const columns = new Map<EventField, string>();
  EVENT_FIELDS.forEach((key) => {
    const match = HEADER_ALIASES[key]
      .map((alias) => byNormalized.get(alias))
      .find((value): value is string => typeof value === 'string');
    if (match) {
      columns.set(key, match);
    }
  });

  if (!columns.has('start')) {
    issues.push({ row: 1, column: 'start', message: 'Missing required column' });
  }
  return columns;
}

function readCell(
  row: Record<string, string | undefined>,
  column: string | undefined,
): string | undefined {
  if (!column) {
    return undefined;
  }
  const value = row[column];
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function toRawEvent(
  row: Record<string, string | undefined>,
  columns: Map<EventField, string>,
): Record<string, unknown> {
  const event: Record<string, unknown> = {};
  const start = readCell(row, columns.get('start'));
  const end = readCell(row, columns.get('end'));
  const duration = readCell(row, columns.get('duration'));
  const minutes = readCell(row, columns.get('durationMinutes'));
  const title = readCell(row, columns.get('title'));
  if (start !== undefined) event.start = start;
  if (end !== undefined) event.end = end;
  if (duration !== undefined) event.duration = duration;
  if (minutes !== undefined) {
    const parsed = Number(minutes);
    event.durationMinutes = Number.isFinite(parsed) ? parsed : minutes;
  }
  event.title = title ?? '';
  return event;
}

/**
 * Parses an exported calendar CSV into raw event records. Header problems fail
 * the whole file; row content is left for the schedule builder to validate so
 * that one bad row only costs that row.
 */
export function parseEventCsv(csv: string): Record<string, unknown>[] {
  const parsed = Papa.parse<Record<string, string | undefined>>(csv, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header: string) => stripBom(header).trim(),
  });

  const issues: CsvIssue[] = [];
  parsed.errors.forEach((error: Papa.ParseError) => {
    if (error.type === 'FieldMismatch') {
      return;
    }
    const row = error.row == null ? 0 : error.row + 2;
    issues.push({ row, message: error.message });
  });

  const columns = resolveColumns(parsed.meta.fields ?? [], issues);
  if (issues.length > 0) {
    throw new CsvValidationError(issues);
  }

  return parsed.data.map((row) => toRawEvent(row, columns));
}
