import { afterEach, describe, it, expect, vi } from 'vitest';
import { fileURLToPath } from 'node:url';
import { createTradeDesk, createTradeDeskFromEnv, resolveEngineConfig } from '../../src/engine/tradeDesk';
import { createStaticCalendarSource } from '../../src/engine/calendarFeed';
import { SnapshotCache } from '../../src/engine/snapshotCache';
import { ShiftNotFoundError, TraderShiftIneligibleError } from '../../src/domain/errors';
import { ShiftViewSchema, type ShiftDataset, type ShiftView } from '../../src/domain/types';
import { TZ, at } from '../builders/dataBuilders';

const fixture = (name: string) => fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));

const clock = () => at('2025-01-05T10:00');

function calendars(): Record<string, unknown[]> {
  return {
    Alice: [
      { start: '2025-01-06T07:00', end: '2025-01-06T19:00', title: 'Day 1' },
      { start: '2025-01-09T07:00', end: '2025-01-09T19:00', title: 'Trauma Day 1' },
      { start: '2025-01-03T07:00', end: '2025-01-03T19:00', title: 'Day 2' },
    ],
    Bob: [{ start: '2025-01-07T07:00', end: '2025-01-07T19:00', title: 'Day 2' }],
  };
}

function findByTitle(shifts: readonly ShiftView[], owner: string, title: string): ShiftView {
  const match = shifts.find((shift) => shift.owner === owner && shift.title === title);
  if (!match) {
    throw new Error(`missing ${owner} ${title}`);
  }
  return match;
}

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllGlobals();
});

describe('resolveEngineConfig', () => {
  it('merges overrides onto the defaults', () => {
    const config = resolveEngineConfig({ timezone: 'UTC', offRun: { threshold: 3 } });
    expect(config.timezone).toBe('UTC');
    expect(config.weeklyCapHours).toBe(60);
    expect(config.offRun).toEqual({ threshold: 3, lookbackGuard: 12, lookaheadGuard: 24 });
  });
});

describe('createTradeDesk', () => {
  const roster = [{ name: 'Bob' }, { name: 'Alice' }];

  it('lists future shifts in the public view shape', async () => {
    const desk = createTradeDesk({
      roster,
      source: createStaticCalendarSource(calendars()),
      config: { timezone: TZ },
      clock,
    });

    const listing = await desk.listFutureShifts();
    expect(listing.people).toEqual(['Alice', 'Bob']);
    expect(listing.shifts.map((shift) => [shift.owner, shift.start])).toEqual([
      ['Alice', '2025-01-06T07:00:00-05:00'],
      ['Bob', '2025-01-07T07:00:00-05:00'],
      ['Alice', '2025-01-09T07:00:00-05:00'],
    ]);
    listing.shifts.forEach((shift) => {
      expect(ShiftViewSchema.safeParse(shift).success).toBe(true);
    });
  });

  it('finds trade candidates for an eligible shift', async () => {
    const desk = createTradeDesk({
      roster,
      source: createStaticCalendarSource(calendars()),
      config: { timezone: TZ },
      clock,
    });
    const { shifts } = await desk.listFutureShifts();
    const mine = findByTitle(shifts, 'Alice', 'Day 1');

    const options = await desk.findTradeCandidates('Alice', mine.id);
    expect(options.traderShift).toEqual(mine);
    expect(options.candidates).toHaveLength(1);
    expect(options.candidates[0]?.counterpartyOwner).toBe('Bob');
    expect(options.candidates[0]?.counterpartyShift).toEqual(findByTitle(shifts, 'Bob', 'Day 2'));
    expect(options.candidates[0]?.reason).toBe('ok');
  });

  it('rejects unknown, foreign and ineligible trader shifts', async () => {
    const desk = createTradeDesk({
      roster,
      source: createStaticCalendarSource(calendars()),
      config: { timezone: TZ },
      clock,
    });
    const { shifts } = await desk.listFutureShifts();
    const mine = findByTitle(shifts, 'Alice', 'Day 1');
    const trauma = findByTitle(shifts, 'Alice', 'Trauma Day 1');

    await expect(desk.findTradeCandidates('Alice', 'nope')).rejects.toBeInstanceOf(ShiftNotFoundError);
    await expect(desk.findTradeCandidates('Bob', mine.id)).rejects.toBeInstanceOf(ShiftNotFoundError);
    await expect(desk.findTradeCandidates('Alice', trauma.id)).rejects.toBeInstanceOf(
      TraderShiftIneligibleError,
    );
  });

  it('rechecks against fresh data even when the listing is cached', async () => {
    const data = calendars();
    const cache = new SnapshotCache<ShiftDataset>({ ttlMs: 60_000, clock });
    const desk = createTradeDesk({
      roster,
      source: createStaticCalendarSource(data),
      config: { timezone: TZ },
      cache,
      clock,
    });
    const { shifts } = await desk.listFutureShifts();
    const mine = findByTitle(shifts, 'Alice', 'Day 1');
    const theirs = findByTitle(shifts, 'Bob', 'Day 2');

    await expect(desk.recheckSwap(mine.id, theirs.id)).resolves.toEqual({ ok: true, reason: 'ok' });

    data.Bob = [{ start: '2025-01-07T08:00', end: '2025-01-07T19:00', title: 'Day 2' }];
    expect((await desk.listFutureShifts()).shifts).toHaveLength(3);
    expect(findByTitle((await desk.listFutureShifts()).shifts, 'Bob', 'Day 2').id).toBe(theirs.id);

    const missing = desk.recheckSwap(mine.id, theirs.id);
    await expect(missing).rejects.toBeInstanceOf(ShiftNotFoundError);
    await expect(desk.recheckSwap(mine.id, theirs.id)).rejects.toThrow(`Shift not found: ${theirs.id}`);
  });

  it('keeps members whose calendar failed in the people list', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const desk = createTradeDesk({
      roster: [...roster, { name: 'Cara' }],
      source: createStaticCalendarSource(calendars()),
      config: { timezone: TZ },
      clock,
    });
    const dataset = await desk.refresh();
    expect(dataset.people).toEqual(['Alice', 'Bob', 'Cara']);
    expect(dataset.issues.map((issue) => issue.owner)).toEqual(['Cara']);
  });
});

describe('createTradeDeskFromEnv', () => {
  it('wires the roster file and title patterns', async () => {
    const desk = await createTradeDeskFromEnv({
      env: {
        timezone: TZ,
        weeklyCapHours: 60,
        cacheTtlMs: 60_000,
        rosterPath: fixture('roster.json'),
        titlePatternsPath: fixture('title-patterns.json'),
      },
      source: createStaticCalendarSource({
        Alice: [{ start: '2025-01-06T07:00', end: '2025-01-06T15:00', title: 'Clinic AM' }],
        Bob: [{ start: '2025-01-07T07:00', end: '2025-01-07T15:00', title: 'Clinic PM' }],
      }),
      clock,
    });

    const { people, shifts } = await desk.listFutureShifts();
    expect(people).toEqual(['Alice', 'Bob']);
    expect(shifts.map((shift) => shift.eligible)).toEqual([true, true]);
    const options = await desk.findTradeCandidates('Alice', findByTitle(shifts, 'Alice', 'Clinic AM').id);
    expect(options.candidates.map((candidate) => candidate.counterpartyShift.title)).toEqual([
      'Clinic PM',
    ]);
  });

  it('reads iCalendar and CSV feeds over fetch by default', async () => {
    const bodies: Record<string, string> = {
      'https://calendar.example.test/alice.ics': [
        'BEGIN:VCALENDAR',
        'VERSION:2.0',
        'BEGIN:VEVENT',
        'DTSTART;TZID=America/New_York:20250106T070000',
        'DTEND;TZID=America/New_York:20250106T150000',
        'SUMMARY:Clinic AM',
        'END:VEVENT',
        'END:VCALENDAR',
      ].join('\r\n'),
      'https://calendar.example.test/bob.csv': 'start,end,title\n2025-01-07T07:00,2025-01-07T15:00,Clinic PM',
    };
    const fetchMock = vi.fn(async (url: string) => new Response(bodies[url] ?? '', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const desk = await createTradeDeskFromEnv({
      env: {
        timezone: TZ,
        weeklyCapHours: 60,
        cacheTtlMs: 60_000,
        rosterPath: fixture('roster.json'),
        titlePatternsPath: null,
      },
      clock,
    });

    expect((await desk.refresh()).issues).toEqual([]);
    const { shifts } = await desk.listFutureShifts();
    expect(shifts.map((shift) => [shift.owner, shift.title, shift.start])).toEqual([
      ['Alice', 'Clinic AM', '2025-01-06T07:00:00-05:00'],
      ['Bob', 'Clinic PM', '2025-01-07T07:00:00-05:00'],
    ]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });
});
