import { futureCutoff } from '@domain/calendar';
import { classifyTitle, type TitlePatternTable } from '@domain/eligibility';
import { ShiftNotFoundError, TraderShiftIneligibleError } from '@domain/errors';
import { simulateSwap } from '@domain/rules';
import { buildShiftDataset } from '@domain/schedule';
import {
  DEFAULT_ENGINE_CONFIG,
  type EngineConfig,
  type OffRunAdvisory,
  type OffRunConfig,
  type RosterMember,
  type Shift,
  type ShiftDataset,
  type ShiftView,
  type SwapContext,
  type SwapVerdict,
  toShiftView,
} from '@domain/types';
import { engineConfigFromEnv, resolveRuntimeEnv, type RuntimeEnv } from '@config/runtimeEnv';
import { loadRosterConfig, loadTitlePatterns } from '@config/files';
import { debugLog } from '@utils/debug';
import { type CalendarSource, collectRosterEvents, createRemoteCalendarSource } from './calendarFeed';
import { SnapshotCache, type Clock } from './snapshotCache';
import { findCandidates } from './swapEngine';

export type EngineConfigOverrides = Partial<Omit<EngineConfig, 'offRun'>> & {
  offRun?: Partial<OffRunConfig>;
};

export type TradeDeskOptions = {
  roster: readonly RosterMember[];
  source: CalendarSource;
  config?: EngineConfigOverrides;
  cache?: SnapshotCache<ShiftDataset>;
  clock?: Clock;
  titlePatterns?: TitlePatternTable;
};

export type ShiftListing = {
  people: string[];
  shifts: ShiftView[];
};

export type CandidateView = {
  counterpartyOwner: string;
  counterpartyShift: ShiftView;
  reason: 'ok';
  advisory: OffRunAdvisory;
};

export type TradeOptions = {
  traderShift: ShiftView;
  candidates: CandidateView[];
};

export interface TradeDesk {
  listFutureShifts(): Promise<ShiftListing>;
  findTradeCandidates(traderOwner: string, traderShiftId: string): Promise<TradeOptions>;
  recheckSwap(shiftIdA: string, shiftIdB: string): Promise<SwapVerdict>;
  refresh(): Promise<ShiftDataset>;
}

export function resolveEngineConfig(overrides?: EngineConfigOverrides): EngineConfig {
  return {
    ...DEFAULT_ENGINE_CONFIG,
    ...overrides,
    offRun: { ...DEFAULT_ENGINE_CONFIG.offRun, ...overrides?.offRun },
  };
}

function findShift(dataset: ShiftDataset, shiftId: string): Shift | undefined {
  return dataset.shifts.find((shift) => shift.id === shiftId);
}

export function createTradeDesk(options: TradeDeskOptions): TradeDesk {
  const config = resolveEngineConfig(options.config);
  const clock = options.clock ?? Date.now;
  const roster = [...options.roster];
  const titlePatterns = options.titlePatterns;
  const classify = titlePatterns
    ? (title: string) => classifyTitle(title, titlePatterns)
    : classifyTitle;

  async function loadDataset(): Promise<ShiftDataset> {
    const { eventsByPerson, issues } = await collectRosterEvents(roster, options.source);
    return buildShiftDataset({
      roster: roster.map((member) => member.name),
      eventsByPerson,
      cutoff: futureCutoff(clock(), config.timezone),
      config,
      classify,
      sourceIssues: issues,
    });
  }

  function readDataset(refresh = false): Promise<ShiftDataset> {
    if (!options.cache) {
      return loadDataset();
    }
    return options.cache.get(loadDataset, { refresh });
  }

  function contextFor(dataset: ShiftDataset): SwapContext {
    return { config, schedules: dataset.schedules };
  }

  return {
    async listFutureShifts() {
      const dataset = await readDataset();
      return { people: [...dataset.people], shifts: dataset.shifts.map(toShiftView) };
    },

    async findTradeCandidates(traderOwner, traderShiftId) {
      const dataset = await readDataset();
      const traderShift = findShift(dataset, traderShiftId);
      if (!traderShift || traderShift.owner !== traderOwner) {
        throw new ShiftNotFoundError([traderShiftId]);
      }
      if (!traderShift.eligible) {
        throw new TraderShiftIneligibleError(traderShiftId);
      }
      const candidates = findCandidates(dataset.shifts, traderShift, contextFor(dataset));
      debugLog('tradeDesk.findTradeCandidates', {
        traderOwner,
        traderShiftId,
        candidates: candidates.length,
      });
      return {
        traderShift: toShiftView(traderShift),
        candidates: candidates.map((candidate) => ({
          counterpartyOwner: candidate.counterpartyOwner,
          counterpartyShift: toShiftView(candidate.counterpartyShift),
          reason: candidate.reason,
          advisory: candidate.advisory,
        })),
      };
    },

    async recheckSwap(shiftIdA, shiftIdB) {
      // Rechecks confirm against current upstream data, never a cached snapshot.
      const dataset = await readDataset(true);
      const shiftA = findShift(dataset, shiftIdA);
      const shiftB = findShift(dataset, shiftIdB);
      if (!shiftA || !shiftB) {
        const missing = [shiftA ? null : shiftIdA, shiftB ? null : shiftIdB].filter(
          (id): id is string => id !== null,
        );
        throw new ShiftNotFoundError(missing);
      }
      const verdict = simulateSwap(shiftA, shiftB, contextFor(dataset));
      debugLog('tradeDesk.recheckSwap', { shiftIdA, shiftIdB, verdict });
      return verdict;
    },

    refresh() {
      return readDataset(true);
    },
  };
}

export type TradeDeskFromEnvOptions = {
  env?: RuntimeEnv;
  source?: CalendarSource;
  clock?: Clock;
};

/** Wires roster file, title patterns, iCalendar or CSV feeds and the cache from the environment. */
export async function createTradeDeskFromEnv(
  options: TradeDeskFromEnvOptions = {},
): Promise<TradeDesk> {
  const env = options.env ?? resolveRuntimeEnv();
  const roster = await loadRosterConfig(env.rosterPath);
  const titlePatterns = env.titlePatternsPath
    ? await loadTitlePatterns(env.titlePatternsPath)
    : undefined;
  return createTradeDesk({
    roster,
    source: options.source ?? createRemoteCalendarSource(),
    config: engineConfigFromEnv(env),
    cache: new SnapshotCache<ShiftDataset>({ ttlMs: env.cacheTtlMs, clock: options.clock }),
    clock: options.clock,
    titlePatterns,
  });
}
