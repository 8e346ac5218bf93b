export * from '@domain/types';
export * from '@domain/errors';
export { classifyTitle, createTitleClassifier, DEFAULT_TITLE_PATTERNS } from '@domain/eligibility';
export type { TitlePatternTable } from '@domain/eligibility';
export { normalizeInstant, classifyRawInstant } from '@domain/instants';
export { encodeShiftKey, decodeShiftKey } from '@domain/shiftKey';
export { buildShiftDataset, createShift, reassignShift } from '@domain/schedule';
export { futureCutoff, isWeekendShift, weekWindowFor } from '@domain/calendar';
export {
  hasOverlap,
  isFreeForInterval,
  localRestOk,
  weeklyCapOk,
  weeklyHours,
  simulateSwap,
  explainSwap,
  isFeasibleSwap,
} from '@domain/rules';
export { isInLongOffRun, offRunAdvisoryForSwap } from '@domain/offRun';
export { compareCandidates } from '@domain/swapSort';
export { findCandidates, searchCandidates } from '@engine/swapEngine';
export type { CandidateSearchResult } from '@engine/swapEngine';
export { SnapshotCache } from '@engine/snapshotCache';
export {
  collectRosterEvents,
  createCsvCalendarSource,
  createIcsCalendarSource,
  createRemoteCalendarSource,
  createStaticCalendarSource,
  detectCalendarFormat,
} from '@engine/calendarFeed';
export type { CalendarFormat, CalendarSource } from '@engine/calendarFeed';
export { parseEventIcs, IcsParseError } from '@utils/ics';
export { createTradeDesk, createTradeDeskFromEnv, resolveEngineConfig } from '@engine/tradeDesk';
export type { TradeDesk, TradeOptions, ShiftListing, CandidateView } from '@engine/tradeDesk';
export { resolveRuntimeEnv, engineConfigFromEnv } from '@config/runtimeEnv';
export { loadRosterConfig, loadTitlePatterns } from '@config/files';
export { setDebugLogging } from '@utils/debug';
