export { Board } from './core/Board';
export { Game } from './core/Game';
export type { MoveResult } from './core/Game';
export { WinLineCatalog } from './core/WinLineCatalog';
export { toPosition, toCellNumber } from './core/coordinates';
export * from './core/errors';
export { Mark, GameStatus, opponentOf } from './core/types';
export type { Position, PlayerMark, Line, Move, GameMode, RoundOutcome, RoundSummary } from './core/types';
export { RandomAIPlayer, HeuristicAIPlayer, createSeededRandom } from './ai';
export type { AIPlayer, AIPlayerOptions, RandomSource } from './ai';
export { MatchHistory } from './history/MatchHistory';
export { HistoryAnalytics } from './history/HistoryAnalytics';
export { formatRecord, parseRecord } from './history/recordFormat';
export type { MatchRecord } from './history/recordFormat';
