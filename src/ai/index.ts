export { RandomAIPlayer, HeuristicAIPlayer } from './AIPlayer';
export type { AIPlayer, AIPlayerOptions } from './AIPlayer';
export { createSeededRandom } from './random';
export type { RandomSource } from './random';
