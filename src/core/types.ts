/**
 * Represents a zero-based position on the board
 */
export interface Position {
    row: number;
    col: number;
}

/**
 * Represents the content of a cell
 */
export enum Mark {
    X = 'X',
    O = 'O',
    EMPTY = 'EMPTY'
}

/**
 * A mark a player can place
 */
export type PlayerMark = Mark.X | Mark.O;

/**
 * An ordered run of positions that wins when filled by one mark
 */
export type Line = readonly Readonly<Position>[];

/**
 * Represents the state of a round
 */
export enum GameStatus {
    IN_PROGRESS = 'IN_PROGRESS',
    WON = 'WON',
    DRAWN = 'DRAWN'
}

/**
 * Represents a move in the game
 */
export interface Move {
    position: Position;
    mark: PlayerMark;
}

export type GameMode = 'bot' | 'pvp';

export type RoundOutcome = PlayerMark | 'draw';

/**
 * What a finished round hands to the match history
 */
export interface RoundSummary {
    mode: GameMode;
    boardSize: number;
    moveCount: number;
    outcome: RoundOutcome;
}

export const MIN_BOARD_SIZE = 2;
export const MAX_BOARD_SIZE = 9;

export function opponentOf(mark: PlayerMark): PlayerMark {
    return mark === Mark.X ? Mark.O : Mark.X;
}

export function isPlayerMark(mark: Mark): mark is PlayerMark {
    return mark !== Mark.EMPTY;
}
