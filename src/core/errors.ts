import { MAX_BOARD_SIZE, MIN_BOARD_SIZE, PlayerMark } from './types';

/**
 * Base class for every failure raised by the game
 */
export class TicTacToeError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/**
 * Invalid game setup (board size, environment)
 */
export class ConfigurationError extends TicTacToeError {}

export class BoardSizeTypeError extends ConfigurationError {
    constructor(public readonly value: unknown) {
        super(`Board size ${String(value)} is not an integer`);
    }
}

export class BoardSizeValueError extends ConfigurationError {
    constructor(public readonly value: number) {
        super(`Board size ${value} is out of range, expected ${MIN_BOARD_SIZE} to ${MAX_BOARD_SIZE}`);
    }
}

export class InvalidInputError extends TicTacToeError {
    public readonly kind = 'InvalidInput';

    constructor(public readonly token: string) {
        super(`Invalid input "${token}", please enter a cell number`);
    }
}

export class InvalidPositionError extends TicTacToeError {
    public readonly kind = 'InvalidPosition';

    constructor(public readonly position: number, public readonly limit: number) {
        super(`Cell ${position} is off the board, enter a value from 1 to ${limit}`);
    }
}

export class CellOccupiedError extends TicTacToeError {
    public readonly kind = 'CellOccupied';

    constructor(public readonly position: number, public readonly mark: PlayerMark) {
        super(`Cell ${position} is already taken by ${mark}`);
    }
}

export class GameOverError extends TicTacToeError {
    public readonly kind = 'GameOver';

    constructor() {
        super('The round is over, start a new one to keep playing');
    }
}

/**
 * Reasons a move can be rejected. Discriminated by `kind`.
 */
export type MoveError = InvalidInputError | InvalidPositionError | CellOccupiedError | GameOverError;

/**
 * Thrown when the board holds a position normal play cannot reach,
 * e.g. complete lines for both marks
 */
export class BoardInvariantError extends TicTacToeError {}

/**
 * Missing or unreadable history file, or a bad analytics argument
 */
export class HistoryError extends TicTacToeError {}

/**
 * Command line that names no known command or carries bad options
 */
export class UsageError extends TicTacToeError {}
