import { Board } from '../core/Board';
import { Game } from '../core/Game';
import { Line, Mark, opponentOf, PlayerMark, Position } from '../core/types';
import { pickOne, RandomSource } from './random';

/**
 * Interface for bot players
 * Implement this interface to create different strategies
 */
export interface AIPlayer {
    /**
     * Chooses the next cell for the bot
     * @returns a zero-based position, or null when the board is full
     */
    getMove(game: Game): Position | null;
}

export interface AIPlayerOptions {
    /** Mark the bot plays, O unless told otherwise */
    mark?: PlayerMark;
    random?: RandomSource;
}

/**
 * Picks any empty cell uniformly
 */
export class RandomAIPlayer implements AIPlayer {
    private readonly random: RandomSource;

    constructor(random: RandomSource = Math.random) {
        this.random = random;
    }

    public getMove(game: Game): Position | null {
        return pickOne(game.getBoard().getEmptyPositions(), this.random);
    }
}

/**
 * One-ply heuristic bot. Tiers are tried in order and the first that
 * yields a cell wins:
 *
 * 1. complete its own line
 * 2. block the opponent's line
 * 3. take the center cell `(n / 2, n / 2)`, rounded down (off-center on even boards)
 * 4. any empty cell at random
 */
export class HeuristicAIPlayer implements AIPlayer {
    private readonly mark: PlayerMark;
    private readonly fallback: RandomAIPlayer;

    constructor(options: AIPlayerOptions = {}) {
        this.mark = options.mark ?? Mark.O;
        this.fallback = new RandomAIPlayer(options.random);
    }

    public getMark(): PlayerMark {
        return this.mark;
    }

    public getMove(game: Game): Position | null {
        const board = game.getBoard();
        const lines = game.getCatalog().lines;

        // First, check if we can win
        const winningMove = this.findLastEmptyCell(board, lines, this.mark);
        if (winningMove) {
            return winningMove;
        }

        // Second, block opponent's winning move
        const blockingMove = this.findLastEmptyCell(board, lines, opponentOf(this.mark));
        if (blockingMove) {
            return blockingMove;
        }

        const center = Math.floor(board.getSize() / 2);
        const centerPosition = { row: center, col: center };
        if (board.isEmpty(centerPosition)) {
            return centerPosition;
        }

        return this.fallback.getMove(game);
    }

    /**
     * First line holding n-1 of `mark` and one empty cell
     */
    private findLastEmptyCell(board: Board, lines: readonly Line[], mark: PlayerMark): Position | null {
        const size = board.getSize();

        for (const line of lines) {
            const cells = board.getCells(line);
            const owned = cells.filter(cell => cell === mark).length;
            const empty = cells.indexOf(Mark.EMPTY);
            if (owned === size - 1 && empty !== -1) {
                return { ...line[empty] };
            }
        }

        return null;
    }
}
