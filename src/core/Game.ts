import { Board } from './Board';
import { toPosition } from './coordinates';
import {
    BoardInvariantError,
    CellOccupiedError,
    GameOverError,
    InvalidInputError,
    InvalidPositionError,
    MoveError
} from './errors';
import { GameStatus, isPlayerMark, Line, Mark, Move, PlayerMark, Position } from './types';
import { WinLineCatalog } from './WinLineCatalog';

export type MoveResult =
    | { ok: true; position: Position }
    | { ok: false; error: MoveError };

const DIGITS = /^\d+$/;

/**
 * Represents one tic-tac-toe round and its rules.
 *
 * Applying a move does not end the turn: callers check for a winner, then a
 * draw, and only then call {@link Game.switchTurn}.
 */
export class Game {
    private readonly board: Board;
    private readonly catalog: WinLineCatalog;
    private currentPlayer: PlayerMark;
    private status: GameStatus;
    private moveCount: number;
    private winningLine: Line | null;
    private moveHistory: Move[];

    constructor(size: number) {
        this.board = new Board(size);
        this.catalog = WinLineCatalog.forSize(size);
        this.currentPlayer = Mark.X; // X plays first
        this.status = GameStatus.IN_PROGRESS;
        this.moveCount = 0;
        this.winningLine = null;
        this.moveHistory = [];
    }

    public getBoard(): Board {
        return this.board;
    }

    public getCatalog(): WinLineCatalog {
        return this.catalog;
    }

    public getSize(): number {
        return this.board.getSize();
    }

    /**
     * Highest cell number a player may enter
     */
    public getPositionLimit(): number {
        return this.getSize() * this.getSize();
    }

    public getCurrentPlayer(): PlayerMark {
        return this.currentPlayer;
    }

    public getStatus(): GameStatus {
        return this.status;
    }

    public getMoveCount(): number {
        return this.moveCount;
    }

    /**
     * Line that won the round, for highlighting
     */
    public getWinningLine(): Line | null {
        return this.winningLine;
    }

    /**
     * Gets the move history
     */
    public getMoveHistory(): Move[] {
        return [...this.moveHistory];
    }

    /**
     * Validates a raw token from a player before applying it
     */
    public submitMove(token: string): MoveResult {
        if (!DIGITS.test(token)) {
            return { ok: false, error: new InvalidInputError(token) };
        }
        return this.applyMove(Number(token));
    }

    /**
     * Places the current player's mark on a 1-based cell number
     */
    public applyMove(cell: number): MoveResult {
        if (!Number.isInteger(cell)) {
            return { ok: false, error: new InvalidInputError(String(cell)) };
        }
        const limit = this.getPositionLimit();
        if (cell < 1 || cell > limit) {
            return { ok: false, error: new InvalidPositionError(cell, limit) };
        }

        const position = toPosition(cell, this.getSize());
        const occupant = this.board.getCell(position);
        if (isPlayerMark(occupant)) {
            return { ok: false, error: new CellOccupiedError(cell, occupant) };
        }
        if (this.status !== GameStatus.IN_PROGRESS) {
            return { ok: false, error: new GameOverError() };
        }

        this.board.place(position, this.currentPlayer);
        this.moveCount++;
        this.moveHistory.push({ position, mark: this.currentPlayer });
        return { ok: true, position };
    }

    /**
     * Looks for a complete line of either mark. The first one in catalog
     * order is kept as the winning line.
     */
    public checkWinner(): boolean {
        const line = this.findWinningLine();
        if (!line) {
            return false;
        }
        this.winningLine = line;
        this.status = GameStatus.WON;
        return true;
    }

    /**
     * A full board with no complete line
     */
    public checkDraw(): boolean {
        if (!this.board.isFull() || this.findWinningLine()) {
            return false;
        }
        this.status = GameStatus.DRAWN;
        return true;
    }

    /**
     * Switches the current player
     */
    public switchTurn(): void {
        this.currentPlayer = this.currentPlayer === Mark.X ? Mark.O : Mark.X;
    }

    /**
     * Gets the winner (if any)
     */
    public getWinner(): PlayerMark | null {
        if (!this.winningLine) {
            return null;
        }
        const [first] = this.winningLine;
        const mark = this.board.getCell(first);
        return isPlayerMark(mark) ? mark : null;
    }

    /**
     * Starts a new round on an empty board of the same size
     */
    public reset(): void {
        this.board.reset();
        this.currentPlayer = Mark.X;
        this.status = GameStatus.IN_PROGRESS;
        this.moveCount = 0;
        this.winningLine = null;
        this.moveHistory = [];
    }

    private findWinningLine(): Line | null {
        const size = this.getSize();
        let found: Line | null = null;
        const winners = new Set<PlayerMark>();

        for (const line of this.catalog.lines) {
            const cells = this.board.getCells(line);
            for (const mark of [Mark.X, Mark.O] as const) {
                if (cells.filter(cell => cell === mark).length === size) {
                    winners.add(mark);
                    found = found ?? line;
                }
            }
        }

        if (winners.size > 1) {
            throw new BoardInvariantError('Both X and O hold a complete line');
        }
        return found;
    }
}
