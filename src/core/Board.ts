import { BoardSizeTypeError, BoardSizeValueError } from './errors';
import { Line, Mark, MAX_BOARD_SIZE, MIN_BOARD_SIZE, PlayerMark, Position } from './types';

/**
 * Represents the n×n tic-tac-toe board
 */
export class Board {
    private readonly size: number;
    private board: Mark[][];

    constructor(size: number) {
        if (!Number.isInteger(size)) {
            throw new BoardSizeTypeError(size);
        }
        if (size < MIN_BOARD_SIZE || size > MAX_BOARD_SIZE) {
            throw new BoardSizeValueError(size);
        }
        this.size = size;
        this.board = this.createEmptyBoard();
    }

    /**
     * Creates an empty board
     */
    private createEmptyBoard(): Mark[][] {
        return Array(this.size)
            .fill(null)
            .map(() => Array<Mark>(this.size).fill(Mark.EMPTY));
    }

    /**
     * Gets the size of the board
     */
    public getSize(): number {
        return this.size;
    }

    /**
     * Gets the mark at a specific position
     */
    public getCell(position: Position): Mark {
        if (!this.isValidPosition(position)) {
            throw new Error('Invalid position');
        }
        return this.board[position.row][position.col];
    }

    /**
     * Places a mark on an empty cell. Occupied cells are never overwritten.
     */
    public place(position: Position, mark: PlayerMark): boolean {
        if (!this.isValidPosition(position)) {
            return false;
        }
        if (this.board[position.row][position.col] !== Mark.EMPTY) {
            return false;
        }
        this.board[position.row][position.col] = mark;
        return true;
    }

    /**
     * Checks if a position is valid
     */
    public isValidPosition(position: Position): boolean {
        return (
            Number.isInteger(position.row) &&
            Number.isInteger(position.col) &&
            position.row >= 0 &&
            position.row < this.size &&
            position.col >= 0 &&
            position.col < this.size
        );
    }

    public isEmpty(position: Position): boolean {
        return this.getCell(position) === Mark.EMPTY;
    }

    public isOccupied(position: Position): boolean {
        return !this.isEmpty(position);
    }

    /**
     * Checks if the board is full
     */
    public isFull(): boolean {
        for (let row = 0; row < this.size; row++) {
            for (let col = 0; col < this.size; col++) {
                if (this.board[row][col] === Mark.EMPTY) {
                    return false;
                }
            }
        }
        return true;
    }

    /**
     * Empty positions in row-major order
     */
    public getEmptyPositions(): Position[] {
        const positions: Position[] = [];
        for (let row = 0; row < this.size; row++) {
            for (let col = 0; col < this.size; col++) {
                if (this.board[row][col] === Mark.EMPTY) {
                    positions.push({ row, col });
                }
            }
        }
        return positions;
    }

    /**
     * Marks along a line, in line order
     */
    public getCells(line: Line): Mark[] {
        return line.map(position => this.getCell(position));
    }

    /**
     * Resets the board to empty state
     */
    public reset(): void {
        this.board = this.createEmptyBoard();
    }

    /**
     * Gets a copy of the current board state
     */
    public getBoard(): Mark[][] {
        return this.board.map(row => [...row]);
    }
}
