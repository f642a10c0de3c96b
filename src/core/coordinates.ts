import { Position } from './types';

/**
 * Converts a 1-based cell number (counted row by row) to a board position.
 * Range checks are left to the caller.
 */
export function toPosition(cell: number, size: number): Position {
    return {
        row: Math.floor((cell - 1) / size),
        col: (cell - 1) % size
    };
}

export function toCellNumber(position: Position, size: number): number {
    return position.row * size + position.col + 1;
}
