import { Board } from '../core/Board';
import { Line, Mark } from '../core/types';

export const CELL_WIDTH = 5;

const RESET = '\x1b[0m';
const MARK_COLORS: Record<Mark.X | Mark.O, string> = {
    [Mark.X]: '\x1b[31m',
    [Mark.O]: '\x1b[32m'
};
const DIMMED = '\x1b[90m';

export interface RenderOptions {
    /** Wrap marks in ANSI colors */
    color?: boolean;
}

function center(text: string, width: number): string {
    const left = Math.floor((width - text.length) / 2);
    return ' '.repeat(left) + text + ' '.repeat(width - text.length - left);
}

export function colorMark(mark: Mark.X | Mark.O, color = true): string {
    return color ? `${MARK_COLORS[mark]}${mark}${RESET}` : mark;
}

function renderCell(mark: Mark, highlighted: boolean, color: boolean): string {
    if (mark === Mark.EMPTY) {
        return ' '.repeat(CELL_WIDTH);
    }
    const text = center(mark, CELL_WIDTH);
    if (!color) {
        return text;
    }
    return `${highlighted ? MARK_COLORS[mark] : DIMMED}${text}${RESET}`;
}

/**
 * Draws the grid as text lines. Once a line is won, marks outside it are dimmed.
 */
export function renderBoard(board: Board, winningLine: Line | null, options: RenderOptions = {}): string[] {
    const color = options.color ?? true;
    const size = board.getSize();
    const cells = board.getBoard();
    const onWinningLine = (row: number, col: number) =>
        !winningLine || winningLine.some(position => position.row === row && position.col === col);

    const emptyLine = Array(size).fill(' '.repeat(CELL_WIDTH)).join('|');
    const separator = Array(size).fill('_'.repeat(CELL_WIDTH)).join('|');

    const lines: string[] = [];
    cells.forEach((row, r) => {
        lines.push(emptyLine);
        lines.push(row.map((mark, c) => renderCell(mark, onWinningLine(r, c), color)).join('|'));
        lines.push(r < size - 1 ? separator : emptyLine);
    });
    return lines;
}
