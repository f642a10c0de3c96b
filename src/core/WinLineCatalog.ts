import { BoardSizeTypeError, BoardSizeValueError } from './errors';
import { Line, MAX_BOARD_SIZE, MIN_BOARD_SIZE, Position } from './types';

const catalogs = new Map<number, WinLineCatalog>();

/**
 * Every winning line for one board size.
 *
 * Lines are ordered rows, then columns, then the main diagonal and the
 * anti-diagonal. Win detection and the bot both take the first match in this
 * order, so it must not change.
 */
export class WinLineCatalog {
    public readonly lines: readonly Line[];

    private constructor(public readonly size: number) {
        this.lines = Object.freeze(WinLineCatalog.generate(size));
    }

    /**
     * Shared catalog for a board size, built on first use
     */
    public static forSize(size: number): WinLineCatalog {
        let catalog = catalogs.get(size);
        if (!catalog) {
            if (!Number.isInteger(size)) {
                throw new BoardSizeTypeError(size);
            }
            if (size < MIN_BOARD_SIZE || size > MAX_BOARD_SIZE) {
                throw new BoardSizeValueError(size);
            }
            catalog = new WinLineCatalog(size);
            catalogs.set(size, catalog);
        }
        return catalog;
    }

    public static generate(size: number): Line[] {
        const line = (at: (i: number) => Position): Line =>
            Object.freeze(Array.from({ length: size }, (_, i) => Object.freeze(at(i))));

        const lines: Line[] = [];
        for (let row = 0; row < size; row++) {
            lines.push(line(i => ({ row, col: i })));
        }
        for (let col = 0; col < size; col++) {
            lines.push(line(i => ({ row: i, col })));
        }
        lines.push(line(i => ({ row: i, col: i })));
        lines.push(line(i => ({ row: i, col: size - 1 - i })));
        return lines;
    }
}
