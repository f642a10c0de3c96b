import { Mark } from '../core/types';
import type { GameMode, PlayerMark, RoundOutcome, RoundSummary } from '../core/types';

/**
 * One parsed line of the history file
 */
export interface MatchRecord {
    /** Timestamp as written, `DD.MM.YYYY HH:MM` */
    date: string;
    mode: GameMode;
    boardSize: number;
    /** Cells on the board, rows × columns */
    area: number;
    moveCount: number;
    outcome: RoundOutcome;
    /** The line the record was read from */
    raw: string;
}

const RECORD_PATTERN =
    /\[(?<date>[^\]]*)\]\s+Mode:\s+(?<mode>bot|pvp)\s+\|\s+Board:\s+(?<rows>\d+)x(?<cols>\d+)\s+\|\s+Moves:\s+(?<moves>\d+)\s+\|\s+Result:\s+(?<outcome>X|O|draw)\s*$/;

const pad = (value: number) => String(value).padStart(2, '0');

export function formatTimestamp(date: Date): string {
    return `${pad(date.getDate())}.${pad(date.getMonth() + 1)}.${date.getFullYear()} ` +
        `${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

export function formatRecord(summary: RoundSummary, date: Date): string {
    const { mode, boardSize, moveCount, outcome } = summary;
    return `[${formatTimestamp(date)}] Mode: ${mode} | Board: ${boardSize}x${boardSize} | ` +
        `Moves: ${moveCount} | Result: ${outcome}`;
}

export function parseRecord(line: string): MatchRecord | null {
    const groups = RECORD_PATTERN.exec(line)?.groups;
    if (!groups) {
        return null;
    }
    const rows = Number(groups.rows);
    return {
        date: groups.date,
        mode: groups.mode === 'bot' ? 'bot' : 'pvp',
        boardSize: rows,
        area: rows * Number(groups.cols),
        moveCount: Number(groups.moves),
        outcome: toOutcome(groups.outcome),
        raw: line
    };
}

function toOutcome(value: string): RoundOutcome {
    if (value === 'draw') {
        return 'draw';
    }
    const mark: PlayerMark = value === 'X' ? Mark.X : Mark.O;
    return mark;
}
