import { HistoryError } from '../core/errors';
import { GameMode, Mark, RoundOutcome } from '../core/types';
import { MatchHistory } from './MatchHistory';
import { MatchRecord, parseRecord } from './recordFormat';

export const MAX_RECENT_MATCHES = 40;

export type OutcomeCounts = Record<RoundOutcome, number>;

export interface HistoryStats {
    byMode: Record<GameMode, OutcomeCounts>;
    totals: OutcomeCounts;
    totalMatches: number;
}

/**
 * Percentages with one decimal, e.g. "66.7%"
 */
export type WinRate = Record<RoundOutcome, string>;

const emptyCounts = (): OutcomeCounts => ({ [Mark.X]: 0, [Mark.O]: 0, draw: 0 });

/**
 * Read-only queries over the lines of a match history file.
 *
 * Lines that do not parse are still listed by {@link HistoryAnalytics.all}
 * but are left out of every statistic.
 */
export class HistoryAnalytics {
    private readonly records: MatchRecord[];

    constructor(private readonly lines: readonly string[]) {
        this.records = lines
            .map(line => parseRecord(line))
            .filter((record): record is MatchRecord => record !== null);
    }

    public static async load(history: MatchHistory): Promise<HistoryAnalytics> {
        return new HistoryAnalytics(await history.readLines());
    }

    public all(): string[] {
        return [...this.lines];
    }

    public getRecords(): MatchRecord[] {
        return [...this.records];
    }

    public draws(): string[] {
        return this.records.filter(record => record.outcome === 'draw').map(record => record.raw);
    }

    public winsOf(mark: string): string[] {
        const upper = mark.toUpperCase();
        if (upper !== Mark.X && upper !== Mark.O) {
            throw new HistoryError('Choose a player: X or O');
        }
        return this.records.filter(record => record.outcome === upper).map(record => record.raw);
    }

    public stats(): HistoryStats {
        const byMode: Record<GameMode, OutcomeCounts> = { bot: emptyCounts(), pvp: emptyCounts() };
        const totals = emptyCounts();
        for (const record of this.records) {
            byMode[record.mode][record.outcome]++;
            totals[record.outcome]++;
        }
        return { byMode, totals, totalMatches: this.records.length };
    }

    /**
     * Most recent matches first
     */
    public lastMatches(count: number): string[] {
        if (!Number.isInteger(count) || count < 1 || count > MAX_RECENT_MATCHES) {
            throw new HistoryError(`Enter a whole number of games from 1 to ${MAX_RECENT_MATCHES}`);
        }
        return this.lines.slice(-count).reverse();
    }

    public totalMoves(): number {
        return this.records.reduce((sum, record) => sum + record.moveCount, 0);
    }

    public totalBoardArea(): number {
        return this.records.reduce((sum, record) => sum + record.area, 0);
    }

    /**
     * Share of each outcome in one mode, or null before any game in it
     */
    public winRate(mode: string): WinRate | null {
        const target = mode.toLowerCase();
        if (target !== 'bot' && target !== 'pvp') {
            throw new HistoryError('Choose a game mode: bot or pvp');
        }
        const counts = this.stats().byMode[target];
        const total = counts[Mark.X] + counts[Mark.O] + counts.draw;
        if (total === 0) {
            return null;
        }
        const percent = (value: number) => `${((100 / total) * value).toFixed(1)}%`;
        return { [Mark.X]: percent(counts[Mark.X]), [Mark.O]: percent(counts[Mark.O]), draw: percent(counts.draw) };
    }

    /**
     * Game with the fewest moves, the earliest one on ties
     */
    public fastest(): MatchRecord | null {
        let best: MatchRecord | null = null;
        for (const record of this.records) {
            if (!best || record.moveCount < best.moveCount) {
                best = record;
            }
        }
        return best;
    }

    /**
     * Matches whose timestamp starts with a prefix such as `19.10.2026`
     */
    public byDate(prefix: string): MatchRecord[] {
        if (prefix.length === 0) {
            throw new HistoryError('Enter a date as DD.MM.YYYY');
        }
        return this.records.filter(record => record.date.startsWith(prefix));
    }
}
