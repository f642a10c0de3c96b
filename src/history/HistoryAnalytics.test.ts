import { describe, it, expect, beforeEach } from 'vitest';
import { HistoryAnalytics } from './HistoryAnalytics';
import { HistoryError } from '../core/errors';
import { Mark } from '../core/types';

const LINES = [
    '[18.10.2026 10:00] Mode: pvp | Board: 3x3 | Moves: 5 | Result: X',
    '[18.10.2026 10:05] Mode: bot | Board: 3x3 | Moves: 9 | Result: draw',
    'garbage line',
    '[19.10.2026 09:15] Mode: bot | Board: 4x4 | Moves: 8 | Result: O',
    '[19.10.2026 09:20] Mode: bot | Board: 2x2 | Moves: 3 | Result: X',
    '[19.10.2026 21:40] Mode: pvp | Board: 3x3 | Moves: 3 | Result: O',
];

describe('HistoryAnalytics', () => {
    let analytics: HistoryAnalytics;

    beforeEach(() => {
        analytics = new HistoryAnalytics(LINES);
    });

    it('lists every line, parseable or not', () => {
        expect(analytics.all()).toEqual(LINES);
        expect(analytics.getRecords()).toHaveLength(5);
    });

    it('filters draws', () => {
        expect(analytics.draws()).toEqual([LINES[1]]);
    });

    describe('winsOf', () => {
        it('filters wins of one player, ignoring case', () => {
            expect(analytics.winsOf('x')).toEqual([LINES[0], LINES[4]]);
            expect(analytics.winsOf('O')).toEqual([LINES[3], LINES[5]]);
        });

        it('rejects other players', () => {
            expect(() => analytics.winsOf('Z')).toThrow(HistoryError);
        });
    });

    it('counts outcomes per mode', () => {
        expect(analytics.stats()).toEqual({
            byMode: {
                bot: { [Mark.X]: 1, [Mark.O]: 1, draw: 1 },
                pvp: { [Mark.X]: 1, [Mark.O]: 1, draw: 0 },
            },
            totals: { [Mark.X]: 2, [Mark.O]: 2, draw: 1 },
            totalMatches: 5,
        });
    });

    describe('lastMatches', () => {
        it('returns the newest lines first', () => {
            expect(analytics.lastMatches(2)).toEqual([LINES[5], LINES[4]]);
        });

        it('caps at the number of lines', () => {
            expect(analytics.lastMatches(40)).toHaveLength(LINES.length);
        });

        it('accepts 1 to 40 only', () => {
            expect(() => analytics.lastMatches(0)).toThrow(HistoryError);
            expect(() => analytics.lastMatches(41)).toThrow('Enter a whole number of games from 1 to 40');
            expect(() => analytics.lastMatches(2.5)).toThrow(HistoryError);
        });
    });

    it('sums moves and board areas', () => {
        expect(analytics.totalMoves()).toBe(28);
        expect(analytics.totalBoardArea()).toBe(9 + 9 + 16 + 4 + 9);
    });

    describe('winRate', () => {
        it('gives percentages for a mode', () => {
            expect(analytics.winRate('bot')).toEqual({ [Mark.X]: '33.3%', [Mark.O]: '33.3%', draw: '33.3%' });
            expect(analytics.winRate('PVP')).toEqual({ [Mark.X]: '50.0%', [Mark.O]: '50.0%', draw: '0.0%' });
        });

        it('returns null before any game in the mode', () => {
            expect(new HistoryAnalytics([LINES[0]]).winRate('bot')).toBeNull();
        });

        it('rejects unknown modes', () => {
            expect(() => analytics.winRate('online')).toThrow('Choose a game mode: bot or pvp');
        });
    });

    describe('fastest', () => {
        it('picks the earliest game with the fewest moves', () => {
            expect(analytics.fastest()?.raw).toBe(LINES[4]);
        });

        it('returns null without records', () => {
            expect(new HistoryAnalytics([]).fastest()).toBeNull();
        });
    });

    describe('byDate', () => {
        it('matches timestamps by prefix', () => {
            expect(analytics.byDate('19.10.2026').map(record => record.raw)).toEqual([LINES[3], LINES[4], LINES[5]]);
            expect(analytics.byDate('19.10.2026 09').map(record => record.moveCount)).toEqual([8, 3]);
        });

        it('finds nothing for other dates', () => {
            expect(analytics.byDate('01.01.2020')).toEqual([]);
        });
    });
});
