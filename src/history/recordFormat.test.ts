import { describe, it, expect } from 'vitest';
import { formatRecord, formatTimestamp, parseRecord } from './recordFormat';
import { Mark } from '../core/types';

const playedAt = new Date(2026, 9, 19, 14, 5);

describe('formatTimestamp', () => {
    it('writes day, month, year, hours and minutes with padding', () => {
        expect(formatTimestamp(playedAt)).toBe('19.10.2026 14:05');
        expect(formatTimestamp(new Date(2026, 0, 3, 9, 0))).toBe('03.01.2026 09:00');
    });
});

describe('formatRecord', () => {
    it('writes one history line', () => {
        expect(formatRecord({ mode: 'bot', boardSize: 3, moveCount: 7, outcome: Mark.X }, playedAt))
            .toBe('[19.10.2026 14:05] Mode: bot | Board: 3x3 | Moves: 7 | Result: X');
        expect(formatRecord({ mode: 'pvp', boardSize: 4, moveCount: 16, outcome: 'draw' }, playedAt))
            .toBe('[19.10.2026 14:05] Mode: pvp | Board: 4x4 | Moves: 16 | Result: draw');
    });
});

describe('parseRecord', () => {
    it('reads every field back', () => {
        const line = '[19.10.2026 14:05] Mode: pvp | Board: 5x5 | Moves: 12 | Result: O';
        expect(parseRecord(line)).toEqual({
            date: '19.10.2026 14:05',
            mode: 'pvp',
            boardSize: 5,
            area: 25,
            moveCount: 12,
            outcome: Mark.O,
            raw: line,
        });
    });

    it('reads draws', () => {
        expect(parseRecord('[01.02.2026 08:30] Mode: bot | Board: 2x2 | Moves: 4 | Result: draw')?.outcome)
            .toBe('draw');
    });

    it('returns null for lines in another format', () => {
        expect(parseRecord('not a record')).toBeNull();
        expect(parseRecord('[19.10.2026 14:05] Mode: online | Board: 3x3 | Moves: 5 | Result: X')).toBeNull();
        expect(parseRecord('[19.10.2026 14:05] Mode: bot | Board: 3x3 | Moves: 5 | Result: Z')).toBeNull();
    });
});
