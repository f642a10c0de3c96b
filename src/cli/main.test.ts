import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { CliContext, PromptSession, USAGE, main } from './main';
import { AppConfig, loadConfig } from '../config/env';
import type { MatchOutput } from './ConsoleMatch';

const LINE = '[18.10.2026 10:00] Mode: pvp | Board: 3x3 | Moves: 5 | Result: X';

class TestConsole implements CliContext {
    public readonly printed: string[] = [];
    public readonly errorLines: string[] = [];
    public readonly prompts: string[] = [];
    public readonly color = false;
    public inputClosed = false;

    public readonly output: MatchOutput = { print: line => this.printed.push(line) };
    public readonly errors: MatchOutput = { print: line => this.errorLines.push(line) };

    constructor(private readonly env: NodeJS.ProcessEnv, private readonly answers: string[] = []) {}

    public openInput(): PromptSession {
        return {
            ask: async prompt => {
                this.prompts.push(prompt);
                return this.answers.shift() ?? '';
            },
            close: () => {
                this.inputClosed = true;
            }
        };
    }

    public loadConfig(): AppConfig {
        return loadConfig(this.env);
    }
}

describe('main', () => {
    let dir: string;
    let file: string;

    const cli = (answers: string[] = [], env: NodeJS.ProcessEnv = {}) =>
        new TestConsole({ TTT_HISTORY_FILE: file, ...env }, answers);

    beforeEach(async () => {
        dir = await mkdtemp(path.join(tmpdir(), 'ttt-main-'));
        file = path.join(dir, 'history.txt');
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    describe('usage', () => {
        it('rejects an unknown command', async () => {
            const context = cli();
            expect(await main(['dance'], context)).toBe(1);
            expect(context.errorLines).toEqual(['Unknown command "dance"', USAGE]);
        });

        it('rejects an unknown history command', async () => {
            const context = cli();
            expect(await main(['history', 'purge'], context)).toBe(1);
            expect(context.errorLines).toEqual(['Unknown history command "purge"', USAGE]);
        });

        it('rejects unknown play options', async () => {
            const context = cli();
            expect(await main(['play', '--fast'], context)).toBe(1);
            expect(context.errorLines).toHaveLength(2);
            expect(context.errorLines[1]).toBe(USAGE);
            expect(context.inputClosed).toBe(false);
        });

        it('rejects both modes at once', async () => {
            const context = cli();
            expect(await main(['play', '--bot', '--pvp'], context)).toBe(1);
            expect(context.errorLines).toEqual(['Choose either --bot or --pvp', USAGE]);
        });
    });

    describe('errors', () => {
        it('reports an invalid environment by its message', async () => {
            const context = cli([], { TTT_BOARD_SIZE: '12' });
            expect(await main(['history', 'stats'], context)).toBe(1);
            expect(context.errorLines).toHaveLength(1);
            expect(context.errorLines[0]).toMatch(/^Invalid environment: TTT_BOARD_SIZE: /);
        });

        it('reports a missing history file', async () => {
            const context = cli();
            expect(await main(['history', 'stats'], context)).toBe(1);
            expect(context.errorLines).toEqual([`History file ${file} not found, play at least one game first`]);
        });

        it('reports a bad analytics argument', async () => {
            await writeFile(file, `${LINE}\n`, 'utf-8');
            const context = cli();
            expect(await main(['history', 'last', '100'], context)).toBe(1);
            expect(context.errorLines).toEqual(['Enter a whole number of games from 1 to 40']);
        });
    });

    describe('history', () => {
        it('shows the full history by default', async () => {
            await writeFile(file, `${LINE}\n`, 'utf-8');
            const context = cli();
            expect(await main(['history'], context)).toBe(0);
            expect(context.printed).toEqual(['--- Match history ---', LINE]);
            expect(context.errorLines).toEqual([]);
        });
    });

    describe('play', () => {
        it('plays a round and appends it to the history file', async () => {
            const context = cli(['1', '2', '3', 'n']);
            expect(await main(['play', '--pvp', '--size', '2'], context)).toBe(0);

            expect(context.printed).toContain('Player X wins!');
            expect(context.inputClosed).toBe(true);
            const content = await readFile(file, 'utf-8');
            expect(content).toMatch(/^\[\d{2}\.\d{2}\.\d{4} \d{2}:\d{2}\] Mode: pvp \| Board: 2x2 \| Moves: 3 \| Result: X\n$/);
        });

        it('uses the configured board size without --size', async () => {
            const context = cli([''], { TTT_BOARD_SIZE: '4' });
            expect(await main(['play', '--pvp'], context)).toBe(0);
            expect(context.prompts).toEqual(['Enter a cell 1 - 16: ']);
            expect(context.printed[context.printed.length - 1]).toBe('You ended the game early');
        });

        it('plays when no command is given', async () => {
            const context = cli(['n', '']);
            expect(await main([], context)).toBe(0);
            expect(context.prompts).toEqual(['Play against the bot? [y/N] ', 'Enter a cell 1 - 9: ']);
        });

        it('rejects a board size out of range', async () => {
            const context = cli();
            expect(await main(['play', '--size', '12'], context)).toBe(1);
            expect(context.errorLines).toEqual(['Board size 12 is out of range, expected 2 to 9']);
            expect(context.inputClosed).toBe(true);
        });

        it('rejects a board size that is not a number', async () => {
            const context = cli();
            expect(await main(['play', '--size', 'big'], context)).toBe(1);
            expect(context.errorLines).toEqual(['Board size big is not an integer']);
        });
    });
});
