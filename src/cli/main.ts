import { createInterface } from 'node:readline/promises';
import { parseArgs } from 'node:util';
import { AppConfig, getConfig } from '../config/env';
import { BoardSizeTypeError, TicTacToeError, UsageError } from '../core/errors';
import type { GameMode } from '../core/types';
import { MatchHistory } from '../history/MatchHistory';
import { getLogger } from '../lib/logger';
import { ConsoleMatch, MatchOutput, MoveInput } from './ConsoleMatch';
import { HISTORY_COMMANDS, isHistoryCommand, runHistoryCommand } from './historyCommands';

export const USAGE = [
    'Usage:',
    '  tictactoe play [--bot | --pvp] [--size n]',
    `  tictactoe history <${HISTORY_COMMANDS.join('|')}> [argument]`
].join('\n');

/**
 * Prompt source for one `play` session
 */
export interface PromptSession extends MoveInput {
    close(): void;
}

/**
 * Everything the CLI touches outside the game itself
 */
export interface CliContext {
    output: MatchOutput;
    errors: MatchOutput;
    color: boolean;
    openInput(): PromptSession;
    loadConfig(): AppConfig;
}

export const consoleContext: CliContext = {
    output: { print: line => console.log(line) },
    errors: { print: line => console.error(line) },
    color: process.stdout.isTTY,
    openInput: () => {
        const rl = createInterface({ input: process.stdin, output: process.stdout });
        return {
            ask: prompt => rl.question(prompt),
            close: () => rl.close()
        };
    },
    loadConfig: getConfig
};

function parsePlayArgs(args: string[]) {
    try {
        return parseArgs({
            args,
            options: {
                bot: { type: 'boolean', default: false },
                pvp: { type: 'boolean', default: false },
                size: { type: 'string' }
            }
        });
    } catch (error) {
        throw new UsageError(error instanceof Error ? error.message : String(error));
    }
}

function parseBoardSize(value: string): number {
    if (!/^\d+$/.test(value)) {
        throw new BoardSizeTypeError(value);
    }
    return Number(value);
}

async function play(args: string[], config: AppConfig, context: CliContext): Promise<void> {
    const { values } = parsePlayArgs(args);
    if (values.bot && values.pvp) {
        throw new UsageError('Choose either --bot or --pvp');
    }

    let mode: GameMode | undefined;
    if (values.bot) {
        mode = 'bot';
    } else if (values.pvp) {
        mode = 'pvp';
    }
    const boardSize = values.size === undefined ? config.boardSize : parseBoardSize(values.size);

    const input = context.openInput();
    try {
        const match = new ConsoleMatch({
            boardSize,
            mode,
            input,
            output: context.output,
            history: new MatchHistory(config.historyFile),
            color: context.color
        });
        await match.run();
    } finally {
        input.close();
    }
}

/**
 * Runs one command line and resolves to the process exit code
 */
export async function main(argv: string[], context: CliContext = consoleContext): Promise<number> {
    const [command, ...rest] = argv;
    try {
        const config = context.loadConfig();
        if (command === 'play' || command === undefined) {
            await play(rest, config, context);
            return 0;
        }
        if (command === 'history') {
            const [subcommand = 'show', argument] = rest;
            if (!isHistoryCommand(subcommand)) {
                throw new UsageError(`Unknown history command "${subcommand}"`);
            }
            await runHistoryCommand(new MatchHistory(config.historyFile), subcommand, argument, context.output);
            return 0;
        }
        throw new UsageError(`Unknown command "${command}"`);
    } catch (error) {
        if (error instanceof TicTacToeError) {
            context.errors.print(error.message);
            if (error instanceof UsageError) {
                context.errors.print(USAGE);
            }
            return 1;
        }
        getLogger().error('unexpected_failure', { error });
        return 2;
    }
}
