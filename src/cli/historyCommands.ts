import { HistoryError } from '../core/errors';
import { Mark } from '../core/types';
import { HistoryAnalytics } from '../history/HistoryAnalytics';
import { MatchHistory } from '../history/MatchHistory';
import type { MatchOutput } from './ConsoleMatch';

export const HISTORY_COMMANDS = [
    'show', 'draws', 'wins', 'stats', 'last', 'moves', 'boards', 'winrate', 'fastest', 'date', 'delete'
] as const;

export type HistoryCommand = (typeof HISTORY_COMMANDS)[number];

export function isHistoryCommand(value: string): value is HistoryCommand {
    return HISTORY_COMMANDS.some(command => command === value);
}

function requireArgument(argument: string | undefined, message: string): string {
    if (argument === undefined || argument === '') {
        throw new HistoryError(message);
    }
    return argument;
}

/**
 * Runs one `history` subcommand and prints its report
 */
export async function runHistoryCommand(
    history: MatchHistory,
    command: HistoryCommand,
    argument: string | undefined,
    output: MatchOutput
): Promise<void> {
    const print = (line: string) => output.print(line);

    if (command === 'delete') {
        await history.remove(argument);
        print('History file removed');
        return;
    }

    const analytics = await HistoryAnalytics.load(history);

    switch (command) {
        case 'show':
            print('--- Match history ---');
            analytics.all().forEach(print);
            break;

        case 'draws':
            print('--- Drawn matches ---');
            analytics.draws().forEach(print);
            break;

        case 'wins': {
            const mark = requireArgument(argument, 'Choose a player: X or O').toUpperCase();
            const wins = analytics.winsOf(mark);
            print(`--- Wins of player ${mark} ---`);
            wins.forEach(print);
            break;
        }

        case 'stats': {
            const { byMode, totals, totalMatches } = analytics.stats();
            print('----- Wins and draws -----');
            print(`X wins | PVP ${byMode.pvp[Mark.X]} | Bot ${byMode.bot[Mark.X]} | Total ${totals[Mark.X]}`);
            print(`O wins | PVP ${byMode.pvp[Mark.O]} | Bot ${byMode.bot[Mark.O]} | Total ${totals[Mark.O]}`);
            print(`Draws | PVP ${byMode.pvp.draw} | Bot ${byMode.bot.draw} | Total ${totals.draw}`);
            print(`Matches played: ${totalMatches}`);
            break;
        }

        case 'last': {
            const count = Number(requireArgument(argument, 'Enter how many games to show'));
            const matches = analytics.lastMatches(count);
            if (matches.length === 0) {
                print('No games played yet.');
                break;
            }
            print(matches.length > 1 ? `--- Last ${matches.length} games ---` : '--- Last game ---');
            matches.forEach(print);
            break;
        }

        case 'moves':
            print(`Total moves: ${analytics.totalMoves()}`);
            break;

        case 'boards':
            print(`Total board area: ${analytics.totalBoardArea()}`);
            break;

        case 'winrate': {
            const mode = requireArgument(argument, 'Choose a game mode: bot or pvp').toLowerCase();
            const rate = analytics.winRate(mode);
            if (!rate) {
                print(`No games recorded in ${mode} mode yet.`);
                break;
            }
            const o = mode === 'bot' ? 'Bot (O)' : 'Player (O)';
            print(`Win rate | mode: ${mode} | Player (X) ${rate[Mark.X]} | ${o} ${rate[Mark.O]} | Draw ${rate.draw}`);
            break;
        }

        case 'fastest': {
            const record = analytics.fastest();
            if (!record) {
                print('No games played yet.');
                break;
            }
            print(`Fewest moves: ${record.moveCount}, played ${record.date}`);
            break;
        }

        case 'date': {
            const prefix = requireArgument(argument, 'Enter a date as DD.MM.YYYY');
            const records = analytics.byDate(prefix);
            if (records.length === 0) {
                print(`No games found for ${prefix}.`);
                break;
            }
            print(`---------- Games on ${prefix} ----------`);
            records.forEach(record => print(record.raw));
            break;
        }
    }
}
