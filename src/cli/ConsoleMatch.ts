import { AIPlayer, HeuristicAIPlayer } from '../ai/AIPlayer';
import { toCellNumber } from '../core/coordinates';
import { Game } from '../core/Game';
import { GameMode, Mark, PlayerMark, RoundOutcome, RoundSummary } from '../core/types';
import { MatchHistory } from '../history/MatchHistory';
import { gameLogger } from '../lib/logger';
import { colorMark, renderBoard } from './renderer';

/**
 * Where player answers come from
 */
export interface MoveInput {
    ask(prompt: string): Promise<string>;
}

export interface MatchOutput {
    print(line: string): void;
}

export interface ConsoleMatchOptions {
    boardSize: number;
    input: MoveInput;
    output: MatchOutput;
    history: MatchHistory;
    /** Asked for when omitted */
    mode?: GameMode;
    bot?: AIPlayer;
    botMark?: PlayerMark;
    color?: boolean;
}

const YES = ['y', 'yes'];

/**
 * Drives rounds on the console: prompts, bot turns, rendering and history.
 */
export class ConsoleMatch {
    private readonly game: Game;
    private readonly bot: AIPlayer;
    private readonly botMark: PlayerMark;
    private readonly color: boolean;

    constructor(private readonly options: ConsoleMatchOptions) {
        this.game = new Game(options.boardSize);
        this.botMark = options.botMark ?? Mark.O;
        this.bot = options.bot ?? new HeuristicAIPlayer({ mark: this.botMark });
        this.color = options.color ?? true;
    }

    public getGame(): Game {
        return this.game;
    }

    /**
     * Plays rounds until a player declines a replay or aborts with empty input.
     * Without a fixed mode, the mode is asked again before every round.
     */
    public async run(): Promise<RoundSummary[]> {
        const played: RoundSummary[] = [];

        for (;;) {
            const mode = this.options.mode ?? (await this.askMode());
            const summary = await this.playRound(mode);
            if (!summary) {
                this.print('You ended the game early');
                return played;
            }
            played.push(summary);

            const again = await this.options.input.ask('Play again? [y/N] ');
            if (!YES.includes(again.trim().toLowerCase())) {
                this.print('Have a nice day!');
                return played;
            }
            this.game.reset();
        }
    }

    /**
     * One round from an empty board. Resolves to null when aborted.
     */
    public async playRound(mode: GameMode): Promise<RoundSummary | null> {
        const game = this.game;
        gameLogger.roundStarted(mode, game.getSize());
        this.print(mode === 'pvp' ? 'Playing in PVP mode' : this.botBanner());

        for (;;) {
            let token: string;
            const botTurn = mode === 'bot' && game.getCurrentPlayer() === this.botMark;

            if (botTurn) {
                const position = this.bot.getMove(game);
                if (!position) {
                    return null;
                }
                const cell = toCellNumber(position, game.getSize());
                gameLogger.botMoved(cell);
                token = String(cell);
            } else {
                this.render();
                this.print(`${mode === 'bot' ? 'Your move' : 'Player to move'}: ${this.mark(game.getCurrentPlayer())}`);
                token = (await this.options.input.ask(`Enter a cell 1 - ${game.getPositionLimit()}: `)).trim();
                if (token === '') {
                    return null;
                }
            }

            const result = game.submitMove(token);
            if (!result.ok) {
                gameLogger.moveRejected(result.error.kind, token);
                this.print(result.error.message);
                continue;
            }
            if (botTurn) {
                this.print(`The bot played ${token}, your turn`);
            }

            if (game.checkWinner()) {
                const winner = game.getWinner() ?? game.getCurrentPlayer();
                this.render();
                this.print(`Player ${this.mark(winner)} wins!`);
                return this.finish(mode, winner);
            }
            if (game.checkDraw()) {
                this.render();
                this.print('The game ended in a draw!');
                return this.finish(mode, 'draw');
            }
            game.switchTurn();
        }
    }

    private async finish(mode: GameMode, outcome: RoundOutcome): Promise<RoundSummary> {
        const summary: RoundSummary = {
            mode,
            boardSize: this.game.getSize(),
            moveCount: this.game.getMoveCount(),
            outcome
        };
        gameLogger.roundEnded(mode, outcome, summary.moveCount);
        await this.options.history.record(summary);
        return summary;
    }

    private async askMode(): Promise<GameMode> {
        this.print('Press ENTER on an empty line to leave a game before it ends');
        const answer = await this.options.input.ask('Play against the bot? [y/N] ');
        return YES.includes(answer.trim().toLowerCase()) ? 'bot' : 'pvp';
    }

    private botBanner(): string {
        const first = this.botMark === this.game.getCurrentPlayer() ? 'The bot moves first' : 'You move first';
        return `Playing against the bot. ${first}`;
    }

    private render(): void {
        for (const line of renderBoard(this.game.getBoard(), this.game.getWinningLine(), { color: this.color })) {
            this.print(line);
        }
    }

    private mark(mark: PlayerMark): string {
        return colorMark(mark, this.color);
    }

    private print(line: string): void {
        this.options.output.print(line);
    }
}
