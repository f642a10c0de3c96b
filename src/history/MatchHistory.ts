import { appendFile, readFile, rm } from 'node:fs/promises';
import { HistoryError } from '../core/errors';
import type { RoundSummary } from '../core/types';
import { gameLogger } from '../lib/logger';
import { formatRecord } from './recordFormat';

export const DELETE_CONFIRMATION = 'delete';

/**
 * Append-only text file with one finished round per line
 */
export class MatchHistory {
    constructor(
        private readonly file: string,
        private readonly now: () => Date = () => new Date()
    ) {}

    /**
     * Appends a round. A failed write is logged, never thrown: losing a
     * history line must not end the game.
     */
    public async record(summary: RoundSummary): Promise<boolean> {
        try {
            await appendFile(this.file, `${formatRecord(summary, this.now())}\n`, 'utf-8');
            return true;
        } catch (error) {
            gameLogger.historyWriteFailed(this.file, toError(error));
            return false;
        }
    }

    /**
     * Non-blank lines, oldest first
     */
    public async readLines(): Promise<string[]> {
        let content: string;
        try {
            content = await readFile(this.file, 'utf-8');
        } catch (error) {
            if (isErrnoException(error) && error.code === 'ENOENT') {
                throw new HistoryError(`History file ${this.file} not found, play at least one game first`);
            }
            throw new HistoryError(`Cannot read history file ${this.file}: ${toError(error).message}`);
        }
        return content
            .split(/\r?\n/)
            .map(line => line.trim())
            .filter(line => line.length > 0);
    }

    /**
     * Deletes the history file. Requires the word `delete` as confirmation.
     */
    public async remove(confirmation: string | undefined): Promise<void> {
        if (confirmation !== DELETE_CONFIRMATION) {
            throw new HistoryError(`Type "${DELETE_CONFIRMATION}" to confirm removing the history file`);
        }
        try {
            await rm(this.file);
        } catch (error) {
            throw new HistoryError(`Cannot remove history file ${this.file}: ${toError(error).message}`);
        }
    }
}

function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}
