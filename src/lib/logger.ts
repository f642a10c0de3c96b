/**
 * Diagnostic logging for the console game.
 *
 * Goes to stderr so it never mixes with the board on stdout. Set LOG_DIR to
 * also keep a JSON log file.
 */

import path from 'node:path';
import winston from 'winston';
import { AppConfig, getConfig } from '../config/env';
import type { GameMode, RoundOutcome } from '../core/types';

const logFormat = winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.json()
);

const consoleFormat = winston.format.combine(
    winston.format.colorize(),
    winston.format.timestamp({ format: 'HH:mm:ss' }),
    winston.format.printf(({ timestamp, level, message, ...meta }) => {
        const metaStr = Object.keys(meta).length ? JSON.stringify(meta) : '';
        return `${timestamp} ${level}: ${message} ${metaStr}`;
    })
);

export function createLogger(config: AppConfig): winston.Logger {
    const transports = [
        new winston.transports.Console({
            format: consoleFormat,
            stderrLevels: ['error', 'warn', 'info', 'debug']
        }),
        // JSON log kept only when LOG_DIR is set
        ...(config.logDir
            ? [
                new winston.transports.File({
                    filename: path.join(config.logDir, 'tictactoe.log'),
                    format: logFormat
                })
            ]
            : [])
    ];

    return winston.createLogger({
        level: config.logLevel,
        format: logFormat,
        silent: config.nodeEnv === 'test',
        defaultMeta: { service: 'tictactoe-console' },
        transports
    });
}

let logger: winston.Logger | undefined;

/**
 * Shared logger, built from the process configuration on first use
 */
export function getLogger(): winston.Logger {
    if (!logger) {
        logger = createLogger(getConfig());
    }
    return logger;
}

export const gameLogger = {
    roundStarted(mode: GameMode, boardSize: number) {
        getLogger().info('round_started', { mode, boardSize });
    },

    moveRejected(kind: string, input: string) {
        getLogger().debug('move_rejected', { kind, input });
    },

    botMoved(cell: number) {
        getLogger().debug('bot_moved', { cell });
    },

    roundEnded(mode: GameMode, outcome: RoundOutcome, moveCount: number) {
        getLogger().info('round_ended', { mode, outcome, moveCount });
    },

    historyWriteFailed(file: string, error: Error) {
        getLogger().error('history_write_failed', {
            file,
            error: error.message
        });
    }
};
