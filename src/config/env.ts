import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../core/errors';
import { MAX_BOARD_SIZE, MIN_BOARD_SIZE } from '../core/types';

dotenv.config();

const envSchema = z.object({
    NODE_ENV: z.string().default('development'),
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('warn'),
    LOG_DIR: z.string().min(1).optional(),
    TTT_BOARD_SIZE: z.coerce.number().int().min(MIN_BOARD_SIZE).max(MAX_BOARD_SIZE).default(3),
    TTT_HISTORY_FILE: z.string().min(1).default('tic_tac_toe_history.txt')
});

export interface AppConfig {
    nodeEnv: string;
    logLevel: 'error' | 'warn' | 'info' | 'debug';
    logDir?: string;
    boardSize: number;
    historyFile: string;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(source);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigurationError(`Invalid environment: ${issues.join('; ')}`);
    }
    const env = parsed.data;
    return {
        nodeEnv: env.NODE_ENV,
        logLevel: env.LOG_LEVEL,
        logDir: env.LOG_DIR,
        boardSize: env.TTT_BOARD_SIZE,
        historyFile: env.TTT_HISTORY_FILE
    };
}

let current: AppConfig | undefined;

/**
 * Process configuration, read on first use so a bad value surfaces as a
 * ConfigurationError where the caller can report it
 */
export function getConfig(): AppConfig {
    if (!current) {
        current = loadConfig();
    }
    return current;
}
