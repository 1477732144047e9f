/**
 * Bot Configuration
 * Process-wide settings read from the environment
 * @module config/bot
 */

import dotenv from 'dotenv';
import type { LogLevel } from '../core/Logger.js';
import { ERROR_THUMBNAIL_URL } from '../constants.js';

dotenv.config();

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'success', 'warn', 'error'];

function readLogLevel(raw: string | undefined): LogLevel {
    return LOG_LEVELS.find(level => level === raw?.toLowerCase()) ?? 'info';
}

export const logLevel: LogLevel = readLogLevel(process.env.LOG_LEVEL);

export const errorThumbnailUrl: string = process.env.ERROR_THUMBNAIL_URL || ERROR_THUMBNAIL_URL;

export default {
    logLevel,
    errorThumbnailUrl
};
