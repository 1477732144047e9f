/**
 * Application Error
 * Envelope around an {@link ErrorKind}: a short id users can report, the
 * classification, and the call stack for internal failures. The envelope is
 * logged once, when it is created.
 * @module errors/AppError
 */

import { randomInt } from 'crypto';
import { DiscordAPIError } from 'discord.js';
import logger from '../core/Logger.js';
import {
    classifyErrorKind,
    describeErrorKind,
    getErrorTitle,
    inspectErrorKind,
    shouldCaptureContext,
    toDebugValue,
    type DebugValue,
    type ErrorClassification,
    type ErrorKind,
} from './ErrorKind.js';
// TYPES
/**
 * Anything that converts into an {@link ErrorKind}
 */
export type ErrorSource = ErrorKind | DiscordAPIError;

/**
 * What the chat surface shows for a failed command
 */
export interface ErrorMessage {
    title: string;
    body: string;
}

export interface SerializedAppError {
    name: string;
    id: string;
    classification: ErrorClassification;
    kind: DebugValue;
}
// CONSTANTS
const ID_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789_-';
export const ERROR_ID_LENGTH = 6;
// HELPERS
export function generateErrorId(): string {
    let id = '';
    for (let i = 0; i < ERROR_ID_LENGTH; i++) {
        id += ID_ALPHABET[randomInt(ID_ALPHABET.length)];
    }
    return id;
}

export function toErrorKind(source: ErrorSource): ErrorKind {
    if (source instanceof DiscordAPIError) {
        return { type: 'UnknownDiscord', cause: source };
    }
    return source;
}

/**
 * Stack frames of the code that called `AppError.from`
 */
function captureContext(): string {
    const holder: { stack?: string } = {};
    Error.captureStackTrace(holder, AppError.from);

    const frames = (holder.stack ?? '')
        .split('\n')
        .slice(1)
        .map(line => line.trim())
        .filter(line => line.length > 0);

    return frames.length > 0 ? frames.join('\n') : '<no stack frames captured>';
}

function shorten(text: string, max: number): string {
    if (text.length <= max) return text;
    return max > 0 ? `${text.slice(0, max - 1)}…` : '';
}

function renderBody(sentence: string, idLine: string, dump: string): string {
    return `${sentence}\n\n${idLine}\n\n\`\`\`\n${dump}\n\`\`\``;
}
// APP ERROR CLASS
export class AppError extends Error {
    /** Short id mentioned in chat so the matching log line can be found */
    public readonly id: string;
    public readonly kind: ErrorKind;
    public readonly classification: ErrorClassification;
    /** Call stack at creation, only kept for internal errors */
    public readonly context: string | null;

    private constructor(kind: ErrorKind, context: string | null) {
        super(describeErrorKind(kind));
        this.name = 'AppError';
        this.id = generateErrorId();
        this.kind = kind;
        this.classification = classifyErrorKind(kind);
        this.context = context;
        Object.setPrototypeOf(this, new.target.prototype);
    }

    /**
     * The only way to create an AppError: classifies, captures and logs
     */
    static from(source: ErrorSource): AppError {
        const kind = toErrorKind(source);
        const context = shouldCaptureContext(kind) ? captureContext() : null;
        const error = new AppError(kind, context);

        logger.error('AppError', `Error ${error.id}: ${kind.type}`, {
            id: error.id,
            kind: toDebugValue(kind),
            ...(context !== null ? { context } : {}),
        });

        return error;
    }

    get title(): string {
        return getErrorTitle(this.kind);
    }

    /**
     * Render for the chat: display sentence, id and a dump of the kind.
     * With a `limit`, the sentence and the dump are shortened to fit; the id line is always kept.
     */
    toMessage(limit: number = Number.POSITIVE_INFINITY): ErrorMessage {
        const idLine = `Error id: **\`${this.id}\`**`;
        const sentence = this.message;
        const dump = inspectErrorKind(this.kind);

        const body = renderBody(sentence, idLine, dump);
        if (body.length <= limit) {
            return { title: this.title, body };
        }

        const free = Math.max(limit - renderBody('', idLine, '').length, 0);
        // the sentence gets at least half of the room, more when the dump is short
        const sentenceRoom = Math.min(sentence.length, Math.max(Math.floor(free / 2), free - dump.length));
        return {
            title: this.title,
            body: renderBody(shorten(sentence, sentenceRoom), idLine, shorten(dump, free - sentenceRoom)),
        };
    }

    toJSON(): SerializedAppError {
        return {
            name: this.name,
            id: this.id,
            classification: this.classification,
            kind: toDebugValue(this.kind),
        };
    }
}

export function isAppError(value: unknown): value is AppError {
    return value instanceof AppError;
}
