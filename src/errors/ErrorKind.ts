/**
 * Error Kinds
 * Closed set of failures the bot can report. Every fallible operation ends up
 * as exactly one of these, wrapped in an {@link AppError}.
 * @module errors/ErrorKind
 */

import type { AppError } from './AppError.js';
// TYPES
/**
 * Half-open range `start..end` of valid indices
 */
export interface IndexRange {
    readonly start: number;
    readonly end: number;
}

/**
 * Why a command argument could not be consumed
 */
export type ArgFailure<E> =
    | { readonly reason: 'missing' }
    | { readonly reason: 'invalid'; readonly input: string; readonly cause: E };

export type ErrorKind =
    // Caused by the user
    | { readonly type: 'TrackIndexOutOfBounds'; readonly index: number; readonly available: IndexRange | null }
    | { readonly type: 'NoActiveTrack' }
    | { readonly type: 'UserNotInGuild' }
    | { readonly type: 'ParseInt'; readonly failure: ArgFailure<string> }
    | { readonly type: 'ParseArg'; readonly failure: ArgFailure<AppError> }
    | { readonly type: 'CommaInImageTag'; readonly input: string }
    | { readonly type: 'UserNotInVoiceChannel' }
    // Internal / infrastructure
    | { readonly type: 'JoinVoiceChannel'; readonly channelName: string | null; readonly cause: Error | null }
    | { readonly type: 'AudioStart'; readonly cause: Error }
    | { readonly type: 'UnknownDiscord'; readonly cause: Error }
    | { readonly type: 'SendRequest'; readonly cause: Error }
    | { readonly type: 'GetRequest'; readonly status: number; readonly body: string }
    | { readonly type: 'UnexpectedJsonShape'; readonly cause: Error }
    | { readonly type: 'YtVidNotFound'; readonly query: string }
    | { readonly type: 'YtInferVideoId'; readonly url: string };

export type ErrorKindType = ErrorKind['type'];

/**
 * `user` errors are expected and logged without a stack,
 * `internal` ones carry the captured context
 */
export type ErrorClassification = 'user' | 'internal';

/**
 * JSON-safe structured dump of a kind
 */
export type DebugValue =
    | string
    | number
    | boolean
    | null
    | DebugValue[]
    | { [key: string]: DebugValue };

/**
 * Normalise a caught value into an `Error` cause
 */
export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}

function assertNever(value: never): never {
    throw new TypeError(`Unhandled error kind: ${JSON.stringify(value)}`);
}
// CLASSIFICATION
export function classifyErrorKind(kind: ErrorKind): ErrorClassification {
    switch (kind.type) {
        case 'TrackIndexOutOfBounds':
        case 'NoActiveTrack':
        case 'UserNotInGuild':
        case 'ParseInt':
        case 'ParseArg':
        case 'CommaInImageTag':
        case 'UserNotInVoiceChannel':
            return 'user';
        case 'JoinVoiceChannel':
        case 'AudioStart':
        case 'UnknownDiscord':
        case 'SendRequest':
        case 'GetRequest':
        case 'UnexpectedJsonShape':
        case 'YtVidNotFound':
        case 'YtInferVideoId':
            return 'internal';
        default:
            return assertNever(kind);
    }
}

/**
 * Expected errors don't need a stack trace in the logs
 */
export function shouldCaptureContext(kind: ErrorKind): boolean {
    return classifyErrorKind(kind) === 'internal';
}
// RENDERING
/**
 * Short name of the kind, used as the embed title
 */
export function getErrorTitle(kind: ErrorKind): string {
    switch (kind.type) {
        case 'NoActiveTrack':
            return 'Invalid command error';
        case 'UserNotInGuild':
            return 'Not in a guild error';
        case 'ParseArg':
        case 'ParseInt':
        case 'CommaInImageTag':
        case 'TrackIndexOutOfBounds':
            return 'Invalid argument error';
        case 'UserNotInVoiceChannel':
            return 'Not in a voice channel error';
        case 'JoinVoiceChannel':
            return 'Permissions error';
        case 'AudioStart':
        case 'UnknownDiscord':
            return 'Internal error';
        case 'SendRequest':
            return 'Send request error';
        case 'GetRequest':
        case 'UnexpectedJsonShape':
            return 'HTTP error';
        case 'YtVidNotFound':
            return 'YouTube error';
        case 'YtInferVideoId':
            return 'Bad YouTube URL';
        default:
            return assertNever(kind);
    }
}

function describeArgFailure<E>(failure: ArgFailure<E>, describeCause: (cause: E) => string): string {
    return failure.reason === 'missing'
        ? 'the argument is missing'
        : `\`${failure.input}\` (${describeCause(failure.cause)})`;
}

function describeRange(range: IndexRange | null): string {
    return range ? `${range.start}..${range.end}` : '<empty>';
}

/**
 * Long-form sentence shown to the user
 */
export function describeErrorKind(kind: ErrorKind): string {
    switch (kind.type) {
        case 'TrackIndexOutOfBounds':
            return `Given track index \`${kind.index}\` is out of bounds, available range: ${describeRange(kind.available)}`;
        case 'NoActiveTrack':
            return 'No track is currently playing';
        case 'UserNotInGuild':
            return 'You are not in a discord server (guild) right now';
        case 'ParseInt':
            return `Failed to parse an integer: ${describeArgFailure(kind.failure, cause => cause)}`;
        case 'ParseArg':
            return `Parsing the arguments finished with an error: ${describeArgFailure(kind.failure, cause => cause.message)}`;
        case 'CommaInImageTag':
            return `The specified image tags contain a comma (which is prohibited): ${kind.input}`;
        case 'UserNotInVoiceChannel':
            return 'You are not in a voice channel. You need to connect to one first so that '
                + 'I can understand which channel to join.';
        case 'JoinVoiceChannel':
            return `I cannot join the voice channel ${kind.channelName ?? '<unknown channel name>'}`;
        case 'AudioStart':
            return `Failed to start streaming the audio: ${kind.cause.message}`;
        case 'UnknownDiscord':
            return `Unknown discord error: ${kind.cause.message}`;
        case 'SendRequest':
            return `Failed to send an http request: ${kind.cause.message}`;
        case 'GetRequest':
            return `GET request has failed (http status code: ${kind.status}):\n${kind.body}`;
        case 'UnexpectedJsonShape':
            return `The server has returned an unexpected response JSON object: ${kind.cause.message}`;
        case 'YtVidNotFound':
            return `Failed to find youtube video for "${kind.query}" query.`;
        case 'YtInferVideoId':
            return `Could not infer YouTube video id from the url \`${kind.url}\``;
        default:
            return assertNever(kind);
    }
}
// DEBUG DUMP
function errorToDebugValue(error: Error): DebugValue {
    return { name: error.name, message: error.message };
}

function argFailureToDebugValue<E>(failure: ArgFailure<E>, causeToDebugValue: (cause: E) => DebugValue): DebugValue {
    if (failure.reason === 'missing') {
        return { reason: 'missing' };
    }
    return { reason: 'invalid', input: failure.input, cause: causeToDebugValue(failure.cause) };
}

/**
 * Variant name plus payload, with nested envelopes expanded
 */
export function toDebugValue(kind: ErrorKind): DebugValue {
    switch (kind.type) {
        case 'NoActiveTrack':
        case 'UserNotInGuild':
        case 'UserNotInVoiceChannel':
            return { type: kind.type };
        case 'TrackIndexOutOfBounds':
            return {
                type: kind.type,
                index: kind.index,
                available: kind.available ? { start: kind.available.start, end: kind.available.end } : null,
            };
        case 'ParseInt':
            return { type: kind.type, failure: argFailureToDebugValue(kind.failure, cause => cause) };
        case 'ParseArg':
            return {
                type: kind.type,
                failure: argFailureToDebugValue(kind.failure, cause => ({ id: cause.id, kind: toDebugValue(cause.kind) })),
            };
        case 'CommaInImageTag':
            return { type: kind.type, input: kind.input };
        case 'JoinVoiceChannel':
            return {
                type: kind.type,
                channelName: kind.channelName,
                cause: kind.cause ? errorToDebugValue(kind.cause) : null,
            };
        case 'AudioStart':
        case 'UnknownDiscord':
        case 'SendRequest':
        case 'UnexpectedJsonShape':
            return { type: kind.type, cause: errorToDebugValue(kind.cause) };
        case 'GetRequest':
            return { type: kind.type, status: kind.status, body: kind.body };
        case 'YtVidNotFound':
            return { type: kind.type, query: kind.query };
        case 'YtInferVideoId':
            return { type: kind.type, url: kind.url };
        default:
            return assertNever(kind);
    }
}

/**
 * Pretty-printed {@link toDebugValue}
 */
export function inspectErrorKind(kind: ErrorKind): string {
    return JSON.stringify(toDebugValue(kind), null, 2);
}
