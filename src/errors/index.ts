/**
 * Errors Module
 * Central exports for the error taxonomy
 * @module errors
 */

export { AppError, isAppError, toErrorKind, generateErrorId, ERROR_ID_LENGTH } from './AppError.js';
export type { ErrorSource, ErrorMessage, SerializedAppError } from './AppError.js';

export {
    classifyErrorKind,
    shouldCaptureContext,
    getErrorTitle,
    describeErrorKind,
    toDebugValue,
    inspectErrorKind,
    toError,
} from './ErrorKind.js';
export type {
    ErrorKind,
    ErrorKindType,
    ErrorClassification,
    ArgFailure,
    IndexRange,
    DebugValue,
} from './ErrorKind.js';
