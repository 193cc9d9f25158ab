/**
 * Error Handling Utilities
 *
 * This module provides centralized error management for pdfrefs.
 * It defines the error types, their messages and the console logging used by the
 * construction pipeline, the backends and the downloader, so every failure reaches
 * the caller as one specific, distinguishable error kind.
 */

import { LogConfig } from '../types';

/** Error header prefix for all error and log messages */
export const ERRORHEADER = "[pdfrefs]: ";

/**
 * Standard error types for pdfrefs.
 * Use these to identify the kind of error being reported.
 */
export enum PdfRefsErrorType {
    /** No file exists at the given local path */
    FILE_NOT_FOUND = 'FILE_NOT_FOUND',
    /** Downloading a remote document failed */
    DOWNLOAD_FAILED = 'DOWNLOAD_FAILED',
    /** Acquiring the document bytes exceeded the read deadline */
    READ_TIMEOUT = 'READ_TIMEOUT',
    /** Parsing and text rendering exceeded the text deadline and degradation was not allowed */
    TEXT_TIMEOUT = 'TEXT_TIMEOUT',
    /** The bytes are not a valid PDF document */
    INVALID_DOCUMENT = 'INVALID_DOCUMENT',
    /** Walking the annotations of a page failed unexpectedly */
    ANNOTATION_RESOLUTION_FAILED = 'ANNOTATION_RESOLUTION_FAILED',
    /** Arguments passed to the function are missing or invalid */
    IMPROPER_ARGUMENTS = 'IMPROPER_ARGUMENTS'
}

/**
 * Lookup table for error messages.
 * Some entries are functions that take a parameter to build dynamic messages.
 */
const ERROR_MESSAGES: Record<PdfRefsErrorType, string | ((info: string) => string)> = {
    [PdfRefsErrorType.FILE_NOT_FOUND]: (filepath: string) => `Invalid filename and not an url: '${filepath}'`,
    [PdfRefsErrorType.DOWNLOAD_FAILED]: (url: string) => `Error downloading '${url}'`,
    [PdfRefsErrorType.READ_TIMEOUT]: (uri: string) => `Reading '${uri}' timed out`,
    [PdfRefsErrorType.TEXT_TIMEOUT]: (uri: string) => `Extracting the text of '${uri}' timed out`,
    [PdfRefsErrorType.INVALID_DOCUMENT]: (reason: string) => `Invalid PDF (${reason})`,
    [PdfRefsErrorType.ANNOTATION_RESOLUTION_FAILED]: (page: string) => `Resolving the annotations of page ${page} failed`,
    [PdfRefsErrorType.IMPROPER_ARGUMENTS]: (detail: string) => `Improper arguments: ${detail}`
};

/**
 * Error thrown by every public pdfrefs operation.
 * The `type` tells the failure kinds apart, the original failure is kept as `cause`.
 */
export class PdfRefsError extends Error {
    public readonly type: PdfRefsErrorType;

    constructor(type: PdfRefsErrorType, message: string, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = 'PdfRefsError';
        this.type = type;
    }
}

/**
 * Returns the message of any thrown value.
 */
export const describeError = (error: unknown): string => {
    if (error instanceof Error) return error.message;
    return String(error);
};

/**
 * Creates a formatted error message for a specific error type.
 *
 * @param info - Additional information (e.g., filepath, url, page number)
 */
const createErrorMessage = (type: PdfRefsErrorType, info: string, cause?: unknown): string => {
    const msg = ERROR_MESSAGES[type];
    const message = typeof msg === 'function' ? msg(info) : msg;
    if (cause === undefined || type === PdfRefsErrorType.INVALID_DOCUMENT) {
        return message;
    }
    return `${message} (${describeError(cause)})`;
};

/**
 * Creates, optionally logs to console, and returns a pdfrefs error.
 *
 * @param type - The type of error
 * @param config - Configuration (checks outputErrorToConsole)
 * @param info - Additional information for the message
 * @param cause - The original failure
 * @returns The PdfRefsError to be thrown
 */
export const getPdfRefsError = (type: PdfRefsErrorType, config: LogConfig, info: string | number, cause?: unknown): PdfRefsError => {
    const message = ERRORHEADER + createErrorMessage(type, String(info), cause);
    if (config.outputErrorToConsole) {
        console.error(message);
    }
    return new PdfRefsError(type, message, cause);
};

/**
 * Tells whether a thrown value is a PdfRefsError, optionally of a given type.
 */
export const isPdfRefsError = (error: unknown, type?: PdfRefsErrorType): error is PdfRefsError => {
    return error instanceof PdfRefsError && (type === undefined || error.type === type);
};

/**
 * Conditionally logs a warning message to the console.
 * Used for non-fatal errors that shouldn't stop the extraction.
 *
 * @param message - The warning message
 * @param config - Configuration
 * @param error - Optional original error object for more context
 */
export const logWarning = (message: string, config: LogConfig, error?: unknown): void => {
    if (config.outputErrorToConsole) {
        if (error !== undefined) {
            console.warn(ERRORHEADER + message, error);
        } else {
            console.warn(ERRORHEADER + message);
        }
    }
};

/**
 * Conditionally logs a debug message to the console. Needs both `outputErrorToConsole` and `verbose`.
 */
export const logDebug = (message: string, config: LogConfig): void => {
    if (config.outputErrorToConsole && config.verbose) {
        console.debug(ERRORHEADER + message);
    }
};
