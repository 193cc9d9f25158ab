/**
 * Stream acquisition: reads a local file or downloads a url into a seekable stream.
 *
 * @module acquireStream
 */

import * as fs from 'fs';
import * as path from 'path';
import { LogConfig } from '../types';
import { getPdfRefsError, logDebug, PdfRefsErrorType } from '../utils/errorUtils';
import { SeekableByteStream } from '../utils/SeekableByteStream';
import { Fetcher } from './fetcher';

export interface AcquiredStream {
    stream: SeekableByteStream;
    /** File name part of the location */
    displayName: string;
}

export interface AcquireOptions {
    isRemote: boolean;
    fetcher: Fetcher;
    config: LogConfig;
    signal?: AbortSignal;
}

/**
 * Last non-empty path segment of a url, without query or fragment.
 */
export const urlFileName = (url: string): string => {
    const withoutQuery = url.split(/[?#]/)[0];
    const segments = withoutQuery.split('/').filter((segment) => segment.length > 0);
    return segments[segments.length - 1] ?? url;
};

/**
 * Reads the document at `uri`.
 *
 * @throws {PdfRefsError} FILE_NOT_FOUND if a local path is not a file,
 *         DOWNLOAD_FAILED if a url cannot be downloaded
 */
export const acquireStream = async (uri: string, options: AcquireOptions): Promise<AcquiredStream> => {
    const { config, signal } = options;

    if (options.isRemote) {
        logDebug(`Reading url '${uri}'...`, config);
        let content: Buffer;
        try {
            content = await options.fetcher(uri, signal);
        } catch (e) {
            throw getPdfRefsError(PdfRefsErrorType.DOWNLOAD_FAILED, config, uri, e);
        }
        return { stream: new SeekableByteStream(content), displayName: urlFileName(uri) };
    }

    if (!fs.existsSync(uri) || !fs.statSync(uri).isFile()) {
        throw getPdfRefsError(PdfRefsErrorType.FILE_NOT_FOUND, config, uri);
    }
    logDebug(`Reading file '${uri}'...`, config);
    const content = await fs.promises.readFile(uri, { signal });
    return { stream: new SeekableByteStream(content), displayName: path.basename(uri) };
};
