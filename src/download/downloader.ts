/**
 * Downloader for referenced documents.
 *
 * @module downloader
 */

import * as fs from 'fs';
import * as path from 'path';
import { urlFileName } from '../acquisition/acquireStream';
import { Fetcher } from '../acquisition/fetcher';
import { DownloadResult, LogConfig } from '../types';
import { mapWithConcurrency } from '../utils/concurrency';
import { describeError, logDebug, logWarning } from '../utils/errorUtils';

export interface DownloadOptions {
    fetcher: Fetcher;
    /** Maximum number of downloads in flight. Default is 10. */
    concurrency?: number;
    config?: LogConfig;
}

/**
 * Makes a url file name safe to use as a local file name.
 */
export const toLocalFileName = (url: string): string => {
    const name = urlFileName(url).replace(/[^\w.\-]+/g, '_');
    return name === '' || name === '.' || name === '..' ? 'download' : name;
};

/**
 * Downloads every distinct url into `targetDir`, named after the last path segment of the url.
 * A failing url is reported in its result and does not stop the others.
 *
 * @returns One result per distinct url, in the order of first appearance
 */
export const downloadUrls = async (urls: readonly string[], targetDir: string, options: DownloadOptions): Promise<DownloadResult[]> => {
    const config = options.config ?? {};
    const distinct = [...new Set(urls)];
    if (distinct.length === 0) return [];

    await fs.promises.mkdir(targetDir, { recursive: true });
    logDebug(`Downloading ${distinct.length} urls to '${targetDir}'...`, config);

    return mapWithConcurrency(distinct, options.concurrency ?? 10, async (url): Promise<DownloadResult> => {
        try {
            const content = await options.fetcher(url);
            const target = path.join(targetDir, toLocalFileName(url));
            await fs.promises.writeFile(target, content);
            logDebug(`- Saved '${url}' as '${target}'`, config);
            return { url, path: target };
        } catch (e) {
            logWarning(`Error downloading '${url}'`, config, e);
            return { url, error: describeError(e) };
        }
    });
};
