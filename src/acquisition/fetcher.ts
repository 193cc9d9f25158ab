/**
 * Network Fetcher
 *
 * Downloads a url into memory. Any transport failure or non-2xx status rejects.
 *
 * @module fetcher
 */

import axios from 'axios';

/** Downloads the body of a url */
export type Fetcher = (url: string, signal?: AbortSignal) => Promise<Buffer>;

const USER_AGENT = 'pdfrefs/1.0 (+https://www.npmjs.com/package/pdfrefs)';

/**
 * Adds `http://` to urls written without a scheme, e.g. `www.example.org/paper.pdf`.
 */
export const toFetchableUrl = (url: string): string => {
    return /^[a-z][a-z0-9+.-]*:\/\//i.test(url) ? url : `http://${url}`;
};

/**
 * Default fetcher, based on axios.
 */
export const fetchUrl: Fetcher = async (url, signal) => {
    const response = await axios.get<ArrayBuffer>(toFetchableUrl(url), {
        responseType: 'arraybuffer',
        signal,
        maxRedirects: 5,
        headers: {
            'User-Agent': USER_AGENT
        }
    });
    return Buffer.from(response.data);
};
