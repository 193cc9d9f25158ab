import { afterEach, describe, expect, it, vi } from 'vitest';
import { getPdfRefsError, isPdfRefsError, logDebug, logWarning, PdfRefsError, PdfRefsErrorType } from '../errorUtils';

describe('getPdfRefsError', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('builds the message from the lookup table and keeps the cause', () => {
        const cause = new Error('socket hang up');
        const error = getPdfRefsError(PdfRefsErrorType.DOWNLOAD_FAILED, {}, 'https://example.org/a.pdf', cause);
        expect(error).toBeInstanceOf(PdfRefsError);
        expect(error.type).toBe(PdfRefsErrorType.DOWNLOAD_FAILED);
        expect(error.message).toBe("[pdfrefs]: Error downloading 'https://example.org/a.pdf' (socket hang up)");
        expect(error.cause).toBe(cause);
    });

    it('logs to the console only when asked to', () => {
        const errorLog = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        getPdfRefsError(PdfRefsErrorType.FILE_NOT_FOUND, {}, 'a.pdf');
        expect(errorLog).not.toHaveBeenCalled();
        getPdfRefsError(PdfRefsErrorType.FILE_NOT_FOUND, { outputErrorToConsole: true }, 'a.pdf');
        expect(errorLog).toHaveBeenCalledWith("[pdfrefs]: Invalid filename and not an url: 'a.pdf'");
    });
});

describe('isPdfRefsError', () => {
    it('narrows by type', () => {
        const error = getPdfRefsError(PdfRefsErrorType.READ_TIMEOUT, {}, 'a.pdf');
        expect(isPdfRefsError(error)).toBe(true);
        expect(isPdfRefsError(error, PdfRefsErrorType.READ_TIMEOUT)).toBe(true);
        expect(isPdfRefsError(error, PdfRefsErrorType.TEXT_TIMEOUT)).toBe(false);
        expect(isPdfRefsError(new Error('plain'))).toBe(false);
    });
});

describe('logging', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('needs verbose for debug messages', () => {
        const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
        logDebug('hidden', { outputErrorToConsole: true });
        logDebug('shown', { outputErrorToConsole: true, verbose: true });
        expect(debug).toHaveBeenCalledOnce();
        expect(debug).toHaveBeenCalledWith('[pdfrefs]: shown');
    });

    it('passes the original error along with warnings', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const cause = new Error('boom');
        logWarning('careful', { outputErrorToConsole: true }, cause);
        expect(warn).toHaveBeenCalledWith('[pdfrefs]: careful', cause);
    });
});
