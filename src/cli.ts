#!/usr/bin/env node
/**
 * Command line interface.
 *
 * ```
 * pdfrefs <file-or-url> [--json] [--verbose] [--sort] [--text]
 *         [--read-timeout=S] [--text-timeout=S] [--no-limit] [--download=DIR]
 * ```
 *
 * @module cli
 */

import { PdfRefs } from './PdfRefs';
import { PdfRefsConfig } from './types';
import { describeError, ERRORHEADER, getPdfRefsError, isPdfRefsError, PdfRefsErrorType } from './utils/errorUtils';

export const USAGE = 'Usage: pdfrefs <file-or-url> [--json] [--verbose] [--sort] [--text] [--read-timeout=S] [--text-timeout=S] [--no-limit] [--download=DIR]';

export interface CliOptions {
    uri: string;
    json: boolean;
    verbose: boolean;
    sort: boolean;
    text: boolean;
    limit: boolean;
    readTimeout?: number;
    textTimeout?: number;
    downloadDir?: string;
}

/** Where the CLI writes. Each call is one line. */
export interface CliIO {
    out(line: string): void;
    err(line: string): void;
}

const parseSeconds = (flag: string, value: string): number => {
    const seconds = Number(value);
    if (value.trim() === '' || !Number.isFinite(seconds)) {
        throw getPdfRefsError(PdfRefsErrorType.IMPROPER_ARGUMENTS, {}, `${flag} needs a number of seconds, got '${value}'`);
    }
    return seconds;
};

/**
 * Parses the arguments that follow the program name.
 *
 * @throws {PdfRefsError} IMPROPER_ARGUMENTS for unknown flags, bad values or a missing location
 */
export const parseCliArgs = (args: readonly string[]): CliOptions => {
    const options: CliOptions = { uri: '', json: false, verbose: false, sort: false, text: false, limit: true };
    for (const arg of args) {
        const separator = arg.startsWith('--') ? arg.indexOf('=') : -1;
        const flag = separator === -1 ? arg : arg.slice(0, separator);
        const value = separator === -1 ? undefined : arg.slice(separator + 1);
        switch (flag) {
            case '--json': options.json = true; break;
            case '--verbose': options.verbose = true; break;
            case '--sort': options.sort = true; break;
            case '--text': options.text = true; break;
            case '--no-limit': options.limit = false; break;
            case '--read-timeout': options.readTimeout = parseSeconds(flag, value ?? ''); break;
            case '--text-timeout': options.textTimeout = parseSeconds(flag, value ?? ''); break;
            case '--download':
                if (!value) throw getPdfRefsError(PdfRefsErrorType.IMPROPER_ARGUMENTS, {}, '--download needs a directory');
                options.downloadDir = value;
                break;
            default:
                if (flag.startsWith('-') || options.uri) {
                    throw getPdfRefsError(PdfRefsErrorType.IMPROPER_ARGUMENTS, {}, `unexpected argument '${arg}'`);
                }
                options.uri = arg;
        }
    }
    if (!options.uri) {
        throw getPdfRefsError(PdfRefsErrorType.IMPROPER_ARGUMENTS, {}, 'Need a file path or url');
    }
    return options;
};

const formatValue = (value: unknown): string => typeof value === 'string' ? value : JSON.stringify(value);

/**
 * Runs the CLI and returns the exit code: 0 on success, 1 on failure.
 *
 * @param args - Arguments after the program name
 * @param overrides - Configuration merged over the options derived from the arguments
 */
export const runCli = async (args: readonly string[], io: CliIO, overrides: PdfRefsConfig = {}): Promise<number> => {
    try {
        const options = parseCliArgs(args);
        const pdf = await PdfRefs.open(options.uri, {
            readTimeout: options.readTimeout,
            textTimeout: options.textTimeout,
            limit: options.limit,
            outputErrorToConsole: options.verbose,
            verbose: options.verbose,
            ...overrides
        });

        if (options.json) {
            const summary = pdf.getSummary();
            io.out(JSON.stringify({ ...summary, references: pdf.getReferencesAsDict(options.sort) }, null, 2));
        } else {
            io.out('Document infos:');
            for (const [key, value] of Object.entries(pdf.getMetadata())) {
                io.out(`- ${key} = ${formatValue(value)}`);
            }
            if (pdf.degraded) {
                io.out('Text extraction timed out, showing annotation references only');
            }
            io.out('');
            io.out(`References: ${pdf.getReferencesCount()}`);
            const references = pdf.getReferencesAsDict(options.sort);
            for (const source of ['annot', 'scrape'] as const) {
                const tokens = references[source];
                if (!tokens) continue;
                io.out(`- ${source}: ${tokens.length}`);
                for (const token of tokens) {
                    io.out(`  - ${token}`);
                }
            }
        }

        if (options.text) {
            io.out(pdf.getText());
        }

        if (options.downloadDir) {
            const result = await pdf.downloadPdfs(options.downloadDir);
            const failed = result.downloads.filter((download) => download.error !== undefined).length;
            io.out(`Downloaded ${result.downloads.length - failed} of ${result.downloads.length} referenced pdfs to '${options.downloadDir}'`);
        }
        return 0;
    } catch (e) {
        if (isPdfRefsError(e)) {
            io.err(e.message);
            if (e.type === PdfRefsErrorType.IMPROPER_ARGUMENTS) io.err(USAGE);
            return 1;
        }
        io.err(`${ERRORHEADER}${describeError(e)}`);
        return 1;
    }
};

if (require.main === module) {
    runCli(process.argv.slice(2), {
        out: (line) => console.log(line),
        err: (line) => console.error(line)
    }).then((code) => {
        process.exitCode = code;
    }, (e: unknown) => {
        console.error(e);
        process.exitCode = 1;
    });
}
