/**
 * Reference Pattern Extractors
 *
 * Finds URLs, DOIs and arXiv identifiers in free text with one fixed regular grammar per family.
 *
 * Every extractor returns a lazy iterable: nothing is scanned until it is iterated, and each new
 * iteration scans the text again from the start. Tokens are yielded in text order, once per
 * occurrence. Deduplication is left to the caller.
 *
 * @module patterns
 */

/** Top-level domains recognized for urls written without a scheme or `www.` prefix */
const BARE_URL_TLDS = [
    'com', 'net', 'org', 'edu', 'gov', 'mil', 'int', 'info', 'biz', 'io', 'ai', 'dev', 'app',
    'eu', 'uk', 'de', 'fr', 'nl', 'ch', 'at', 'be', 'it', 'es', 'se', 'jp', 'cn', 'ru', 'au', 'ca', 'us'
];

/** Characters that never belong to a url */
const URL_BODY = String.raw`[^\s<>"'{}\[\]]`;

const URL_PATTERN = new RegExp(
    String.raw`\b(?:(?:https?|ftp)://|www\.)${URL_BODY}+` +
    '|' +
    String.raw`(?<![@\w.\-/:])[a-z0-9][a-z0-9.\-]*\.(?:${BARE_URL_TLDS.join('|')})/${URL_BODY}*`,
    'gi'
);

const DOI_PATTERN = /doi:\s?([^\s,]+)/gi;

const ARXIV_PATTERN = /arxiv(?::\s?|\.org\/abs\/)([^\s,]+)/gi;

/** Sentence punctuation that ends a url when it is the last character */
const TRAILING_PUNCTUATION = /[.,;:!?'"]$/;

const count = (text: string, char: string): number => text.split(char).length - 1;

/**
 * Removes the sentence punctuation and unbalanced closing parentheses a url picks up from surrounding prose.
 *
 * @example
 * ```typescript
 * trimUrlToken('https://example.org/a).'); // 'https://example.org/a'
 * trimUrlToken('https://en.wikipedia.org/wiki/Set_(mathematics)'); // unchanged
 * ```
 */
export const trimUrlToken = (token: string): string => {
    let trimmed = token;
    for (;;) {
        if (TRAILING_PUNCTUATION.test(trimmed)) {
            trimmed = trimmed.slice(0, -1);
        } else if (trimmed.endsWith(')') && count(trimmed, ')') > count(trimmed, '(')) {
            trimmed = trimmed.slice(0, -1);
        } else {
            return trimmed;
        }
    }
};

/**
 * Wraps a global pattern into a restartable iterable of tokens.
 */
const scan = (text: string, pattern: RegExp, pick: (match: RegExpMatchArray) => string): Iterable<string> => ({
    *[Symbol.iterator]() {
        for (const match of text.matchAll(pattern)) {
            const token = pick(match);
            if (token) yield token;
        }
    }
});

/**
 * Finds urls: scheme (`http`, `https`, `ftp`) or `www.` prefixed tokens, and bare `host.tld/path`
 * tokens for common top-level domains.
 *
 * @example
 * ```typescript
 * [...extractUrls('See https://example.org/a, and (www.test.com/x).')];
 * // ['https://example.org/a', 'www.test.com/x']
 * ```
 */
export const extractUrls = (text: string): Iterable<string> => scan(text, URL_PATTERN, (match) => trimUrlToken(match[0]));

/**
 * Finds DOIs written as `doi:<id>` (case-insensitive, optionally followed by one whitespace).
 * Yields the identifier without the prefix.
 */
export const extractDois = (text: string): Iterable<string> => scan(text, DOI_PATTERN, (match) => match[1] ?? '');

/**
 * Finds arXiv identifiers written as `arxiv:<id>` or `arxiv.org/abs/<id>`.
 * Yields the identifier only.
 */
export const extractArxivIds = (text: string): Iterable<string> => scan(text, ARXIV_PATTERN, (match) => match[1] ?? '');

/**
 * Tells whether a document location is a remote url rather than a local path:
 * the location has to start with a url token.
 */
export const isUrl = (uri: string): boolean => {
    const location = uri.trim();
    const [first] = extractUrls(location);
    return first !== undefined && location.startsWith(first);
};
