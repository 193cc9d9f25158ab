import { describe, expect, it } from 'vitest';
import { MetadataRecord } from '../../types';
import { normalizeMetadata } from '../normalizeMetadata';

describe('normalizeMetadata', () => {
    const sample = (): MetadataRecord => ({
        Title: ' Paper ',
        Subject: '',
        Keywords: '   ',
        dc: { subject: ['', ' pdf '], rights: {} },
        Pages: 3,
        Trapped: false,
        Empty: []
    });

    it('trims strings and removes empty values at any depth', () => {
        expect(normalizeMetadata(sample())).toEqual({
            Title: 'Paper',
            dc: { subject: ['pdf'] },
            Pages: 3,
            Trapped: false
        });
    });

    it('drops falsy non-string array items and empty nested arrays', () => {
        expect(normalizeMetadata({ list: [0, 1, null, 'a', ''], nested: [[' ', 'x'], []] })).toEqual({
            list: [1, 'a'],
            nested: [['x']]
        });
    });

    it('is idempotent', () => {
        const once = normalizeMetadata(sample());
        expect(normalizeMetadata(once)).toEqual(once);
    });

    it('does not modify its input', () => {
        const input = sample();
        normalizeMetadata(input);
        expect(input).toEqual(sample());
    });

    it('keeps a __proto__ key as an own entry', () => {
        const input: MetadataRecord = JSON.parse('{"__proto__": " polluted ", "Title": "Paper"}');
        const result = normalizeMetadata(input);
        expect(Object.keys(result)).toEqual(['__proto__', 'Title']);
        expect(Object.getOwnPropertyDescriptor(result, '__proto__')?.value).toBe('polluted');
        expect(Object.getPrototypeOf(result)).toBe(Object.prototype);
    });

    it('returns an empty record when everything is empty', () => {
        expect(normalizeMetadata({ a: '', b: { c: [' '] } })).toEqual({});
    });
});
