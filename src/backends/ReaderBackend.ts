/**
 * Base class of all reader backends.
 *
 * A backend extracts text, metadata and references from one document when it is created and answers
 * queries afterwards. References are kept in two sets that are never merged in storage:
 * `annotated` (from link annotations) and `scraped` (from pattern matching the text).
 * Query results are computed at most once per `sort` value and cached for the lifetime of the backend.
 *
 * @module ReaderBackend
 */

import { Reference, ReferenceSet } from '../references/Reference';
import { BackendKind, MetadataRecord, ReferenceDict } from '../types';

export abstract class ReaderBackend {
    public abstract readonly kind: BackendKind;

    protected readonly annotated: ReferenceSet;
    protected readonly scraped: ReferenceSet;

    private readonly dictCache = new Map<boolean, ReferenceDict>();
    private readonly listCache = new Map<boolean, readonly Reference[]>();

    protected constructor(
        protected readonly text: string,
        protected readonly metadata: MetadataRecord,
        annotated: Iterable<Reference>,
        scraped: Iterable<Reference>
    ) {
        this.annotated = new ReferenceSet(annotated);
        this.scraped = new ReferenceSet(scraped);
    }

    public getText(): string {
        return this.text;
    }

    public getMetadata(): MetadataRecord {
        return this.metadata;
    }

    /**
     * Tokens grouped by source. A source without references is left out.
     *
     * @param sort - Order each list by token
     */
    public getReferencesAsDict(sort = false): ReferenceDict {
        const cached = this.dictCache.get(sort);
        if (cached) return cached;

        const dict: ReferenceDict = {};
        if (this.annotated.size > 0) dict.annot = Object.freeze(this.annotated.tokens(sort));
        if (this.scraped.size > 0) dict.scrape = Object.freeze(this.scraped.tokens(sort));
        const result = Object.freeze(dict);
        this.dictCache.set(sort, result);
        return result;
    }

    /**
     * All references, deduplicated by token across both sources.
     *
     * @param sort - Order by token
     */
    public getReferences(sort = false): readonly Reference[] {
        const cached = this.listCache.get(sort);
        if (cached) return cached;

        const union = this.annotated.union(this.scraped);
        const result = Object.freeze(sort ? union.sorted() : [...union]);
        this.listCache.set(sort, result);
        return result;
    }

    public getReferencesCount(): number {
        return this.getReferences().length;
    }
}
