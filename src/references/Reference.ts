/**
 * Reference value type and the set that stores references by token.
 *
 * @module Reference
 */

/**
 * A hyperlink or identifier found in a document.
 *
 * Identity is the token alone: two references to the same token found on different pages
 * are the same reference. `originPage` is kept for diagnostics only.
 */
export class Reference {
    /** The raw token, case-sensitive and untrimmed */
    public readonly token: string;
    /** One-based number of the page the reference was found on, 0 when there is no page context */
    public readonly originPage: number;
    /** All references are reported as urls */
    public readonly refType = 'url';

    constructor(token: string, originPage = 0) {
        if (!Number.isInteger(originPage) || originPage < 0) {
            throw new RangeError(`originPage must be a non-negative integer, got ${originPage}`);
        }
        this.token = token;
        this.originPage = originPage;
    }

    /** Key under which the reference is stored in a ReferenceSet */
    public get hashKey(): string {
        return this.token;
    }

    /**
     * Compares tokens. Comparing with anything but a Reference is a programming error.
     *
     * @throws {TypeError} If `other` is not a Reference
     */
    public equals(other: unknown): boolean {
        assertReference(other);
        return this.token === other.token;
    }

    /**
     * Orders references by token, in code unit order.
     *
     * @throws {TypeError} If `other` is not a Reference
     */
    public compareTo(other: unknown): number {
        assertReference(other);
        if (this.token < other.token) return -1;
        if (this.token > other.token) return 1;
        return 0;
    }

    public toString(): string {
        return `<${this.refType}: ${this.token}>`;
    }

    public toJSON(): string {
        return this.token;
    }
}

function assertReference(value: unknown): asserts value is Reference {
    if (!(value instanceof Reference)) {
        throw new TypeError(`Cannot compare a Reference with ${value === null ? 'null' : typeof value}`);
    }
}

/**
 * A set of references keyed by token. Adding a token that is already present keeps the first reference.
 */
export class ReferenceSet implements Iterable<Reference> {
    private readonly items = new Map<string, Reference>();

    constructor(references: Iterable<Reference> = []) {
        for (const reference of references) {
            this.add(reference);
        }
    }

    /**
     * Adds a reference unless its token is already present.
     *
     * @returns true if the reference was added
     */
    public add(reference: Reference): boolean {
        if (this.items.has(reference.hashKey)) return false;
        this.items.set(reference.hashKey, reference);
        return true;
    }

    public has(reference: Reference): boolean {
        return this.items.has(reference.hashKey);
    }

    public get size(): number {
        return this.items.size;
    }

    public [Symbol.iterator](): Iterator<Reference> {
        return this.items.values();
    }

    /** A new set holding the references of both sets. Neither set is modified. */
    public union(other: ReferenceSet): ReferenceSet {
        const merged = new ReferenceSet(this);
        for (const reference of other) {
            merged.add(reference);
        }
        return merged;
    }

    /** The references ordered by token. */
    public sorted(): Reference[] {
        return [...this.items.values()].sort((a, b) => a.compareTo(b));
    }

    /** The tokens, in insertion order or sorted. */
    public tokens(sort = false): string[] {
        return (sort ? this.sorted() : [...this.items.values()]).map((reference) => reference.token);
    }
}
