/**
 * In-memory byte source with a read position.
 *
 * A document handle owns its stream; the original bytes stay available for saving
 * and re-reading after parsing.
 *
 * @module SeekableByteStream
 */

export type SeekOrigin = 'start' | 'current' | 'end';

export class SeekableByteStream {
    private position = 0;

    constructor(private readonly bytes: Buffer) {}

    /** Total size in bytes */
    public get length(): number {
        return this.bytes.length;
    }

    /** Current read position */
    public tell(): number {
        return this.position;
    }

    /**
     * Moves the read position. The position is clamped to the stream bounds.
     *
     * @returns The new position
     */
    public seek(offset: number, origin: SeekOrigin = 'start'): number {
        const base = origin === 'start' ? 0 : origin === 'current' ? this.position : this.bytes.length;
        this.position = Math.min(Math.max(base + offset, 0), this.bytes.length);
        return this.position;
    }

    /**
     * Reads up to `size` bytes from the current position, or everything that is left.
     * The returned buffer is a copy.
     */
    public read(size?: number): Buffer {
        const end = size === undefined ? this.bytes.length : Math.min(this.position + Math.max(size, 0), this.bytes.length);
        const chunk = Buffer.from(this.bytes.subarray(this.position, end));
        this.position = end;
        return chunk;
    }

    /**
     * Seeks back to the start and reads the whole stream.
     */
    public readAll(): Buffer {
        this.seek(0);
        return this.read();
    }
}
