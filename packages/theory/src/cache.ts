/**
 * Append-only memo of name → descriptor.
 *
 * Entries are computed on first lookup and never invalidated. Keys are the
 * exact input strings: "c4" and "C4" are stored separately even though they
 * resolve to the same note.
 */
export class NameCache<T> {
    private readonly entries = new Map<string, T>();

    /**
     * @param compute Pure function from a name to its descriptor
     */
    constructor(private readonly compute: (name: string) => T) {}

    /**
     * Get the cached descriptor, computing and storing it on a miss.
     */
    get(name: string): T {
        const cached = this.entries.get(name);
        if (cached !== undefined) return cached;

        const value = this.compute(name);
        this.entries.set(name, value);
        return value;
    }

    has(name: string): boolean {
        return this.entries.has(name);
    }

    get size(): number {
        return this.entries.size;
    }
}
