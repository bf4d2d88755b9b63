/**
 * Case-insensitive name → value map that remembers the name as last written
 */
export class PropertyDictionary<V = string> {
  private readonly entriesByKey = new Map<string, { name: string; value: V }>();

  constructor(initial: Record<string, V> = {}) {
    for (const [name, value] of Object.entries(initial)) {
      this.set(name, value);
    }
  }

  get(name: string): V | undefined {
    return this.entriesByKey.get(name.toLowerCase())?.value;
  }

  has(name: string): boolean {
    return this.entriesByKey.has(name.toLowerCase());
  }

  set(name: string, value: V): void {
    this.entriesByKey.set(name.toLowerCase(), { name, value });
  }

  get size(): number {
    return this.entriesByKey.size;
  }

  /** Names as written, in insertion order */
  names(): string[] {
    return [...this.entriesByKey.values()].map((entry) => entry.name);
  }

  *entries(): IterableIterator<[string, V]> {
    for (const { name, value } of this.entriesByKey.values()) {
      yield [name, value];
    }
  }

  toObject(): Record<string, V> {
    return Object.fromEntries(this.entries());
  }
}
