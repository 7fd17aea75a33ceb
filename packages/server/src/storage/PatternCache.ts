const DEFAULT_MAX_SIZE = 1024;

/**
 * Compiled-pattern cache for adapters that match in JavaScript. Stored
 * patterns are already anchored, so a plain `test` is a full-string match.
 */
export class PatternCache {
  private readonly cache = new Map<string, RegExp>();

  constructor(private readonly maxSize: number = DEFAULT_MAX_SIZE) {}

  get(pattern: string): RegExp {
    let regex = this.cache.get(pattern);
    if (!regex) {
      regex = new RegExp(pattern);
      if (this.cache.size >= this.maxSize) {
        this.cache.clear();
      }
      this.cache.set(pattern, regex);
    }
    return regex;
  }

  test(pattern: string, candidate: string): boolean {
    return this.get(pattern).test(candidate);
  }

  get size(): number {
    return this.cache.size;
  }
}
