/**
 * Multi-valued HTTP header map with case-insensitive names.
 * Values keep their insertion order.
 */
export class HttpHeaders {
  static readonly AUTHORIZATION = 'Authorization';
  static readonly WWW_AUTHENTICATE = 'WWW-Authenticate';

  private values = new Map<string, { name: string; values: string[] }>();

  constructor(init?: Record<string, string | string[] | undefined>) {
    if (init) {
      for (const [name, value] of Object.entries(init)) {
        if (value === undefined) {
          continue;
        }
        for (const v of Array.isArray(value) ? value : [value]) {
          this.add(name, v);
        }
      }
    }
  }

  /**
   * All values of a header, empty when it is absent.
   */
  getAll(name: string): string[] {
    return [...(this.values.get(name.toLowerCase())?.values ?? [])];
  }

  getFirst(name: string): string | undefined {
    return this.values.get(name.toLowerCase())?.values[0];
  }

  has(name: string): boolean {
    return this.values.has(name.toLowerCase());
  }

  add(name: string, value: string): this {
    const key = name.toLowerCase();
    const entry = this.values.get(key);
    if (entry) {
      entry.values.push(value);
    } else {
      this.values.set(key, { name, values: [value] });
    }
    return this;
  }

  set(name: string, value: string): this {
    this.values.set(name.toLowerCase(), { name, values: [value] });
    return this;
  }

  /**
   * Header names as first added, with their values.
   */
  entries(): [string, string[]][] {
    return Array.from(this.values.values(), entry => [entry.name, [...entry.values]]);
  }
}
