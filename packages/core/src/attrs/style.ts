import { stringAttr } from "../format.js";

/**
 * The `style` attribute of any stylable element: a map of CSS property
 * names to values. Pairs serialize in insertion order.
 */
export class Style {
  private readonly values = new Map<string, string>();

  get(key: string): string | undefined {
    return this.values.get(key);
  }

  set(key: string, value: string): this {
    this.values.set(key, value);
    return this;
  }

  unset(key: string): this {
    this.values.delete(key);
    return this;
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  get size(): number {
    return this.values.size;
  }

  entries(): IterableIterator<[string, string]> {
    return this.values.entries();
  }

  attrFragment(): string {
    const pairs: string[] = [];
    for (const [key, value] of this.values) {
      pairs.push(`${key}:${value}`);
    }
    return stringAttr("style", pairs.join(";"));
  }
}
