/**
 * Format Registry
 * Extensible string format generation and validation
 */

import type { Rng } from '../util/rng.js';

/**
 * Each generator produces and recognizes values for one string format.
 */
export interface FormatGenerator {
  readonly name: string;

  /** Alternative names resolved to this generator */
  readonly aliases?: readonly string[];

  generate(rng: Rng): string;

  /** Check if a value conforms to this format */
  validate(value: string): boolean;

  /** Example values for documentation and tests */
  getExamples(): readonly string[];
}

/**
 * Registry of format generators keyed by name and alias.
 * Built complete by its factory; there is no deferred initialization.
 */
export class FormatRegistry {
  private readonly formats = new Map<string, FormatGenerator>();

  constructor(generators: Iterable<FormatGenerator> = []) {
    for (const generator of generators) {
      this.register(generator);
    }
  }

  register(generator: FormatGenerator): void {
    this.formats.set(generator.name, generator);
    for (const alias of generator.aliases ?? []) {
      if (!this.formats.has(alias)) {
        this.formats.set(alias, generator);
      }
    }
  }

  unregister(name: string): boolean {
    const generator = this.formats.get(name);
    if (!generator) return false;
    for (const [key, value] of Array.from(this.formats.entries())) {
      if (value === generator) this.formats.delete(key);
    }
    return true;
  }

  /**
   * Exact name or alias first, then a case-insensitive match
   */
  get(format: string): FormatGenerator | undefined {
    const exact = this.formats.get(format);
    if (exact) return exact;

    const lowerFormat = format.toLowerCase();
    for (const [key, generator] of Array.from(this.formats.entries())) {
      if (key.toLowerCase() === lowerFormat) {
        return generator;
      }
    }
    return undefined;
  }

  supports(format: string): boolean {
    return this.get(format) !== undefined;
  }

  /** Primary format names, without aliases. */
  getRegisteredFormats(): string[] {
    const names = new Set<string>();
    for (const generator of Array.from(this.formats.values())) {
      names.add(generator.name);
    }
    return Array.from(names).sort();
  }

  /** Fresh registry with the same generators. */
  clone(): FormatRegistry {
    return new FormatRegistry(new Set(this.formats.values()));
  }
}
