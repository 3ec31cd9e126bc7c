/**
 * Identifier Registry - Collects identifier occurrences across a manifest
 */

export interface DuplicateIdentifier {
  identifier: string;
  count: number;
  locations: string[];
}

export class IdentifierRegistry {
  // Map keeps insertion order, so reports follow document order
  private readonly occurrences = new Map<string, string[]>();

  /**
   * Record one occurrence. Null identifiers are not tracked; the empty string
   * is an ordinary key. Comparison is exact (no trimming or case folding).
   */
  register(identifier: string | null | undefined, location: string): void {
    if (identifier === null || identifier === undefined) {
      return;
    }

    const locations = this.occurrences.get(identifier);
    if (locations) {
      locations.push(location);
    } else {
      this.occurrences.set(identifier, [location]);
    }
  }

  has(identifier: string): boolean {
    return this.occurrences.has(identifier);
  }

  locationsOf(identifier: string): string[] {
    return [...(this.occurrences.get(identifier) ?? [])];
  }

  get size(): number {
    return this.occurrences.size;
  }

  duplicates(): DuplicateIdentifier[] {
    const result: DuplicateIdentifier[] = [];
    for (const [identifier, locations] of this.occurrences) {
      if (locations.length > 1) {
        result.push({ identifier, count: locations.length, locations: [...locations] });
      }
    }
    return result;
  }
}
