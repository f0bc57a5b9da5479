/**
 * Version Catalog
 *
 * Ordered list of consent-form versions, each in force from its effective date.
 * Answers "which version(s) applied on date D" in one of two lookup modes:
 *
 * - interval:    each version covers [effectiveFrom, nextEffectiveFrom)
 * - tied-latest: every version sharing the greatest effectiveFrom <= D applies
 */

import type { CatalogVersion, IsoDate, LookupMode } from "@shared/schema";

export class VersionCatalog {
  private readonly ordered: readonly CatalogVersion[];

  constructor(versions: readonly CatalogVersion[], readonly mode: LookupMode) {
    // Array.prototype.sort is stable, so tied versions keep their input order
    this.ordered = Object.freeze(
      [...versions]
        .sort((a, b) => compareIsoDates(a.effectiveFrom, b.effectiveFrom))
        .map((v) => Object.freeze({ ...v })),
    );
  }

  get size(): number {
    return this.ordered.length;
  }

  versions(): readonly CatalogVersion[] {
    return this.ordered;
  }

  applicableVersions(date: IsoDate | null | undefined): string[] {
    if (!date) return [];
    return this.mode === "interval" ? this.intervalLookup(date) : this.tiedLatestLookup(date);
  }

  private intervalLookup(date: IsoDate): string[] {
    for (let i = 0; i < this.ordered.length; i++) {
      const current = this.ordered[i];
      const next = this.ordered[i + 1];

      if (date < current.effectiveFrom) continue;
      if (next === undefined || date < next.effectiveFrom) {
        return [current.name];
      }
    }
    return [];
  }

  private tiedLatestLookup(date: IsoDate): string[] {
    let latest: IsoDate | null = null;
    for (const v of this.ordered) {
      if (v.effectiveFrom <= date && (latest === null || v.effectiveFrom > latest)) {
        latest = v.effectiveFrom;
      }
    }
    if (latest === null) return [];
    return this.ordered.filter((v) => v.effectiveFrom === latest).map((v) => v.name);
  }
}

export function compareIsoDates(a: IsoDate, b: IsoDate): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
