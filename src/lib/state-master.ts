import levenshtein from 'js-levenshtein';
import type { CellValue } from './types';

/**
 * Allowed state names read from the validation master. Exposed for lookups;
 * no rule references it yet.
 */
export class StateMaster {
  private readonly names: string[];
  private readonly byKey: Map<string, string>;

  constructor(values: CellValue[]) {
    const names = values
      .map((v) => (v === null ? '' : String(v).trim()))
      .filter((v) => v !== '');
    this.names = Array.from(new Set(names));
    this.byKey = new Map(this.names.map((n) => [n.toLowerCase(), n]));
  }

  get size() {
    return this.names.length;
  }

  values(): string[] {
    return [...this.names];
  }

  has(name: string): boolean {
    return this.byKey.has(name.trim().toLowerCase());
  }

  /** Nearest allowed name within `maxDistance` edits, exact matches first. */
  closest(name: string, maxDistance = 2): string | null {
    const v = name.trim().toLowerCase();
    if (!v) return null;
    const exact = this.byKey.get(v);
    if (exact) return exact;
    let best: { cand: string; dist: number } | null = null;
    for (const cand of this.names) {
      const d = levenshtein(v, cand.toLowerCase());
      if (!best || d < best.dist) best = { cand, dist: d };
    }
    return best && best.dist <= maxDistance ? best.cand : null;
  }
}
