// src/core/filter/list-filter.ts
import type { AccessionRecord, CsvParseResult } from '../types/index.js';

export type SelectionWeight = 0 | 1;

/**
 * Every accession starts deselected; accessions of an identifier named in the
 * list are selected. An accession shared with a listed identifier is selected
 * even when it also sits under unlisted ones.
 */
export function resolveSelection(
  parsed: CsvParseResult,
  accepted: ReadonlySet<string>
): Map<string, SelectionWeight> {
  const weights = new Map<string, SelectionWeight>();

  for (const accession of parsed.counts.keys()) {
    weights.set(accession, 0);
  }

  for (const [identifier, accessions] of parsed.groups) {
    if (!accepted.has(identifier)) continue;
    for (const accession of accessions) {
      weights.set(accession, 1);
    }
  }

  return weights;
}

export function buildRecords(
  counts: ReadonlyMap<string, number>,
  weights?: ReadonlyMap<string, SelectionWeight>
): AccessionRecord[] {
  return [...counts.keys()].sort().map((accession) => ({
    accession,
    count: counts.get(accession) ?? 0,
    selected: weights ? weights.get(accession) === 1 : true,
  }));
}
