/**
 * Derived metrics and entity partitioning for skill records
 */

import type { EntityKind, SkillRecord } from "../types/index.js";

// ============================================================================
// Entity Partition
// ============================================================================

/** Aggregate-region codes published alongside country rows in the source */
export const DEFAULT_REGION_CODES: ReadonlySet<string> = new Set([
  "EMU",
  "EUU",
  "OED",
  "CEB",
  "EAS",
  "LCN",
  "MEA",
  "NAC",
  "SAS",
  "SSF",
  "WLD",
]);

export interface EntityPartition {
  isRegion(entityCode: string): boolean;
  classify(entityCode: string): EntityKind;
}

export function createEntityPartition(
  regionCodes: Iterable<string> = DEFAULT_REGION_CODES
): EntityPartition {
  const regions = new Set(regionCodes);
  return {
    isRegion: (entityCode) => regions.has(entityCode),
    classify: (entityCode) => (regions.has(entityCode) ? "region" : "country"),
  };
}

// ============================================================================
// Numeric Helpers
// ============================================================================

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Finite number or 0. Accepts numeric strings, as returned by some drivers.
 */
export function coercePercentage(value: unknown): number {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : 0;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

// ============================================================================
// Derived Metrics
// ============================================================================

/**
 * above-basic / basic, rounded to 2 decimals. 0 when there is no basic share.
 */
export function skillDepthRatio(pctBasic: number, pctAboveBasic: number): number {
  if (!(pctBasic > 0)) {
    return 0;
  }
  const ratio = round2(pctAboveBasic / pctBasic);
  return Number.isFinite(ratio) ? ratio : 0;
}

/**
 * Percent change from start to end. 0 when either endpoint is missing, the
 * start is 0, or the result is not finite.
 */
export function rangeGrowth(
  start: number | undefined,
  end: number | undefined
): number {
  if (start === undefined || end === undefined || start === 0) {
    return 0;
  }
  const growth = ((end - start) / start) * 100;
  return Number.isFinite(growth) ? growth : 0;
}

/**
 * Year-over-year percent change of pct_above_basic within each entity.
 * Output is grouped by entity (first-seen order) and sorted by year.
 */
export function sequentialGrowth<T extends SkillRecord>(
  records: readonly T[]
): (T & { growth_advanced: number })[] {
  const byEntity = new Map<string, T[]>();
  for (const record of records) {
    const rows = byEntity.get(record.entity_code);
    if (rows === undefined) {
      byEntity.set(record.entity_code, [record]);
    } else {
      rows.push(record);
    }
  }

  const result: (T & { growth_advanced: number })[] = [];
  for (const rows of byEntity.values()) {
    const sorted = [...rows].sort((a, b) => a.year - b.year);
    let previous: T | undefined;
    for (const row of sorted) {
      result.push({
        ...row,
        growth_advanced:
          previous === undefined
            ? 0
            : rangeGrowth(previous.pct_above_basic, row.pct_above_basic),
      });
      previous = row;
    }
  }
  return result;
}

// ============================================================================
// Rankings
// ============================================================================

type NumericKey<T> = {
  [K in keyof T]: T[K] extends number ? K : never;
}[keyof T];

/**
 * Highest `n` rows by `key`; ties keep input order.
 */
export function topBy<T>(rows: readonly T[], key: NumericKey<T>, n: number): T[] {
  return [...rows]
    .sort((a, b) => Number(b[key]) - Number(a[key]))
    .slice(0, Math.max(0, n));
}

/**
 * Lowest `n` rows by `key`; ties keep input order.
 */
export function bottomBy<T>(
  rows: readonly T[],
  key: NumericKey<T>,
  n: number
): T[] {
  return [...rows]
    .sort((a, b) => Number(a[key]) - Number(b[key]))
    .slice(0, Math.max(0, n));
}
