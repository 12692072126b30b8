/**
 * Reshape long-format observations into one row per (entity, year).
 */

import {
  SKILL_CATEGORIES,
  type RawObservation,
  type ReshapedRecord,
  type SkillCategory,
  type SkillRecord,
} from "../types/index.js";

function isSkillCategory(category: string): category is SkillCategory {
  return SKILL_CATEGORIES.some((c) => c === category);
}

/**
 * Numeric coercion for observed values. Sentinels ("_Z", "..", "") are missing.
 */
export function parseObservedValue(value: string): number | null {
  const trimmed = value.trim();
  if (trimmed === "") {
    return null;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

interface PivotGroup {
  record: ReshapedRecord;
  seen: Set<SkillCategory>;
}

/**
 * Filter to BASIC / ABOVE_BASIC and pivot by (entity_code, year).
 *
 * - The first observation for a (group, category) wins, even when missing.
 * - Both percentage fields are always present; `null` when not represented.
 * - Groups keep the order in which they first appear.
 */
export function reshapeObservations(
  observations: readonly RawObservation[]
): ReshapedRecord[] {
  const groups = new Map<string, PivotGroup>();

  for (const obs of observations) {
    if (!isSkillCategory(obs.category)) {
      continue;
    }

    const key = `${obs.entity_code}|${String(obs.period)}`;
    let group = groups.get(key);
    if (group === undefined) {
      group = {
        record: {
          entity_code: obs.entity_code,
          entity_label: obs.entity_label,
          year: obs.period,
          pct_basic: null,
          pct_above_basic: null,
        },
        seen: new Set(),
      };
      groups.set(key, group);
    }

    if (group.seen.has(obs.category)) {
      continue;
    }
    group.seen.add(obs.category);

    const value = parseObservedValue(obs.value);
    if (obs.category === "BASIC") {
      group.record.pct_basic = value;
    } else {
      group.record.pct_above_basic = value;
    }
  }

  return [...groups.values()].map((g) => g.record);
}

/**
 * Apply the storage policy for missing percentages (null -> 0).
 * This is the only place the policy is applied.
 */
export function toSkillRecords(
  records: readonly ReshapedRecord[]
): SkillRecord[] {
  return records.map((r) => ({
    entity_code: r.entity_code,
    entity_label: r.entity_label,
    year: r.year,
    pct_basic: r.pct_basic ?? 0,
    pct_above_basic: r.pct_above_basic ?? 0,
  }));
}
