/**
 * Load step - idempotent upsert of normalized records
 */

import { sql, type Kysely } from "kysely";

import { etlLogger } from "../logger.js";

import type { Database, NewIctSkillsStat } from "../db/types.js";
import type { SkillRecord } from "../types/index.js";

export const DEFAULT_BATCH_SIZE = 500;

export interface UpsertSummary {
  upserted: number;
}

/**
 * Upsert records keyed on (entity_code, year); on conflict every non-key
 * column is overwritten. All batches share one transaction, so a failure
 * leaves the table untouched.
 */
export async function upsertSkillRecords(
  db: Kysely<Database>,
  records: readonly SkillRecord[],
  batchSize = DEFAULT_BATCH_SIZE
): Promise<UpsertSummary> {
  if (records.length === 0) {
    return { upserted: 0 };
  }

  const size = Number.isFinite(batchSize)
    ? Math.max(1, Math.floor(batchSize))
    : DEFAULT_BATCH_SIZE;

  const upserted = await db.transaction().execute(async (trx) => {
    let total = 0;

    for (let i = 0; i < records.length; i += size) {
      const batch = records.slice(i, i + size);

      await trx
        .insertInto("ict_skills_stats")
        .values(
          batch.map(
            (r): NewIctSkillsStat => ({
              entity_code: r.entity_code,
              entity_label: r.entity_label,
              year: r.year,
              pct_basic: r.pct_basic,
              pct_above_basic: r.pct_above_basic,
            })
          )
        )
        .onConflict((oc) =>
          oc.columns(["entity_code", "year"]).doUpdateSet((eb) => ({
            entity_label: eb.ref("excluded.entity_label"),
            pct_basic: eb.ref("excluded.pct_basic"),
            pct_above_basic: eb.ref("excluded.pct_above_basic"),
            updated_at: sql<Date>`NOW()`,
          }))
        )
        .execute();

      total += batch.length;
      etlLogger.debug(
        { batch: i / size + 1, rows: batch.length },
        "Upserted batch"
      );
    }

    return total;
  });

  return { upserted };
}
