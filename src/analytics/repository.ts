/**
 * Skill record repository - the only read the aggregator needs
 */

import { err, ok, type Result } from "neverthrow";

import { DataSourceError, toErrorMessage } from "../errors.js";

import type { Database } from "../db/types.js";
import type { SkillRecord } from "../types/index.js";
import type { Kysely } from "kysely";

export interface SkillRecordRepository {
  /**
   * Every row of the normalized table, ordered by entity and year.
   */
  listAll(): Promise<Result<SkillRecord[], DataSourceError>>;
}

export function createKyselySkillRecordRepository(
  db: Kysely<Database>
): SkillRecordRepository {
  return {
    async listAll() {
      try {
        const rows = await db
          .selectFrom("ict_skills_stats")
          .select([
            "entity_code",
            "entity_label",
            "year",
            "pct_basic",
            "pct_above_basic",
          ])
          .orderBy("entity_code")
          .orderBy("year")
          .execute();
        return ok(rows);
      } catch (error) {
        return err(
          new DataSourceError(
            `Failed to load skill records: ${toErrorMessage(error)}`,
            { cause: error }
          )
        );
      }
    },
  };
}
