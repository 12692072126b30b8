/**
 * ETL run: extract (CSV) -> reshape -> missing-value policy -> upsert
 */

import { etlLogger } from "../logger.js";
import { DEFAULT_BATCH_SIZE, upsertSkillRecords } from "./load.js";
import { readRawObservations } from "./source.js";
import { reshapeObservations, toSkillRecords } from "./transform.js";

import type { Database } from "../db/types.js";
import type { SkillRecord } from "../types/index.js";
import type { Kysely } from "kysely";

export interface EtlOptions {
  filePath: string;
  /** Required unless dryRun is set */
  db?: Kysely<Database>;
  dryRun?: boolean;
  batchSize?: number;
}

export interface EtlSummary {
  extracted: number;
  records: SkillRecord[];
  upserted: number;
}

/**
 * Run the full ETL. Source failures throw DataSourceError before anything is
 * written; load failures roll back the whole upsert.
 */
export async function runEtl(options: EtlOptions): Promise<EtlSummary> {
  const { filePath, db, dryRun = false, batchSize = DEFAULT_BATCH_SIZE } =
    options;

  const observations = readRawObservations(filePath);

  const reshaped = reshapeObservations(observations);
  const records = toSkillRecords(reshaped);
  etlLogger.info(
    { observations: observations.length, records: records.length },
    "Transformed observations"
  );

  if (dryRun) {
    etlLogger.info("Dry run: skipping load");
    return { extracted: observations.length, records, upserted: 0 };
  }

  if (db === undefined) {
    throw new Error("runEtl requires a database unless dryRun is set");
  }

  const { upserted } = await upsertSkillRecords(db, records, batchSize);
  etlLogger.info({ upserted }, "ETL process completed");

  return { extracted: observations.length, records, upserted };
}
