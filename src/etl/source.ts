/**
 * CSV source for the ITU digital-skills dataset (long format)
 */

import { readFileSync } from "node:fs";

import { parse } from "csv-parse/sync";

import { DataSourceError, toErrorMessage } from "../errors.js";
import { etlLogger } from "../logger.js";

import type { RawObservation } from "../types/index.js";

// ============================================================================
// Column Mapping
// ============================================================================

export const SOURCE_COLUMNS = {
  entityCode: "REF_AREA",
  entityLabel: "REF_AREA_LABEL",
  period: "TIME_PERIOD",
  category: "COMP_BREAKDOWN_1",
  value: "OBS_VALUE",
} as const;

type SourceField = keyof typeof SOURCE_COLUMNS;

const YEAR_PATTERN = /^\d{4}$/;

// ============================================================================
// Parsing
// ============================================================================

function parseCsv(content: string): string[][] {
  try {
    const rows: string[][] = parse(content, {
      columns: false,
      skip_empty_lines: true,
      trim: true,
      bom: true,
    });
    return rows;
  } catch (error) {
    throw new DataSourceError(`Invalid CSV: ${toErrorMessage(error)}`, {
      cause: error,
    });
  }
}

function resolveColumnIndexes(header: string[]): Record<SourceField, number> {
  const missing: string[] = [];
  const indexOf = (field: SourceField): number => {
    const index = header.indexOf(SOURCE_COLUMNS[field]);
    if (index === -1) {
      missing.push(SOURCE_COLUMNS[field]);
    }
    return index;
  };

  const indexes = {
    entityCode: indexOf("entityCode"),
    entityLabel: indexOf("entityLabel"),
    period: indexOf("period"),
    category: indexOf("category"),
    value: indexOf("value"),
  };

  if (missing.length > 0) {
    throw new DataSourceError(
      `Source is missing required columns: ${missing.join(", ")}`
    );
  }
  return indexes;
}

/**
 * Parse CSV text into raw observations. Rows whose period is not a
 * four-digit year are skipped.
 */
export function parseRawObservations(content: string): RawObservation[] {
  const [header, ...rows] = parseCsv(content);
  if (header === undefined) {
    throw new DataSourceError("Source is empty (no header row)");
  }

  const columns = resolveColumnIndexes(header);
  const observations: RawObservation[] = [];
  let skipped = 0;

  for (const row of rows) {
    const period = row[columns.period] ?? "";
    if (!YEAR_PATTERN.test(period)) {
      skipped++;
      continue;
    }

    observations.push({
      entity_code: row[columns.entityCode] ?? "",
      entity_label: row[columns.entityLabel] ?? "",
      period: Number.parseInt(period, 10),
      category: row[columns.category] ?? "",
      value: row[columns.value] ?? "",
    });
  }

  if (skipped > 0) {
    etlLogger.warn({ skipped }, "Skipped rows without a valid year");
  }

  return observations;
}

/**
 * Read raw observations from a CSV file.
 * Any read or parse failure is a DataSourceError; nothing is returned partially.
 */
export function readRawObservations(filePath: string): RawObservation[] {
  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new DataSourceError(`Cannot read source file: ${filePath}`, {
      cause: error,
    });
  }

  const observations = parseRawObservations(content);
  etlLogger.info(
    { filePath, rows: observations.length },
    "Extracted raw observations"
  );
  return observations;
}
