import type { ColumnType, Insertable } from "kysely";

// ============================================================================
// Table Types
// ============================================================================

/**
 * ict_skills_stats - one row per (entity_code, year).
 * Missing percentages are stored as 0 (coerced once, at ingestion).
 */
export interface IctSkillsStatsTable {
  entity_code: string;
  entity_label: string;
  year: number;
  pct_basic: number;
  pct_above_basic: number;
  updated_at: ColumnType<Date, Date | string | undefined, Date | string>;
}

// ============================================================================
// Database Interface
// ============================================================================

export interface Database {
  ict_skills_stats: IctSkillsStatsTable;
}

// ============================================================================
// Row Types
// ============================================================================

export type NewIctSkillsStat = Insertable<IctSkillsStatsTable>;
