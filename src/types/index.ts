/**
 * Domain types for the digital-skills pipeline
 */

// ============================================================================
// Source Types
// ============================================================================

export const SKILL_CATEGORIES = ["BASIC", "ABOVE_BASIC"] as const;

export type SkillCategory = (typeof SKILL_CATEGORIES)[number];

/**
 * One long-format observation as it appears in the source CSV.
 * `value` is kept raw: numbers and sentinels such as "_Z" alike.
 */
export interface RawObservation {
  entity_code: string;
  entity_label: string;
  period: number;
  category: string;
  value: string;
}

// ============================================================================
// Normalized Records
// ============================================================================

/**
 * Output of the reshape step, before the missing-value policy is applied.
 */
export interface ReshapedRecord {
  entity_code: string;
  entity_label: string;
  year: number;
  pct_basic: number | null;
  pct_above_basic: number | null;
}

/**
 * Persisted unit of truth, unique per (entity_code, year).
 */
export interface SkillRecord {
  entity_code: string;
  entity_label: string;
  year: number;
  pct_basic: number;
  pct_above_basic: number;
}

export interface DerivedSkillRecord extends SkillRecord {
  skill_depth_ratio: number;
}

export type EntityKind = "region" | "country";

// ============================================================================
// Query Types
// ============================================================================

export interface YearRangeQuery {
  start_year: number;
  end_year: number;
}

// Legacy single-year form, treated as the range [year, year]
export interface SingleYearQuery {
  year: number;
}

export type DashboardQuery = YearRangeQuery | SingleYearQuery;

// ============================================================================
// Aggregate Result Types
// ============================================================================

export interface RankedEntity {
  entity_code: string;
  entity_label: string;
  pct_above_basic: number;
}

export interface DigitalDivide {
  top_tier_avg_growth: number;
  bottom_tier_avg_growth: number;
}

export interface CorrelationPoint {
  entity_code: string;
  entity_label: string;
  pct_basic: number;
  pct_above_basic: number;
}

export interface DepthLeader {
  entity_code: string;
  entity_label: string;
  skill_depth_ratio: number;
}

export interface TrendPoint {
  year: number;
  value: number;
}

export interface DashboardData {
  start_year: number;
  end_year: number;
  snapshot_year: number | null;
  top_advanced: RankedEntity[];
  digital_divide: DigitalDivide;
  correlation: CorrelationPoint[];
  depth_leaders: DepthLeader[];
  regional_trends: Record<string, TrendPoint[]>;
}

export interface EntityHistoryPoint {
  year: number;
  pct_basic: number;
  pct_above_basic: number;
  skill_depth_ratio: number;
  growth_advanced: number;
}

export interface EntityHistory {
  entity_code: string;
  entity_label: string;
  partition: EntityKind;
  points: EntityHistoryPoint[];
}
