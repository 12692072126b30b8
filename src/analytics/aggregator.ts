/**
 * Dashboard aggregator
 *
 * Pure computation over the full normalized table: snapshot rankings,
 * range growth, the digital divide and trend series for a year range.
 * Every failure is returned as a ComputationError value.
 */

import { err, ok, type Result } from "neverthrow";

import { ComputationError, toErrorMessage } from "../errors.js";
import {
  bottomBy,
  coercePercentage,
  createEntityPartition,
  mean,
  rangeGrowth,
  sequentialGrowth,
  skillDepthRatio,
  topBy,
  type EntityPartition,
} from "./metrics.js";

import type {
  CorrelationPoint,
  DashboardData,
  DashboardQuery,
  DepthLeader,
  DerivedSkillRecord,
  DigitalDivide,
  EntityHistory,
  RankedEntity,
  SkillRecord,
  TrendPoint,
  YearRangeQuery,
} from "../types/index.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Row as read from storage. Percentages are re-validated before use.
 */
export type SkillRecordInput = Omit<
  SkillRecord,
  "pct_basic" | "pct_above_basic"
> & {
  pct_basic: unknown;
  pct_above_basic: unknown;
};

export interface AggregatorOptions {
  regionCodes?: Iterable<string>;
  /** Size of rankings and of the frontier/emerging cohorts */
  topN?: number;
  /** Size of each digital-divide tier */
  tierSize?: number;
}

const DEFAULT_TOP_N = 10;
const DEFAULT_TIER_SIZE = 5;

export const GLOBAL_AVERAGE_SERIES = "Global Average";

export function frontierSeriesName(topN: number): string {
  return `Frontier (Top ${String(topN)})`;
}

export function emergingSeriesName(topN: number): string {
  return `Emerging (Bottom ${String(topN)})`;
}

// A single point cannot be drawn as a trend line
const MIN_SERIES_POINTS = 2;

// ============================================================================
// Query Normalization
// ============================================================================

export function normalizeQuery(query: DashboardQuery): YearRangeQuery {
  if ("year" in query) {
    return { start_year: query.year, end_year: query.year };
  }
  return { start_year: query.start_year, end_year: query.end_year };
}

export function emptyDashboard(range: YearRangeQuery): DashboardData {
  return {
    start_year: range.start_year,
    end_year: range.end_year,
    snapshot_year: null,
    top_advanced: [],
    digital_divide: { top_tier_avg_growth: 0, bottom_tier_avg_growth: 0 },
    correlation: [],
    depth_leaders: [],
    regional_trends: {},
  };
}

// ============================================================================
// Pipeline Stages
// ============================================================================

function deriveRecords(records: readonly SkillRecordInput[]): DerivedSkillRecord[] {
  return records.map((r) => {
    const pctBasic = coercePercentage(r.pct_basic);
    const pctAboveBasic = coercePercentage(r.pct_above_basic);
    return {
      entity_code: r.entity_code,
      entity_label: r.entity_label,
      year: r.year,
      pct_basic: pctBasic,
      pct_above_basic: pctAboveBasic,
      skill_depth_ratio: skillDepthRatio(pctBasic, pctAboveBasic),
    };
  });
}

function selectSnapshotYear(
  rows: readonly DerivedSkillRecord[],
  endYear: number
): number {
  let maxYear = Number.NEGATIVE_INFINITY;
  for (const row of rows) {
    if (row.year === endYear) {
      return endYear;
    }
    maxYear = Math.max(maxYear, row.year);
  }
  return maxYear;
}

function firstValueByEntity(
  rows: readonly DerivedSkillRecord[],
  year: number
): Map<string, number> {
  const values = new Map<string, number>();
  for (const row of rows) {
    if (row.year === year && !values.has(row.entity_code)) {
      values.set(row.entity_code, row.pct_above_basic);
    }
  }
  return values;
}

/**
 * Growth of pct_above_basic between the requested endpoints, for every
 * country with at least one endpoint on record.
 */
export function computeRangeGrowth(
  countries: readonly DerivedSkillRecord[],
  range: YearRangeQuery
): Map<string, number> {
  const startValues = firstValueByEntity(countries, range.start_year);
  const endValues = firstValueByEntity(countries, range.end_year);

  const growth = new Map<string, number>();
  for (const code of new Set([...startValues.keys(), ...endValues.keys()])) {
    growth.set(code, rangeGrowth(startValues.get(code), endValues.get(code)));
  }
  return growth;
}

function tierAverageGrowth(
  tier: readonly DerivedSkillRecord[],
  growth: ReadonlyMap<string, number>
): number {
  const values: number[] = [];
  for (const row of tier) {
    const value = growth.get(row.entity_code);
    if (value !== undefined) {
      values.push(value);
    }
  }
  return mean(values);
}

function groupByYear(
  rows: readonly DerivedSkillRecord[]
): Map<number, DerivedSkillRecord[]> {
  const groups = new Map<number, DerivedSkillRecord[]>();
  for (const row of [...rows].sort((a, b) => a.year - b.year)) {
    const group = groups.get(row.year);
    if (group === undefined) {
      groups.set(row.year, [row]);
    } else {
      group.push(row);
    }
  }
  return groups;
}

/**
 * Country-wide series. Frontier and emerging cohorts are picked again
 * for every year.
 */
function buildCountryTrends(
  countries: readonly DerivedSkillRecord[],
  topN: number
): Record<string, TrendPoint[]> {
  const global: TrendPoint[] = [];
  const frontier: TrendPoint[] = [];
  const emerging: TrendPoint[] = [];

  for (const [year, rows] of groupByYear(countries)) {
    global.push({ year, value: mean(rows.map((r) => r.pct_above_basic)) });

    const leaders = topBy(rows, "pct_above_basic", topN);
    frontier.push({ year, value: mean(leaders.map((r) => r.pct_above_basic)) });

    const nonZero = rows.filter((r) => r.pct_above_basic !== 0);
    if (nonZero.length > 0) {
      const laggards = bottomBy(nonZero, "pct_above_basic", topN);
      emerging.push({
        year,
        value: mean(laggards.map((r) => r.pct_above_basic)),
      });
    }
  }

  return {
    [GLOBAL_AVERAGE_SERIES]: global,
    [frontierSeriesName(topN)]: frontier,
    [emergingSeriesName(topN)]: emerging,
  };
}

/**
 * One series per region label, averaging duplicates within a year.
 */
function buildRegionTrends(
  regions: readonly DerivedSkillRecord[]
): Record<string, TrendPoint[]> {
  const byLabel = new Map<string, DerivedSkillRecord[]>();
  for (const row of regions) {
    const rows = byLabel.get(row.entity_label);
    if (rows === undefined) {
      byLabel.set(row.entity_label, [row]);
    } else {
      rows.push(row);
    }
  }

  const series: Record<string, TrendPoint[]> = {};
  for (const [label, rows] of byLabel) {
    series[label] = [...groupByYear(rows)].map(([year, yearRows]) => ({
      year,
      value: mean(yearRows.map((r) => r.pct_above_basic)),
    }));
  }
  return series;
}

function dropShortSeries(
  series: Record<string, TrendPoint[]>
): Record<string, TrendPoint[]> {
  return Object.fromEntries(
    Object.entries(series).filter(
      ([, points]) => points.length >= MIN_SERIES_POINTS
    )
  );
}

// ============================================================================
// Dashboard
// ============================================================================

function buildDashboard(
  records: readonly SkillRecordInput[],
  range: YearRangeQuery,
  partition: EntityPartition,
  topN: number,
  tierSize: number
): DashboardData {
  const derived = deriveRecords(records);

  const inRange = derived.filter(
    (r) => r.year >= range.start_year && r.year <= range.end_year
  );
  if (inRange.length === 0) {
    return emptyDashboard(range);
  }

  const countries = inRange.filter((r) => !partition.isRegion(r.entity_code));
  const regions = inRange.filter((r) => partition.isRegion(r.entity_code));

  // Snapshot sections are country-only, so the year is picked from country rows
  const snapshotYear = selectSnapshotYear(
    countries.length > 0 ? countries : inRange,
    range.end_year
  );

  const growth = computeRangeGrowth(countries, range);
  const snapshot = countries.filter((r) => r.year === snapshotYear);

  const topAdvanced: RankedEntity[] = topBy(
    snapshot,
    "pct_above_basic",
    topN
  ).map((r) => ({
    entity_code: r.entity_code,
    entity_label: r.entity_label,
    pct_above_basic: r.pct_above_basic,
  }));

  const digitalDivide: DigitalDivide = {
    top_tier_avg_growth: tierAverageGrowth(
      topBy(snapshot, "pct_above_basic", tierSize),
      growth
    ),
    bottom_tier_avg_growth: tierAverageGrowth(
      bottomBy(snapshot, "pct_above_basic", tierSize),
      growth
    ),
  };

  const correlation: CorrelationPoint[] = snapshot
    .filter((r) => r.pct_basic !== 0 || r.pct_above_basic !== 0)
    .map((r) => ({
      entity_code: r.entity_code,
      entity_label: r.entity_label,
      pct_basic: r.pct_basic,
      pct_above_basic: r.pct_above_basic,
    }));

  const depthLeaders: DepthLeader[] = topBy(
    snapshot.filter((r) => r.skill_depth_ratio !== 0),
    "skill_depth_ratio",
    topN
  ).map((r) => ({
    entity_code: r.entity_code,
    entity_label: r.entity_label,
    skill_depth_ratio: r.skill_depth_ratio,
  }));

  // Country-wide series keep their names when a region label collides
  const regionalTrends = dropShortSeries({
    ...buildRegionTrends(regions),
    ...buildCountryTrends(countries, topN),
  });

  return {
    start_year: range.start_year,
    end_year: range.end_year,
    snapshot_year: snapshotYear,
    top_advanced: topAdvanced,
    digital_divide: digitalDivide,
    correlation,
    depth_leaders: depthLeaders,
    regional_trends: regionalTrends,
  };
}

/**
 * Compute every dashboard section for a year or year range.
 *
 * Growth uses the requested endpoints; rankings, correlation and depth leaders
 * use the snapshot year (the end year when it has country data, otherwise the
 * latest country year in range). The result always has the same shape, even with no data.
 */
export function computeDashboard(
  records: readonly SkillRecordInput[],
  query: DashboardQuery,
  options: AggregatorOptions = {}
): Result<DashboardData, ComputationError> {
  try {
    const range = normalizeQuery(query);
    const partition = createEntityPartition(options.regionCodes);
    return ok(
      buildDashboard(
        records,
        range,
        partition,
        options.topN ?? DEFAULT_TOP_N,
        options.tierSize ?? DEFAULT_TIER_SIZE
      )
    );
  } catch (error) {
    return err(
      new ComputationError(
        `Failed to compute dashboard: ${toErrorMessage(error)}`,
        { cause: error }
      )
    );
  }
}

// ============================================================================
// Entity History
// ============================================================================

/**
 * Full yearly history of one entity with year-over-year growth.
 */
export function computeEntityHistory(
  records: readonly SkillRecordInput[],
  entityCode: string,
  options: Pick<AggregatorOptions, "regionCodes"> = {}
): Result<EntityHistory, ComputationError> {
  try {
    const partition = createEntityPartition(options.regionCodes);
    const rows = sequentialGrowth(
      deriveRecords(records.filter((r) => r.entity_code === entityCode))
    );

    return ok({
      entity_code: entityCode,
      entity_label: rows[0]?.entity_label ?? "",
      partition: partition.classify(entityCode),
      points: rows.map((r) => ({
        year: r.year,
        pct_basic: r.pct_basic,
        pct_above_basic: r.pct_above_basic,
        skill_depth_ratio: r.skill_depth_ratio,
        growth_advanced: r.growth_advanced,
      })),
    });
  } catch (error) {
    return err(
      new ComputationError(
        `Failed to compute history for ${entityCode}: ${toErrorMessage(error)}`,
        { cause: error }
      )
    );
  }
}

/**
 * Distinct years on record, ascending.
 */
export function listAvailableYears(
  records: readonly Pick<SkillRecord, "year">[]
): number[] {
  return [...new Set(records.map((r) => r.year))].sort((a, b) => a - b);
}
