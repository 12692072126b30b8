import { describe, it, expect } from "vitest";

import {
  computeDashboard,
  computeEntityHistory,
  computeRangeGrowth,
  emergingSeriesName,
  emptyDashboard,
  frontierSeriesName,
  GLOBAL_AVERAGE_SERIES,
  listAvailableYears,
  normalizeQuery,
  type AggregatorOptions,
  type SkillRecordInput,
} from "../../../src/analytics/aggregator.js";
import { ComputationError } from "../../../src/errors.js";
import { createRecord, sampleRecords } from "../../fixtures/skill-records.js";

import type { DashboardData, DashboardQuery } from "../../../src/types/index.js";

function unwrapDashboard(
  records: readonly SkillRecordInput[],
  query: DashboardQuery,
  options?: AggregatorOptions
): DashboardData {
  const result = computeDashboard(records, query, options);
  if (result.isErr()) {
    throw result.error;
  }
  return result.value;
}

describe("analytics/aggregator", () => {
  // ============================================================================
  // Query normalization
  // ============================================================================

  describe("normalizeQuery", () => {
    it("should turn a single year into a one-year range", () => {
      expect(normalizeQuery({ year: 2022 })).toEqual({
        start_year: 2022,
        end_year: 2022,
      });
    });

    it("should pass a range through", () => {
      expect(normalizeQuery({ start_year: 2021, end_year: 2023 })).toEqual({
        start_year: 2021,
        end_year: 2023,
      });
    });
  });

  describe("computeRangeGrowth", () => {
    it("should only cover countries with at least one endpoint", () => {
      const growth = computeRangeGrowth(
        [
          { ...createRecord("AAA", "A", 2021, 20, 10), skill_depth_ratio: 0.5 },
          { ...createRecord("AAA", "A", 2023, 20, 40), skill_depth_ratio: 2 },
          { ...createRecord("BBB", "B", 2022, 20, 10), skill_depth_ratio: 0.5 },
          { ...createRecord("CCC", "C", 2023, 20, 10), skill_depth_ratio: 0.5 },
        ],
        { start_year: 2021, end_year: 2023 }
      );

      expect([...growth]).toEqual([
        ["AAA", 300],
        ["CCC", 0],
      ]);
    });
  });

  // ============================================================================
  // computeDashboard()
  // ============================================================================

  describe("computeDashboard", () => {
    it("should compute every section for a year range", () => {
      const data = unwrapDashboard(sampleRecords, {
        start_year: 2021,
        end_year: 2023,
      });

      expect(data.start_year).toBe(2021);
      expect(data.end_year).toBe(2023);
      expect(data.snapshot_year).toBe(2023);

      expect(data.top_advanced).toEqual([
        { entity_code: "AAA", entity_label: "Alphaland", pct_above_basic: 40 },
        { entity_code: "BBB", entity_label: "Betania", pct_above_basic: 30 },
        { entity_code: "CCC", entity_label: "Gammastan", pct_above_basic: 5 },
        { entity_code: "DDD", entity_label: "Deltavia", pct_above_basic: 0 },
      ]);

      expect(data.digital_divide).toEqual({
        top_tier_avg_growth: 87.5,
        bottom_tier_avg_growth: 87.5,
      });

      expect(data.correlation).toEqual([
        {
          entity_code: "AAA",
          entity_label: "Alphaland",
          pct_basic: 20,
          pct_above_basic: 40,
        },
        {
          entity_code: "BBB",
          entity_label: "Betania",
          pct_basic: 40,
          pct_above_basic: 30,
        },
        {
          entity_code: "CCC",
          entity_label: "Gammastan",
          pct_basic: 50,
          pct_above_basic: 5,
        },
      ]);

      expect(data.depth_leaders).toEqual([
        { entity_code: "AAA", entity_label: "Alphaland", skill_depth_ratio: 2 },
        { entity_code: "BBB", entity_label: "Betania", skill_depth_ratio: 0.75 },
        {
          entity_code: "CCC",
          entity_label: "Gammastan",
          skill_depth_ratio: 0.1,
        },
      ]);
    });

    it("should never rank regions as countries", () => {
      const data = unwrapDashboard(sampleRecords, {
        start_year: 2021,
        end_year: 2023,
      });

      const codes = [
        ...data.top_advanced,
        ...data.correlation,
        ...data.depth_leaders,
      ].map((r) => r.entity_code);
      expect(codes).not.toContain("WLD");
      expect(codes).not.toContain("EUU");
    });

    it("should build country-wide and regional trend series", () => {
      const data = unwrapDashboard(sampleRecords, {
        start_year: 2021,
        end_year: 2023,
      });

      expect(data.regional_trends).toEqual({
        [GLOBAL_AVERAGE_SERIES]: [
          { year: 2021, value: 10 },
          { year: 2022, value: 20 },
          { year: 2023, value: 18.75 },
        ],
        [frontierSeriesName(10)]: [
          { year: 2021, value: 10 },
          { year: 2022, value: 20 },
          { year: 2023, value: 18.75 },
        ],
        [emergingSeriesName(10)]: [
          { year: 2021, value: 15 },
          { year: 2022, value: 20 },
          { year: 2023, value: 25 },
        ],
        World: [
          { year: 2021, value: 15 },
          { year: 2022, value: 18 },
          { year: 2023, value: 21 },
        ],
      });
    });

    it("should name cohort series after their size", () => {
      expect(frontierSeriesName(10)).toBe("Frontier (Top 10)");
      expect(emergingSeriesName(5)).toBe("Emerging (Bottom 5)");
    });

    it("should use the tier size for the digital divide", () => {
      const data = unwrapDashboard(
        sampleRecords,
        { start_year: 2021, end_year: 2023 },
        { tierSize: 2 }
      );

      expect(data.digital_divide).toEqual({
        top_tier_avg_growth: 175,
        bottom_tier_avg_growth: 0,
      });
    });

    it("should treat a single year like a one-year range", () => {
      const single = unwrapDashboard(sampleRecords, { year: 2023 });
      const range = unwrapDashboard(sampleRecords, {
        start_year: 2023,
        end_year: 2023,
      });

      expect(single).toEqual(range);
      expect(single.digital_divide).toEqual({
        top_tier_avg_growth: 0,
        bottom_tier_avg_growth: 0,
      });
      expect(single.regional_trends).toEqual({});
    });

    it("should reselect the frontier and emerging cohorts every year", () => {
      const records = [
        createRecord("AAA", "A", 2021, 10, 50),
        createRecord("BBB", "B", 2021, 10, 40),
        createRecord("CCC", "C", 2021, 10, 10),
        createRecord("DDD", "D", 2021, 10, 0),
        createRecord("AAA", "A", 2022, 10, 10),
        createRecord("BBB", "B", 2022, 10, 45),
        createRecord("CCC", "C", 2022, 10, 60),
        createRecord("DDD", "D", 2022, 10, 0),
      ];

      const data = unwrapDashboard(
        records,
        { start_year: 2021, end_year: 2022 },
        { topN: 2 }
      );

      expect(data.regional_trends).toEqual({
        [GLOBAL_AVERAGE_SERIES]: [
          { year: 2021, value: 25 },
          { year: 2022, value: 28.75 },
        ],
        "Frontier (Top 2)": [
          { year: 2021, value: 45 },
          { year: 2022, value: 52.5 },
        ],
        "Emerging (Bottom 2)": [
          { year: 2021, value: 25 },
          { year: 2022, value: 27.5 },
        ],
      });
      expect(data.top_advanced.map((r) => r.entity_code)).toEqual([
        "CCC",
        "BBB",
      ]);
    });

    it("should fall back to the latest year in range for the snapshot", () => {
      const records = [
        createRecord("AAA", "A", 2022, 20, 10),
        createRecord("AAA", "A", 2023, 20, 30),
      ];

      const data = unwrapDashboard(records, {
        start_year: 2021,
        end_year: 2024,
      });

      expect(data.snapshot_year).toBe(2023);
      expect(data.top_advanced).toEqual([
        { entity_code: "AAA", entity_label: "A", pct_above_basic: 30 },
      ]);
      expect(data.digital_divide).toEqual({
        top_tier_avg_growth: 0,
        bottom_tier_avg_growth: 0,
      });
    });

    it("should pick the snapshot year from country rows", () => {
      const records = [
        createRecord("AAA", "A", 2022, 20, 10),
        createRecord("WLD", "World", 2023, 30, 21),
      ];

      const data = unwrapDashboard(records, {
        start_year: 2021,
        end_year: 2023,
      });

      expect(data.snapshot_year).toBe(2022);
      expect(data.top_advanced).toEqual([
        { entity_code: "AAA", entity_label: "A", pct_above_basic: 10 },
      ]);
    });

    it("should fall back to region years when the range has no countries", () => {
      const data = unwrapDashboard(
        [createRecord("WLD", "World", 2023, 30, 21)],
        { start_year: 2021, end_year: 2023 }
      );

      expect(data.snapshot_year).toBe(2023);
      expect(data.top_advanced).toEqual([]);
    });

    it("should keep country-wide series when a region label matches their name", () => {
      const records = [
        createRecord("AAA", "A", 2021, 20, 10),
        createRecord("AAA", "A", 2022, 20, 20),
        createRecord("WLD", GLOBAL_AVERAGE_SERIES, 2021, 30, 99),
        createRecord("WLD", GLOBAL_AVERAGE_SERIES, 2022, 30, 98),
      ];

      const data = unwrapDashboard(records, {
        start_year: 2021,
        end_year: 2022,
      });

      expect(data.regional_trends[GLOBAL_AVERAGE_SERIES]).toEqual([
        { year: 2021, value: 10 },
        { year: 2022, value: 20 },
      ]);
    });

    it("should return the empty shape when nothing is in range", () => {
      const data = unwrapDashboard(sampleRecords, {
        start_year: 2010,
        end_year: 2012,
      });

      expect(data).toEqual(emptyDashboard({ start_year: 2010, end_year: 2012 }));
      expect(data).toEqual({
        start_year: 2010,
        end_year: 2012,
        snapshot_year: null,
        top_advanced: [],
        digital_divide: { top_tier_avg_growth: 0, bottom_tier_avg_growth: 0 },
        correlation: [],
        depth_leaders: [],
        regional_trends: {},
      });
    });

    it("should return the empty shape for an empty table", () => {
      const data = unwrapDashboard([], { start_year: 2021, end_year: 2023 });

      expect(data.snapshot_year).toBeNull();
      expect(data.regional_trends).toEqual({});
    });

    it("should return the empty shape for an inverted range", () => {
      const data = unwrapDashboard(sampleRecords, {
        start_year: 2023,
        end_year: 2021,
      });

      expect(data.snapshot_year).toBeNull();
      expect(data.top_advanced).toEqual([]);
    });

    it("should coerce unusable percentages to 0", () => {
      const records: SkillRecordInput[] = [
        {
          entity_code: "AAA",
          entity_label: "A",
          year: 2023,
          pct_basic: "25",
          pct_above_basic: "50",
        },
        {
          entity_code: "BBB",
          entity_label: "B",
          year: 2023,
          pct_basic: null,
          pct_above_basic: "n/a",
        },
      ];

      const data = unwrapDashboard(records, { year: 2023 });

      expect(data.top_advanced).toEqual([
        { entity_code: "AAA", entity_label: "A", pct_above_basic: 50 },
        { entity_code: "BBB", entity_label: "B", pct_above_basic: 0 },
      ]);
      expect(data.depth_leaders).toEqual([
        { entity_code: "AAA", entity_label: "A", skill_depth_ratio: 2 },
      ]);
      expect(data.correlation.map((r) => r.entity_code)).toEqual(["AAA"]);
    });

    it("should honor a custom region list", () => {
      const data = unwrapDashboard(
        sampleRecords,
        { year: 2023 },
        { regionCodes: ["AAA"] }
      );

      const codes = data.top_advanced.map((r) => r.entity_code);
      expect(codes).not.toContain("AAA");
      expect(codes).toContain("WLD");
    });

    it("should return a ComputationError instead of throwing", () => {
      const broken: unknown = undefined;
      const result = computeDashboard(
        // Deliberately malformed input
        broken as SkillRecordInput[],
        { year: 2023 }
      );

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error).toBeInstanceOf(ComputationError);
        expect(result.error.message).toMatch(/^Failed to compute dashboard: /);
      }
    });
  });

  // ============================================================================
  // computeEntityHistory()
  // ============================================================================

  describe("computeEntityHistory", () => {
    it("should return the yearly history with growth", () => {
      const result = computeEntityHistory(sampleRecords, "AAA");

      expect(result.isOk()).toBe(true);
      expect(result._unsafeUnwrap()).toEqual({
        entity_code: "AAA",
        entity_label: "Alphaland",
        partition: "country",
        points: [
          {
            year: 2021,
            pct_basic: 20,
            pct_above_basic: 10,
            skill_depth_ratio: 0.5,
            growth_advanced: 0,
          },
          {
            year: 2022,
            pct_basic: 25,
            pct_above_basic: 20,
            skill_depth_ratio: 0.8,
            growth_advanced: 100,
          },
          {
            year: 2023,
            pct_basic: 20,
            pct_above_basic: 40,
            skill_depth_ratio: 2,
            growth_advanced: 100,
          },
        ],
      });
    });

    it("should classify aggregate codes as regions", () => {
      const history = computeEntityHistory(sampleRecords, "WLD")._unsafeUnwrap();

      expect(history.partition).toBe("region");
      expect(history.points.map((p) => p.pct_above_basic)).toEqual([15, 18, 21]);
    });

    it("should return an empty history for an unknown entity", () => {
      expect(computeEntityHistory(sampleRecords, "ZZZ")._unsafeUnwrap()).toEqual({
        entity_code: "ZZZ",
        entity_label: "",
        partition: "country",
        points: [],
      });
    });
  });

  describe("listAvailableYears", () => {
    it("should list distinct years ascending", () => {
      expect(
        listAvailableYears([{ year: 2023 }, { year: 2021 }, { year: 2023 }])
      ).toEqual([2021, 2023]);
      expect(listAvailableYears(sampleRecords)).toEqual([2021, 2022, 2023]);
    });
  });
});
