import { err, ok } from "neverthrow";
import pino from "pino";
import { describe, it, expect, vi } from "vitest";

import { createDashboardService } from "../../../src/analytics/service.js";
import { DataSourceError } from "../../../src/errors.js";
import { sampleRecords } from "../../fixtures/skill-records.js";

import type { SkillRecordRepository } from "../../../src/analytics/repository.js";

function createRepository(
  result: Awaited<ReturnType<SkillRecordRepository["listAll"]>>
): SkillRecordRepository & { listAll: ReturnType<typeof vi.fn> } {
  return { listAll: vi.fn().mockResolvedValue(result) };
}

describe("analytics/service", () => {
  const logger = pino({ level: "silent" });

  describe("getDashboard", () => {
    it("should aggregate the full table on every call", async () => {
      const repository = createRepository(ok(sampleRecords));
      const service = createDashboardService({ repository, logger });

      const first = await service.getDashboard({ year: 2023 });
      const second = await service.getDashboard({
        start_year: 2021,
        end_year: 2023,
      });

      expect(repository.listAll).toHaveBeenCalledTimes(2);
      expect(first._unsafeUnwrap().start_year).toBe(2023);
      expect(second._unsafeUnwrap().digital_divide).toEqual({
        top_tier_avg_growth: 87.5,
        bottom_tier_avg_growth: 87.5,
      });
    });

    it("should pass the region list to the aggregator", async () => {
      const service = createDashboardService({
        repository: createRepository(ok(sampleRecords)),
        regionCodes: ["AAA"],
        logger,
      });

      const data = (await service.getDashboard({ year: 2023 }))._unsafeUnwrap();

      expect(data.top_advanced.map((r) => r.entity_code)).not.toContain("AAA");
    });

    it("should return and log a storage failure", async () => {
      const failure = new DataSourceError("Failed to load skill records: timeout");
      const errorSpy = vi.spyOn(logger, "error");
      const service = createDashboardService({
        repository: createRepository(err(failure)),
        logger,
      });

      const result = await service.getDashboard({
        start_year: 2021,
        end_year: 2023,
      });

      expect(result.isErr()).toBe(true);
      expect(result._unsafeUnwrapErr()).toBe(failure);
      expect(errorSpy).toHaveBeenCalledWith(
        { err: failure, start_year: 2021, end_year: 2023 },
        "Dashboard computation failed"
      );
    });
  });

  describe("getEntityHistory", () => {
    it("should return the history of one entity", async () => {
      const service = createDashboardService({
        repository: createRepository(ok(sampleRecords)),
        logger,
      });

      const history = (await service.getEntityHistory("BBB"))._unsafeUnwrap();

      expect(history.entity_label).toBe("Betania");
      expect(history.points.map((p) => [p.year, p.growth_advanced])).toEqual([
        [2021, 0],
        [2023, 50],
      ]);
    });

    it("should propagate a storage failure", async () => {
      const failure = new DataSourceError("Failed to load skill records: timeout");
      const service = createDashboardService({
        repository: createRepository(err(failure)),
        logger,
      });

      const result = await service.getEntityHistory("BBB");

      expect(result._unsafeUnwrapErr()).toBe(failure);
    });
  });

  describe("getAvailableYears", () => {
    it("should list the years on record", async () => {
      const service = createDashboardService({
        repository: createRepository(ok(sampleRecords)),
        logger,
      });

      expect((await service.getAvailableYears())._unsafeUnwrap()).toEqual([
        2021, 2022, 2023,
      ]);
    });
  });
});
