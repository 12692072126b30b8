/**
 * Dashboard service - loads the full table per request and aggregates it.
 * Nothing is cached between requests.
 */

import { analyticsLogger } from "../logger.js";
import {
  computeDashboard,
  computeEntityHistory,
  listAvailableYears,
  normalizeQuery,
} from "./aggregator.js";

import type { AnalyticsError } from "../errors.js";
import type {
  DashboardData,
  DashboardQuery,
  EntityHistory,
} from "../types/index.js";
import type { SkillRecordRepository } from "./repository.js";
import type { Result } from "neverthrow";
import type { Logger } from "pino";

export interface DashboardServiceDeps {
  repository: SkillRecordRepository;
  regionCodes?: Iterable<string>;
  logger?: Logger;
}

export interface DashboardService {
  getDashboard(
    query: DashboardQuery
  ): Promise<Result<DashboardData, AnalyticsError>>;
  getEntityHistory(
    entityCode: string
  ): Promise<Result<EntityHistory, AnalyticsError>>;
  getAvailableYears(): Promise<Result<number[], AnalyticsError>>;
}

export function createDashboardService(
  deps: DashboardServiceDeps
): DashboardService {
  const { repository, logger = analyticsLogger } = deps;
  const regionCodes =
    deps.regionCodes !== undefined ? [...deps.regionCodes] : undefined;

  return {
    async getDashboard(query) {
      const range = normalizeQuery(query);
      const startedAt = performance.now();

      const result = (await repository.listAll()).andThen((records) =>
        computeDashboard(records, range, { regionCodes })
      );

      if (result.isErr()) {
        logger.error(
          { err: result.error, ...range },
          "Dashboard computation failed"
        );
      } else {
        logger.debug(
          {
            ...range,
            snapshotYear: result.value.snapshot_year,
            durationMs: Math.round(performance.now() - startedAt),
          },
          "Dashboard computed"
        );
      }
      return result;
    },

    async getEntityHistory(entityCode) {
      const result = (await repository.listAll()).andThen((records) =>
        computeEntityHistory(records, entityCode, { regionCodes })
      );
      if (result.isErr()) {
        logger.error(
          { err: result.error, entityCode },
          "Entity history failed"
        );
      }
      return result;
    },

    async getAvailableYears() {
      const result = (await repository.listAll()).map(listAvailableYears);
      if (result.isErr()) {
        logger.error({ err: result.error }, "Listing years failed");
      }
      return result;
    },
  };
}
