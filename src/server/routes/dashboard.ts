/**
 * Dashboard Routes - /api/dashboard-data, /api/years, /api/entities
 */

import { Type, type Static } from "@sinclair/typebox";

import { ValidationError } from "../plugins/error-handler.js";
import {
  ApiErrorSchema,
  EntityCodeParamSchema,
  type EntityCodeParam,
} from "../schemas/common.js";
import {
  DashboardResponseSchema,
  EntityHistoryResponseSchema,
  YearsResponseSchema,
} from "../schemas/responses.js";

import type { DashboardService } from "../../analytics/service.js";
import type { QueryErrorPayload } from "../../types/api.js";
import type { DashboardQuery } from "../../types/index.js";
import type { FastifyInstance } from "fastify";

// ============================================================================
// Schemas
// ============================================================================

export const DEFAULT_START_YEAR = 2021;
export const DEFAULT_END_YEAR = 2023;

const DashboardQuerySchema = Type.Object({
  start_year: Type.Optional(
    Type.Integer({
      minimum: 1900,
      maximum: 2100,
      description: `Start year of analysis (default ${String(DEFAULT_START_YEAR)})`,
    })
  ),
  end_year: Type.Optional(
    Type.Integer({
      minimum: 1900,
      maximum: 2100,
      description: `End year of analysis (default ${String(DEFAULT_END_YEAR)})`,
    })
  ),
  year: Type.Optional(
    Type.Integer({
      minimum: 1900,
      maximum: 2100,
      description: "Single year; takes precedence over start_year/end_year",
    })
  ),
});

type DashboardQuerystring = Static<typeof DashboardQuerySchema>;

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Map query parameters to the aggregator query; `year` is the legacy form.
 */
export function resolveDashboardQuery(
  params: DashboardQuerystring
): DashboardQuery {
  if (params.year !== undefined) {
    return { year: params.year };
  }

  const startYear = params.start_year ?? DEFAULT_START_YEAR;
  const endYear = params.end_year ?? DEFAULT_END_YEAR;
  if (startYear > endYear) {
    throw new ValidationError("start_year must not be after end_year", {
      start_year: startYear,
      end_year: endYear,
    });
  }
  return { start_year: startYear, end_year: endYear };
}

function toQueryError(error: Error): QueryErrorPayload {
  return { error: error.message };
}

// ============================================================================
// Routes
// ============================================================================

export function registerDashboardRoutes(
  app: FastifyInstance,
  service: DashboardService
): void {
  /**
   * GET /api/dashboard-data
   * All dashboard sections for a year range
   */
  app.get<{ Querystring: DashboardQuerystring }>(
    "/dashboard-data",
    {
      schema: {
        summary: "Dashboard data",
        description:
          "Growth is measured from start_year to end_year. Rankings, correlation and " +
          "depth leaders use the snapshot year (end_year, or the latest year with data). " +
          "Trend series cover the full range. Failures are returned as `{ error }`. " +
          "Example: `/api/dashboard-data?start_year=2021&end_year=2023`",
        tags: ["Dashboard"],
        querystring: DashboardQuerySchema,
        response: {
          200: DashboardResponseSchema,
          400: ApiErrorSchema,
        },
      },
    },
    async (request) => {
      const query = resolveDashboardQuery(request.query);
      const result = await service.getDashboard(query);
      return result.match((data) => data, toQueryError);
    }
  );

  /**
   * GET /api/years
   */
  app.get(
    "/years",
    {
      schema: {
        summary: "Available years",
        description: "Distinct years present in the skills table",
        tags: ["Dashboard"],
        response: {
          200: YearsResponseSchema,
        },
      },
    },
    async () => {
      const result = await service.getAvailableYears();
      return result.match((years) => ({ years }), toQueryError);
    }
  );

  /**
   * GET /api/entities/:code/history
   */
  app.get<{ Params: EntityCodeParam }>(
    "/entities/:code/history",
    {
      schema: {
        summary: "Entity history",
        description:
          "Yearly values for one country or region with year-over-year growth " +
          "of the above-basic share",
        tags: ["Entities"],
        params: EntityCodeParamSchema,
        response: {
          200: EntityHistoryResponseSchema,
          400: ApiErrorSchema,
        },
      },
    },
    async (request) => {
      const result = await service.getEntityHistory(
        request.params.code.toUpperCase()
      );
      return result.match((history) => history, toQueryError);
    }
  );
}
