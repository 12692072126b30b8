/**
 * Response schemas (OpenAPI documentation and serialization)
 */

import { Type } from "@sinclair/typebox";

import { QueryErrorSchema } from "./common.js";

export const RankedEntitySchema = Type.Object({
  entity_code: Type.String(),
  entity_label: Type.String(),
  pct_above_basic: Type.Number(),
});

export const CorrelationPointSchema = Type.Object({
  entity_code: Type.String(),
  entity_label: Type.String(),
  pct_basic: Type.Number(),
  pct_above_basic: Type.Number(),
});

export const DepthLeaderSchema = Type.Object({
  entity_code: Type.String(),
  entity_label: Type.String(),
  skill_depth_ratio: Type.Number(),
});

export const TrendPointSchema = Type.Object({
  year: Type.Integer(),
  value: Type.Number(),
});

export const DashboardDataSchema = Type.Object({
  start_year: Type.Integer(),
  end_year: Type.Integer(),
  snapshot_year: Type.Union([Type.Integer(), Type.Null()]),
  top_advanced: Type.Array(RankedEntitySchema),
  digital_divide: Type.Object({
    top_tier_avg_growth: Type.Number(),
    bottom_tier_avg_growth: Type.Number(),
  }),
  correlation: Type.Array(CorrelationPointSchema),
  depth_leaders: Type.Array(DepthLeaderSchema),
  regional_trends: Type.Record(Type.String(), Type.Array(TrendPointSchema)),
});

export const DashboardResponseSchema = Type.Union([
  QueryErrorSchema,
  DashboardDataSchema,
]);

export const EntityHistorySchema = Type.Object({
  entity_code: Type.String(),
  entity_label: Type.String(),
  partition: Type.Union([Type.Literal("region"), Type.Literal("country")]),
  points: Type.Array(
    Type.Object({
      year: Type.Integer(),
      pct_basic: Type.Number(),
      pct_above_basic: Type.Number(),
      skill_depth_ratio: Type.Number(),
      growth_advanced: Type.Number(),
    })
  ),
});

export const EntityHistoryResponseSchema = Type.Union([
  QueryErrorSchema,
  EntityHistorySchema,
]);

export const YearsResponseSchema = Type.Union([
  QueryErrorSchema,
  Type.Object({ years: Type.Array(Type.Integer()) }),
]);
