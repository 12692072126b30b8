/**
 * Common TypeBox schemas for API validation
 */

import { Type, type Static } from "@sinclair/typebox";

// ============================================================================
// Error Schemas
// ============================================================================

export const ApiErrorSchema = Type.Object({
  error: Type.String(),
  message: Type.String(),
  details: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  requestId: Type.Optional(Type.String()),
});

export const QueryErrorSchema = Type.Object(
  {
    error: Type.String({ description: "Why the query could not be computed" }),
  },
  { examples: [{ error: "Failed to load skill records: timeout" }] }
);

// ============================================================================
// Param Schemas
// ============================================================================

export const EntityCodeParamSchema = Type.Object({
  code: Type.String({
    minLength: 2,
    maxLength: 8,
    description: "Country (ISO alpha-3) or region code",
  }),
});

export type EntityCodeParam = Static<typeof EntityCodeParamSchema>;
