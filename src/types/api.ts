/**
 * API Request/Response Types
 */

// ============================================================================
// Common Response Types
// ============================================================================

/**
 * Protocol-level error (bad request, unknown route, unexpected fault)
 */
export interface ApiError {
  error: string;
  message: string;
  details?: Record<string, unknown>;
  requestId?: string;
}

/**
 * Degraded payload returned with HTTP 200 when a query could not be computed,
 * so the dashboard can render an empty state instead of failing.
 */
export interface QueryErrorPayload {
  error: string;
}
