/**
 * Common TypeBox schemas for API validation
 */

import { Type } from "@sinclair/typebox";

import {
  DEFAULT_LIMIT,
  MAX_LIMIT,
} from "../../utils/pagination.js";
import {
  MAX_SEASONS_PER_UPDATE,
  MAX_TEAM_NAME_LENGTH,
} from "../../utils/validation.js";

// ============================================================================
// Pagination Schemas
// ============================================================================

export const PaginationQuerySchema = Type.Object({
  limit: Type.Optional(
    Type.Integer({ minimum: 1, maximum: MAX_LIMIT, default: DEFAULT_LIMIT })
  ),
  offset: Type.Optional(Type.Integer({ minimum: 0, default: 0 })),
});

export const PaginationMetaSchema = Type.Object({
  total: Type.Integer(),
  limit: Type.Integer(),
  offset: Type.Integer(),
  hasMore: Type.Boolean(),
});

// ============================================================================
// Error Schemas
// ============================================================================

export const ApiErrorSchema = Type.Object({
  error: Type.String(),
  message: Type.String(),
  details: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  requestId: Type.Optional(Type.String()),
});

// ============================================================================
// Common Field Schemas
// ============================================================================

export const SeasonSchema = Type.String({
  pattern: "^\\d{4}$",
  description: "Season start year",
  examples: ["2024"],
});

export const SeasonListSchema = Type.Array(SeasonSchema, {
  maxItems: MAX_SEASONS_PER_UPDATE,
});

export const TeamNameSchema = Type.String({
  minLength: 1,
  maxLength: MAX_TEAM_NAME_LENGTH,
});

export const ProviderFlagsSchema = Type.Object({
  "football-data": Type.Boolean(),
  "api-football": Type.Boolean(),
  footystats: Type.Boolean(),
});
