/**
 * Type barrel — re-exports all public types from @tally/node.
 */

// DTOs
export {
  DateSchema,
  AmountSchema,
  DueStatusSchema,
  ReportFormatSchema,
  RegisterPayableSchema,
  RegisterReceivableSchema,
  SettleSchema,
  ListPayablesQuerySchema,
  ListReceivablesQuerySchema,
  SearchQuerySchema,
  AsOfQuerySchema,
  SummaryQuerySchema,
  DailyCashFlowQuerySchema,
  MonthlyCashFlowQuerySchema,
  RangeCashFlowQuerySchema,
} from "./dto.js";
export type {
  RegisterPayableDto,
  RegisterReceivableDto,
  SettleDto,
  ListPayablesQuery,
  ListReceivablesQuery,
  SummaryQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Auth
export { ROLE_PERMISSIONS, hasPermission, isRole } from "./auth.js";
export type { Role, Permission, AuthContext, ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
