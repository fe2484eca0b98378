/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Shapes are checked here; the ledger still owns the business rules
 * (positive amounts, real calendar days, known categories).
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

export const DateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Expected a date in YYYY-MM-DD form");

export const AmountSchema = z
  .string()
  .regex(/^-?\d+(\.\d+)?$/, "Expected a decimal string such as \"1500.00\"");

export const DueStatusSchema = z.enum([
  "overdue",
  "due_today",
  "due_soon",
  "on_time",
  "invalid_date",
  "paid",
  "received",
]);

export const ReportFormatSchema = z.enum(["json", "text"]).default("json");

// =============================================================================
// Registration
// =============================================================================

export const RegisterPayableSchema = z.object({
  description: z.string().min(1).max(1024),
  category: z.string().min(1).max(64),
  amount: AmountSchema,
  dueDate: DateSchema,
  supplier: z.string().max(256).optional(),
  notes: z.string().max(4096).optional(),
});

export type RegisterPayableDto = z.infer<typeof RegisterPayableSchema>;

export const RegisterReceivableSchema = z.object({
  payer: z.string().min(1).max(256),
  description: z.string().min(1).max(1024),
  category: z.string().min(1).max(64),
  amount: AmountSchema,
  dueDate: DateSchema,
  notes: z.string().max(4096).optional(),
});

export type RegisterReceivableDto = z.infer<typeof RegisterReceivableSchema>;

// =============================================================================
// Settlement
// =============================================================================

export const SettleSchema = z.object({
  /** Defaults to today */
  settlementDate: DateSchema.optional(),
});

export type SettleDto = z.infer<typeof SettleSchema>;

// =============================================================================
// Queries
// =============================================================================

export const ListPayablesQuerySchema = z.object({
  status: z.enum(["pending", "paid"]).optional(),
  category: z.string().min(1).optional(),
  dueStatus: DueStatusSchema.optional(),
  asOf: DateSchema.optional(),
});

export type ListPayablesQuery = z.infer<typeof ListPayablesQuerySchema>;

export const ListReceivablesQuerySchema = z.object({
  status: z.enum(["pending", "received"]).optional(),
  category: z.string().min(1).optional(),
  dueStatus: DueStatusSchema.optional(),
  asOf: DateSchema.optional(),
});

export type ListReceivablesQuery = z.infer<typeof ListReceivablesQuerySchema>;

export const SearchQuerySchema = z.object({
  q: z.string().trim().min(1, "Search term is required"),
});

export const AsOfQuerySchema = z.object({
  asOf: DateSchema.optional(),
});

export const SummaryQuerySchema = z.object({
  from: DateSchema.optional(),
  to: DateSchema.optional(),
  asOf: DateSchema.optional(),
});

export type SummaryQuery = z.infer<typeof SummaryQuerySchema>;

export const DailyCashFlowQuerySchema = z.object({
  /** Defaults to today */
  date: DateSchema.optional(),
  format: ReportFormatSchema,
});

export const MonthlyCashFlowQuerySchema = z.object({
  year: z.coerce.number().int(),
  month: z.coerce.number().int(),
  format: ReportFormatSchema,
});

export const RangeCashFlowQuerySchema = z.object({
  from: DateSchema,
  to: DateSchema,
  format: ReportFormatSchema,
});
