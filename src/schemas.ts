/**
 * ブランド予算プランナー - バリデーションスキーマ
 */

import { z } from "zod";
import { FIELD_LIMITS } from "./constants";
import { ValidationError } from "./errors";
import { CampaignStatus, MANUAL_CAMPAIGN_STATUSES } from "./models";
import { integerDigits, tryParseMoney } from "./money";

// =============================================================================
// 基本型のスキーマ
// =============================================================================

/**
 * 金額（"123.45" 形式の文字列または数値）→ Money
 * 負の値・整数部の桁数超過は不可
 */
function moneySchema(field: string, maxDigits: number) {
  return z.union([z.string(), z.number()]).transform((value, ctx) => {
    const parsed = tryParseMoney(value);
    if (parsed === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${field} must be a decimal amount with at most 2 fractional digits`,
      });
      return z.NEVER;
    }
    if (parsed < BigInt(0)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${field} must be non-negative` });
      return z.NEVER;
    }
    if (integerDigits(parsed) > maxDigits - 2) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${field} must have at most ${maxDigits - 2} integer digits`,
      });
      return z.NEVER;
    }
    return parsed;
  });
}

export const WeekdaySchema = z.enum([
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
  "saturday",
  "sunday",
]);

/** "HH:MM"（24時間表記、ゼロ埋め） */
export const TimeOfDaySchema = z
  .string()
  .regex(/^([01]\d|2[0-3]):[0-5]\d$/, "time must be HH:MM (24-hour, zero-padded)");

export const DaypartingWindowSchema = z
  .object({
    start: TimeOfDaySchema,
    end: TimeOfDaySchema,
  })
  .strict();

export const DaypartingScheduleSchema = z.record(WeekdaySchema, z.array(DaypartingWindowSchema));

export const CampaignStatusSchema = z.enum([
  CampaignStatus.ACTIVE,
  CampaignStatus.PAUSED,
  CampaignStatus.BUDGET_EXCEEDED,
  CampaignStatus.DAYPARTING_PAUSED,
  CampaignStatus.INACTIVE,
]);

export const ManualCampaignStatusSchema = z.enum(MANUAL_CAMPAIGN_STATUSES);

const BrandNameSchema = z.string().trim().min(1, "name is required").max(FIELD_LIMITS.BRAND_NAME_MAX);

const CampaignNameSchema = z
  .string()
  .trim()
  .min(1, "name is required")
  .max(FIELD_LIMITS.CAMPAIGN_NAME_MAX);

// =============================================================================
// APIリクエストスキーマ
// =============================================================================

export const CreateBrandRequestSchema = z
  .object({
    name: BrandNameSchema,
    dailyBudget: moneySchema("dailyBudget", FIELD_LIMITS.DAILY_AMOUNT_MAX_DIGITS),
    monthlyBudget: moneySchema("monthlyBudget", FIELD_LIMITS.MONTHLY_AMOUNT_MAX_DIGITS),
    isActive: z.boolean().optional(),
  })
  .strict();

export const UpdateBrandRequestSchema = z
  .object({
    name: BrandNameSchema.optional(),
    dailyBudget: moneySchema("dailyBudget", FIELD_LIMITS.DAILY_AMOUNT_MAX_DIGITS).optional(),
    monthlyBudget: moneySchema("monthlyBudget", FIELD_LIMITS.MONTHLY_AMOUNT_MAX_DIGITS).optional(),
    isActive: z.boolean().optional(),
  })
  .strict();

export const CreateCampaignRequestSchema = z
  .object({
    brandId: z.string().min(1, "brandId is required"),
    name: CampaignNameSchema,
    status: ManualCampaignStatusSchema.optional(),
    daypartingEnabled: z.boolean().optional(),
    daypartingSchedule: DaypartingScheduleSchema.optional(),
  })
  .strict();

export const UpdateCampaignRequestSchema = z
  .object({
    name: CampaignNameSchema.optional(),
    daypartingEnabled: z.boolean().optional(),
    daypartingSchedule: DaypartingScheduleSchema.optional(),
  })
  .strict();

export const SetCampaignStatusRequestSchema = z
  .object({
    status: ManualCampaignStatusSchema,
  })
  .strict();

/**
 * 金額の検証（負の値など）は SpendRecorder が行う
 */
export const RecordSpendRequestSchema = z
  .object({
    amount: z.union([z.string(), z.number()]),
    description: z.string().max(FIELD_LIMITS.SPEND_DESCRIPTION_MAX).optional().default(""),
  })
  .strict();

export const ListCampaignsQuerySchema = z.object({
  brandId: z.string().min(1).optional(),
  status: CampaignStatusSchema.optional(),
});

export const SpendEventsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).optional().default(50),
});

export const DryRunQuerySchema = z.object({
  dryRun: z
    .enum(["true", "false", "1", "0"])
    .optional()
    .transform((value) => value === "true" || value === "1"),
});

// =============================================================================
// バリデーションヘルパー関数
// =============================================================================

/**
 * スキーマでパース
 * @throws {ValidationError} バリデーション失敗時
 */
export function parseRequest<S extends z.ZodTypeAny>(schema: S, data: unknown): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw ValidationError.fromZodError(result.error);
  }
  return result.data;
}
