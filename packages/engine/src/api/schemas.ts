import { z } from "zod";

// ---------------------------------------------------------------------------
// Wire schemas (Notion REST API responses)
// ---------------------------------------------------------------------------

const RichTextSchema = z
  .object({ plain_text: z.string().optional() })
  .passthrough();

const PropertySchema = z
  .object({
    type: z.string().optional(),
    title: z.array(RichTextSchema).optional(),
  })
  .passthrough();

export const SearchResponseSchema = z
  .object({
    results: z.array(z.object({ id: z.string() }).passthrough()).default([]),
    has_more: z.boolean().default(false),
    next_cursor: z.string().nullable().optional(),
  })
  .passthrough();

export type SearchResponse = z.infer<typeof SearchResponseSchema>;

export const PageObjectSchema = z
  .object({
    id: z.string(),
    url: z.string().default(""),
    public_url: z.string().nullable().optional(),
    created_time: z.string().default(""),
    last_edited_time: z.string().default(""),
    created_by: z.object({ id: z.string().optional() }).passthrough().optional(),
    parent: z.object({ type: z.string().optional() }).passthrough().optional(),
    archived: z.boolean().default(false),
    properties: z.record(PropertySchema).default({}),
  })
  .passthrough();

export type PageObject = z.infer<typeof PageObjectSchema>;

// ---------------------------------------------------------------------------
// Domain schemas
// ---------------------------------------------------------------------------

export const LabelSchema = z.enum([
  "public-url-present",
  "url-pattern-suggests-public",
  "reachable-without-auth",
]);

export type Label = z.infer<typeof LabelSchema>;

/** Human-readable text for each label, used in CSV/markdown/console output. */
export const LABEL_DESCRIPTIONS: Record<Label, string> = {
  "public-url-present": "Explicit public URL present",
  "url-pattern-suggests-public": "URL pattern suggests public exposure",
  "reachable-without-auth": "Reachable without authentication",
};

/**
 * `low` exists for output compatibility only. The classifier never assigns
 * it, so `riskSummary.low` is always 0.
 */
export const RiskTierSchema = z.enum(["high", "medium", "low"]);

export type RiskTier = z.infer<typeof RiskTierSchema>;

export const AssignedTierSchema = RiskTierSchema.exclude(["low"]);

export type AssignedTier = z.infer<typeof AssignedTierSchema>;

export const PageRecordSchema = z
  .object({
    id: z.string(),
    title: z.string(),
    url: z.string(),
    createdTime: z.string(),
    lastEditedTime: z.string(),
    createdById: z.string(),
    parentType: z.string(),
    archived: z.boolean(),
    publicUrl: z.string().nullable(),
  })
  .readonly();

export type PageRecord = z.infer<typeof PageRecordSchema>;

export const RiskEntrySchema = z
  .object({
    id: z.string(),
    title: z.string(),
    url: z.string(),
    createdTime: z.string(),
    lastEditedTime: z.string(),
    createdById: z.string(),
    parentType: z.string(),
    archived: z.boolean(),
    publicUrl: z.string().nullable(),
    publicIndicators: z.array(LabelSchema).readonly(),
    riskTier: AssignedTierSchema,
  })
  .readonly();

export type RiskEntry = z.infer<typeof RiskEntrySchema>;

export const RiskSummarySchema = z.object({
  high: z.number().int().nonnegative(),
  medium: z.number().int().nonnegative(),
  low: z.number().int().nonnegative(),
});

export type RiskSummary = z.infer<typeof RiskSummarySchema>;

export const ReportSchema = z.object({
  scanTimestamp: z.string(),
  totalScanned: z.number().int().nonnegative(),
  entries: z.array(RiskEntrySchema),
  riskSummary: RiskSummarySchema,
  recommendations: z.array(z.string()),
});

export type Report = z.infer<typeof ReportSchema>;
