import { z } from "zod";

// ---------------------------------------------------------------------------
// Loader configuration
// ---------------------------------------------------------------------------

export const plausibilitySchema = z.object({
  // Translations beyond this (cm, any axis) are physically implausible for in-room monitoring.
  maxTranslationCm: z.number().positive().default(5),
  maxRotationDeg: z.number().positive().default(10),
});

export const sgrtConfigSchema = z.object({
  // Gap (minutes) at or above which two captures on the same day start separate sessions.
  sessionGapMinutes: z.number().positive().default(30),
  // Promote every per-capture failure to a patient-level failure.
  strictMode: z.boolean().default(false),
  plausibility: plausibilitySchema.default({}),
});

export type SgrtConfigInput = z.input<typeof sgrtConfigSchema>;
export type SgrtConfig = z.infer<typeof sgrtConfigSchema>;
export type PlausibilityLimits = z.infer<typeof plausibilitySchema>;

export const DEFAULT_SGRT_CONFIG: SgrtConfig = sgrtConfigSchema.parse({});

// ---------------------------------------------------------------------------
// Load report (as served over the API and printed by scripts/load-pdata.ts)
// ---------------------------------------------------------------------------

export const sgrtErrorKindSchema = z.enum([
  "MalformedRecord",
  "MissingTimestamp",
  "IncompleteRecord",
  "HierarchyIntegrityError",
  "ReprocessingError",
  "PatientNotFound",
]);

export type SgrtErrorKind = z.infer<typeof sgrtErrorKindSchema>;

export const warningScopeSchema = z.object({
  patientId: z.string(),
  siteId: z.string().optional(),
  phaseId: z.string().optional(),
  fieldId: z.string().optional(),
});

export const loadWarningSchema = z.object({
  kind: sgrtErrorKindSchema,
  message: z.string(),
  path: z.string(),
  scope: warningScopeSchema,
});

export type WarningScope = z.infer<typeof warningScopeSchema>;
export type LoadWarning = z.infer<typeof loadWarningSchema>;

export const patientOutcomeSchema = z.discriminatedUnion("status", [
  z.object({
    status: z.literal("loaded"),
    warnings: z.array(loadWarningSchema),
    skippedSurfaces: z.array(z.number().int().nonnegative()),
  }),
  z.object({
    status: z.literal("failed"),
    reason: sgrtErrorKindSchema,
    message: z.string(),
    warnings: z.array(loadWarningSchema),
  }),
]);

export type PatientOutcome = z.infer<typeof patientOutcomeSchema>;

export const loadReportSchema = z.object({
  roots: z.array(z.string()),
  loaded: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
  warned: z.number().int().nonnegative(),
  patients: z.record(z.string(), patientOutcomeSchema),
});

export type LoadReport = z.infer<typeof loadReportSchema>;
