import { z } from 'zod';
import { sgrtConfigSchema, type SgrtConfig } from '@shared/schema';

const optionalNumber = z
  .string()
  .trim()
  .min(1)
  .transform((value, ctx) => {
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${value}" is not a number` });
      return z.NEVER;
    }
    return parsed;
  })
  .optional();

const optionalBoolean = z
  .enum(['true', 'false', '1', '0'])
  .transform(value => value === 'true' || value === '1')
  .optional();

const envSchema = z.object({
  SGRT_DATA_ROOT: z
    .string()
    .default('storage/pdata')
    .transform(value => value.split(',').map(root => root.trim()).filter(root => root.length > 0))
    .pipe(z.array(z.string()).min(1, 'at least one data root is required')),
  SGRT_SESSION_GAP_MINUTES: optionalNumber,
  SGRT_STRICT_MODE: optionalBoolean,
  SGRT_MAX_TRANSLATION_CM: optionalNumber,
  SGRT_MAX_ROTATION_DEG: optionalNumber,
  PORT: optionalNumber,
});

export interface ServerConfig {
  /** Comma separated in SGRT_DATA_ROOT; a patient id found under two roots keeps the first. */
  dataRoots: string[];
  port: number;
  sgrt: SgrtConfig;
}

/**
 * Reads server settings from the environment (after dotenv has run).
 * Throws a ZodError naming every invalid variable.
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const vars = envSchema.parse(env);
  return {
    dataRoots: vars.SGRT_DATA_ROOT,
    port: vars.PORT ?? 5000,
    sgrt: sgrtConfigSchema.parse({
      sessionGapMinutes: vars.SGRT_SESSION_GAP_MINUTES,
      strictMode: vars.SGRT_STRICT_MODE,
      plausibility: {
        maxTranslationCm: vars.SGRT_MAX_TRANSLATION_CM,
        maxRotationDeg: vars.SGRT_MAX_ROTATION_DEG,
      },
    }),
  };
}
