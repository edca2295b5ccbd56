/**
 * Exporter Configuration Types
 */

import { z } from 'zod';

export const VALID_LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export const VALID_LOG_FORMATS = ['json', 'pretty'] as const;

export const VarExportConfigSchema = z.object({
  logging: z
    .object({
      level: z.enum(VALID_LOG_LEVELS).default('info'),
      format: z.enum(VALID_LOG_FORMATS).default('json'),
      name: z.string().min(1, 'Logger name cannot be empty').default('varexport'),
    })
    .strict()
    .default({}),
  dump: z
    .object({
      includeDoc: z.boolean().default(false),
    })
    .strict()
    .default({}),
}).strict();

export type VarExportConfig = z.infer<typeof VarExportConfigSchema>;

export const DEFAULT_CONFIG: VarExportConfig = VarExportConfigSchema.parse({});

/** Environment variables read by {@link loadConfig}, mapped to their config path */
export const ENV_OVERRIDES = {
  VAREXPORT_LOG_LEVEL: ['logging', 'level'],
  VAREXPORT_LOG_FORMAT: ['logging', 'format'],
  VAREXPORT_LOG_NAME: ['logging', 'name'],
  VAREXPORT_DUMP_INCLUDE_DOC: ['dump', 'includeDoc'],
} as const;

export const CONFIG_PATH_ENV = 'VAREXPORT_CONFIG';
