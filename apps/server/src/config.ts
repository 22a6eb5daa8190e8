import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { Extent } from './types/geo';
import type { JsonObject } from './types/schema';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const DEMO_DATA_FILE = path.join(__dirname, '..', 'data', 'demo.json');

const extent = z
  .string()
  .transform(value => value.split(',').map(Number))
  .pipe(z.tuple([z.number(), z.number(), z.number(), z.number()]));

const settings = z
  .string()
  .transform((value, ctx): unknown => {
    try {
      return JSON.parse(value);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be JSON' });
      return z.NEVER;
    }
  })
  .pipe(z.record(z.unknown()));

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  NODE_ENV: z.string().default('development'),
  CORS_ORIGINS: z.string().default('http://localhost:5173,http://localhost:3000'),
  GEOCRUD_DATA_FILE: z.string().default(DEMO_DATA_FILE),
  GEOCRUD_DEFAULT_EXTENT: extent.default('-180,-90,180,90'),
  GEOCRUD_SETTINGS: settings.default('{}'),
});

export interface AppConfig {
  port: number;
  production: boolean;
  corsOrigins: string[];
  dataFile: string;
  /** used as view extent when its layer has no geometry */
  defaultExtent: Extent;
  /** free-form client settings returned by GET /api/settings */
  settings: JsonObject;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    port: parsed.PORT,
    production: parsed.NODE_ENV === 'production',
    corsOrigins: parsed.CORS_ORIGINS.split(',').map(origin => origin.trim()).filter(Boolean),
    dataFile: parsed.GEOCRUD_DATA_FILE,
    defaultExtent: parsed.GEOCRUD_DEFAULT_EXTENT,
    settings: parsed.GEOCRUD_SETTINGS,
  };
}
