/**
 * Process configuration, read from the environment once and validated.
 */

import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import { ValidationError } from './errors'
import { LOG_LEVELS } from './utils/logger'
import type { LogLevel } from './utils/logger'

export const DEFAULT_DATA_DIR = fileURLToPath(new URL('../data', import.meta.url))

const logLevelSchema = z.enum(LOG_LEVELS)

const envSchema = z.object({
  LOG_LEVEL: z
    .string()
    .transform((v) => v.toLowerCase())
    .pipe(logLevelSchema)
    .default('info'),
  PATHFINDER_DATA_DIR: z.string().min(1).optional(),
  PATHFINDER_DB_PATH: z.string().min(1).optional(),
})

export interface AppConfig {
  logLevel: LogLevel
  dataDir: string
  dbPath: string
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    throw ValidationError.fromZod('Invalid environment', parsed.error)
  }
  const { LOG_LEVEL, PATHFINDER_DATA_DIR, PATHFINDER_DB_PATH } = parsed.data
  return {
    logLevel: LOG_LEVEL,
    dataDir: PATHFINDER_DATA_DIR ?? DEFAULT_DATA_DIR,
    dbPath: PATHFINDER_DB_PATH ?? path.resolve(process.cwd(), 'pathfinder.db'),
  }
}
