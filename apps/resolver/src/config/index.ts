/**
 * Runtime configuration, validated once from the environment.
 */
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import type { TimeoutClass } from '@aerochart/chart-sources'

const APP_ROOT = resolve(dirname(fileURLToPath(import.meta.url)), '..', '..')

export const DEFAULT_OFFLINE_DATA_DIR = resolve(APP_ROOT, 'data', 'offline')

const positiveMs = (fallback: number) => z.coerce.number().int().positive().default(fallback)

const envSchema = z.object({
  CHART_TIMEOUT_FAST_MS: positiveMs(10_000),
  CHART_TIMEOUT_MODERATE_MS: positiveMs(30_000),
  CHART_TIMEOUT_SLOW_MS: positiveMs(120_000),
  CHART_BROWSER_POOL_SIZE: z.coerce.number().int().min(1).max(16).default(2),
  CHART_BROWSER_EXECUTABLE: z.string().min(1).optional(),
  CHART_BROWSER_CHANNEL: z.string().min(1).optional(),
  CHART_OFFLINE_DATA_DIR: z.string().min(1).default(DEFAULT_OFFLINE_DATA_DIR),
  CHART_USER_AGENT: z.string().min(1).default('AeroChart/0.1 (+chart resolver)'),
  CHART_MAX_PAGE_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
})

export type TimeoutBudget = Record<TimeoutClass, number>

export interface ResolverConfig {
  timeouts: TimeoutBudget
  browser: {
    poolSize: number
    executablePath?: string
    channel?: string
  }
  offlineDataDir: string
  userAgent: string
  maxPageBytes: number
  port: number
}

/**
 * Parse configuration from an environment map.
 * Throws a readable error listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ResolverConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new Error(`Invalid resolver configuration\n  ${issues.join('\n  ')}`)
  }

  const e = parsed.data
  return {
    timeouts: {
      fast: e.CHART_TIMEOUT_FAST_MS,
      moderate: e.CHART_TIMEOUT_MODERATE_MS,
      slow: e.CHART_TIMEOUT_SLOW_MS,
    },
    browser: {
      poolSize: e.CHART_BROWSER_POOL_SIZE,
      executablePath: e.CHART_BROWSER_EXECUTABLE,
      channel: e.CHART_BROWSER_CHANNEL,
    },
    offlineDataDir: e.CHART_OFFLINE_DATA_DIR,
    userAgent: e.CHART_USER_AGENT,
    maxPageBytes: e.CHART_MAX_PAGE_BYTES,
    port: e.PORT,
  }
}
