import { z } from 'zod'

const positiveInt = z.coerce.number().int().positive()
const nonNegativeInt = z.coerce.number().int().min(0)

function numberList(name: string) {
  return z
    .string()
    .transform((raw, ctx) => {
      const values = raw
        .split(',')
        .map((part) => part.trim())
        .filter((part) => part.length > 0)
        .map(Number)
      if (values.length === 0 || values.some((value) => !Number.isFinite(value) || value < 0)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} must be a comma-separated list of non-negative numbers` })
        return z.NEVER
      }
      return values
    })
}

const envSchema = z.object({
  PORT: positiveInt.default(3000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  REDIS_URL: z
    .string()
    .optional()
    .refine(
      (url) => !url || ['redis:', 'rediss:'].some((protocol) => url.startsWith(protocol)),
      'REDIS_URL must start with redis:// or rediss://'
    ),
  REDIS_KEY_PREFIX: z.string().default('crm-relay:'),
  API_TOKENS: z
    .string()
    .default('')
    .transform((raw) =>
      raw
        .split(',')
        .map((token) => token.trim())
        .filter((token) => token.length > 0)
    ),
  ACCOUNTS_FILE: z.string().default('data/accounts.json'),
  ACCOUNTS_RELOAD_CRON: z.string().default('*/5 * * * *'),
  ALERTS_LOG_FILE: z.string().default('logs/alerts.log'),
  PLATFORM_API_BASE_URL: z.string().url().default('https://graph.instagram.com/v21.0'),
  PLATFORM_APP_SECRET: z.string().default(''),
  PLATFORM_VERIFY_TOKEN: z.string().default(''),
  PLATFORM_TIMEOUT_MS: positiveInt.default(5000),
  DISPATCH_MAX_LOCAL_RETRIES: nonNegativeInt.default(3),
  DISPATCH_BACKOFF_MS: numberList('DISPATCH_BACKOFF_MS').default('1000,2000,4000'),
  DISPATCH_STALE_AFTER_MS: positiveInt.default(60_000),
  DISPATCH_RECOVERY_CRON: z.string().default('* * * * *'),
  RELAY_IMMEDIATE_TIMEOUT_MS: positiveInt.default(2000),
  WEBHOOK_TIMEOUT_MS: positiveInt.default(5000),
  RETRY_BACKOFF_SECONDS: numberList('RETRY_BACKOFF_SECONDS').default('1,2,4,8,16'),
  RETRY_EXTENDED_INTERVAL_SECONDS: positiveInt.default(3600),
  RETRY_WINDOW_HOURS: z.coerce.number().positive().default(24),
  RETRY_TICK_CRON: z.string().default('* * * * * *'),
  RETRY_CONCURRENCY: positiveInt.default(4),
  RETRY_BATCH_SIZE: positiveInt.default(100)
})

export type Env = z.infer<typeof envSchema>

export interface AppConfig {
  port: number
  logLevel: Env['LOG_LEVEL']
  redis: { url: string | null; keyPrefix: string }
  apiTokens: string[]
  accounts: { file: string; reloadCron: string }
  alertsLogFile: string
  platform: { baseUrl: string; appSecret: string; verifyToken: string; timeoutMs: number }
  dispatch: { maxLocalRetries: number; backoffMs: number[]; staleAfterMs: number; recoveryCron: string }
  relay: { immediateTimeoutMs: number }
  retry: {
    backoffSeconds: number[]
    extendedIntervalSeconds: number
    maxRetryWindowSeconds: number
    attemptTimeoutMs: number
    tickCron: string
    concurrency: number
    batchSize: number
  }
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`)
    this.name = 'ConfigError'
  }
}

/**
 * Validates the environment and maps it onto the typed config. Empty strings
 * count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''))
  const parsed = envSchema.safeParse(cleaned)
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`))
  }
  const e = parsed.data
  return {
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    redis: { url: e.REDIS_URL ?? null, keyPrefix: e.REDIS_KEY_PREFIX },
    apiTokens: e.API_TOKENS,
    accounts: { file: e.ACCOUNTS_FILE, reloadCron: e.ACCOUNTS_RELOAD_CRON },
    alertsLogFile: e.ALERTS_LOG_FILE,
    platform: {
      baseUrl: e.PLATFORM_API_BASE_URL,
      appSecret: e.PLATFORM_APP_SECRET,
      verifyToken: e.PLATFORM_VERIFY_TOKEN,
      timeoutMs: e.PLATFORM_TIMEOUT_MS
    },
    dispatch: {
      maxLocalRetries: e.DISPATCH_MAX_LOCAL_RETRIES,
      backoffMs: e.DISPATCH_BACKOFF_MS,
      staleAfterMs: e.DISPATCH_STALE_AFTER_MS,
      recoveryCron: e.DISPATCH_RECOVERY_CRON
    },
    relay: { immediateTimeoutMs: e.RELAY_IMMEDIATE_TIMEOUT_MS },
    retry: {
      backoffSeconds: e.RETRY_BACKOFF_SECONDS,
      extendedIntervalSeconds: e.RETRY_EXTENDED_INTERVAL_SECONDS,
      maxRetryWindowSeconds: Math.round(e.RETRY_WINDOW_HOURS * 3600),
      attemptTimeoutMs: e.WEBHOOK_TIMEOUT_MS,
      tickCron: e.RETRY_TICK_CRON,
      concurrency: e.RETRY_CONCURRENCY,
      batchSize: e.RETRY_BATCH_SIZE
    }
  }
}
