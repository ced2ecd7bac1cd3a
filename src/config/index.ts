import dotenv from 'dotenv'
import { z } from 'zod'
import { ConfigError } from '../errors.js'
import { PlanTier } from '../types/plan.js'

const toNumber = (fallback: number) => (value: unknown) => {
  if (value === undefined || value === null || value === '') {
    return fallback
  }
  const parsed = Number(value)
  return Number.isNaN(parsed) ? fallback : parsed
}

const emptyToUndefined = (value: unknown) => (value === '' ? undefined : value)

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORT: z.preprocess(toNumber(3000), z.number().int().min(1).max(65535)),
    DATABASE_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),
    GRPC_PORT: z.preprocess(toNumber(50051), z.number().int().min(1).max(65535)),
    GRPC_INTERNAL_SECRET: z.preprocess(emptyToUndefined, z.string().min(8).optional()),
    GRPC_TLS_CERT: z.preprocess(emptyToUndefined, z.string().optional()),
    GRPC_TLS_KEY: z.preprocess(emptyToUndefined, z.string().optional()),
    GRPC_TLS_CA: z.preprocess(emptyToUndefined, z.string().optional()),
    RATE_LIMIT_FREE: z.preprocess(toNumber(10), z.number().int().min(0)),
    RATE_LIMIT_STARTER: z.preprocess(toNumber(500), z.number().int().min(0)),
    RATE_LIMIT_PRO: z.preprocess(toNumber(5000), z.number().int().min(0)),
    RATE_LIMIT_ENTERPRISE: z.preprocess(toNumber(999999), z.number().int().min(0)),
    LEDGER_WRITE_TIMEOUT_MS: z.preprocess(toNumber(2000), z.number().int().min(1)),
    HANDLER_TIMEOUT_MS: z.preprocess(toNumber(30000), z.number().int().min(1)),
    SUPPORT_EMAIL: z.string().email().default('support@example.com'),
  })
  .superRefine((env, ctx) => {
    if (env.NODE_ENV === 'production' && !env.GRPC_INTERNAL_SECRET) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['GRPC_INTERNAL_SECRET'],
        message: 'GRPC_INTERNAL_SECRET is required in production',
      })
    }
  })

export interface GrpcTlsConfig {
  certPath: string
  keyPath: string
  caPath?: string
}

export interface AppConfig {
  env: 'development' | 'test' | 'production'
  port: number
  databaseUrl?: string
  grpc: {
    port: number
    internalSecret: string
    tls?: GrpcTlsConfig
  }
  rateLimits: Record<PlanTier, number>
  ledgerWriteTimeoutMs: number
  handlerTimeoutMs: number
  supportEmail: string
}

/**
 * Reads configuration from the environment (and `.env` when present).
 * Pass an explicit map to parse without touching `process.env`.
 */
export function loadConfig(source?: NodeJS.ProcessEnv): AppConfig {
  if (!source) {
    dotenv.config()
  }
  const parsed = envSchema.safeParse(source ?? process.env)
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => issue.path.join('.')))
  }
  const env = parsed.data

  const tls =
    env.GRPC_TLS_CERT && env.GRPC_TLS_KEY
      ? { certPath: env.GRPC_TLS_CERT, keyPath: env.GRPC_TLS_KEY, caPath: env.GRPC_TLS_CA }
      : undefined

  return {
    env: env.NODE_ENV,
    port: env.PORT,
    databaseUrl: env.DATABASE_URL,
    grpc: {
      port: env.GRPC_PORT,
      internalSecret: env.GRPC_INTERNAL_SECRET ?? 'dev-secret',
      tls,
    },
    rateLimits: {
      [PlanTier.FREE]: env.RATE_LIMIT_FREE,
      [PlanTier.STARTER]: env.RATE_LIMIT_STARTER,
      [PlanTier.PRO]: env.RATE_LIMIT_PRO,
      [PlanTier.ENTERPRISE]: env.RATE_LIMIT_ENTERPRISE,
    },
    ledgerWriteTimeoutMs: env.LEDGER_WRITE_TIMEOUT_MS,
    handlerTimeoutMs: env.HANDLER_TIMEOUT_MS,
    supportEmail: env.SUPPORT_EMAIL,
  }
}
