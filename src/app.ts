import express, { type Express } from 'express'
import type { Stores } from './db/repositories/index.js'
import { createAdmissionMiddleware } from './middleware/admission.js'
import { createErrorHandler, notFoundHandler } from './middleware/errorHandler.js'
import { createHealthRouter } from './routes/health.js'
import { createRankMonitorRouter } from './routes/rankMonitor.js'
import { createUsageRouter } from './routes/usage.js'
import { CredentialService, type CredentialServiceOptions } from './services/credentials.js'
import { QuotaPolicy } from './services/quotaPolicy.js'
import { MemoryMonitorStore, RankMonitorService, type MonitorStore } from './services/rankMonitor.js'
import { UsageLedger } from './services/usageLedger.js'
import type { AppConfig } from './config/index.js'

export const SERVICE_NAME = 'keygate-api'

export interface AppServices {
  credentials: CredentialService
  ledger: UsageLedger
  policy: QuotaPolicy
  rankMonitor: RankMonitorService
}

export type ServiceConfig = Pick<AppConfig, 'rateLimits' | 'ledgerWriteTimeoutMs'>

export interface ServiceOptions {
  monitors?: MonitorStore
  credentialOptions?: CredentialServiceOptions
  now?: () => number
}

export function createServices(stores: Stores, config: ServiceConfig, options: ServiceOptions = {}): AppServices {
  return {
    credentials: new CredentialService(stores, options.credentialOptions),
    ledger: new UsageLedger(stores.usageRecords, config.ledgerWriteTimeoutMs),
    policy: new QuotaPolicy(config.rateLimits),
    rankMonitor: new RankMonitorService(options.monitors ?? new MemoryMonitorStore(), undefined, options.now),
  }
}

export type HttpConfig = Pick<AppConfig, 'handlerTimeoutMs' | 'supportEmail'>

export function createApp(services: AppServices, config: HttpConfig): Express {
  const app = express()

  app.use(express.json({ limit: '64kb' }))

  // ── Health ────────────────────────────────────────────────────────────────────
  const health = createHealthRouter(SERVICE_NAME)
  app.use('/health', health)
  app.use('/api/health', health)

  // ── Quota admission (every /api/ request below this line) ─────────────────────
  app.use(
    createAdmissionMiddleware({
      credentials: services.credentials,
      ledger: services.ledger,
      policy: services.policy,
      handlerTimeoutMs: config.handlerTimeoutMs,
    })
  )

  // ── API ───────────────────────────────────────────────────────────────────────
  app.use('/api', createUsageRouter(services.credentials, services.ledger, services.policy))
  app.use('/api', createRankMonitorRouter(services.rankMonitor, services.credentials))

  app.use(notFoundHandler)
  app.use(createErrorHandler(config.supportEmail))

  return app
}
