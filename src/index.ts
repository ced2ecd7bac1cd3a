import { createApp, createServices } from './app.js'
import { loadConfig } from './config/index.js'
import { createPool, initDb } from './db/index.js'
import { createMemoryStores, createPgStores, type Stores } from './db/repositories/index.js'
import { startGrpcServer } from './grpc/server.js'

async function main(): Promise<void> {
  const config = loadConfig()

  let stores: Stores
  if (config.databaseUrl) {
    const pool = createPool(config.databaseUrl)
    await initDb(pool)
    stores = createPgStores(pool)
  } else {
    console.warn('DATABASE_URL not set; using in-process stores. Keys and usage are lost on restart.')
    stores = createMemoryStores()
  }

  const services = createServices(stores, config, {
    credentialOptions: {
      onKeyIssued: (credential) => {
        console.log(`[Provisioning] Welcome notification queued for account ${credential.accountId}`)
      },
    },
  })
  const app = createApp(services, config)

  const grpcServer = await startGrpcServer(services.credentials, services.ledger, services.policy, config.grpc)
  const httpServer = app.listen(config.port, () => {
    console.log(`Keygate API listening on http://localhost:${config.port}`)
  })

  const shutdown = () => {
    httpServer.close()
    grpcServer.forceShutdown()
    process.exit()
  }
  process.on('SIGINT', shutdown)
  process.on('SIGTERM', shutdown)
}

main().catch((err: unknown) => {
  console.error('Failed to start Keygate API:', err)
  process.exit(1)
})
