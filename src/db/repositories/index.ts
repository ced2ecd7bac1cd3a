import type { Queryable } from './queryable.js'
import type { Stores } from './types.js'
import { AccountsRepository } from './accountsRepository.js'
import { CredentialsRepository } from './credentialsRepository.js'
import { UsageRecordsRepository } from './usageRecordsRepository.js'

export * from './types.js'
export { AccountsRepository } from './accountsRepository.js'
export { CredentialsRepository } from './credentialsRepository.js'
export { UsageRecordsRepository } from './usageRecordsRepository.js'
export { MemoryState, createMemoryStores } from './memory.js'
export type { Queryable } from './queryable.js'

export function createPgStores(db: Queryable): Stores {
  return {
    accounts: new AccountsRepository(db),
    credentials: new CredentialsRepository(db),
    usageRecords: new UsageRecordsRepository(db),
  }
}
