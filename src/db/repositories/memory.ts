import { ConflictError } from '../../errors.js'
import type {
  AccountRecord,
  AccountsStore,
  CreateCredentialInput,
  CreateUsageRecordInput,
  CredentialMatch,
  CredentialRecord,
  CredentialsStore,
  Stores,
  UsageRecord,
  UsageRecordsStore,
  UsageSummary,
} from './types.js'

const HOUR_MS = 60 * 60 * 1000

type StoredCredential = CredentialRecord & { fingerprint: string }

/**
 * Rows for the in-process stores. One instance per app; stores created from
 * the same state see each other's writes the way tables in one database do.
 */
export class MemoryState {
  readonly accounts = new Map<string, AccountRecord>()
  readonly credentials = new Map<string, StoredCredential>()
  readonly usageRecords: UsageRecord[] = []
  private sequence = 0

  constructor(readonly now: () => number = Date.now) {}

  nextId(): string {
    this.sequence += 1
    return String(this.sequence)
  }
}

const copyCredential = ({ fingerprint: _fingerprint, ...record }: StoredCredential): CredentialRecord => ({
  ...record,
})

export class MemoryAccountsStore implements AccountsStore {
  constructor(private readonly state: MemoryState) {}

  async create(email: string): Promise<AccountRecord> {
    for (const account of this.state.accounts.values()) {
      if (account.email === email) {
        throw new ConflictError('Account email already exists')
      }
    }
    const account: AccountRecord = {
      id: this.state.nextId(),
      email,
      active: true,
      createdAt: new Date(this.state.now()),
    }
    this.state.accounts.set(account.id, account)
    return { ...account }
  }

  async findById(id: string): Promise<AccountRecord | null> {
    const account = this.state.accounts.get(id)
    return account ? { ...account } : null
  }

  async setActive(id: string, active: boolean): Promise<AccountRecord | null> {
    const account = this.state.accounts.get(id)
    if (!account) return null
    account.active = active
    return { ...account }
  }
}

export class MemoryCredentialsStore implements CredentialsStore {
  constructor(private readonly state: MemoryState) {}

  async create(input: CreateCredentialInput): Promise<CredentialRecord> {
    if (!this.state.accounts.has(input.accountId)) {
      throw new Error(`Account ${input.accountId} does not exist`)
    }
    for (const credential of this.state.credentials.values()) {
      if (credential.fingerprint === input.fingerprint) {
        throw new ConflictError('Credential fingerprint already exists')
      }
    }
    const credential: StoredCredential = {
      id: this.state.nextId(),
      accountId: input.accountId,
      fingerprint: input.fingerprint,
      keyPrefix: input.keyPrefix,
      planTier: input.planTier,
      active: true,
      createdAt: new Date(this.state.now()),
    }
    this.state.credentials.set(credential.id, credential)
    return copyCredential(credential)
  }

  async findById(id: string): Promise<CredentialRecord | null> {
    const credential = this.state.credentials.get(id)
    return credential ? copyCredential(credential) : null
  }

  async findByFingerprint(fingerprint: string): Promise<CredentialMatch | null> {
    for (const credential of this.state.credentials.values()) {
      if (credential.fingerprint === fingerprint) {
        const account = this.state.accounts.get(credential.accountId)
        return { ...copyCredential(credential), accountActive: account?.active ?? false }
      }
    }
    return null
  }

  async listByAccount(accountId: string): Promise<CredentialRecord[]> {
    return [...this.state.credentials.values()]
      .filter((credential) => credential.accountId === accountId)
      .reverse()
      .map(copyCredential)
  }

  async deactivate(id: string): Promise<boolean> {
    const credential = this.state.credentials.get(id)
    if (!credential) return false
    credential.active = false
    return true
  }
}

export class MemoryUsageRecordsStore implements UsageRecordsStore {
  constructor(private readonly state: MemoryState) {}

  async create(input: CreateUsageRecordInput): Promise<UsageRecord> {
    const record: UsageRecord = {
      id: this.state.nextId(),
      ...input,
      createdAt: new Date(this.state.now()),
    }
    this.state.usageRecords.push(record)
    return { ...record }
  }

  async countSince(credentialId: string, windowHours: number): Promise<number> {
    return this.inWindow(credentialId, windowHours).length
  }

  async summarize(credentialId: string, windowHours: number): Promise<UsageSummary> {
    const records = this.inWindow(credentialId, windowHours)
    const calls = new Map<string, number>()
    let latencyTotal = 0
    for (const record of records) {
      calls.set(record.endpoint, (calls.get(record.endpoint) ?? 0) + 1)
      latencyTotal += record.latencyMs
    }

    const byEndpoint = [...calls.entries()]
      .map(([endpoint, count]) => ({ endpoint, calls: count }))
      .sort((a, b) => b.calls - a.calls || a.endpoint.localeCompare(b.endpoint))
      .slice(0, 10)

    return {
      totalCalls: records.length,
      averageLatencyMs:
        records.length === 0 ? 0 : Math.round((latencyTotal / records.length) * 100) / 100,
      byEndpoint,
    }
  }

  private inWindow(credentialId: string, windowHours: number): UsageRecord[] {
    const since = this.state.now() - windowHours * HOUR_MS
    return this.state.usageRecords.filter(
      (record) => record.credentialId === credentialId && record.createdAt.getTime() >= since
    )
  }
}

export function createMemoryStores(state: MemoryState = new MemoryState()): Stores {
  return {
    accounts: new MemoryAccountsStore(state),
    credentials: new MemoryCredentialsStore(state),
    usageRecords: new MemoryUsageRecordsStore(state),
  }
}
