import type { PlanTier } from '../../types/plan.js'

export interface AccountRecord {
  id: string
  email: string
  active: boolean
  createdAt: Date
}

export interface CredentialRecord {
  id: string
  accountId: string
  keyPrefix: string
  planTier: PlanTier
  active: boolean
  createdAt: Date
}

/** A credential row together with its owning account's active flag. */
export interface CredentialMatch extends CredentialRecord {
  accountActive: boolean
}

export interface CreateCredentialInput {
  accountId: string
  fingerprint: string
  keyPrefix: string
  planTier: PlanTier
}

export interface UsageRecord {
  id: string
  credentialId: string
  endpoint: string
  latencyMs: number
  statusCode: number
  createdAt: Date
}

export interface CreateUsageRecordInput {
  credentialId: string
  endpoint: string
  latencyMs: number
  statusCode: number
}

export interface EndpointUsage {
  endpoint: string
  calls: number
}

export interface UsageSummary {
  totalCalls: number
  averageLatencyMs: number
  byEndpoint: EndpointUsage[]
}

export interface AccountsStore {
  create(email: string): Promise<AccountRecord>
  findById(id: string): Promise<AccountRecord | null>
  setActive(id: string, active: boolean): Promise<AccountRecord | null>
}

export interface CredentialsStore {
  /** Rejects with `ConflictError` when the fingerprint is already taken. */
  create(input: CreateCredentialInput): Promise<CredentialRecord>
  findById(id: string): Promise<CredentialRecord | null>
  findByFingerprint(fingerprint: string): Promise<CredentialMatch | null>
  listByAccount(accountId: string): Promise<CredentialRecord[]>
  deactivate(id: string): Promise<boolean>
}

export interface UsageRecordsStore {
  create(input: CreateUsageRecordInput): Promise<UsageRecord>
  countSince(credentialId: string, windowHours: number): Promise<number>
  summarize(credentialId: string, windowHours: number): Promise<UsageSummary>
}

export interface Stores {
  accounts: AccountsStore
  credentials: CredentialsStore
  usageRecords: UsageRecordsStore
}
