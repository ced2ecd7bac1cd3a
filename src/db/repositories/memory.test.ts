import { describe, it, expect, beforeEach } from 'vitest'
import { ConflictError } from '../../errors.js'
import { PlanTier } from '../../types/plan.js'
import { MemoryState, createMemoryStores } from './memory.js'
import type { Stores } from './types.js'

describe('memory stores', () => {
  let state: MemoryState
  let stores: Stores

  beforeEach(() => {
    state = new MemoryState(() => Date.parse('2026-03-01T12:00:00.000Z'))
    stores = createMemoryStores(state)
  })

  it('rejects a second account with the same email', async () => {
    await stores.accounts.create('owner@example.com')

    await expect(stores.accounts.create('owner@example.com')).rejects.toBeInstanceOf(ConflictError)
  })

  it('refuses credentials for an unknown account', async () => {
    await expect(
      stores.credentials.create({ accountId: '42', fingerprint: 'f', keyPrefix: 'p', planTier: PlanTier.FREE })
    ).rejects.toThrow('Account 42 does not exist')
  })

  it('enforces unique fingerprints', async () => {
    const account = await stores.accounts.create('owner@example.com')
    const input = { accountId: account.id, fingerprint: 'f', keyPrefix: 'p', planTier: PlanTier.FREE }
    await stores.credentials.create(input)

    await expect(stores.credentials.create(input)).rejects.toBeInstanceOf(ConflictError)
  })

  it('reflects the account flag in fingerprint lookups', async () => {
    const account = await stores.accounts.create('owner@example.com')
    await stores.credentials.create({ accountId: account.id, fingerprint: 'f', keyPrefix: 'p', planTier: PlanTier.PRO })

    expect(await stores.credentials.findByFingerprint('f')).toMatchObject({ active: true, accountActive: true })

    await stores.accounts.setActive(account.id, false)

    expect(await stores.credentials.findByFingerprint('f')).toMatchObject({ active: true, accountActive: false })
  })

  it('hands out copies rather than live rows', async () => {
    const account = await stores.accounts.create('owner@example.com')
    const created = await stores.credentials.create({
      accountId: account.id,
      fingerprint: 'f',
      keyPrefix: 'p',
      planTier: PlanTier.FREE,
    })
    created.active = false

    expect((await stores.credentials.findById(created.id))?.active).toBe(true)
  })

  it('returns an empty summary for a credential with no usage', async () => {
    expect(await stores.usageRecords.summarize('1', 24)).toEqual({
      totalCalls: 0,
      averageLatencyMs: 0,
      byEndpoint: [],
    })
  })
})
