import type { UsageRecordsStore, UsageSummary } from '../db/repositories/index.js';

export const DEFAULT_WRITE_TIMEOUT_MS = 2000;

export interface UsageEntry {
    credentialId: string;
    endpoint: string;
    latencyMs: number;
    statusCode: number;
}

class LedgerTimeoutError extends Error {
    constructor(timeoutMs: number) {
        super(`usage write timed out after ${timeoutMs}ms`);
        this.name = 'LedgerTimeoutError';
    }
}

/**
 * Append-only log of metered calls and the window counts the quota reads.
 *
 * `record` never rejects: a failed or slow write is logged and dropped, so
 * the ledger can undercount but never writes one request twice.
 */
export class UsageLedger {
    constructor(
        private readonly store: UsageRecordsStore,
        private readonly writeTimeoutMs: number = DEFAULT_WRITE_TIMEOUT_MS,
    ) {}

    public async record(entry: UsageEntry): Promise<boolean> {
        let timer: NodeJS.Timeout | undefined;
        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(() => reject(new LedgerTimeoutError(this.writeTimeoutMs)), this.writeTimeoutMs);
        });

        try {
            await Promise.race([this.store.create(entry), timeout]);
            return true;
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            console.warn(
                `[UsageLedger] Dropped usage record for credential ${entry.credentialId} ` +
                `(${entry.endpoint} ${entry.statusCode}): ${reason}`,
            );
            return false;
        } finally {
            clearTimeout(timer);
        }
    }

    public async countWindow(credentialId: string, windowHours: number): Promise<number> {
        return this.store.countSince(credentialId, windowHours);
    }

    public async summary(credentialId: string, days: number): Promise<UsageSummary> {
        return this.store.summarize(credentialId, days * 24);
    }
}
