import * as grpc from '@grpc/grpc-js';
import { z } from 'zod';
import { ConflictError, NotFoundError, ValidationError } from '../../errors.js';
import { toFieldIssues } from '../../middleware/validate.js';
import type { CredentialService } from '../../services/credentials.js';
import { QUOTA_WINDOW_HOURS, type QuotaPolicy } from '../../services/quotaPolicy.js';
import type { UsageLedger } from '../../services/usageLedger.js';
import { PlanTier, parsePlanTier } from '../../types/plan.js';

// Types derived from ProvisioningService proto (keepCase, defaults)
export interface IssueKeyRequest {
  account_id: string;
  plan_tier: string;
}

export interface IssueKeyResponse {
  api_key: string;
  credential_id: string;
  key_prefix: string;
  plan_tier: string;
}

export interface RevokeKeyRequest {
  credential_id: string;
}

export interface RevokeKeyResponse {
  revoked: boolean;
}

export interface ListKeysRequest {
  account_id: string;
}

export interface KeySummary {
  credential_id: string;
  key_prefix: string;
  plan_tier: string;
  created_at: string;
  active: boolean;
}

export interface ListKeysResponse {
  keys: KeySummary[];
}

export interface GetUsageRequest {
  credential_id: string;
  days: number;
}

export interface GetUsageResponse {
  plan_tier: string;
  limit: number;
  calls_today: number;
  remaining: number;
  total_calls: number;
  average_latency_ms: number;
  top_endpoints: { endpoint: string; calls: number }[];
}

export type ProvisioningServiceHandlers = {
  IssueKey: grpc.handleUnaryCall<IssueKeyRequest, IssueKeyResponse>;
  RevokeKey: grpc.handleUnaryCall<RevokeKeyRequest, RevokeKeyResponse>;
  ListKeys: grpc.handleUnaryCall<ListKeysRequest, ListKeysResponse>;
  GetUsage: grpc.handleUnaryCall<GetUsageRequest, GetUsageResponse>;
};

// ids are BIGSERIAL keys
const requiredId = (field: string) => z.string().trim().regex(/^\d+$/, `${field} must be a numeric id`);

const issueKeySchema = z.object({
  account_id: requiredId('account_id'),
  // proto3 sends '' for an unset string; that means the default plan
  plan_tier: z
    .string()
    .transform((value, ctx) => {
      const tier = value === '' ? PlanTier.FREE : parsePlanTier(value);
      if (!tier) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown plan tier '${value}'` });
        return z.NEVER;
      }
      return tier;
    }),
});

const revokeKeySchema = z.object({ credential_id: requiredId('credential_id') });

const listKeysSchema = z.object({ account_id: requiredId('account_id') });

const getUsageSchema = z.object({
  credential_id: requiredId('credential_id'),
  days: z
    .number()
    .int()
    .max(90)
    .transform((days) => (days <= 0 ? 1 : days)),
});

function parseMessage<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, message: unknown): T {
  const result = schema.safeParse(message);
  if (!result.success) {
    throw new ValidationError(toFieldIssues(result.error.issues, 'request'));
  }
  return result.data;
}

export function toServiceError(err: unknown): grpc.ServerErrorResponse {
  const serviceError = (code: grpc.status, details: string) =>
    Object.assign(new Error(details), { code, details });

  if (err instanceof ValidationError) {
    return serviceError(
      grpc.status.INVALID_ARGUMENT,
      err.issues.map((issue) => `${issue.field}: ${issue.message}`).join('; '),
    );
  }
  if (err instanceof NotFoundError) {
    return serviceError(grpc.status.NOT_FOUND, err.message);
  }
  if (err instanceof ConflictError) {
    return serviceError(grpc.status.ALREADY_EXISTS, err.message);
  }
  console.error('[ProvisioningService] Unexpected error:', err);
  return serviceError(grpc.status.INTERNAL, 'Internal error');
}

/**
 * Adapts a promise-returning operation to a unary gRPC handler.
 */
export function unary<Req, Res>(operation: (request: Req) => Promise<Res>): grpc.handleUnaryCall<Req, Res> {
  return (call, callback) => {
    operation(call.request).then(
      (response) => callback(null, response),
      (err: unknown) => callback(toServiceError(err)),
    );
  };
}

/**
 * Handlers for the internal provisioning API used by account management
 * and purchase processing.
 */
export function createProvisioningHandlers(
  credentials: CredentialService,
  ledger: UsageLedger,
  policy: QuotaPolicy,
): ProvisioningServiceHandlers {
  return {
    IssueKey: unary<IssueKeyRequest, IssueKeyResponse>(async (message) => {
      const request = parseMessage(issueKeySchema, message);
      const { apiKey, credential } = await credentials.issue(request.account_id, request.plan_tier);
      return {
        api_key: apiKey,
        credential_id: credential.id,
        key_prefix: credential.keyPrefix,
        plan_tier: credential.planTier,
      };
    }),

    RevokeKey: unary<RevokeKeyRequest, RevokeKeyResponse>(async (message) => {
      const request = parseMessage(revokeKeySchema, message);
      const revoked = await credentials.revoke(request.credential_id);
      if (!revoked) {
        throw new NotFoundError('Credential', request.credential_id);
      }
      return { revoked };
    }),

    ListKeys: unary<ListKeysRequest, ListKeysResponse>(async (message) => {
      const request = parseMessage(listKeysSchema, message);
      const records = await credentials.listForAccount(request.account_id);
      return {
        keys: records.map((record) => ({
          credential_id: record.id,
          key_prefix: record.keyPrefix,
          plan_tier: record.planTier,
          created_at: record.createdAt.toISOString(),
          active: record.active,
        })),
      };
    }),

    GetUsage: unary<GetUsageRequest, GetUsageResponse>(async (message) => {
      const request = parseMessage(getUsageSchema, message);
      const credential = await credentials.get(request.credential_id);
      if (!credential) {
        throw new NotFoundError('Credential', request.credential_id);
      }
      const callsToday = await ledger.countWindow(credential.id, QUOTA_WINDOW_HOURS);
      const decision = policy.evaluate(credential.planTier, callsToday);
      const summary = await ledger.summary(credential.id, request.days);
      return {
        plan_tier: credential.planTier,
        limit: decision.ceiling,
        calls_today: callsToday,
        remaining: decision.remaining,
        total_calls: summary.totalCalls,
        average_latency_ms: summary.averageLatencyMs,
        top_endpoints: summary.byEndpoint,
      };
    }),
  };
}
