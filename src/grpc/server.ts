import * as grpc from '@grpc/grpc-js';
import * as protoLoader from '@grpc/proto-loader';
import { timingSafeEqual } from 'crypto';
import path from 'path';
import fs from 'fs';
import { dirname } from 'path';
import { fileURLToPath } from 'url';
import type { AppConfig } from '../config/index.js';
import type { CredentialService } from '../services/credentials.js';
import type { QuotaPolicy } from '../services/quotaPolicy.js';
import type { UsageLedger } from '../services/usageLedger.js';
import { createProvisioningHandlers, type ProvisioningServiceHandlers } from './services/provisioning.service.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const PROTO_PATH = path.resolve(__dirname, '../../proto/provisioning.proto');
const SERVICE_NAME = 'keygate.provisioning.ProvisioningService';

export type GrpcConfig = AppConfig['grpc'];

export function loadProvisioningService(): protoLoader.ServiceDefinition {
    const packageDefinition = protoLoader.loadSync(PROTO_PATH, {
        keepCase: true,
        longs: String,
        enums: String,
        defaults: true,
        oneofs: true,
    });

    const definition = packageDefinition[SERVICE_NAME];
    if (!definition || 'format' in definition) {
        throw new Error(`${SERVICE_NAME} is not defined in ${PROTO_PATH}`);
    }
    return definition;
}

const provisioningService = loadProvisioningService();

const secretsMatch = (presented: string, expected: string): boolean => {
    const a = Buffer.from(presented);
    const b = Buffer.from(expected);
    return a.length === b.length && timingSafeEqual(a, b);
};

/**
 * Internal callers must send `authorization: Bearer <shared secret>`.
 * @grpc/grpc-js has no server-side interceptors for unary calls, so each
 * handler is wrapped instead.
 */
export function withAuth<Req, Res>(secret: string, handler: grpc.handleUnaryCall<Req, Res>): grpc.handleUnaryCall<Req, Res> {
    return (call, callback) => {
        const [token] = call.metadata.get('authorization');
        if (typeof token !== 'string' || !secretsMatch(token, `Bearer ${secret}`)) {
            callback({
                code: grpc.status.UNAUTHENTICATED,
                details: 'Invalid or missing authentication token',
            });
            return;
        }
        handler(call, callback);
    };
}

/**
 * Creates and configures the gRPC server.
 */
export function createGrpcServer(handlers: ProvisioningServiceHandlers, secret: string): grpc.Server {
    const server = new grpc.Server();

    server.addService(provisioningService, {
        IssueKey: withAuth(secret, handlers.IssueKey),
        RevokeKey: withAuth(secret, handlers.RevokeKey),
        ListKeys: withAuth(secret, handlers.ListKeys),
        GetUsage: withAuth(secret, handlers.GetUsage),
    });

    return server;
}

function loadCredentials(config: GrpcConfig): grpc.ServerCredentials {
    if (!config.tls) {
        console.warn('gRPC Server configured with Insecure credentials. Use TLS in production.');
        return grpc.ServerCredentials.createInsecure();
    }

    const cert = fs.readFileSync(config.tls.certPath);
    const key = fs.readFileSync(config.tls.keyPath);
    const ca = config.tls.caPath ? fs.readFileSync(config.tls.caPath) : null;

    console.log('gRPC Server configured with TLS.');
    return grpc.ServerCredentials.createSsl(
        ca,
        [{ cert_chain: cert, private_key: key }],
        ca !== null // verify client certificates when a CA is configured
    );
}

/**
 * Starts the provisioning gRPC server on `config.port`.
 */
export function startGrpcServer(
    credentials: CredentialService,
    ledger: UsageLedger,
    policy: QuotaPolicy,
    config: GrpcConfig,
): Promise<grpc.Server> {
    return new Promise((resolve, reject) => {
        const server = createGrpcServer(createProvisioningHandlers(credentials, ledger, policy), config.internalSecret);

        let serverCredentials: grpc.ServerCredentials;
        try {
            serverCredentials = loadCredentials(config);
        } catch (error) {
            console.error('Failed to load TLS certificates for gRPC server:', error);
            reject(error);
            return;
        }

        server.bindAsync(
            `0.0.0.0:${config.port}`,
            serverCredentials,
            (error, boundPort) => {
                if (error) {
                    console.error('Failed to bind gRPC server:', error);
                    reject(error);
                } else {
                    console.log(`Provisioning gRPC Service listening on port ${boundPort}`);
                    resolve(server);
                }
            }
        );
    });
}
