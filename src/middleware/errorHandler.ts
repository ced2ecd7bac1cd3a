import type { ErrorRequestHandler, RequestHandler } from 'express';
import { ApiError } from '../errors.js';

const HELPFUL_MESSAGES: Record<number, string> = {
    400: 'Bad Request - Check your request parameters',
    404: 'Not Found - Endpoint or resource doesn\'t exist',
    405: 'Method Not Allowed - Check HTTP method (GET/POST/etc)',
};

const hasStatus = (err: unknown): err is { status: number } =>
    typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number';

export const notFoundHandler: RequestHandler = (req, res) => {
    res.status(404).json({
        success: false,
        error: HELPFUL_MESSAGES[404],
        details: {},
        path: req.path,
    });
};

/**
 * Renders every error as `{ success: false, error, details, path }`.
 * Anything that is not an `ApiError` or a body-parser 4xx is logged and
 * collapsed into a generic 500.
 */
export function createErrorHandler(supportEmail: string): ErrorRequestHandler {
    return (err: unknown, req, res, next) => {
        if (res.headersSent) {
            next(err);
            return;
        }

        if (err instanceof ApiError) {
            if (err.statusCode >= 500) {
                console.error(`[ErrorHandler] ${req.method} ${req.path} failed:`, err);
            }
            res.status(err.statusCode).json({
                success: false,
                error: err.message,
                details: err.details,
                path: req.path,
            });
            return;
        }

        // body-parser errors (malformed JSON, oversized payloads)
        if (hasStatus(err) && err.status >= 400 && err.status < 500) {
            res.status(err.status).json({
                success: false,
                error: HELPFUL_MESSAGES[err.status] ?? 'Bad Request - Check your request parameters',
                details: {},
                path: req.path,
            });
            return;
        }

        console.error(`[ErrorHandler] Unexpected error on ${req.method} ${req.path}:`, err);
        res.status(500).json({
            success: false,
            error: 'Internal server error',
            details: {
                message: 'An unexpected error occurred',
                support: `Contact ${supportEmail} with the time of the request`,
            },
            path: req.path,
        });
    };
}
