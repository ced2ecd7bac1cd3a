import type { ZodIssue, ZodType, ZodTypeDef } from 'zod';
import { ValidationError, type FieldIssue } from '../errors.js';

export const toFieldIssues = (issues: ZodIssue[], location: string): FieldIssue[] =>
    issues.map((issue) => ({
        field: [location, ...issue.path].join(' -> '),
        message: issue.message,
    }));

/**
 * Parses one part of a request (`body`, `query`, `params`) and throws a
 * 422 `ValidationError` listing every failing field.
 */
export function parseRequest<T>(
    schema: ZodType<T, ZodTypeDef, unknown>,
    value: unknown,
    location: 'body' | 'query' | 'params',
): T {
    const result = schema.safeParse(value);
    if (!result.success) {
        throw new ValidationError(toFieldIssues(result.error.issues, location));
    }
    return result.data;
}
