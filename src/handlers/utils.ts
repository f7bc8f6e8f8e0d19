import type { z } from 'zod';
import { createInvalidArgumentsError } from '../types/index.js';

/**
 * Validate raw tool arguments against a schema.
 * Throws an INVALID_ARGUMENTS exception listing every issue.
 */
export function parseArgs<T extends z.ZodTypeAny>(schema: T, args: unknown): z.infer<T> {
    const parsed = schema.safeParse(args);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue =>
            issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
        );
        throw createInvalidArgumentsError('Invalid tool arguments', issues);
    }
    return parsed.data;
}
