import type { z } from 'zod';
import { ErrorCodes, fail, ok, type ServiceResult } from '../../types/index.js';

/**
 * Boundary check for a request body: not an object or no `type` is a
 * validation error, an unknown `type` is UNKNOWN_REQUEST, a known type with
 * a bad shape is a validation error listing the offending fields.
 */
export function parseRequest<T extends { type: string }>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    knownTypes: ReadonlySet<string>,
    body: unknown
): ServiceResult<T> {
    if (typeof body !== 'object' || body === null) {
        return fail(ErrorCodes.VALIDATION_ERROR, 'Bad message');
    }
    const type: unknown = Reflect.get(body, 'type');
    if (typeof type !== 'string') return fail(ErrorCodes.VALIDATION_ERROR, 'Bad message');
    if (!knownTypes.has(type)) return fail(ErrorCodes.UNKNOWN_REQUEST, 'Unknown request', { type });

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
        return fail(ErrorCodes.VALIDATION_ERROR, 'Invalid request', {
            type,
            fields: parsed.error.issues.map((issue) => issue.path.join('.') || '(root)'),
        });
    }
    return ok(parsed.data);
}
