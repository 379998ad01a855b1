import type { ErrorHandler } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { HTTPException } from 'hono/http-exception';
import { adminLogger as logger } from '../../utils/logger.js';
import { AppError } from './index.js';

export function createHonoErrorHandler(): ErrorHandler {
    return (err, c) => {
        if (err instanceof AppError) {
            const { code, message, statusCode } = err;
            const logMethod = statusCode >= 500 ? 'error' : 'warn';
            logger[logMethod]({ err, statusCode }, `AppError: ${code}`);

            return c.json(
                { error: { code, message, statusCode, ...(err.details ? { details: err.details } : {}) } },
                statusCode as ContentfulStatusCode
            );
        }

        // bearer-auth and body parsing failures arrive as HTTPException
        if (err instanceof HTTPException) {
            return err.getResponse();
        }

        logger.error({ err }, 'Unhandled error');
        return c.json(
            { error: { code: 'INTERNAL_ERROR', message: 'Internal Server Error', statusCode: 500 } },
            500
        );
    };
}
