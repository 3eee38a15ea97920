/**
 * 라우터 공통 에러 처리
 */
import type { Response } from 'express';
import {
    AuthError,
    InvalidRepositoryError,
    NotFoundError,
    RateLimitError,
    StorageError,
    TransientNetworkError,
    errorMessage,
} from '../shared/errors.js';

export function statusCodeOf(error: unknown): number {
    if (error instanceof InvalidRepositoryError) return 400;
    if (error instanceof NotFoundError) return 404;
    if (error instanceof RateLimitError) return 429;
    if (error instanceof AuthError || error instanceof TransientNetworkError) return 502;
    if (error instanceof StorageError) return 503;
    return 500;
}

export function handleError(
    res: Response,
    error: unknown,
    defaultMessage: string = 'Internal server error'
): void {
    const statusCode = statusCodeOf(error);
    const message = errorMessage(error);

    if (statusCode >= 500) {
        console.error('❌ API Error:', { statusCode, message, name: error instanceof Error ? error.name : undefined });
    } else {
        console.warn(`⚠️  API ${statusCode}: ${message}`);
    }

    if (error instanceof RateLimitError) {
        res.setHeader('Retry-After', String(Math.ceil(error.retryAfterMs / 1000)));
    }

    res.status(statusCode).json({
        error: defaultMessage,
        message,
    });
}
