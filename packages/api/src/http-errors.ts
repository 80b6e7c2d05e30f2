import { type Response } from 'express';
import { type DispatchError, type DispatchErrorCode } from '@kiln/core';

/** Non-standard, as used by nginx for a client that went away. */
export const CLIENT_CLOSED_REQUEST = 499;

const STATUS_BY_CODE: Record<DispatchErrorCode, number> = {
    ValidationError: 400,
    SessionBusy: 409,
    Cancelled: CLIENT_CLOSED_REQUEST,
    InferenceTimeout: 502,
    InferenceError: 502,
    Overloaded: 503,
    ServiceUnavailable: 503
};

export interface ErrorBody {
    error: {
        code: string;
        message: string;
        retryable: boolean;
    };
}

export function statusForDispatchError(error: DispatchError): number {
    return STATUS_BY_CODE[error.code];
}

export function sendDispatchError(res: Response, error: DispatchError, retryAfterSeconds: number): void {
    if (error.code === 'Overloaded') {
        res.setHeader('Retry-After', String(retryAfterSeconds));
    }
    sendError(res, statusForDispatchError(error), {
        error: { code: error.code, message: error.message, retryable: error.retryable }
    });
}

export function sendError(res: Response, status: number, body: ErrorBody): void {
    if (res.headersSent || res.destroyed) return;
    res.status(status).json(body);
}
