import axios from 'axios';
import type { z } from 'zod';
import { describeIssues } from '../../utils/mood-vector';

export interface HttpFailure {
    status?: number;
    timedOut: boolean;
    message: string;
    body?: unknown;
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/**
 * Normalizes anything thrown by an axios call into status / timeout / message.
 */
export const describeHttpFailure = (error: unknown): HttpFailure => {
    if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        const timedOut = error.code !== undefined && TIMEOUT_CODES.has(error.code);
        return {
            status,
            timedOut,
            message: timedOut ? 'request timed out' : status ? `HTTP ${status}` : error.message,
            body: error.response?.data
        };
    }
    return {
        timedOut: false,
        message: error instanceof Error ? error.message : String(error)
    };
};

export type ParseResult<T> = { ok: true; value: T } | { ok: false; reason: string };

/**
 * Validates an upstream payload against its expected shape.
 */
export const parsePayload = <S extends z.ZodTypeAny>(schema: S, payload: unknown): ParseResult<z.infer<S>> => {
    const parsed = schema.safeParse(payload);
    if (parsed.success) {
        return { ok: true, value: parsed.data };
    }
    return { ok: false, reason: describeIssues(parsed.error) };
};
