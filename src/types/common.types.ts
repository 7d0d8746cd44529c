/**
 * Shared common types
 */

import type { ErrorKind, FieldError } from '../utils/errors';

export interface ErrorResponse {
    success: false;
    error: ErrorKind;
    message: string;
    code: number;
    errors?: FieldError[];
}
