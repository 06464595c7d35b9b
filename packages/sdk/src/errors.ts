import { ErrorDetail } from './types';

export function toErrorDetail(err: unknown): ErrorDetail {
    if (err instanceof Error) {
        return err.stack
            ? { name: err.name, message: err.message, stack: err.stack }
            : { name: err.name, message: err.message };
    }
    return { name: 'Error', message: String(err) };
}

export function formatErrorDetail(detail: ErrorDetail): string {
    return `${detail.name}: ${detail.message}`;
}
