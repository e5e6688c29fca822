/** Paging info attached to list endpoints. */
export interface ListMeta {
    /** Items in this response. */
    count: number;
    /** Items matching the filter before the limit was applied. */
    matched: number;
}

export interface ApiError {
    code: number;
    message: string;
    details?: unknown;
}

export type ApiResponse<T> =
    | { status: 'success'; data: T; meta?: ListMeta }
    | { status: 'error'; error: ApiError };

export const successResponse = <T>(data: T): ApiResponse<T> => ({ status: 'success', data });

export const listResponse = <T>(items: T[], matched: number): ApiResponse<T[]> => ({
    status: 'success',
    data: items,
    meta: { count: items.length, matched }
});

export const errorResponse = (message: string, code = 500, details?: unknown): ApiResponse<never> => ({
    status: 'error',
    error: details === undefined ? { code, message } : { code, message, details }
});
