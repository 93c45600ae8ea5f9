/**
 * Wire envelope shared by every endpoint.
 * HTTP status stays 200; callers inspect `success`.
 */
export interface ApiResponse<T> {
  success: boolean;
  data: T;
}

/**
 * Internal tagged result. Services return this and routes flatten it
 * into an ApiResponse at the boundary.
 */
export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };

export const ok = <T>(value: T): Result<T> => ({ ok: true, value });

export const fail = <T = never>(error: string): Result<T> => ({ ok: false, error });

/** Flatten a Result into the wire envelope, building placeholder data on failure. */
export function toApiResponse<T>(result: Result<T>, onError: (error: string) => T): ApiResponse<T> {
  return result.ok
    ? { success: true, data: result.value }
    : { success: false, data: onError(result.error) };
}
