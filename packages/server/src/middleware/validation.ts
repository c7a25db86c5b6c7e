import type { ZodError } from 'zod';

/**
 * Hook for `zValidator` that hands validation failures to the OAuth
 * error handler, which reports them as invalid_request
 */
export function rejectInvalid(result: { success: true } | { success: false; error: ZodError }): void {
  if (!result.success) {
    throw result.error;
  }
}
