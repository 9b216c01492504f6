/**
 * Context passed explicitly into every log line of a dispatch run
 */
export interface LogContext {
  runId?: string;
  eventId?: string;
  paymentId?: string;
  clientId?: string;
}

/**
 * Render a context as a `key=value` suffix, e.g. ` (runId=abc eventId=def)`
 */
export function formatLogContext(context: LogContext): string {
  const parts = Object.entries(context)
    .filter(([, value]) => value !== undefined && value !== '')
    .map(([key, value]) => `${key}=${value}`);
  return parts.length > 0 ? ` (${parts.join(' ')})` : '';
}
