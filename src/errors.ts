import type { Logger } from 'pino';

export class RemoteCallError extends Error {
  constructor(
    public readonly operation: string,
    public readonly status: number | undefined,
    options: { cause: unknown }
  ) {
    super(
      `${operation} failed${status !== undefined ? ` with status ${status}` : ''}: ${messageOf(options.cause)}`,
      options
    );
    this.name = 'RemoteCallError';
  }
}

/** Raised when the audit input cannot produce a faithful report. */
export class AuditError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AuditError';
  }
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Reads the HTTP status off a Google API client error. Gaxios errors carry it
 * on `response.status`; some older paths only set a numeric `code`.
 */
export function statusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  if ('response' in error) {
    const response: unknown = error.response;
    if (
      typeof response === 'object' &&
      response !== null &&
      'status' in response &&
      typeof response.status === 'number'
    ) {
      return response.status;
    }
  }
  if ('code' in error && typeof error.code === 'number') {
    return error.code;
  }
  return undefined;
}

/**
 * Awaits a Drive or Sheets API call. A failure is logged here, once, and
 * rethrown as a RemoteCallError so the run aborts.
 */
export async function callRemote<T>(
  logger: Logger,
  operation: string,
  context: Record<string, unknown>,
  call: () => Promise<T>
): Promise<T> {
  try {
    return await call();
  } catch (error) {
    const status = statusOf(error);
    logger.error({ err: error, operation, status, ...context }, 'Remote call failed');
    throw new RemoteCallError(operation, status, { cause: error });
  }
}
