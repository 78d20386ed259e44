import { ConnectorError, errorMessage, type IHandle } from '@opendata-linker/core';
import { ReconcileError, type ReadSource } from './reconcile-error.js';

/**
 * Wrap a handle failure as SOURCE_UNAVAILABLE for the given side
 */
export function sourceUnavailable(source: ReadSource, error: unknown): ReconcileError {
  if (error instanceof ReconcileError) {
    return error;
  }

  return new ReconcileError({
    code: 'SOURCE_UNAVAILABLE',
    message: `Cannot read the ${source}: ${errorMessage(error)}`,
    source,
    suggestion: error instanceof ConnectorError ? error.suggestion : undefined,
    cause: error instanceof Error ? error : undefined,
  });
}

/**
 * Connect a handle unless it is already connected
 */
export async function ensureConnected(handle: IHandle, source: ReadSource): Promise<void> {
  if (handle.state === 'connected') {
    return;
  }
  try {
    await handle.connect();
  } catch (error) {
    throw sourceUnavailable(source, error);
  }
}
