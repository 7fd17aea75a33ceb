import { BackendError, PolicyStoreError, errorMessage } from '@tessera/core';
import { logger } from '../utils/logger';

export interface TransactionControl {
  begin(): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

/**
 * Leaves policy store errors as they are and wraps anything else a driver
 * throws in a BackendError.
 */
export function toBackendError(err: unknown, action: string): PolicyStoreError {
  if (err instanceof PolicyStoreError) return err;
  return new BackendError(`${action} failed: ${errorMessage(err)}`, { cause: err });
}

/**
 * Begin, run, commit. Any rejection from `work` or from the commit rolls the
 * transaction back and is rethrown unchanged. If the rollback fails too, the
 * caller gets a BackendError holding the original error as `cause` and the
 * rollback failure as `rollbackError`.
 */
export async function runTransaction<T>(control: TransactionControl, work: () => Promise<T>): Promise<T> {
  try {
    await control.begin();
  } catch (err) {
    throw toBackendError(err, 'BEGIN');
  }

  try {
    const result = await work();
    try {
      await control.commit();
    } catch (err) {
      throw toBackendError(err, 'COMMIT');
    }
    return result;
  } catch (err) {
    try {
      await control.rollback();
    } catch (rollbackError) {
      logger.error({ err, rollbackError }, 'Rollback failed');
      throw new BackendError(
        `${errorMessage(err)} (rollback also failed: ${errorMessage(rollbackError)})`,
        { cause: err, rollbackError }
      );
    }
    logger.warn({ err: errorMessage(err) }, 'Transaction rolled back');
    throw err;
  }
}
