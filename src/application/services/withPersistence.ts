import { isAppError, PersistenceFailure } from '../errors/AppError.js';

/**
 * Runs a storage call, turning anything that is not already an `AppError`
 * into a `PersistenceFailure` so driver details never reach the client.
 */
export const withPersistence = async <T>(operation: string, call: () => Promise<T>): Promise<T> => {
  try {
    return await call();
  } catch (error) {
    if (isAppError(error)) {
      throw error;
    }

    throw new PersistenceFailure(operation, error);
  }
};
