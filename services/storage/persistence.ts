// services/storage/persistence.ts
import logger from '../../utils/logger';
import { PersistenceError, describeError } from '../../utils/pipelineErrors';

// Wraps a database call so callers only ever see PersistenceError.
export const withPersistence = async <T>(operation: string, fn: () => Promise<T>): Promise<T> => {
    try {
        return await fn();
    } catch (error: unknown) {
        if (error instanceof PersistenceError) throw error;
        logger.error(`💾 ${operation} failed: ${describeError(error)}`);
        throw new PersistenceError(`${operation} failed: ${describeError(error)}`);
    }
};
