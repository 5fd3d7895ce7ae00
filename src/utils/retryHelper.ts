import { logger } from './logger';

export interface RetryOptions {
  maxRetries?: number;
  baseDelay?: number;
  operationName?: string;
  /** Return false to give up immediately on errors retrying cannot fix */
  shouldRetry?: (error: Error) => boolean;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Retry helper for engine and network calls with exponential backoff
 */
export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const {
    maxRetries = 3,
    baseDelay = 1000,
    operationName = 'operation',
    shouldRetry = () => true,
  } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      const lastError = toError(error);
      if (attempt >= maxRetries || !shouldRetry(lastError)) {
        logger.error(`${operationName} failed after ${attempt} retries`, {
          error: lastError.message,
        });
        throw lastError;
      }

      const delay = baseDelay * Math.pow(2, attempt);
      logger.warn(
        `${operationName} failed, retrying in ${delay}ms (retry ${attempt + 1}/${maxRetries})`,
        { error: lastError.message },
      );
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
}
