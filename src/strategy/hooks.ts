import { errorMessage } from "../errors";
import { logger } from "../utils/logger";

/**
 * Run a user callback without letting it block or crash the caller.
 * Sync throws and async rejections are both logged.
 */
export function runHook<TArgs extends unknown[]>(
  label: string,
  hook: ((...args: TArgs) => void | Promise<void>) | undefined,
  ...args: TArgs
): void {
  if (!hook) return;

  try {
    const result = hook(...args);
    if (result instanceof Promise) {
      result.catch((error: unknown) => {
        logger.error(`${label} failed: ${errorMessage(error)}`);
      });
    }
  } catch (error) {
    logger.error(`${label} failed: ${errorMessage(error)}`);
  }
}
