import type { Logger } from '../logger';

/**
 * Runs one hierarchy/authority read. A failing read is logged and replaced
 * by `fallback` so the calling component can degrade to its documented
 * default instead of failing the request.
 */
export async function guardedLookup<T>(
  read: () => Promise<T>,
  fallback: T,
  logger: Logger,
  description: string
): Promise<T> {
  try {
    return await read();
  } catch (error) {
    logger.warn(`${description} failed; using fallback`, error instanceof Error ? error.message : error);
    return fallback;
  }
}
