import { describeError, isProviderFailure } from '../../common/errors';
import type { TagProvider, WeightedTag } from '../../types/providers';
import { createLogger } from '../../utils/log';
import { withTimeout } from './timeouts';

const logger = createLogger('tagging');

/**
 * Asks `primary` first and answers from `fallback` when the primary is down
 * or slow. Errors that are not provider failures still propagate.
 */
export class FallbackTagProvider implements TagProvider {
  readonly name: string;

  constructor(
    private readonly primary: TagProvider,
    private readonly fallback: TagProvider,
    private readonly primaryTimeoutMs: number,
  ) {
    this.name = `${primary.name}|${fallback.name}`;
  }

  async tag(filePath: string, content: string, signal?: AbortSignal): Promise<WeightedTag[]> {
    try {
      return await withTimeout(
        this.primary.name,
        this.primaryTimeoutMs,
        (primarySignal) => this.primary.tag(filePath, content, primarySignal),
        signal,
      );
    } catch (error) {
      if (!isProviderFailure(error) || signal?.aborted) {
        throw error;
      }
      logger.warn(`${this.primary.name} failed for ${filePath}, using ${this.fallback.name}: ${describeError(error)}`);
      return this.fallback.tag(filePath, content, signal);
    }
  }
}
