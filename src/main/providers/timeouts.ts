import { ProviderTimeoutError } from '../../common/errors';

/**
 * Runs `task` with a deadline. The signal handed to the task aborts when the
 * deadline passes or when `parentSignal` aborts, whichever comes first.
 */
export const withTimeout = async <T>(
  provider: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
  parentSignal?: AbortSignal,
): Promise<T> => {
  parentSignal?.throwIfAborted();
  const controller = new AbortController();
  const onParentAbort = () => controller.abort(parentSignal?.reason);
  parentSignal?.addEventListener('abort', onParentAbort, { once: true });

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      const error = new ProviderTimeoutError(provider, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
    parentSignal?.removeEventListener('abort', onParentAbort);
  }
};
