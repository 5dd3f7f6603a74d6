/**
 * 可取消的延时工具
 */

export class DelayCancelledError extends Error {
  constructor(message = 'Delay cancelled') {
    super(message);
    this.name = 'DelayCancelledError';
  }
}

/**
 * 等待指定毫秒数，signal 触发时立即以 DelayCancelledError 拒绝
 */
export function cancellableDelay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new DelayCancelledError());
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new DelayCancelledError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
