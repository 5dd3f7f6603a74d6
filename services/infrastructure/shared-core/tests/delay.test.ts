/**
 * 可取消延时单元测试
 */

import { cancellableDelay, DelayCancelledError } from '../src';

describe('cancellableDelay', () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('应该在到期后完成', async () => {
    const done = jest.fn();
    const promise = cancellableDelay(1000).then(done);

    jest.advanceTimersByTime(999);
    await Promise.resolve();
    expect(done).not.toHaveBeenCalled();

    jest.advanceTimersByTime(1);
    await promise;
    expect(done).toHaveBeenCalledTimes(1);
  });

  it('应该在取消信号触发时立即拒绝', async () => {
    const controller = new AbortController();
    const promise = cancellableDelay(60000, controller.signal);

    controller.abort();

    await expect(promise).rejects.toBeInstanceOf(DelayCancelledError);
  });

  it('已取消的信号应该直接拒绝', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(cancellableDelay(10, controller.signal)).rejects.toThrow('Delay cancelled');
  });
});
