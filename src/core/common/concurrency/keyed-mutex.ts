// src/core/common/concurrency/keyed-mutex.ts

/**
 * 按 key 串行化的异步互斥锁
 *
 * 同一个 key 上的任务按进入顺序依次执行，不同 key 之间互不阻塞。
 * 任务结束（无论成功或抛错）后都会释放锁；队列清空后 key 会被移除。
 */
export class KeyedMutex {
  /** 每个 key 当前队尾任务的完成信号 */
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * 在 key 对应的锁内执行任务
   * @param key 锁的键（例如活动名称）
   * @param task 临界区任务，可同步也可异步
   * @returns 任务的返回值；任务抛出的错误原样向上抛出
   */
  async runExclusive<T>(key: string, task: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      // 没有后继者排队时清理，避免 key 无限增长
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
