import { ShimError } from './error.js';

/**
 * ContextCell はスパンごとの現在値を保持する排他ガード。
 * 取得中に再取得することは無く (リーフロック)、再入は不変条件違反として扱う。
 * ガード中に SDK を呼び出してはならない。
 */
export class ContextCell<T> {
  private held = false;

  constructor(private current: T) {}

  read<R>(fn: (value: T) => R): R {
    this.acquire();
    try {
      return fn(this.current);
    } finally {
      this.held = false;
    }
  }

  update(fn: (value: T) => T): void {
    this.acquire();
    try {
      this.current = fn(this.current);
    } finally {
      this.held = false;
    }
  }

  private acquire(): void {
    if (this.held) {
      throw new ShimError('context lock re-entered', 'LOCK_REENTERED');
    }
    this.held = true;
  }
}
