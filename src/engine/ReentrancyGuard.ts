import { ReentrancyError } from './errors.js';

/**
 * Scoped lock around the engine's mutating entry points. Execution is
 * synchronous, so the only way to find the lock held is a collaborator
 * calling back into the engine from inside an active operation.
 */
export class ReentrancyGuard {
  private active: string | null = null;

  get locked(): boolean {
    return this.active !== null;
  }

  /**
   * Run `fn` holding the lock. A nested call fails with ReentrancyError
   * without touching the outer call's lock.
   */
  run<T>(operation: string, fn: () => T): T {
    if (this.active !== null) {
      throw new ReentrancyError(operation, this.active);
    }

    this.active = operation;
    try {
      return fn();
    } finally {
      this.active = null;
    }
  }
}
