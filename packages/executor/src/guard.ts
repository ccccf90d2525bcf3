import { ExecutorError } from './errors.js';

export type GuardState = 'idle' | 'busy';

/**
 * Non-blocking exclusive lock around executor entry points.
 *
 * A second entry while busy fails at once with ReentrantCall; it never waits.
 */
export class ReentrancyGuard {
  private state: GuardState = 'idle';

  get status(): GuardState {
    return this.state;
  }

  async run<T>(work: () => Promise<T>): Promise<T> {
    if (this.state === 'busy') {
      throw new ExecutorError({ code: 'ReentrantCall' });
    }

    this.state = 'busy';
    try {
      return await work();
    } finally {
      this.state = 'idle';
    }
  }
}
