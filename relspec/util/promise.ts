// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { strict } from 'assert';

export class Queue {
  private active = 0;
  private readonly waiting = new Array<() => void>();

  constructor(private readonly maxConcurrency = 4) {
    strict.ok(Number.isInteger(maxConcurrency) && maxConcurrency > 0, 'concurrency must be a positive integer');
  }

  /**
   * Queues up actions for throttling the number of concurrent async tasks running at a given time.
   *
   * When the queue is at capacity, the action waits for a running action to finish and takes over its slot.
   */
  async enqueue<T>(action: () => Promise<T>): Promise<T> {
    if (this.active >= this.maxConcurrency) {
      await new Promise<void>(resolve => this.waiting.push(resolve));
    } else {
      this.active++;
    }

    try {
      return await action();
    } finally {
      const next = this.waiting.shift();
      if (next) {
        next();
      } else {
        this.active--;
      }
    }
  }

  enqueueMany<S, T>(array: Iterable<S>, fn: (v: S) => Promise<T>): Promise<Array<T>> {
    return Promise.all([...array].map(each => this.enqueue(() => fn(each))));
  }
}
