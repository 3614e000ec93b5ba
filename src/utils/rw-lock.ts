// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Read-write lock for async critical sections.
 *
 * Any number of readers may hold the lock together; a writer holds it
 * alone. A waiting writer blocks newly arriving readers, and when a writer
 * releases, every reader queued behind it is admitted before the next
 * writer, so neither side starves.
 */
export class ReadWriteLock {
  private readers = 0;
  private writing = false;
  private readQueue: Array<() => void> = [];
  private writeQueue: Array<() => void> = [];

  /**
   * Acquire a shared permit. Resolves to the release function.
   */
  async acquireRead(): Promise<() => void> {
    if (!this.writing && this.writeQueue.length === 0) {
      this.readers++;
      return () => this.releaseRead();
    }

    // Wait for the writers ahead of us
    await new Promise<void>((resolve) => {
      this.readQueue.push(resolve);
    });
    return () => this.releaseRead();
  }

  /**
   * Acquire the exclusive permit. Resolves to the release function.
   */
  async acquireWrite(): Promise<() => void> {
    if (!this.writing && this.readers === 0) {
      this.writing = true;
      return () => this.releaseWrite();
    }

    await new Promise<void>((resolve) => {
      this.writeQueue.push(resolve);
    });
    return () => this.releaseWrite();
  }

  /**
   * Run a function while holding a shared permit.
   */
  async withRead<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquireRead();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /**
   * Run a function while holding the exclusive permit.
   */
  async withWrite<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquireWrite();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /**
   * Current holder counts, for diagnostics.
   */
  getState(): { readers: number; writing: boolean; queuedReaders: number; queuedWriters: number } {
    return {
      readers: this.readers,
      writing: this.writing,
      queuedReaders: this.readQueue.length,
      queuedWriters: this.writeQueue.length,
    };
  }

  private releaseRead(): void {
    this.readers--;
    if (this.readers === 0) {
      this.grantNextWriter();
    }
  }

  private releaseWrite(): void {
    this.writing = false;
    if (this.readQueue.length > 0) {
      this.grantQueuedReaders();
    } else {
      this.grantNextWriter();
    }
  }

  private grantQueuedReaders(): void {
    const waiting = this.readQueue;
    this.readQueue = [];
    this.readers += waiting.length;
    for (const resolve of waiting) {
      resolve();
    }
  }

  private grantNextWriter(): void {
    const next = this.writeQueue.shift();
    if (next) {
      this.writing = true;
      next();
    }
  }
}
