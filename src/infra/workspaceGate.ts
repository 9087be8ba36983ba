import path from "node:path";

import type { StructuredLogger } from "../logger.js";

/** FIFO mutex: each operation starts once every earlier one settled. */
class AsyncMutex {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  get pending(): number {
    return this.waiting;
  }

  async runExclusive<T>(operation: () => Promise<T>): Promise<T> {
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => current);
    this.waiting += 1;
    try {
      await previous;
      return await operation();
    } finally {
      this.waiting -= 1;
      release();
    }
  }
}

/**
 * Serialises pipeline-class operations (`full_ci`, `format_fix`) per
 * workspace root. Operations on different roots never wait on each other.
 */
export class WorkspaceGate {
  private readonly mutexes = new Map<string, AsyncMutex>();

  constructor(private readonly logger?: StructuredLogger) {}

  /** Number of operations holding or waiting for {@link root}. */
  pending(root: string): number {
    return this.mutexes.get(path.resolve(root))?.pending ?? 0;
  }

  async runExclusive<T>(root: string, operation: () => Promise<T>): Promise<T> {
    const key = path.resolve(root);
    let mutex = this.mutexes.get(key);
    if (!mutex) {
      mutex = new AsyncMutex();
      this.mutexes.set(key, mutex);
    }
    if (mutex.pending > 0) {
      this.logger?.info("workspace_gate_wait", { root: key, ahead: mutex.pending });
    }
    try {
      return await mutex.runExclusive(operation);
    } finally {
      if (mutex.pending === 0 && this.mutexes.get(key) === mutex) {
        this.mutexes.delete(key);
      }
    }
  }
}
