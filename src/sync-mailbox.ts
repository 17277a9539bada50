/**
 * @tessera/core — background sync mailbox
 *
 * A single consumer that runs posted commands one after another:
 *
 *   sync        force data to stable storage
 *   close-sync  sync one last time, then stop accepting commands
 *   exit        stop accepting commands
 *
 * A failing command is logged and kept; drain() rethrows the first failure
 * once every queued command has run.
 */

import type { Logger } from './logger';

export type SyncCommand = 'sync' | 'close-sync' | 'exit';

export class SyncMailbox {
  private readonly sync:   () => Promise<void>;
  private readonly logger: Logger;

  private tail: Promise<void> = Promise.resolve();
  private stopped = false;
  private failure: Error | undefined;

  constructor(sync: () => Promise<void>, logger: Logger) {
    this.sync   = sync;
    this.logger = logger;
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  /** @throws Error after 'close-sync' or 'exit' has been posted. */
  post(command: SyncCommand): void {
    if (this.stopped) {
      throw new Error(`SyncMailbox: cannot post '${command}' after the mailbox was stopped.`);
    }
    if (command !== 'sync') this.stopped = true;
    this.tail = this.tail.then(() => this.run(command));
  }

  /** Wait for every posted command; rethrow the first recorded failure. */
  async drain(): Promise<void> {
    await this.tail;
    this.throwIfFailed();
  }

  /** Rethrow (and clear) a failure recorded by an earlier command. */
  throwIfFailed(): void {
    const failure = this.failure;
    if (failure === undefined) return;
    this.failure = undefined;
    throw failure;
  }

  private async run(command: SyncCommand): Promise<void> {
    if (command === 'exit') return;
    try {
      await this.sync();
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.logger.error({ err: error, command }, 'background sync failed');
      this.failure ??= error;
    }
  }
}
