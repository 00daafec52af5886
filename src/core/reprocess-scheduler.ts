// Debounced reprocessing for configuration edits typed a keystroke at a time

import { Logger } from '../types';
import { REPROCESS_IDLE_DELAY } from './constants';

/**
 * Accumulates edit notifications and runs the pass once, after the edits
 * have been quiet for `idleDelay` milliseconds.
 */
export class ReprocessScheduler {
  private readonly pass: () => void;
  private readonly logger: Logger;
  private readonly idleDelay: number;
  private timer?: NodeJS.Timeout;
  private pendingEdits = 0;

  constructor(pass: () => void, logger: Logger, idleDelay: number = REPROCESS_IDLE_DELAY) {
    this.pass = pass;
    this.logger = logger;
    this.idleDelay = idleDelay;
  }

  /**
   * Note an edit; restarts the idle period
   */
  schedule(): void {
    this.pendingEdits++;
    if (this.timer) {
      clearTimeout(this.timer);
    }
    this.timer = setTimeout(() => this.flush(), this.idleDelay);
  }

  /**
   * Run the pending pass now, if there is one
   */
  flush(): void {
    if (!this.isPending()) {
      return;
    }

    const edits = this.pendingEdits;
    this.cancel();
    this.logger.debug(`Reprocessing after ${edits} edit(s)`);
    this.pass();
  }

  cancel(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    this.pendingEdits = 0;
  }

  isPending(): boolean {
    return this.pendingEdits > 0;
  }
}
