/**
 * @fileoverview Interrupt Monitor
 *
 * Turns SIGINT into the two levels of cancellation the engine knows:
 *
 * - an interrupt while a phase is running aborts that phase only;
 * - an interrupt during the grace pause that follows an interrupted phase,
 *   or while no phase is running, aborts the whole run.
 *
 * @module testcase/interruptMonitor
 */

import { setTimeout as sleep } from 'timers/promises';
import { Logger } from '../core/logger';

const log = Logger.for('interrupts');

/**
 * Source of SIGINT events; `process` in production, an EventEmitter in tests.
 */
export interface SignalSource {
  on(event: 'SIGINT', listener: () => void): unknown;
  removeListener(event: 'SIGINT', listener: () => void): unknown;
}

/**
 * Tracks the running phase and the run-level abort flag.
 *
 * @example
 * ```typescript
 * const monitor = new InterruptMonitor({ graceMs: 1000 });
 * monitor.attach();
 * const signal = monitor.beginPhase();
 * try { await tester.run({ signal }); } finally { monitor.endPhase(); }
 * ```
 */
export class InterruptMonitor {
  private readonly graceMs: number;
  private readonly source: SignalSource;
  private phaseController: AbortController | undefined;
  private inGracePause = false;
  private runAborted = false;
  private attached = false;

  private readonly onSigint = (): void => {
    if (this.phaseController && !this.phaseController.signal.aborted && !this.inGracePause) {
      log.info('Interrupt received, aborting current phase');
      this.phaseController.abort();
      return;
    }
    log.info('Interrupt received, aborting run');
    this.runAborted = true;
  };

  constructor(options: { graceMs: number; source?: SignalSource }) {
    this.graceMs = options.graceMs;
    this.source = options.source ?? process;
  }

  /** Start listening for SIGINT. Idempotent. */
  attach(): void {
    if (this.attached) {return;}
    this.source.on('SIGINT', this.onSigint);
    this.attached = true;
  }

  /** Stop listening for SIGINT. Idempotent. */
  detach(): void {
    if (!this.attached) {return;}
    this.source.removeListener('SIGINT', this.onSigint);
    this.attached = false;
  }

  /**
   * Mark a phase as running.
   *
   * @returns Signal aborted by the next interrupt.
   */
  beginPhase(): AbortSignal {
    this.phaseController = new AbortController();
    return this.phaseController.signal;
  }

  /** Mark the running phase as finished. */
  endPhase(): void {
    this.phaseController = undefined;
  }

  /**
   * Wait out the grace window after an interrupted phase. An interrupt
   * arriving meanwhile sets the run-level abort flag.
   */
  async gracePause(): Promise<void> {
    this.inGracePause = true;
    try {
      await sleep(this.graceMs);
    } finally {
      this.inGracePause = false;
    }
  }

  /** Whether the user asked to stop the whole run. */
  isRunAborted(): boolean {
    return this.runAborted;
  }
}
