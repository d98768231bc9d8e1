/**
 * @fileoverview Periodic print-completion check across every registered printer.
 *
 * One timer chain drives the loop; the first tick runs one interval after start() and
 * the next is scheduled only after the previous finishes, so ticks never overlap.
 *
 * Each tick:
 * 1. copies the printer list and notification ledger under the registry lock
 * 2. checks every printer concurrently, each through its own client lock
 * 3. dispatches `print-complete` for a finished file not yet in the ledger copy and
 *    records the file there whether or not delivery succeeded
 * 4. merges the ledger copy back into the registry
 *
 * A printer that is offline or answers garbage is logged and skipped for that tick.
 */

import { EventEmitter } from '../utils/EventEmitter';
import { isPrintComplete, type PrinterProgress } from '../protocol';
import { toError } from '../utils/error.utils';
import { logInfo, logVerbose, logWarning } from '../utils/logging';
import type { PrinterClient } from '../printer-backends/PrinterClient';
import type { PrinterRegistry } from '../managers/PrinterRegistry';
import type { NotificationDispatcher, NotificationDispatchReport } from './NotificationDispatcher';

const LOG_NAMESPACE = 'PrintCompletionWatcher';

export const DEFAULT_WATCHER_INTERVAL_MS = 60000;

export interface PrintCompletionWatcherOptions {
  readonly registry: PrinterRegistry;
  readonly dispatcher: NotificationDispatcher;
  readonly intervalMs?: number;
}

/**
 * What happened to one printer during a tick
 */
export type PrinterCheckOutcome =
  | { readonly printerId: string; readonly result: 'offline' | 'error'; readonly error: string }
  | { readonly printerId: string; readonly result: 'idle' }
  | { readonly printerId: string; readonly result: 'already-notified' | 'printing'; readonly file: string }
  | {
    readonly printerId: string;
    readonly result: 'notified';
    readonly file: string;
    readonly report: NotificationDispatchReport;
  };

export interface WatcherTickReport {
  readonly startedAt: Date;
  readonly finishedAt: Date;
  readonly outcomes: readonly PrinterCheckOutcome[];
}

interface WatcherEventMap extends Record<string, unknown[]> {
  'watcher-started': [{ intervalMs: number }];
  'watcher-stopped': [];
  'tick-completed': [WatcherTickReport];
}

/**
 * Whether a progress reading should trigger a completion notification for the file
 */
export function shouldNotifyCompletion(
  lastNotifiedFile: string | null,
  currentFile: string | null,
  progress: PrinterProgress
): boolean {
  if (currentFile === null || currentFile === lastNotifiedFile) {
    return false;
  }
  return isPrintComplete(progress);
}

export class PrintCompletionWatcher extends EventEmitter<WatcherEventMap> {
  private readonly registry: PrinterRegistry;
  private readonly dispatcher: NotificationDispatcher;
  private readonly intervalMs: number;

  private running = false;
  private timer: NodeJS.Timeout | null = null;
  private activeTick: Promise<WatcherTickReport> | null = null;

  constructor(options: PrintCompletionWatcherOptions) {
    super();
    this.registry = options.registry;
    this.dispatcher = options.dispatcher;
    this.intervalMs = options.intervalMs ?? DEFAULT_WATCHER_INTERVAL_MS;
  }

  start(): void {
    if (this.running) {
      logVerbose(LOG_NAMESPACE, 'Watcher already running');
      return;
    }
    this.running = true;
    logInfo(LOG_NAMESPACE, `Watching for completed prints every ${this.intervalMs}ms`);
    this.emit('watcher-started', { intervalMs: this.intervalMs });
    this.scheduleNextTick();
  }

  /**
   * Cancel the timer and wait for a tick already in progress
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.activeTick) {
      await this.activeTick;
    }
    this.emit('watcher-stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  getIntervalMs(): number {
    return this.intervalMs;
  }

  /**
   * Run one tick now
   */
  async runTick(): Promise<WatcherTickReport> {
    const startedAt = new Date();
    const { printers, ledger } = await this.registry.snapshot();
    const updates = new Map<string, string>();

    const settled = await Promise.allSettled(
      printers.map(printer => this.checkPrinter(printer, ledger.get(printer.id) ?? null, updates))
    );
    const outcomes = settled.map((result, index): PrinterCheckOutcome => {
      if (result.status === 'fulfilled') {
        return result.value;
      }
      const printerId = printers[index]?.id ?? 'unknown';
      const message = toError(result.reason).message;
      logWarning(LOG_NAMESPACE, `Check failed for ${printerId}: ${message}`);
      return { printerId, result: 'error', error: message };
    });

    await this.registry.commitLedger(updates);

    const report: WatcherTickReport = { startedAt, finishedAt: new Date(), outcomes };
    this.emit('tick-completed', report);
    return report;
  }

  // ============================================================================
  // LOOP
  // ============================================================================

  private scheduleNextTick(): void {
    if (!this.running) {
      return;
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.performTick();
    }, this.intervalMs);
  }

  private async performTick(): Promise<void> {
    if (!this.running) {
      return;
    }
    const tick = this.runTick();
    this.activeTick = tick;
    try {
      await tick;
    } catch (error) {
      logWarning(LOG_NAMESPACE, 'Tick failed:', toError(error).message);
    } finally {
      this.activeTick = null;
      this.scheduleNextTick();
    }
  }

  private async checkPrinter(
    printer: PrinterClient,
    lastNotifiedFile: string | null,
    updates: Map<string, string>
  ): Promise<PrinterCheckOutcome> {
    let currentFile: string | null;
    try {
      const status = await printer.refreshStatus();
      currentFile = status.currentFile;
    } catch (error) {
      const message = toError(error).message;
      logVerbose(LOG_NAMESPACE, `${printer.id} status unavailable: ${message}`);
      return { printerId: printer.id, result: printer.isOnline() ? 'error' : 'offline', error: message };
    }

    if (currentFile === null) {
      return { printerId: printer.id, result: 'idle' };
    }
    if (currentFile === lastNotifiedFile) {
      return { printerId: printer.id, result: 'already-notified', file: currentFile };
    }

    const progress = await printer.getProgress();
    if (!shouldNotifyCompletion(lastNotifiedFile, currentFile, progress)) {
      return { printerId: printer.id, result: 'printing', file: currentFile };
    }

    logInfo(LOG_NAMESPACE, `${printer.id} finished ${currentFile}`);
    const report = await this.dispatcher.notify('print-complete', {
      printerId: printer.id,
      printerName: printer.getDisplayName(),
      host: printer.address.host,
      currentFile,
      frame: printer.getCamera().getLastFrame()
    });
    updates.set(printer.id, currentFile);
    return { printerId: printer.id, result: 'notified', file: currentFile, report };
  }
}
