/**
 * @fileoverview Printer fleet type definitions shared by the registry, the watcher and the
 * HTTP layer.
 */

/**
 * Network endpoints of one printer
 */
export interface PrinterAddress {
  readonly host: string;
  /** TCP control port */
  readonly port: number;
  /** HTTP camera port */
  readonly cameraPort: number;
}

/**
 * Cached per-printer summary; building one performs no I/O
 */
export interface PrinterSummary {
  readonly id: string;
  /** Name reported by the printer, null until its identity has been fetched */
  readonly name: string | null;
  readonly address: string;
  readonly online: boolean;
  readonly currentFile: string | null;
  readonly firmwareVersion: string | null;
}

/**
 * Per-printer record of the last file a completion notification was sent for
 */
export type NotificationLedger = ReadonlyMap<string, string>;
