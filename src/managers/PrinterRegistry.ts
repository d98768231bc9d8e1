/**
 * @fileoverview Registry of printer clients plus the print-complete notification ledger.
 *
 * One registry Mutex guards both the id -> client map and the ledger. It is held only
 * while copying or updating those maps and never across printer I/O: callers get client
 * handles out of the registry and then go through each client's own lock.
 *
 * The ledger maps printer id -> file name of the last completion notification. It lives
 * in memory only and starts empty on every run.
 */

import { Mutex } from '../utils/Mutex';
import { AppError, ErrorCode, unknownPrinterError } from '../utils/error.utils';
import { logInfo } from '../utils/logging';
import { PrinterClient, type PrinterClientOptions } from '../printer-backends/PrinterClient';
import type { NotificationLedger, PrinterAddress, PrinterSummary } from '../types/printer';

const LOG_NAMESPACE = 'PrinterRegistry';

export type PrinterClientFactory = (id: string, address: PrinterAddress) => PrinterClient;

export interface PrinterRegistryOptions {
  readonly clientOptions?: PrinterClientOptions;
  /** Replaces the default PrinterClient construction */
  readonly createClient?: PrinterClientFactory;
}

/**
 * Printers and ledger copied under one brief lock
 */
export interface RegistrySnapshot {
  readonly printers: readonly PrinterClient[];
  readonly ledger: Map<string, string>;
}

export class PrinterRegistry {
  private readonly lock = new Mutex();
  private readonly printers = new Map<string, PrinterClient>();
  private readonly ledger = new Map<string, string>();
  private readonly createClient: PrinterClientFactory;

  constructor(options: PrinterRegistryOptions = {}) {
    this.createClient = options.createClient
      ?? ((id, address) => new PrinterClient(id, address, options.clientOptions));
  }

  /**
   * Register a printer, then make one best-effort identity fetch outside the lock
   *
   * @throws AppError CONFIG_INVALID when the id is already registered
   */
  async addPrinter(id: string, address: PrinterAddress): Promise<PrinterClient> {
    const client = await this.lock.runExclusive(() => {
      if (this.printers.has(id)) {
        throw new AppError(`Printer id ${id} is already registered`, ErrorCode.CONFIG_INVALID, { printerId: id });
      }
      const created = this.createClient(id, address);
      this.printers.set(id, created);
      return created;
    });

    logInfo(LOG_NAMESPACE, `Registered ${id} at ${address.host}:${address.port}`);
    await client.getIdentity();
    return client;
  }

  async getPrinter(id: string): Promise<PrinterClient | null> {
    return await this.lock.runExclusive(() => this.printers.get(id) ?? null);
  }

  /**
   * @throws AppError UNKNOWN_PRINTER
   */
  async requirePrinter(id: string): Promise<PrinterClient> {
    const printer = await this.getPrinter(id);
    if (!printer) {
      throw unknownPrinterError(id);
    }
    return printer;
  }

  async listPrinters(): Promise<PrinterClient[]> {
    return await this.lock.runExclusive(() => [...this.printers.values()]);
  }

  async listPrinterIds(): Promise<string[]> {
    return await this.lock.runExclusive(() => [...this.printers.keys()]);
  }

  /**
   * Cached summaries of every printer; performs no printer I/O
   */
  async listSummaries(): Promise<PrinterSummary[]> {
    const printers = await this.listPrinters();
    return printers.map(printer => printer.getSummary());
  }

  /**
   * Copy the printer list and the ledger for one watcher tick
   */
  async snapshot(): Promise<RegistrySnapshot> {
    return await this.lock.runExclusive(() => ({
      printers: [...this.printers.values()],
      ledger: new Map(this.ledger)
    }));
  }

  /**
   * Merge ledger entries written during a tick
   */
  async commitLedger(updates: NotificationLedger): Promise<void> {
    if (updates.size === 0) {
      return;
    }
    await this.lock.runExclusive(() => {
      for (const [printerId, file] of updates) {
        this.ledger.set(printerId, file);
      }
    });
  }

  async getLastNotifiedFile(id: string): Promise<string | null> {
    return await this.lock.runExclusive(() => this.ledger.get(id) ?? null);
  }

  /**
   * Stop every camera stream
   */
  async shutdown(): Promise<void> {
    const printers = await this.listPrinters();
    for (const printer of printers) {
      printer.shutdown();
    }
  }
}
