/**
 * @fileoverview Tests for PrinterRegistry
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { PrinterRegistry } from './PrinterRegistry';
import { AppError, ErrorCode } from '../utils/error.utils';
import { StubPrinterClient } from '../__tests__/fakes/StubPrinterClient';

const ADDRESS = { host: '10.0.0.21', port: 8899, cameraPort: 8080 };

async function captureError(promise: Promise<unknown>): Promise<AppError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof AppError) return error;
    throw error;
  }
  throw new Error('expected rejection');
}

describe('PrinterRegistry', () => {
  let registry: PrinterRegistry;

  beforeEach(() => {
    registry = new PrinterRegistry({ createClient: (id, address) => new StubPrinterClient(id, address.host) });
  });

  it('should register printers and list them in insertion order', async () => {
    await registry.addPrinter('bay-1', ADDRESS);
    await registry.addPrinter('bay-2', { ...ADDRESS, host: '10.0.0.22' });

    expect(await registry.listPrinterIds()).toEqual(['bay-1', 'bay-2']);
    expect((await registry.listSummaries()).map(summary => summary.address)).toEqual(['10.0.0.21', '10.0.0.22']);
  });

  it('should reject a duplicate id with CONFIG_INVALID', async () => {
    await registry.addPrinter('bay-1', ADDRESS);

    const error = await captureError(registry.addPrinter('bay-1', ADDRESS));

    expect(error.code).toBe(ErrorCode.CONFIG_INVALID);
  });

  it('should reject unknown ids with UNKNOWN_PRINTER', async () => {
    const error = await captureError(registry.requirePrinter('nope'));

    expect(error.code).toBe(ErrorCode.UNKNOWN_PRINTER);
    expect(error.context).toEqual({ printerId: 'nope' });
    expect(await registry.getPrinter('nope')).toBeNull();
  });

  it('should hand out ledger copies and merge committed entries', async () => {
    await registry.addPrinter('bay-1', ADDRESS);

    const { ledger } = await registry.snapshot();
    ledger.set('bay-1', 'bracket.gx');
    expect(await registry.getLastNotifiedFile('bay-1')).toBeNull();

    await registry.commitLedger(ledger);
    expect(await registry.getLastNotifiedFile('bay-1')).toBe('bracket.gx');
  });

  it('should fetch identity when a printer is added', async () => {
    const client = await registry.addPrinter('bay-1', ADDRESS);

    expect(client.getDisplayName()).toBe('Stub Printer');
  });
});
