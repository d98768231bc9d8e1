/**
 * @fileoverview Tests for PrintCompletionWatcher with stub printers and recording transports
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { PrintCompletionWatcher, shouldNotifyCompletion, type WatcherTickReport } from './PrintCompletionWatcher';
import { NotificationDispatcher } from './NotificationDispatcher';
import { PrinterRegistry } from '../managers/PrinterRegistry';
import { RecordingMailTransport, RecordingWebhookTransport } from '../__tests__/fakes/RecordingTransports';
import { StubPrinterClient, stubProgress } from '../__tests__/fakes/StubPrinterClient';

describe('shouldNotifyCompletion', () => {
  it('should notify for a finished file that was never notified', () => {
    expect(shouldNotifyCompletion(null, 'part.gx', stubProgress(100, 100))).toBe(true);
  });

  it('should not notify twice for the same file', () => {
    expect(shouldNotifyCompletion('part.gx', 'part.gx', stubProgress(100, 100))).toBe(false);
  });

  it('should not notify while layers remain', () => {
    expect(shouldNotifyCompletion(null, 'part.gx', stubProgress(99, 100))).toBe(false);
  });

  it('should not notify without a current file', () => {
    expect(shouldNotifyCompletion(null, null, stubProgress(100, 100))).toBe(false);
  });

  it('should notify a new file after a previous one was notified', () => {
    expect(shouldNotifyCompletion('part.gx', 'part-v2.gx', stubProgress(100, 100))).toBe(true);
  });
});

describe('PrintCompletionWatcher', () => {
  let registry: PrinterRegistry;
  let webhooks: RecordingWebhookTransport;
  let watcher: PrintCompletionWatcher;
  let stubs: Map<string, StubPrinterClient>;

  beforeEach(async () => {
    stubs = new Map();
    registry = new PrinterRegistry({
      createClient: (id, address) => {
        const stub = new StubPrinterClient(id, address.host);
        stubs.set(id, stub);
        return stub;
      }
    });
    webhooks = new RecordingWebhookTransport();
    const dispatcher = new NotificationDispatcher({
      destinations: {
        getNotificationDestinations: () => ({ emails: [], webhooks: ['http://hooks.test/done'] })
      },
      mail: { transport: new RecordingMailTransport(), from: 'printers@example.com' },
      webhooks
    });
    watcher = new PrintCompletionWatcher({ registry, dispatcher, intervalMs: 1000 });
    await registry.addPrinter('bay-1', { host: '10.0.0.21', port: 8899, cameraPort: 8080 });
  });

  afterEach(async () => {
    await watcher.stop();
    jest.useRealTimers();
  });

  function stub(id: string): StubPrinterClient {
    const found = stubs.get(id);
    if (!found) {
      throw new Error(`no stub ${id}`);
    }
    return found;
  }

  it('should notify once for the same finished file across ticks', async () => {
    stub('bay-1').file = 'bracket.gx';
    stub('bay-1').progress = stubProgress(200, 200);

    const first = await watcher.runTick();
    const second = await watcher.runTick();

    expect(webhooks.posted).toHaveLength(1);
    expect(first.outcomes[0]?.result).toBe('notified');
    expect(second.outcomes).toEqual([{ printerId: 'bay-1', result: 'already-notified', file: 'bracket.gx' }]);
    expect(await registry.getLastNotifiedFile('bay-1')).toBe('bracket.gx');
  });

  it('should notify exactly once more when a new file completes', async () => {
    const printer = stub('bay-1');
    printer.file = 'bracket.gx';
    printer.progress = stubProgress(200, 200);
    await watcher.runTick();

    printer.file = 'hinge.gx';
    printer.progress = stubProgress(10, 300);
    await watcher.runTick();
    expect(webhooks.posted).toHaveLength(1);

    printer.progress = stubProgress(300, 300);
    await watcher.runTick();
    await watcher.runTick();

    expect(webhooks.posted).toHaveLength(2);
    expect(webhooks.posted[1]?.payload.embeds[0]?.description).toBe('File: hinge.gx\nIP: 10.0.0.21\n');
  });

  it('should record the file even when delivery fails', async () => {
    webhooks.failFor('http://hooks.test/done');
    stub('bay-1').file = 'bracket.gx';
    stub('bay-1').progress = stubProgress(5, 5);

    await watcher.runTick();
    const second = await watcher.runTick();

    expect(await registry.getLastNotifiedFile('bay-1')).toBe('bracket.gx');
    expect(second.outcomes[0]?.result).toBe('already-notified');
  });

  it('should skip offline and idle printers without fetching progress', async () => {
    await registry.addPrinter('bay-2', { host: '10.0.0.22', port: 8899, cameraPort: 8080 });
    stub('bay-1').reachable = false;

    const report = await watcher.runTick();

    expect(report.outcomes).toEqual([
      { printerId: 'bay-1', result: 'offline', error: 'Printer unreachable or offline' },
      { printerId: 'bay-2', result: 'idle' }
    ]);
    expect(stub('bay-1').progressCalls).toBe(0);
    expect(stub('bay-2').progressCalls).toBe(0);
  });

  it('should keep checking other printers when one check throws', async () => {
    await registry.addPrinter('bay-2', { host: '10.0.0.22', port: 8899, cameraPort: 8080 });
    const broken = stub('bay-1');
    broken.file = 'bracket.gx';
    broken.getProgress = async () => {
      throw new Error('progress reply malformed');
    };
    stub('bay-2').file = 'clip.gx';
    stub('bay-2').progress = stubProgress(40, 40);

    const report = await watcher.runTick();

    expect(report.outcomes[0]).toEqual({ printerId: 'bay-1', result: 'error', error: 'progress reply malformed' });
    expect(report.outcomes[1]?.result).toBe('notified');
    expect(await registry.getLastNotifiedFile('bay-1')).toBeNull();
    expect(await registry.getLastNotifiedFile('bay-2')).toBe('clip.gx');
  });

  it('should run the first tick one interval after start', async () => {
    jest.useFakeTimers();
    const reports: WatcherTickReport[] = [];
    watcher.on('tick-completed', report => reports.push(report));

    watcher.start();
    expect(watcher.isRunning()).toBe(true);

    await jest.advanceTimersByTimeAsync(999);
    expect(stub('bay-1').statusCalls).toBe(0);

    await jest.advanceTimersByTimeAsync(1);
    expect(stub('bay-1').statusCalls).toBe(1);
    expect(reports).toHaveLength(1);

    await jest.advanceTimersByTimeAsync(1000);
    expect(stub('bay-1').statusCalls).toBe(2);

    await watcher.stop();
    await jest.advanceTimersByTimeAsync(5000);
    expect(stub('bay-1').statusCalls).toBe(2);
    expect(watcher.isRunning()).toBe(false);
  });
});
