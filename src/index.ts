/**
 * @fileoverview Main entry point for the printer fleet monitor.
 *
 * Key responsibilities:
 * - Parse command-line arguments and load the configuration file
 * - Register every configured printer (identity fetched concurrently)
 * - Start the print-completion watcher and the HTTP API
 * - Handle graceful shutdown on SIGINT/SIGTERM, bounded by per-step timeouts and a
 *   hard deadline
 */

import { getConfigManager } from './managers/ConfigManager';
import { PrinterRegistry } from './managers/PrinterRegistry';
import { resolvePrinterAddress } from './printer-backends/PrinterClient';
import { NotificationDispatcher, type MailSender } from './services/NotificationDispatcher';
import { HttpWebhookTransport, SmtpMailTransport } from './services/notification-transports';
import { PrintCompletionWatcher } from './services/PrintCompletionWatcher';
import { WebUIManager } from './webui/server/WebUIManager';
import { parseCliArguments, validateCliOptions } from './utils/CliArguments';
import { createHardDeadline, withTimeout } from './utils/ShutdownTimeout';
import { toError } from './utils/error.utils';
import type { AppConfig } from './types/config';

const SHUTDOWN_STEP_TIMEOUT_MS = 5000;
const SHUTDOWN_HARD_DEADLINE_MS = 15000;

const configManager = getConfigManager();
const registry = new PrinterRegistry();

let watcher: PrintCompletionWatcher | null = null;
let webUIManager: WebUIManager | null = null;
let smtpTransport: SmtpMailTransport | null = null;
let shuttingDown = false;

/**
 * Register every configured printer; one unreachable printer does not block the others
 */
async function registerPrinters(config: AppConfig): Promise<void> {
  const entries = Object.entries(config.printers);
  if (entries.length === 0) {
    console.warn('[Init] No printers configured');
    return;
  }

  console.log(`[Init] Registering ${entries.length} printer(s)...`);
  const results = await Promise.allSettled(
    entries.map(([id, entry]) => registry.addPrinter(id, resolvePrinterAddress({
      host: entry.ip,
      port: entry.port,
      cameraPort: entry.cameraPort
    })))
  );

  results.forEach((result, index) => {
    const id = entries[index]?.[0] ?? 'unknown';
    if (result.status === 'rejected') {
      console.error(`[Init] Failed to register ${id}:`, toError(result.reason).message);
      return;
    }
    const printer = result.value;
    const identity = printer.getCachedIdentity();
    console.log(
      `  - ${id} (${printer.address.host}) ${identity ? `${identity.name}, firmware ${identity.firmwareVersion}` : 'identity pending'}`
    );
  });
}

function createDispatcher(): NotificationDispatcher {
  const smtp = configManager.getSmtpConfig();
  let mail: MailSender | null = null;
  if (smtp) {
    smtpTransport = new SmtpMailTransport(smtp);
    mail = { transport: smtpTransport, from: smtp.user };
  }

  return new NotificationDispatcher({
    destinations: configManager,
    mail,
    webhooks: new HttpWebhookTransport()
  });
}

/**
 * Run one shutdown step, logging instead of throwing when it fails or hangs
 */
async function shutdownStep(operation: string, step: () => Promise<void>): Promise<void> {
  try {
    await withTimeout(step(), { timeoutMs: SHUTDOWN_STEP_TIMEOUT_MS, operation });
    console.log(`[Shutdown] ${operation} done`);
  } catch (error) {
    console.error(`[Shutdown] ${operation} failed:`, toError(error).message);
  }
}

/**
 * Gracefully shutdown the application
 */
async function shutdown(): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  const deadline = createHardDeadline(SHUTDOWN_HARD_DEADLINE_MS);

  console.log('[Shutdown] Stopping services...');
  const activeWatcher = watcher;
  if (activeWatcher) {
    await shutdownStep('watcher', () => activeWatcher.stop());
  }
  const activeServer = webUIManager;
  if (activeServer) {
    await shutdownStep('HTTP server', () => activeServer.stop());
  }
  await shutdownStep('printers', () => registry.shutdown());
  smtpTransport?.close();

  clearTimeout(deadline);
  console.log('[Shutdown] Graceful shutdown complete');
}

/**
 * Setup signal handlers for graceful shutdown
 */
function setupSignalHandlers(): void {
  const onSignal = (signal: NodeJS.Signals): void => {
    console.log(`\n[Shutdown] Received ${signal}`);
    void shutdown().then(() => {
      process.exit(0);
    }).catch((error: unknown) => {
      console.error('[Shutdown] Error during shutdown:', error);
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

/**
 * Main application initialization
 */
async function main(): Promise<void> {
  console.log('='.repeat(60));
  console.log('Printer Fleet Monitor');
  console.log('='.repeat(60));

  // 1. Parse and validate CLI arguments
  const options = parseCliArguments();
  const validation = validateCliOptions(options);
  if (!validation.valid) {
    console.error('[Init] Invalid arguments:');
    validation.errors.forEach((error) => console.error(`  - ${error}`));
    process.exit(1);
  }

  // 2. Load configuration
  const config = await configManager.load(options.configPath);

  // 3. Register printers
  await registerPrinters(config);

  // 4. Start the completion watcher
  watcher = new PrintCompletionWatcher({
    registry,
    dispatcher: createDispatcher(),
    intervalMs: config.watcher.intervalMs
  });
  watcher.start();

  // 5. Start the HTTP API
  webUIManager = new WebUIManager({ registry, configManager, startedAt: new Date() });
  await webUIManager.start({ host: config.server.host, port: options.port ?? config.server.port });

  setupSignalHandlers();
  console.log('[Init] Ready');
}

main().catch((error: unknown) => {
  console.error('[Fatal] Startup failed:', toError(error).message);
  void shutdown().finally(() => {
    process.exit(1);
  });
});
