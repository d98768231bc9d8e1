/**
 * @fileoverview Configuration manager: locates, loads and validates the JSON config file.
 *
 * Resolution order for the file path:
 * 1. explicit path (from `--config=`)
 * 2. CONFIG_PATH environment variable
 * 3. `config.json` under DATA_DIR, or under `<cwd>/data`
 *
 * A missing file yields the defaults (no printers). A file that is not JSON or fails
 * the schema is rejected with CONFIG_INVALID. The configuration is loaded once at
 * startup and is read-only for the lifetime of the process.
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  AppConfig,
  AppConfigSchema,
  DEFAULT_CONFIG,
  NOTIFICATION_CONFIG_KEYS,
  isSmtpUsable,
  type NotificationDestinations,
  type NotificationType,
  type SmtpConfig
} from '../types/config';
import { AppError, ErrorCode, toError } from '../utils/error.utils';
import { formatValidationErrors } from '../utils/validation.utils';
import { logInfo, logWarning } from '../utils/logging';

const LOG_NAMESPACE = 'ConfigManager';

/**
 * Resolve where the configuration file lives
 */
export function resolveConfigPath(
  explicitPath?: string,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): string {
  if (explicitPath) {
    return path.resolve(cwd, explicitPath);
  }
  if (env.CONFIG_PATH) {
    return path.resolve(cwd, env.CONFIG_PATH);
  }
  const dataDir = env.DATA_DIR ? path.resolve(cwd, env.DATA_DIR) : path.join(cwd, 'data');
  return path.join(dataDir, 'config.json');
}

/**
 * Parse and validate configuration file contents
 *
 * @throws AppError CONFIG_INVALID
 */
export function parseConfig(content: string, source: string): AppConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new AppError(`Config file ${source} is not valid JSON`, ErrorCode.CONFIG_INVALID, { source }, toError(error));
  }

  const result = AppConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new AppError(
      `Config file ${source} is invalid:\n${formatValidationErrors(result.error)}`,
      ErrorCode.CONFIG_INVALID,
      { source, issues: result.error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })) },
      result.error
    );
  }
  return result.data;
}

export class ConfigManager {
  private static instance: ConfigManager | null = null;

  private configPath: string;
  private currentConfig: AppConfig = DEFAULT_CONFIG;

  private constructor() {
    this.configPath = resolveConfigPath();
  }

  public static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  /**
   * Load configuration from disk
   *
   * @param configPath - overrides the resolved location
   * @throws AppError CONFIG_INVALID or CONFIG_LOAD_FAILED
   */
  public async load(configPath?: string): Promise<AppConfig> {
    if (configPath) {
      this.configPath = resolveConfigPath(configPath);
    }

    this.currentConfig = await this.readConfigFile();

    logInfo(
      LOG_NAMESPACE,
      `Loaded ${Object.keys(this.currentConfig.printers).length} printer(s) from ${this.configPath}`
    );
    if (this.currentConfig.smtp && !isSmtpUsable(this.currentConfig.smtp)) {
      logWarning(LOG_NAMESPACE, 'SMTP section is incomplete, email notifications are disabled');
    }
    return this.currentConfig;
  }

  /**
   * Use an in-memory configuration instead of a file
   */
  public setConfig(config: AppConfig): void {
    this.currentConfig = config;
  }

  public getConfig(): AppConfig {
    return this.currentConfig;
  }

  public get<K extends keyof AppConfig>(key: K): AppConfig[K] {
    return this.currentConfig[key];
  }

  /**
   * Destinations configured for a notification type; empty lists when none
   */
  public getNotificationDestinations(type: NotificationType): NotificationDestinations {
    const destinations = this.currentConfig.notifications[NOTIFICATION_CONFIG_KEYS[type]];
    return destinations ?? { emails: [], webhooks: [] };
  }

  /**
   * SMTP settings when complete enough to send mail, otherwise null
   */
  public getSmtpConfig(): SmtpConfig | null {
    const smtp = this.currentConfig.smtp;
    return isSmtpUsable(smtp) ? smtp : null;
  }

  private async readConfigFile(): Promise<AppConfig> {
    let content: string;
    try {
      content = await fs.promises.readFile(this.configPath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        logWarning(LOG_NAMESPACE, `No config file at ${this.configPath}, using defaults`);
        return DEFAULT_CONFIG;
      }
      throw new AppError(
        `Failed to read config file ${this.configPath}`,
        ErrorCode.CONFIG_LOAD_FAILED,
        { path: this.configPath },
        toError(error)
      );
    }
    return parseConfig(content, this.configPath);
  }

  /**
   * Drop the singleton; the next getInstance() starts fresh
   */
  public dispose(): void {
    ConfigManager.instance = null;
  }
}

/**
 * Export singleton instance getter for convenience
 */
export function getConfigManager(): ConfigManager {
  return ConfigManager.getInstance();
}
