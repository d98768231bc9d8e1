/**
 * @fileoverview CLI argument parser for the fleet monitor
 *
 * Examples:
 *   node dist/index.js
 *   node dist/index.js --config=/etc/printer-fleet/config.json
 *   node dist/index.js --config="./fleet.json" --port=3001
 */

/**
 * Options parsed from CLI arguments
 */
export interface CliOptions {
  configPath?: string;
  port?: number;
}

/**
 * Validation result for parsed options
 */
export interface CliValidationResult {
  valid: boolean;
  errors: string[];
}

/**
 * Parse command-line arguments
 *
 * @param args argv without the node binary and script, or process.argv as a whole
 */
export function parseCliArguments(args: readonly string[] = process.argv.slice(2)): CliOptions {
  return {
    configPath: parseStringArgument(args, '--config'),
    port: parseNumberArgument(args, '--port')
  };
}

/**
 * Parse a number argument; NaN when present but not an integer
 */
function parseNumberArgument(args: readonly string[], flag: string): number | undefined {
  const value = parseStringArgument(args, flag);
  if (value === undefined) {
    return undefined;
  }
  return /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
}

/**
 * Parse a `--flag=value` argument, stripping surrounding quotes
 */
function parseStringArgument(args: readonly string[], flag: string): string | undefined {
  const arg = args.find((a) => a.startsWith(`${flag}=`));
  if (!arg) {
    return undefined;
  }

  const value = arg.slice(flag.length + 1).replace(/^["']|["']$/g, '');
  return value.length > 0 ? value : undefined;
}

/**
 * Validate parsed options
 */
export function validateCliOptions(options: CliOptions): CliValidationResult {
  const errors: string[] = [];

  if (options.port !== undefined) {
    if (!Number.isInteger(options.port) || options.port < 1 || options.port > 65535) {
      errors.push('Port must be an integer between 1 and 65535');
    }
  }

  return {
    valid: errors.length === 0,
    errors
  };
}
