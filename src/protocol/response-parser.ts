/**
 * @fileoverview Decodes raw printer response text into typed results.
 *
 * Response grammar (all commands except M27):
 *
 *   CMD M119 Received.            <- echo line, discarded
 *   Endstop: X-max:0 Y-max:0 Z-min:1
 *   MachineStatus: READY
 *   ...
 *   ok                            <- terminator
 *
 * Lines are `key: value`. Three keys pack several pairs into one line and are re-split
 * token-wise: `X` (whole line, position triplets), `Endstop` (its value) and `T0` (whole
 * line, per-sensor temperatures). M27 progress bodies are not key/value at all; the
 * `current/total` pairs are taken positionally, byte pair first and layer pair second.
 *
 * Nothing here throws on device input: a missing terminator, a missing key or a bad
 * number comes back as a PROTOCOL_MALFORMED_RESPONSE failure.
 */

import { protocolError } from '../utils/error.utils';
import { logVerbose, logWarning } from '../utils/logging';
import type {
  DecodeResult,
  PrinterHeadPosition,
  PrinterIdentity,
  PrinterProgress,
  PrinterRequestKind,
  PrinterResponseMap,
  PrinterStatus,
  PrinterTemperatures,
  ProgressRatio,
  ResponseFields,
  TemperatureMeasurement
} from './protocol-types';

const LOG_NAMESPACE = 'ResponseParser';

export const RESPONSE_TERMINATOR = 'ok';

const INLINE_PAIR_PATTERN = /([a-zA-Z0-9\-\s]+):\s*([^:\s]+)/g;
const PROGRESS_PAIR_PATTERN = /(\d+)\/(\d+)/g;

// ============================================================================
// KEY/VALUE BODY PARSING
// ============================================================================

/**
 * Split `key1: val1 key2:val2 ...` into its pairs. Keys are left-trimmed.
 */
export function parseInlinePairs(text: string): Array<[string, string]> {
  const pairs: Array<[string, string]> = [];
  for (const match of text.matchAll(INLINE_PAIR_PATTERN)) {
    pairs.push([match[1].trimStart(), match[2]]);
  }
  return pairs;
}

/**
 * Check whether a raw buffer already contains the terminator line
 */
export function hasResponseTerminator(raw: string): boolean {
  return linesBeforeTerminator(raw) !== null;
}

/**
 * Parse a line-oriented response body into a flat key/value map
 */
export function parseKeyValueBody(raw: string): DecodeResult<ResponseFields> {
  const fields = new Map<string, string>();
  const lines = splitLines(raw).slice(1);

  for (const line of lines) {
    if (line === RESPONSE_TERMINATOR) {
      logVerbose(LOG_NAMESPACE, 'parsed fields', Object.fromEntries(fields));
      return { success: true, data: fields };
    }

    const separator = line.indexOf(':');
    if (separator === -1) {
      if (line.length > 0) {
        logWarning(LOG_NAMESPACE, `Invalid line: ${line}`);
      }
      continue;
    }

    const key = line.slice(0, separator);
    const value = line.slice(separator + 1);

    if (key === 'X' || key === 'T0') {
      for (const [subKey, subValue] of parseInlinePairs(line)) {
        fields.set(subKey, subValue);
      }
    } else if (key === 'Endstop') {
      for (const [subKey, subValue] of parseInlinePairs(value)) {
        fields.set(subKey, subValue);
      }
    } else {
      fields.set(key, value.trimStart());
    }
  }

  return missingTerminatorError<ResponseFields>(raw);
}

function splitLines(raw: string): string[] {
  return raw.split(/\r?\n/);
}

/**
 * Lines before the terminator, or null when the terminator never arrived
 */
function linesBeforeTerminator(raw: string): string[] | null {
  const lines = splitLines(raw);
  const end = lines.indexOf(RESPONSE_TERMINATOR);
  return end === -1 ? null : lines.slice(0, end);
}

function missingTerminatorError<T>(raw: string): DecodeResult<T> {
  return {
    success: false,
    error: protocolError('Response ended without "ok" terminator', { raw })
  };
}

// ============================================================================
// FIELD ACCESS
// ============================================================================

/**
 * Reads typed values out of a field map, collecting every problem instead of stopping
 * at the first one so the resulting error names all missing or malformed keys.
 */
class FieldReader {
  private readonly missing: string[] = [];
  private readonly malformed: string[] = [];

  constructor(
    private readonly fields: ResponseFields,
    private readonly responseKind: PrinterRequestKind
  ) {}

  string(key: string): string {
    const value = this.fields.get(key);
    if (value === undefined) {
      this.missing.push(key);
      return '';
    }
    return value;
  }

  optionalString(key: string): string | undefined {
    return this.fields.get(key);
  }

  integer(key: string): number {
    return this.number(key, true);
  }

  decimal(key: string): number {
    return this.number(key, false);
  }

  finish<T>(value: T): DecodeResult<T> {
    if (this.missing.length === 0 && this.malformed.length === 0) {
      return { success: true, data: value };
    }
    return {
      success: false,
      error: protocolError(`Malformed ${this.responseKind} response`, {
        missingKeys: [...this.missing],
        malformedKeys: [...this.malformed]
      })
    };
  }

  private number(key: string, integerOnly: boolean): number {
    const value = this.fields.get(key);
    if (value === undefined) {
      this.missing.push(key);
      return 0;
    }
    const parsed = parseNumeric(value, integerOnly);
    if (parsed === null) {
      this.malformed.push(key);
      return 0;
    }
    return parsed;
  }
}

function parseNumeric(value: string, integerOnly: boolean): number | null {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return null;
  }
  const parsed = Number(trimmed);
  if (!Number.isFinite(parsed)) {
    return null;
  }
  if (integerOnly && !Number.isInteger(parsed)) {
    return null;
  }
  return parsed;
}

// ============================================================================
// TYPED DECODERS
// ============================================================================

export function decodeIdentity(raw: string): DecodeResult<PrinterIdentity> {
  const parsed = parseKeyValueBody(raw);
  if (!parsed.success) return parsed;

  const reader = new FieldReader(parsed.data, 'info');
  return reader.finish<PrinterIdentity>({
    name: reader.string('Machine Name'),
    firmwareVersion: reader.string('Firmware'),
    serialNumber: reader.string('SN'),
    toolCount: reader.integer('Tool Count'),
    modelName: reader.string('Machine Type'),
    macAddress: reader.string('Mac Address'),
    position: {
      x: reader.integer('X'),
      y: reader.integer('Y'),
      z: reader.integer('Z')
    }
  });
}

export function decodeStatus(raw: string): DecodeResult<PrinterStatus> {
  const parsed = parseKeyValueBody(raw);
  if (!parsed.success) return parsed;

  const reader = new FieldReader(parsed.data, 'status');
  const currentFile = reader.optionalString('CurrentFile');
  return reader.finish<PrinterStatus>({
    endStop: {
      xMax: reader.integer('X-max'),
      yMax: reader.integer('Y-max'),
      zMin: reader.integer('Z-min')
    },
    machineStatus: reader.string('MachineStatus'),
    moveMode: reader.string('MoveMode'),
    led: reader.string('LED') === '1',
    currentFile: currentFile && currentFile.length > 0 ? currentFile : null
  });
}

export function decodeHeadPosition(raw: string): DecodeResult<PrinterHeadPosition> {
  const parsed = parseKeyValueBody(raw);
  if (!parsed.success) return parsed;

  const reader = new FieldReader(parsed.data, 'head-position');
  return reader.finish<PrinterHeadPosition>({
    x: reader.decimal('X'),
    y: reader.decimal('Y'),
    z: reader.decimal('Z'),
    a: reader.decimal('A'),
    b: reader.decimal('B')
  });
}

export function decodeTemperatures(raw: string): DecodeResult<PrinterTemperatures> {
  const parsed = parseKeyValueBody(raw);
  if (!parsed.success) return parsed;

  const temperatures: Record<string, TemperatureMeasurement> = {};
  const malformedKeys: string[] = [];

  for (const [key, value] of parsed.data) {
    const parts = value.split('/');
    const current = parts.length === 2 ? parseNumeric(parts[0], false) : null;
    const target = parts.length === 2 ? parseNumeric(parts[1], false) : null;
    if (current === null || target === null) {
      malformedKeys.push(key);
      continue;
    }
    temperatures[key] = { current, target };
  }

  if (malformedKeys.length > 0) {
    return {
      success: false,
      error: protocolError('Malformed temperature response', { malformedKeys })
    };
  }
  return { success: true, data: temperatures };
}

/**
 * Extract the (byte, layer) ratios from an M27 body. Order is positional:
 * the first `current/total` pair is bytes, the second is layers.
 */
export function decodeProgress(raw: string): DecodeResult<PrinterProgress> {
  const lines = linesBeforeTerminator(raw);
  if (lines === null) {
    return missingTerminatorError<PrinterProgress>(raw);
  }

  const ratios: ProgressRatio[] = [];
  for (const match of lines.join('\n').matchAll(PROGRESS_PAIR_PATTERN)) {
    ratios.push({ current: Number(match[1]), total: Number(match[2]) });
  }

  if (ratios.length < 2) {
    return {
      success: false,
      error: protocolError('Progress response must contain byte and layer ratios', {
        ratiosFound: ratios.length
      })
    };
  }

  return { success: true, data: { byte: ratios[0], layer: ratios[1] } };
}

/**
 * A job counts as complete once the layer counter reaches its total
 */
export function isPrintComplete(progress: PrinterProgress): boolean {
  return progress.layer.current >= progress.layer.total;
}

function acknowledge(raw: string): DecodeResult<PrinterResponseMap['control']> {
  if (!hasResponseTerminator(raw)) {
    return missingTerminatorError<PrinterResponseMap['control']>(raw);
  }
  return { success: true, data: { success: true } };
}

// ============================================================================
// DISPATCH
// ============================================================================

type ResponseDecoder<K extends PrinterRequestKind> = (raw: string) => DecodeResult<PrinterResponseMap[K]>;

const RESPONSE_DECODERS: { readonly [K in PrinterRequestKind]: ResponseDecoder<K> } = {
  'control': acknowledge,
  'info': decodeIdentity,
  'head-position': decodeHeadPosition,
  'temperature': decodeTemperatures,
  'progress': decodeProgress,
  'status': decodeStatus,
  'set-temperature': acknowledge
};

/**
 * Decode the raw response to a request of the given kind
 */
export function decodeResponse<K extends PrinterRequestKind>(
  kind: K,
  raw: string
): DecodeResult<PrinterResponseMap[K]> {
  const decoder: ResponseDecoder<K> = RESPONSE_DECODERS[kind];
  return decoder(raw);
}

/**
 * Unwrap a decode result, throwing its error on failure
 */
export function unwrapDecodeResult<T>(result: DecodeResult<T>): T {
  if (!result.success) {
    throw result.error;
  }
  return result.data;
}
