/**
 * @fileoverview Type definitions for the printer TCP text protocol.
 *
 * Requests are a discriminated union on `kind`; PrinterResponseMap ties each kind to the
 * shape its response decodes into, so `decodeResponse('status', raw)` is typed as a
 * PrinterStatus result without any runtime dispatch on unknown kinds.
 */

import type { AppError } from '../utils/error.utils';

// ============================================================================
// REQUESTS
// ============================================================================

export type ControlRequest = { readonly kind: 'control' };
export type InfoRequest = { readonly kind: 'info' };
export type HeadPositionRequest = { readonly kind: 'head-position' };
export type TemperatureRequest = { readonly kind: 'temperature' };
export type ProgressRequest = { readonly kind: 'progress' };
export type StatusRequest = { readonly kind: 'status' };
export type SetTemperatureRequest = {
  readonly kind: 'set-temperature';
  readonly toolIndex: number;
  readonly temperature: number;
};

/**
 * Every logical request the printer understands
 */
export type PrinterRequest =
  | ControlRequest
  | InfoRequest
  | HeadPositionRequest
  | TemperatureRequest
  | ProgressRequest
  | StatusRequest
  | SetTemperatureRequest;

export type PrinterRequestKind = PrinterRequest['kind'];

// ============================================================================
// RESPONSES
// ============================================================================

export interface Position {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

export interface EndStopPosition {
  readonly xMax: number;
  readonly yMax: number;
  readonly zMin: number;
}

/**
 * Printer identity from M115. Fetched once and cached by the client.
 */
export interface PrinterIdentity {
  readonly name: string;
  readonly firmwareVersion: string;
  readonly serialNumber: string;
  readonly toolCount: number;
  readonly modelName: string;
  readonly macAddress: string;
  readonly position: Position;
}

export interface PrinterStatus {
  readonly endStop: EndStopPosition;
  readonly machineStatus: string;
  readonly moveMode: string;
  readonly led: boolean;
  /** null when the printer reports no file or an empty file name */
  readonly currentFile: string | null;
}

export interface ProgressRatio {
  readonly current: number;
  readonly total: number;
}

export interface PrinterProgress {
  readonly byte: ProgressRatio;
  readonly layer: ProgressRatio;
}

export interface TemperatureMeasurement {
  readonly current: number;
  readonly target: number;
}

/** Keyed by sensor name as reported by the printer (T0, B, ...) */
export type PrinterTemperatures = Readonly<Record<string, TemperatureMeasurement>>;

export interface PrinterHeadPosition {
  readonly x: number;
  readonly y: number;
  readonly z: number;
  readonly a: number;
  readonly b: number;
}

export interface ControlAcknowledgement {
  readonly success: true;
}

/**
 * Decoded response type for each request kind
 */
export interface PrinterResponseMap {
  'control': ControlAcknowledgement;
  'info': PrinterIdentity;
  'head-position': PrinterHeadPosition;
  'temperature': PrinterTemperatures;
  'progress': PrinterProgress;
  'status': PrinterStatus;
  'set-temperature': ControlAcknowledgement;
}

export type PrinterResponse<K extends PrinterRequestKind> = PrinterResponseMap[K];

/**
 * Result union for decoding a raw response body
 */
export type DecodeResult<T> =
  | { readonly success: true; readonly data: T }
  | { readonly success: false; readonly error: AppError };

/**
 * Flat key/value view of a response body, produced before typed decoding
 */
export type ResponseFields = ReadonlyMap<string, string>;
