/**
 * @fileoverview Response payload types for the HTTP API.
 *
 * Every endpoint answers with a `success` flag: data-bearing responses carry `data`,
 * failures carry `error` and the AppError `code`. Camera frames and streams are the
 * exception and are sent as raw image bodies.
 */

import type { PrinterSummary } from '../../types/printer';
import type { CameraStatus } from '../../types/camera';

// ============================================================================
// ENVELOPES
// ============================================================================

/**
 * Standard API response
 */
export interface StandardAPIResponse {
  readonly success: boolean;
  readonly message?: string;
  readonly error?: string;
  readonly code?: string;
}

/**
 * Failure body for every non-2xx JSON response
 */
export interface APIErrorResponse {
  readonly success: false;
  readonly error: string;
  readonly code: string;
}

export interface DataResponse<T> {
  readonly success: true;
  readonly data: T;
}

// ============================================================================
// ENDPOINT PAYLOADS
// ============================================================================

export interface HealthStatus {
  readonly status: 'ok';
  readonly uptimeSeconds: number;
  readonly printerCount: number;
}

export type HealthResponse = DataResponse<HealthStatus>;
export type PrinterListResponse = DataResponse<PrinterSummary[]>;
export type PrinterNamesResponse = DataResponse<string[]>;
export type CameraStatusResponse = DataResponse<CameraStatus>;

/**
 * Which side of the API a request is on for access checks
 */
export type AccessKind = 'read' | 'write';
