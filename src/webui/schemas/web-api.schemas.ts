/**
 * @fileoverview Zod validation schemas for HTTP API request parameters and bodies.
 */

import { z } from 'zod';

/**
 * Printer id path parameter
 */
export const PrinterIdParamSchema = z.object({
  printerId: z.string().trim().min(1, 'Printer id is required')
});

/**
 * Set a tool's target temperature
 */
export const TemperatureSetRequestSchema = z.object({
  toolIndex: z.number().int('Tool index must be an integer').min(0, 'Tool index cannot be negative'),
  temperature: z.number().min(0, 'Temperature cannot be negative').max(300, 'Temperature cannot exceed 300')
});

/**
 * Snapshot wait bound, in milliseconds
 */
export const SnapshotQuerySchema = z.object({
  timeoutMs: z.coerce.number().int().min(100).max(60000).optional()
});

export type ValidatedTemperatureSetRequest = z.infer<typeof TemperatureSetRequestSchema>;

/**
 * Create a standardized validation error payload
 */
export function createValidationError(zodError: z.ZodError): { error: string; details: unknown } {
  const issues = zodError.issues.map(issue => ({
    path: issue.path.join('.'),
    message: issue.message
  }));

  return {
    error: issues[0] ? `Validation failed: ${issues[0].path || 'body'} ${issues[0].message}` : 'Validation failed',
    details: issues
  };
}
