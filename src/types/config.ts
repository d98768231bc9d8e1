/**
 * @fileoverview Application configuration schema and types
 *
 * The configuration file is JSON, validated with zod on load. Everything except the
 * printer map has a default, so `{}` is a valid (if idle) configuration.
 *
 * Sections:
 * - server: HTTP listen address
 * - auth: shared secret for the `x-secret` header, separately required for reads/writes
 * - smtp: outbound mail server; absent or incomplete disables email
 * - notifications: destinations per notification type (`onDone` = print complete)
 * - watcher: completion polling interval
 * - printers: id -> network address
 *
 * @module types/config
 */

import { z } from 'zod';
import { EmailSchema, PortSchema, URLSchema } from '../utils/validation.utils';

// ============================================================================
// SCHEMA
// ============================================================================

export const SmtpEncryptionSchema = z.enum(['none', 'starttls', 'tls']);

export const SmtpConfigSchema = z.object({
  host: z.string().default(''),
  port: z.number().int().min(0).max(65535).default(0),
  encryption: SmtpEncryptionSchema.default('none'),
  user: z.string().default(''),
  password: z.string().default('')
});

export const NotificationDestinationsSchema = z.object({
  emails: z.array(EmailSchema).default([]),
  webhooks: z.array(URLSchema).default([])
});

export const PrinterEntrySchema = z.object({
  ip: z.string().min(1, 'Printer ip is required'),
  port: PortSchema.optional(),
  cameraPort: PortSchema.optional()
});

export const AppConfigSchema = z.object({
  server: z.object({
    port: PortSchema.default(3000),
    host: z.string().default('0.0.0.0')
  }).default({}),
  auth: z.object({
    passwordForRead: z.boolean().default(false),
    passwordForWrite: z.boolean().default(false),
    password: z.string().default('')
  }).default({}),
  smtp: SmtpConfigSchema.optional(),
  notifications: z.object({
    onDone: NotificationDestinationsSchema.optional()
  }).default({}),
  watcher: z.object({
    intervalMs: z.number().int().min(1000).default(60000)
  }).default({}),
  printers: z.record(z.string().min(1), PrinterEntrySchema).default({})
});

// ============================================================================
// TYPES
// ============================================================================

export type SmtpEncryption = z.infer<typeof SmtpEncryptionSchema>;
export type SmtpConfig = z.infer<typeof SmtpConfigSchema>;
export type NotificationDestinations = z.infer<typeof NotificationDestinationsSchema>;
export type PrinterEntry = z.infer<typeof PrinterEntrySchema>;
export type AppConfig = Readonly<z.infer<typeof AppConfigSchema>>;

/**
 * Notification kinds and the config key that lists their destinations
 */
export const NOTIFICATION_CONFIG_KEYS = {
  'print-complete': 'onDone'
} as const;

export type NotificationType = keyof typeof NOTIFICATION_CONFIG_KEYS;

export const DEFAULT_CONFIG: AppConfig = AppConfigSchema.parse({});

/**
 * Whether an SMTP section is complete enough to send mail
 */
export function isSmtpUsable(smtp: SmtpConfig | undefined): smtp is SmtpConfig {
  return smtp !== undefined && smtp.host.length > 0 && smtp.user.length > 0 && smtp.port > 0;
}
