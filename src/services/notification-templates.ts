/**
 * @fileoverview Subject/body builders per notification type, and the webhook payload shape.
 */

import type { CameraFrame } from '../types/camera';
import type { NotificationType } from '../types/config';

export const SNAPSHOT_FILENAME = 'snapshot.jpg';

/**
 * What a notification is about
 */
export interface NotificationContext {
  readonly printerId: string;
  /** Printer's own name when known, otherwise its id */
  readonly printerName: string;
  readonly host: string;
  readonly currentFile: string | null;
  /** Last cached camera frame, attached when present */
  readonly frame: CameraFrame | null;
}

export interface NotificationMessage {
  readonly subject: string;
  readonly body: string;
}

type MessageBuilder = (context: NotificationContext) => NotificationMessage;

const MESSAGE_BUILDERS: Readonly<Record<NotificationType, MessageBuilder>> = {
  'print-complete': (context) => ({
    subject: `Print complete on ${context.printerName}`,
    body: `File: ${context.currentFile ?? 'unknown'}\nIP: ${context.host}\n`
  })
};

export function buildNotificationMessage(type: NotificationType, context: NotificationContext): NotificationMessage {
  return MESSAGE_BUILDERS[type](context);
}

// ============================================================================
// WEBHOOK PAYLOAD
// ============================================================================

export interface WebhookEmbed {
  title: string;
  description: string;
  image?: { url: string };
}

/**
 * Discord-compatible webhook body
 */
export interface WebhookPayload {
  username: string;
  embeds: WebhookEmbed[];
}

export function buildWebhookPayload(
  message: NotificationMessage,
  context: NotificationContext
): WebhookPayload {
  const embed: WebhookEmbed = { title: message.subject, description: message.body };
  if (context.frame) {
    embed.image = { url: `attachment://${SNAPSHOT_FILENAME}` };
  }
  return { username: context.printerName, embeds: [embed] };
}
