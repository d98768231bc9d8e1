/**
 * @fileoverview Sends notifications to the destinations configured for their type.
 *
 * Email goes out as one message per notification with every address blind-copied.
 * Webhooks are posted independently, so a failing URL never blocks the others. Every
 * delivery failure is logged as NOTIFICATION_DELIVERY and recorded in the returned
 * report; notify() itself never rejects. There are no retries.
 */

import { notificationDeliveryError, toError } from '../utils/error.utils';
import { logError, logInfo, logVerbose } from '../utils/logging';
import type { NotificationDestinations, NotificationType } from '../types/config';
import {
  buildNotificationMessage,
  buildWebhookPayload,
  SNAPSHOT_FILENAME,
  type NotificationContext,
  type NotificationMessage
} from './notification-templates';
import type { Attachment, MailTransport, WebhookTransport } from './notification-transports';

const LOG_NAMESPACE = 'NotificationDispatcher';

/**
 * Where destinations come from; ConfigManager implements this
 */
export interface NotificationDestinationSource {
  getNotificationDestinations(type: NotificationType): NotificationDestinations;
}

export interface MailSender {
  readonly transport: MailTransport;
  /** From address, the SMTP user */
  readonly from: string;
}

export interface NotificationDispatcherOptions {
  readonly destinations: NotificationDestinationSource;
  /** Null when SMTP is not configured */
  readonly mail: MailSender | null;
  readonly webhooks: WebhookTransport;
}

export type DeliveryChannel = 'email' | 'webhook';

export interface DeliveryOutcome {
  readonly channel: DeliveryChannel;
  readonly destination: string;
  readonly success: boolean;
  readonly error?: string;
}

export interface NotificationDispatchReport {
  readonly type: NotificationType;
  readonly printerId: string;
  readonly outcomes: readonly DeliveryOutcome[];
  readonly delivered: number;
  readonly failed: number;
}

export class NotificationDispatcher {
  constructor(private readonly options: NotificationDispatcherOptions) {}

  async notify(type: NotificationType, context: NotificationContext): Promise<NotificationDispatchReport> {
    const destinations = this.options.destinations.getNotificationDestinations(type);
    const message = buildNotificationMessage(type, context);

    if (destinations.emails.length === 0 && destinations.webhooks.length === 0) {
      logVerbose(LOG_NAMESPACE, `No destinations for ${type}, skipping ${context.printerId}`);
      return createReport(type, context.printerId, []);
    }

    const attachment = toAttachment(context);
    const outcomes = await Promise.all([
      this.sendEmail(destinations.emails, message, attachment),
      ...destinations.webhooks.map(url => this.postWebhook(url, message, context, attachment))
    ]);

    const report = createReport(type, context.printerId, outcomes.filter(isOutcome));
    logInfo(
      LOG_NAMESPACE,
      `${type} for ${context.printerId}: ${report.delivered} delivered, ${report.failed} failed`
    );
    return report;
  }

  private async sendEmail(
    recipients: readonly string[],
    message: NotificationMessage,
    attachment: Attachment | null
  ): Promise<DeliveryOutcome | null> {
    if (recipients.length === 0) {
      return null;
    }
    const destination = recipients.join(', ');

    const mail = this.options.mail;
    if (!mail) {
      return failure('email', destination, new Error('SMTP is not configured'));
    }

    try {
      await mail.transport.send({
        from: mail.from,
        bcc: recipients,
        subject: message.subject,
        text: message.body,
        attachments: attachment ? [attachment] : []
      });
      return { channel: 'email', destination, success: true };
    } catch (error) {
      return failure('email', destination, toError(error));
    }
  }

  private async postWebhook(
    url: string,
    message: NotificationMessage,
    context: NotificationContext,
    attachment: Attachment | null
  ): Promise<DeliveryOutcome> {
    try {
      await this.options.webhooks.post({
        url,
        payload: buildWebhookPayload(message, context),
        ...(attachment ? { attachment } : {})
      });
      return { channel: 'webhook', destination: url, success: true };
    } catch (error) {
      return failure('webhook', url, toError(error));
    }
  }
}

// ============================================================================
// HELPERS
// ============================================================================

function toAttachment(context: NotificationContext): Attachment | null {
  if (!context.frame) {
    return null;
  }
  return {
    filename: SNAPSHOT_FILENAME,
    content: context.frame.data,
    contentType: 'image/jpeg'
  };
}

function failure(channel: DeliveryChannel, destination: string, cause: Error): DeliveryOutcome {
  const error = notificationDeliveryError(destination, cause);
  logError(LOG_NAMESPACE, `${error.message}: ${cause.message}`);
  return { channel, destination, success: false, error: cause.message };
}

function isOutcome(outcome: DeliveryOutcome | null): outcome is DeliveryOutcome {
  return outcome !== null;
}

function createReport(
  type: NotificationType,
  printerId: string,
  outcomes: DeliveryOutcome[]
): NotificationDispatchReport {
  const delivered = outcomes.filter(outcome => outcome.success).length;
  return { type, printerId, outcomes, delivered, failed: outcomes.length - delivered };
}
