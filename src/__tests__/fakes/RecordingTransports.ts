/**
 * @fileoverview Recording stand-ins for the mail and webhook transports
 */

import type {
  MailMessage,
  MailTransport,
  WebhookRequest,
  WebhookTransport
} from '../../services/notification-transports';

export class RecordingMailTransport implements MailTransport {
  readonly sent: MailMessage[] = [];
  failWith: Error | null = null;

  async send(message: MailMessage): Promise<void> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.sent.push(message);
  }
}

export class RecordingWebhookTransport implements WebhookTransport {
  readonly posted: WebhookRequest[] = [];
  private readonly failingUrls = new Set<string>();

  failFor(url: string): void {
    this.failingUrls.add(url);
  }

  async post(request: WebhookRequest): Promise<void> {
    if (this.failingUrls.has(request.url)) {
      throw new Error(`HTTP 500 from ${request.url}`);
    }
    this.posted.push(request);
  }
}
