/**
 * @fileoverview Outbound notification transports.
 *
 * The dispatcher only sees the MailTransport and WebhookTransport interfaces; the
 * concrete classes wrap nodemailer and the global fetch.
 */

import nodemailer from 'nodemailer';
import type { Transporter } from 'nodemailer';
import { AppError, ErrorCode, timeoutError } from '../utils/error.utils';
import type { SmtpConfig } from '../types/config';
import type { WebhookPayload } from './notification-templates';

export const WEBHOOK_TIMEOUT_MS = 5000;

export interface Attachment {
  readonly filename: string;
  readonly content: Buffer;
  readonly contentType: string;
}

export interface MailMessage {
  readonly from: string;
  readonly bcc: readonly string[];
  readonly subject: string;
  readonly text: string;
  readonly attachments: readonly Attachment[];
}

export interface MailTransport {
  send(message: MailMessage): Promise<void>;
}

export interface WebhookRequest {
  readonly url: string;
  readonly payload: WebhookPayload;
  /** Sent as `files[0]` of a multipart body when present */
  readonly attachment?: Attachment;
}

export interface WebhookTransport {
  post(request: WebhookRequest): Promise<void>;
}

// ============================================================================
// SMTP
// ============================================================================

export class SmtpMailTransport implements MailTransport {
  private readonly transporter: Transporter;

  constructor(smtp: SmtpConfig) {
    this.transporter = nodemailer.createTransport({
      host: smtp.host,
      port: smtp.port,
      secure: smtp.encryption === 'tls',
      requireTLS: smtp.encryption === 'starttls',
      ignoreTLS: smtp.encryption === 'none',
      auth: { user: smtp.user, pass: smtp.password }
    });
  }

  async send(message: MailMessage): Promise<void> {
    await this.transporter.sendMail({
      from: message.from,
      bcc: [...message.bcc],
      subject: message.subject,
      text: message.text,
      attachments: message.attachments.map(attachment => ({
        filename: attachment.filename,
        content: attachment.content,
        contentType: attachment.contentType
      }))
    });
  }

  close(): void {
    this.transporter.close();
  }
}

// ============================================================================
// HTTP WEBHOOK
// ============================================================================

export class HttpWebhookTransport implements WebhookTransport {
  constructor(private readonly timeoutMs: number = WEBHOOK_TIMEOUT_MS) {}

  async post(request: WebhookRequest): Promise<void> {
    const response = await this.fetchWithTimeout(request.url, {
      method: 'POST',
      ...this.buildBody(request)
    });

    if (!response.ok) {
      throw new AppError(`HTTP ${response.status}: ${response.statusText}`, ErrorCode.NETWORK, {
        url: request.url,
        status: response.status
      });
    }
  }

  private buildBody(request: WebhookRequest): RequestInit {
    if (!request.attachment) {
      return {
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(request.payload)
      };
    }

    const form = new FormData();
    form.append('payload_json', JSON.stringify(request.payload));
    form.append(
      'files[0]',
      new Blob([request.attachment.content], { type: request.attachment.contentType }),
      request.attachment.filename
    );
    return { body: form };
  }

  /**
   * Fetch with timeout using AbortController
   */
  private async fetchWithTimeout(url: string, options: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      return await fetch(url, {
        ...options,
        signal: controller.signal
      });
    } catch (error) {
      if (controller.signal.aborted) {
        throw timeoutError(`webhook ${url}`, this.timeoutMs);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
