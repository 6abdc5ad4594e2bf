/**
 * Mail Transport
 *
 * Outbound mail behind a small interface so the dispatch loop can run
 * against a fake in tests. The production adapter sends through Resend.
 */

import { Resend } from 'resend';
import type { ResolvedMailConfig } from '../config/app-config.js';
import { MailTransportError } from '../types/errors.js';
import { loggers } from '../utils/logger.js';

const logger = loggers.mail;

export interface MailAttachment {
  filename: string;
  content: Buffer;
}

export interface OutgoingMail {
  to: string;
  subject: string;
  text: string;
  attachments: MailAttachment[];
}

export interface SendResult {
  messageId: string;
}

export interface MailTransport {
  readonly provider: string;
  /** Throws when the message was not accepted */
  send(mail: OutgoingMail): Promise<SendResult>;
}

export function formatSender(fromName: string, fromAddress: string): string {
  return fromName && fromName !== fromAddress ? `${fromName} <${fromAddress}>` : fromAddress;
}

export class ResendTransport implements MailTransport {
  readonly provider = 'resend';
  private readonly client: Resend;
  private readonly from: string;

  constructor(config: Pick<ResolvedMailConfig, 'apiKey' | 'fromAddress' | 'fromName'>) {
    this.client = new Resend(config.apiKey);
    this.from = formatSender(config.fromName, config.fromAddress);
  }

  async send(mail: OutgoingMail): Promise<SendResult> {
    const { data, error } = await this.client.emails.send({
      from: this.from,
      to: mail.to,
      subject: mail.subject,
      text: mail.text,
      attachments: mail.attachments.map(a => ({ filename: a.filename, content: a.content })),
    });

    if (error) {
      throw new MailTransportError(`${error.name}: ${error.message}`, this.provider);
    }
    if (!data) {
      throw new MailTransportError('Provider returned no message id', this.provider);
    }

    logger.debug('Message accepted', { to: mail.to, message_id: data.id });
    return { messageId: data.id };
  }
}
