/**
 * SMTP Notifier
 * Sends workflow emails through nodemailer. Delivery failures are
 * returned as results; callers decide whether they matter.
 */

import nodemailer from 'nodemailer';
import type { Transporter } from 'nodemailer';

import type { SmtpConfig } from '../config/index.js';
import type { EmailMessage, NotifyErrorCode, Result } from '../types/index.js';
import { failure, success } from '../types/index.js';

import type { Notifier } from './site-request.service.js';

/**
 * Build an SMTP transport with short timeouts
 */
export function createSmtpTransport(config: SmtpConfig): Transporter {
  return nodemailer.createTransport({
    host: config.host,
    port: config.port,
    secure: config.secure,
    ...(config.user !== undefined && {
      auth: { user: config.user, pass: config.pass },
    }),
    connectionTimeout: 10000,
    greetingTimeout: 10000,
    socketTimeout: 15000,
  });
}

/**
 * Create a Notifier that delivers through the given transport
 */
export function createEmailNotifier(deps: {
  transporter: Pick<Transporter, 'sendMail'>;
  from: string;
}): Notifier {
  const { transporter, from } = deps;

  return {
    async send(message: EmailMessage): Promise<Result<void, NotifyErrorCode>> {
      try {
        await transporter.sendMail({
          from,
          to: message.to,
          subject: message.subject,
          text: message.text,
        });
        return success(undefined);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        return failure('NOTIFY_FAILED', `Email delivery failed: ${reason}`, {
          to: message.to,
        });
      }
    },
  };
}
