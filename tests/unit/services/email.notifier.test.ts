/**
 * Email Notifier Unit Tests
 */

import type { Transporter } from 'nodemailer';
import { describe, it, expect, vi } from 'vitest';

import { createEmailNotifier } from '@/services/email.notifier.js';

function createMockTransporter() {
  return {
    sendMail: vi.fn<Transporter['sendMail']>(),
  };
}

const message = {
  to: 'alice@example.com',
  subject: 'Your site request',
  text: 'Hello',
};

describe('EmailNotifier', () => {
  it('should send through the transport with the configured sender', async () => {
    const transporter = createMockTransporter();
    transporter.sendMail.mockResolvedValue({});
    const notifier = createEmailNotifier({
      transporter,
      from: 'Sites <no-reply@example.com>',
    });

    const result = await notifier.send(message);

    expect(result).toEqual({ success: true, data: undefined });
    expect(transporter.sendMail).toHaveBeenCalledWith({
      from: 'Sites <no-reply@example.com>',
      to: 'alice@example.com',
      subject: 'Your site request',
      text: 'Hello',
    });
  });

  it('should return NOTIFY_FAILED when delivery throws', async () => {
    const transporter = createMockTransporter();
    transporter.sendMail.mockRejectedValue(new Error('ECONNREFUSED'));
    const notifier = createEmailNotifier({
      transporter,
      from: 'no-reply@example.com',
    });

    const result = await notifier.send(message);

    expect(result).toEqual({
      success: false,
      error: {
        code: 'NOTIFY_FAILED',
        message: 'Email delivery failed: ECONNREFUSED',
        details: { to: 'alice@example.com' },
      },
    });
  });
});
