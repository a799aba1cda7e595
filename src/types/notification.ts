/**
 * Notification Types
 */

export interface EmailMessage {
  to: string;
  subject: string;
  text: string;
}

export type NotifyErrorCode = 'NOTIFY_FAILED';
