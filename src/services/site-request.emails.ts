/**
 * Site request email templates (plain text)
 */

import type { EmailMessage, Identity, SiteRequest } from '../types/index.js';

export function requestSubmittedEmail(
  adminEmail: string,
  requester: Identity,
  request: SiteRequest
): EmailMessage {
  return {
    to: adminEmail,
    subject: 'New site request pending approval',
    text: [
      'A new user has requested a site:',
      '',
      `Username: ${requester.login}`,
      `Email: ${requester.email}`,
      `Requested site: ${request.requestedName}`,
      '',
      'Review pending requests in the network admin site requests page.',
    ].join('\n'),
  };
}

export function approvalEmail(requester: Identity, url: string): EmailMessage {
  return {
    to: requester.email,
    subject: 'Your site has been approved',
    text: [
      `Hi ${requester.login},`,
      '',
      'Your site request has been approved.',
      '',
      'You can access your site here:',
      url,
      '',
      'You can log in with your existing account.',
    ].join('\n'),
  };
}

export function rejectionEmail(requester: Identity): EmailMessage {
  return {
    to: requester.email,
    subject: 'Your site request was not approved',
    text: [
      `Hi ${requester.login},`,
      '',
      "We're sorry, but your site request was not approved.",
      '',
      'If you believe this is an error, please contact the administrator.',
    ].join('\n'),
  };
}
