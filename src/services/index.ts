/**
 * Service Layer Exports
 *
 * Services are the ONLY gateway to the database.
 * All business logic lives here.
 */

// SiteRequestService
export type {
  SiteRequestService,
  SiteRequestServiceDb,
  SiteRequestServiceConfig,
  CreateRequestOutcome,
  IdentityStore,
  SiteProvisioner,
  Notifier,
} from './site-request.service.js';
export { createSiteRequestService } from './site-request.service.js';
export { createSiteRequestServiceDb } from './site-request.db.js';

// Collaborator adapters
export type { IdentityStoreDb } from './identity.db.js';
export { createIdentityStoreDb } from './identity.db.js';
export { createSiteProvisionerDb } from './site-provisioner.db.js';
export { createEmailNotifier, createSmtpTransport } from './email.notifier.js';
