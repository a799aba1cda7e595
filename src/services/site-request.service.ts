/**
 * SiteRequestService Implementation
 *
 * SCOPE: Site request approval workflow
 *
 * Owns: site_requests table
 *
 * GUARDRAILS:
 * - Callers check review permission before approve/reject/list
 * - pending -> approved | rejected are the only transitions, applied with a
 *   conditional update so a replayed or concurrent action cannot repeat
 *   side effects
 * - A request is claimed (pending -> approved) before provisioning and
 *   released back to pending if provisioning fails
 * - Email is sent after the transition is committed and never fails it
 *
 * Dependencies: IdentityStore, SiteProvisioner, Notifier
 */

import type { Logger } from '../lib/logger.js';
import {
  buildSiteDomain,
  buildSiteTitle,
  isValidSiteName,
  normalizeSiteName,
} from '../lib/site-name.js';
import type {
  ActorContext,
  ApprovedSite,
  CreateSiteParams,
  CreateSiteRequestParams,
  EmailMessage,
  Identity,
  NotifyErrorCode,
  ProvisionErrorCode,
  Result,
  SiteRequest,
  SiteRequestStatus,
  SiteRole,
  StatusTransitionPatch,
  SubmitSiteRequestParams,
  ValidationErrorCode,
  WorkflowErrorCode,
} from '../types/index.js';
import { failure, success } from '../types/index.js';

import {
  approvalEmail,
  rejectionEmail,
  requestSubmittedEmail,
} from './site-request.emails.js';

/**
 * Outcome of an insert that may hit a uniqueness constraint
 */
export type CreateRequestOutcome =
  | { created: true; request: SiteRequest }
  | { created: false; conflict: 'requester' | 'name' };

/**
 * Database abstraction interface for SiteRequestService
 */
export interface SiteRequestServiceDb {
  createRequest: (
    params: CreateSiteRequestParams
  ) => Promise<CreateRequestOutcome>;
  getRequest: (requestId: string) => Promise<SiteRequest | null>;
  findByRequester: (requesterId: string) => Promise<SiteRequest | null>;
  /** Pending or approved request holding the name */
  findActiveByName: (requestedName: string) => Promise<SiteRequest | null>;
  listPendingRequests: () => Promise<SiteRequest[]>;
  /**
   * Atomically move a request from `expected` to `next`.
   * Resolves null when the request is no longer in `expected`.
   */
  updateStatusIf: (
    requestId: string,
    expected: SiteRequestStatus,
    next: SiteRequestStatus,
    patch: StatusTransitionPatch
  ) => Promise<SiteRequest | null>;
  recordSite: (requestId: string, siteId: string) => Promise<SiteRequest>;
}

/**
 * Account lookups needed by the workflow
 */
export interface IdentityStore {
  getIdentity: (identityId: string) => Promise<Identity | null>;
  identityExists: (identityId: string) => Promise<boolean>;
}

/**
 * Creates sites on the network
 */
export interface SiteProvisioner {
  domainExists: (domain: string, path: string) => Promise<boolean>;
  createSite: (
    params: CreateSiteParams
  ) => Promise<Result<string, ProvisionErrorCode>>;
  assignOwner: (
    siteId: string,
    identityId: string,
    role: SiteRole
  ) => Promise<Result<void>>;
}

export interface Notifier {
  send: (message: EmailMessage) => Promise<Result<void, NotifyErrorCode>>;
}

export interface SiteRequestServiceConfig {
  networkDomain: string;
  /** Recipient of new-request notices; null disables them */
  networkAdminEmail: string | null;
}

/**
 * SiteRequestService interface
 */
export interface SiteRequestService {
  submitRequest(
    actor: ActorContext,
    params: SubmitSiteRequestParams
  ): Promise<Result<SiteRequest, ValidationErrorCode>>;
  getRequest(
    actor: ActorContext,
    requestId: string
  ): Promise<Result<SiteRequest, 'NOT_FOUND'>>;
  listPending(actor: ActorContext): Promise<Result<SiteRequest[]>>;
  approve(
    actor: ActorContext,
    requestId: string
  ): Promise<Result<ApprovedSite, WorkflowErrorCode>>;
  reject(
    actor: ActorContext,
    requestId: string
  ): Promise<Result<SiteRequest, WorkflowErrorCode>>;
}

const SITE_PATH = '/';

/**
 * Create SiteRequestService instance
 */
export function createSiteRequestService(deps: {
  db: SiteRequestServiceDb;
  identityStore: IdentityStore;
  provisioner: SiteProvisioner;
  notifier: Notifier;
  config: SiteRequestServiceConfig;
  logger: Logger;
  now?: () => Date;
}): SiteRequestService {
  const { db, identityStore, provisioner, notifier, config, logger } = deps;
  const now = deps.now ?? (() => new Date());

  // ─────────────────────────────────────────────────────────────
  // HELPER FUNCTIONS
  // ─────────────────────────────────────────────────────────────

  function reviewerIdOf(actor: ActorContext): string | null {
    if (actor.type === 'system') {
      return null;
    }
    return actor.userId ?? null;
  }

  /**
   * Best-effort email. `compose` runs inside the guard so a failed
   * recipient lookup is logged like a failed delivery; null skips sending.
   */
  async function notify(
    actor: ActorContext,
    requestId: string,
    email: 'admin-notice' | 'approval' | 'rejection',
    compose: () => Promise<EmailMessage | null>
  ): Promise<void> {
    let reason: string | null = null;
    try {
      const message = await compose();
      if (message !== null) {
        const result = await notifier.send(message);
        reason = result.success ? null : result.error.message;
      }
    } catch (error) {
      reason = error instanceof Error ? error.message : String(error);
    }

    if (reason !== null) {
      logger.warn('Site request email not delivered', {
        requestId: actor.requestId,
        siteRequestId: requestId,
        email,
        reason,
      });
    }
  }

  function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Put a claimed request back to pending after a failed approval
   */
  async function releaseClaim(
    actor: ActorContext,
    request: SiteRequest
  ): Promise<void> {
    let released: SiteRequest | null;
    try {
      released = await db.updateStatusIf(request.id, 'approved', 'pending', {
        reviewerId: null,
        reviewedAt: null,
      });
    } catch (error) {
      logger.error(
        'Could not release site request claim',
        { requestId: actor.requestId, siteRequestId: request.id },
        error
      );
      return;
    }
    if (released === null) {
      logger.error('Could not release site request claim', {
        requestId: actor.requestId,
        siteRequestId: request.id,
      });
    }
  }

  /**
   * Domain re-check made after the claim; a lookup error counts as a
   * provisioning failure
   */
  async function checkDomainFree(
    actor: ActorContext,
    domain: string
  ): Promise<Result<void, 'DOMAIN_EXISTS' | 'PROVISION_FAILED'>> {
    try {
      if (await provisioner.domainExists(domain, SITE_PATH)) {
        return failure(
          'DOMAIN_EXISTS',
          'A site with that domain already exists',
          { domain }
        );
      }
      return success(undefined);
    } catch (error) {
      logger.error(
        'Domain check failed',
        { requestId: actor.requestId, domain },
        error
      );
      return failure(
        'PROVISION_FAILED',
        `Failed to check domain: ${errorMessage(error)}`,
        { domain }
      );
    }
  }

  /**
   * Owner membership for a freshly created site; failures are logged only
   */
  async function assignOwner(
    actor: ActorContext,
    siteId: string,
    identityId: string
  ): Promise<void> {
    let reason: string | null;
    try {
      const owner = await provisioner.assignOwner(
        siteId,
        identityId,
        'administrator'
      );
      reason = owner.success ? null : owner.error.message;
    } catch (error) {
      reason = errorMessage(error);
    }

    if (reason !== null) {
      logger.error('Could not assign site owner', {
        requestId: actor.requestId,
        siteId,
        reason,
      });
    }
  }

  async function provision(
    actor: ActorContext,
    params: CreateSiteParams
  ): Promise<Result<string, ProvisionErrorCode>> {
    try {
      return await provisioner.createSite(params);
    } catch (error) {
      logger.error(
        'Site provisioner threw',
        { requestId: actor.requestId, domain: params.domain },
        error
      );
      return failure(
        'PROVISION_FAILED',
        `Failed to create site: ${errorMessage(error)}`
      );
    }
  }

  // ─────────────────────────────────────────────────────────────
  // SERVICE IMPLEMENTATION
  // ─────────────────────────────────────────────────────────────

  return {
    async submitRequest(
      actor: ActorContext,
      params: SubmitSiteRequestParams
    ): Promise<Result<SiteRequest, ValidationErrorCode>> {
      if (params.siteName.trim() === '') {
        return failure('EMPTY_NAME', 'Please choose a site name');
      }

      const requestedName = normalizeSiteName(params.siteName);
      if (!isValidSiteName(requestedName)) {
        return failure(
          'INVALID_FORMAT',
          'Site name may only contain lowercase letters, numbers, and hyphens',
          { normalized: requestedName }
        );
      }

      if (!(await identityStore.identityExists(params.requesterId))) {
        return failure(
          'UNKNOWN_REQUESTER',
          `Requester not found: ${params.requesterId}`
        );
      }

      if ((await db.findByRequester(params.requesterId)) !== null) {
        return failure(
          'DUPLICATE_REQUEST',
          'A site has already been requested for this account'
        );
      }

      const domain = buildSiteDomain(requestedName, config.networkDomain);
      if (
        (await provisioner.domainExists(domain, SITE_PATH)) ||
        (await db.findActiveByName(requestedName)) !== null
      ) {
        return failure('NAME_TAKEN', 'That site name is already taken', {
          domain,
        });
      }

      const outcome = await db.createRequest({
        requesterId: params.requesterId,
        requestedName,
        domain,
      });

      if (!outcome.created) {
        return outcome.conflict === 'requester'
          ? failure(
              'DUPLICATE_REQUEST',
              'A site has already been requested for this account'
            )
          : failure('NAME_TAKEN', 'That site name is already taken', {
              domain,
            });
      }

      const request = outcome.request;
      logger.info('Site request submitted', {
        requestId: actor.requestId,
        siteRequestId: request.id,
        domain,
      });

      const adminEmail = config.networkAdminEmail;
      if (adminEmail !== null) {
        await notify(actor, request.id, 'admin-notice', async () => {
          const requester = await identityStore.getIdentity(
            request.requesterId
          );
          return requester === null
            ? null
            : requestSubmittedEmail(adminEmail, requester, request);
        });
      }

      return success(request);
    },

    async getRequest(
      _actor: ActorContext,
      requestId: string
    ): Promise<Result<SiteRequest, 'NOT_FOUND'>> {
      const request = await db.getRequest(requestId);

      if (request === null) {
        return failure('NOT_FOUND', `Site request not found: ${requestId}`);
      }

      return success(request);
    },

    async listPending(_actor: ActorContext): Promise<Result<SiteRequest[]>> {
      const requests = await db.listPendingRequests();
      return success(requests);
    },

    async approve(
      actor: ActorContext,
      requestId: string
    ): Promise<Result<ApprovedSite, WorkflowErrorCode>> {
      const request = await db.getRequest(requestId);

      if (request === null) {
        return failure('NOT_FOUND', `Site request not found: ${requestId}`);
      }

      if (request.status !== 'pending') {
        return failure(
          'NOT_PENDING',
          `Cannot approve request in ${request.status} state`,
          { status: request.status }
        );
      }

      const requester = await identityStore.getIdentity(request.requesterId);
      if (requester === null) {
        return failure(
          'NOT_FOUND',
          `Requester not found: ${request.requesterId}`
        );
      }

      const claimed = await db.updateStatusIf(requestId, 'pending', 'approved', {
        reviewerId: reviewerIdOf(actor),
        reviewedAt: now(),
      });
      if (claimed === null) {
        return failure(
          'NOT_PENDING',
          'Site request was already handled by another action'
        );
      }

      const domainFree = await checkDomainFree(actor, claimed.domain);
      if (!domainFree.success) {
        await releaseClaim(actor, claimed);
        return domainFree;
      }

      const created = await provision(actor, {
        domain: claimed.domain,
        path: SITE_PATH,
        title: buildSiteTitle(claimed.requestedName),
        ownerId: claimed.requesterId,
      });

      if (!created.success) {
        await releaseClaim(actor, claimed);
        logger.warn('Site provisioning failed', {
          requestId: actor.requestId,
          siteRequestId: requestId,
          code: created.error.code,
          reason: created.error.message,
        });
        return failure(created.error.code, created.error.message, {
          domain: claimed.domain,
        });
      }

      const siteId = created.data;
      await assignOwner(actor, siteId, claimed.requesterId);

      // The site exists from here on; approval is reported even if the
      // site id cannot be stored on the request
      let approved: SiteRequest;
      try {
        approved = await db.recordSite(requestId, siteId);
      } catch (error) {
        logger.error(
          'Could not record provisioned site',
          { requestId: actor.requestId, siteRequestId: requestId, siteId },
          error
        );
        approved = claimed;
      }
      const url = `https://${approved.domain}`;

      logger.info('Site request approved', {
        requestId: actor.requestId,
        siteRequestId: requestId,
        siteId,
      });

      await notify(actor, requestId, 'approval', async () =>
        approvalEmail(requester, url)
      );

      return success({ request: approved, siteId, url });
    },

    async reject(
      actor: ActorContext,
      requestId: string
    ): Promise<Result<SiteRequest, WorkflowErrorCode>> {
      const request = await db.getRequest(requestId);

      if (request === null) {
        return failure('NOT_FOUND', `Site request not found: ${requestId}`);
      }

      if (request.status !== 'pending') {
        return failure(
          'NOT_PENDING',
          `Cannot reject request in ${request.status} state`,
          { status: request.status }
        );
      }

      const rejected = await db.updateStatusIf(
        requestId,
        'pending',
        'rejected',
        { reviewerId: reviewerIdOf(actor), reviewedAt: now() }
      );
      if (rejected === null) {
        return failure(
          'NOT_PENDING',
          'Site request was already handled by another action'
        );
      }

      logger.info('Site request rejected', {
        requestId: actor.requestId,
        siteRequestId: requestId,
      });

      await notify(actor, requestId, 'rejection', async () => {
        const requester = await identityStore.getIdentity(
          rejected.requesterId
        );
        return requester === null ? null : rejectionEmail(requester);
      });

      return success(rejected);
    },
  };
}
