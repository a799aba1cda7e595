/**
 * Site Provisioning Types
 */

/**
 * Role granted to a user on a provisioned site
 */
export type SiteRole = 'administrator' | 'editor' | 'author' | 'subscriber';

/**
 * Parameters for creating a site on the network
 */
export interface CreateSiteParams {
  domain: string;
  path: string;
  title: string;
  ownerId: string;
}

/**
 * Error codes a provisioner may report
 */
export type ProvisionErrorCode = 'DOMAIN_EXISTS' | 'PROVISION_FAILED';
