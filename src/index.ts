/**
 * Application Entry Point
 *
 * Wires the site request service to Supabase, SMTP and the Hono app.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { createClient } from '@supabase/supabase-js';

import { createApp } from './api/app.js';
import { ConfigError, loadConfig } from './config/index.js';
import type { AppConfig } from './config/index.js';
import { logger } from './lib/logger.js';
import {
  createEmailNotifier,
  createIdentityStoreDb,
  createSiteProvisionerDb,
  createSiteRequestService,
  createSiteRequestServiceDb,
  createSmtpTransport,
} from './services/index.js';

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error('Invalid configuration', { issues: error.issues });
      process.exit(1);
    }
    throw error;
  }
}

const config = readConfig();

const supabase = createClient(config.supabaseUrl, config.supabaseServiceKey, {
  auth: {
    autoRefreshToken: false,
    persistSession: false,
    detectSessionInUrl: false,
  },
});

// Wire adapters
const identityStore = createIdentityStoreDb(supabase);
const siteRequestService = createSiteRequestService({
  db: createSiteRequestServiceDb(supabase),
  identityStore,
  provisioner: createSiteProvisionerDb(supabase),
  notifier: createEmailNotifier({
    transporter: createSmtpTransport(config.smtp),
    from: config.smtp.from,
  }),
  config: {
    networkDomain: config.networkDomain,
    networkAdminEmail: config.networkAdminEmail,
  },
  logger,
});

const app = createApp({
  siteRequestService,
  auth: supabase.auth,
  resolvePermissions: identityStore.resolvePermissions,
  logger,
  networkDomain: config.networkDomain,
  allowedOrigins: config.allowedOrigins,
});

serve({ fetch: app.fetch, port: config.port }, (info) => {
  logger.info('Server listening', {
    port: info.port,
    network: config.networkDomain,
  });
});
