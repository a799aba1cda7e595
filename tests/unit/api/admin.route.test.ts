/**
 * Admin Routes Unit Tests
 */

import { Hono } from 'hono';
import type { MiddlewareHandler } from 'hono';
import { describe, it, expect, vi, beforeEach } from 'vitest';

import { createAdminRoutes } from '@/api/routes/admin.js';
import type { SiteRequestService } from '@/services/site-request.service.js';
import type { ActorContext, SiteRequest } from '@/types/index.js';
import { failure, success } from '@/types/index.js';

function createAdminActor(): ActorContext {
  return {
    type: 'admin',
    userId: 'admin-123',
    requestId: 'req-123',
    permissions: ['sites:review'],
  };
}

// Mock middleware that sets actor
function mockAuthMiddleware(actor: ActorContext): MiddlewareHandler {
  return async (c, next) => {
    c.set('actor', actor);
    c.set('requestId', actor.requestId);
    await next();
  };
}

const pendingRequest: SiteRequest = {
  id: 'sr-1',
  requesterId: 'user-123',
  requestedName: 'my-cool-site',
  domain: 'my-cool-site.example.com',
  status: 'pending',
  reviewerId: null,
  siteId: null,
  createdAt: new Date('2024-01-01T00:00:00Z'),
  reviewedAt: null,
};

const pendingDto = {
  id: 'sr-1',
  requesterId: 'user-123',
  requestedName: 'my-cool-site',
  domain: 'my-cool-site.example.com',
  status: 'pending',
  reviewerId: null,
  siteId: null,
  createdAt: '2024-01-01T00:00:00.000Z',
  reviewedAt: null,
};

function createMockService() {
  return {
    submitRequest: vi.fn<SiteRequestService['submitRequest']>(),
    getRequest: vi.fn<SiteRequestService['getRequest']>(),
    listPending: vi.fn<SiteRequestService['listPending']>(),
    approve: vi.fn<SiteRequestService['approve']>(),
    reject: vi.fn<SiteRequestService['reject']>(),
  } satisfies SiteRequestService;
}

describe('Admin Routes', () => {
  let mockService: ReturnType<typeof createMockService>;

  beforeEach(() => {
    mockService = createMockService();
  });

  function adminApp(): Hono {
    const app = new Hono();
    app.use('*', mockAuthMiddleware(createAdminActor()));
    app.route('/api/v1', createAdminRoutes({ siteRequestService: mockService }));
    return app;
  }

  describe('GET /admin/site-requests', () => {
    it('should list pending requests', async () => {
      mockService.listPending.mockResolvedValue(success([pendingRequest]));

      const res = await adminApp().request('/api/v1/admin/site-requests');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        data: { items: [pendingDto] },
        meta: { requestId: 'req-123' },
      });
    });
  });

  describe('GET /admin/site-requests/:id', () => {
    it('should return 404 for an unknown request', async () => {
      mockService.getRequest.mockResolvedValue(
        failure('NOT_FOUND', 'Site request not found: sr-9')
      );

      const res = await adminApp().request('/api/v1/admin/site-requests/sr-9');

      expect(res.status).toBe(404);
      expect(mockService.getRequest).toHaveBeenCalledWith(
        createAdminActor(),
        'sr-9'
      );
    });
  });

  describe('POST /admin/site-requests/:id/approve', () => {
    it('should return the provisioned site', async () => {
      mockService.approve.mockResolvedValue(
        success({
          request: {
            ...pendingRequest,
            status: 'approved',
            reviewerId: 'admin-123',
            siteId: 'site-1',
            reviewedAt: new Date('2024-01-02T00:00:00Z'),
          },
          siteId: 'site-1',
          url: 'https://my-cool-site.example.com',
        })
      );

      const res = await adminApp().request(
        '/api/v1/admin/site-requests/sr-1/approve',
        { method: 'POST' }
      );

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        data: {
          request: {
            ...pendingDto,
            status: 'approved',
            reviewerId: 'admin-123',
            siteId: 'site-1',
            reviewedAt: '2024-01-02T00:00:00.000Z',
          },
          siteId: 'site-1',
          url: 'https://my-cool-site.example.com',
        },
        meta: { requestId: 'req-123' },
      });
    });

    it('should map NOT_PENDING to 409', async () => {
      mockService.approve.mockResolvedValue(
        failure('NOT_PENDING', 'Cannot approve request in approved state')
      );

      const res = await adminApp().request(
        '/api/v1/admin/site-requests/sr-1/approve',
        { method: 'POST' }
      );

      expect(res.status).toBe(409);
    });

    it('should map PROVISION_FAILED to 502', async () => {
      mockService.approve.mockResolvedValue(
        failure('PROVISION_FAILED', 'Failed to create site: timeout')
      );

      const res = await adminApp().request(
        '/api/v1/admin/site-requests/sr-1/approve',
        { method: 'POST' }
      );

      expect(res.status).toBe(502);
    });
  });

  describe('POST /admin/site-requests/:id/reject', () => {
    it('should return the rejected request', async () => {
      mockService.reject.mockResolvedValue(
        success({ ...pendingRequest, status: 'rejected' })
      );

      const res = await adminApp().request(
        '/api/v1/admin/site-requests/sr-1/reject',
        { method: 'POST' }
      );

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        data: { id: 'sr-1', status: 'rejected' },
      });
      expect(mockService.reject).toHaveBeenCalledWith(
        createAdminActor(),
        'sr-1'
      );
    });
  });
});
