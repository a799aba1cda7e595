/**
 * Supabase client backed by an in-process fetch stub
 * Lets the database adapters run their real PostgREST queries in tests.
 */

import { createClient } from '@supabase/supabase-js';
import type { SupabaseClient } from '@supabase/supabase-js';

export interface RecordedRequest {
  method: string;
  url: URL;
  body: string | null;
}

export interface StubResponse {
  status: number;
  body?: unknown;
  headers?: Record<string, string>;
}

export interface SupabaseStub {
  client: SupabaseClient;
  requests: RecordedRequest[];
  /** Queue responses in the order the adapter will request them */
  respond: (...responses: StubResponse[]) => void;
}

export function createSupabaseStub(): SupabaseStub {
  const requests: RecordedRequest[] = [];
  const queue: StubResponse[] = [];

  const stubFetch: typeof fetch = async (input, init) => {
    const url =
      typeof input === 'string'
        ? input
        : input instanceof URL
          ? input.href
          : input.url;
    requests.push({
      method: init?.method ?? 'GET',
      url: new URL(url),
      body: typeof init?.body === 'string' ? init.body : null,
    });

    const next = queue.shift() ?? { status: 200, body: [] };
    return new Response(
      next.body === undefined ? null : JSON.stringify(next.body),
      {
        status: next.status,
        headers: { 'Content-Type': 'application/json', ...next.headers },
      }
    );
  };

  const client = createClient('http://localhost:54321', 'test-key', {
    auth: { persistSession: false, autoRefreshToken: false },
    global: { fetch: stubFetch },
  });

  return {
    client,
    requests,
    respond: (...responses) => {
      queue.push(...responses);
    },
  };
}
