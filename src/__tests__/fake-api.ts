import { vi } from 'vitest';

export interface Reply {
  status: number;
  body?: unknown;
}

export interface RecordedRequest {
  method: string;
  path: string;
  headers: Headers;
  body?: string;
}

export const reply = (status: number, body?: unknown): Reply => ({ status, body });

/**
 * In-process stand-in for the provisioning API, installed as global fetch.
 * Each route replays its replies in order and repeats the last one.
 */
export class FakeApi {
  readonly requests: RecordedRequest[] = [];
  private readonly routes = new Map<string, Reply[]>();

  readonly fetch = vi.fn(async (input: string | URL, init?: RequestInit): Promise<Response> => {
    const method = init?.method ?? 'GET';
    const path = new URL(String(input)).pathname;
    this.requests.push({
      method,
      path,
      headers: new Headers(init?.headers),
      body: typeof init?.body === 'string' ? init.body : undefined,
    });

    const replies = this.routes.get(`${method} ${path}`);
    const next = replies && (replies.length > 1 ? replies.shift() : replies[0]);
    if (!next) {
      return new Response(JSON.stringify({ error: `no route for ${method} ${path}` }), { status: 404 });
    }
    if (next.status === 204 || next.body === undefined) {
      return new Response(null, { status: next.status });
    }
    return new Response(JSON.stringify(next.body), {
      status: next.status,
      headers: { 'Content-Type': 'application/json' },
    });
  });

  on(method: string, path: string, ...replies: Reply[]): this {
    this.routes.set(`${method} ${path}`, replies);
    return this;
  }

  /** Default token route: a one-hour token. */
  withToken(accessToken = 'test-token', expiresIn = 3600): this {
    return this.on('POST', '/oauth/token', reply(200, {
      access_token: accessToken,
      token_type: 'bearer',
      expires_in: expiresIn,
    }));
  }

  calls(method: string, path: string): RecordedRequest[] {
    return this.requests.filter((r) => r.method === method && r.path === path);
  }

  install(): this {
    vi.stubGlobal('fetch', this.fetch);
    return this;
  }
}

export function instanceJson(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 'i1',
    name: 'db1',
    tenant_id: 't1',
    cloud_provider: 'gcp',
    status: 'RUNNING',
    connection_url: 'neo4j+s://i1.example.test',
    memory: '8GB',
    ...overrides,
  };
}
