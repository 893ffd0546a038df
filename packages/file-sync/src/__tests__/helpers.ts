/**
 * Shared test doubles: a mock pino logger and an in-process patch server
 * answering through a fetch stand-in.
 */

import { vi } from 'vitest';
import * as crypto from 'node:crypto';
import type { Logger } from 'pino';

export function createMockLogger(): Logger {
  return {
    child: () => createMockLogger(),
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as Logger;
}

/** Mock logger whose children are itself, so component logs can be inspected */
export function createFlatMockLogger(): Logger {
  const logger = {
    child: () => logger,
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
  return logger as unknown as Logger;
}

export function sha256(content: string): string {
  return crypto.createHash('sha256').update(content).digest('hex');
}

/** How the fake server answers one URL */
export type FakeRoute =
  | { status?: number; body?: string }
  | { networkError: string };

export interface FakeServer {
  fetch: typeof fetch;
  /** Every URL requested, in order */
  requests: string[];
  /** Replace or add a route */
  route: (url: string, route: FakeRoute) => void;
}

/**
 * Fetch stand-in serving fixed responses. Unknown URLs answer 404.
 */
export function createFakeServer(routes: Record<string, FakeRoute> = {}): FakeServer {
  const table = new Map(Object.entries(routes));
  const requests: string[] = [];

  const fakeFetch: typeof fetch = async (input) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    requests.push(url);

    const route = table.get(url);
    if (!route) {
      return new Response('not found', { status: 404 });
    }
    if ('networkError' in route) {
      throw new TypeError(route.networkError);
    }
    return new Response(route.body ?? '', { status: route.status ?? 200 });
  };

  return {
    fetch: fakeFetch,
    requests,
    route: (url, route) => {
      table.set(url, route);
    },
  };
}

/** Manifest text for a set of files served under the patch root */
export function manifestFor(files: Record<string, string>, separator = '\\'): string {
  return Object.entries(files)
    .map(([name, content]) => {
      const token = separator + name.split('/').join(separator);
      return `${token},${sha256(content)},${Buffer.byteLength(content)}`;
    })
    .join('\r\n');
}
