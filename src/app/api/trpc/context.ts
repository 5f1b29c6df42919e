import type { CreateHTTPContextOptions } from '@trpc/server/adapters/standalone';
import type { Services } from '@/app/lib/services';

export interface Context {
  services: Services;
}

/**
 * Services are created once at startup; every request shares them. There is
 * no per-request state.
 */
export function createContextFactory(services: Services) {
  return (_opts?: CreateHTTPContextOptions): Context => ({ services });
}
