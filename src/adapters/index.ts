import type { AdapterDeps, BaseSiteAdapter } from './base-adapter';
import { CareerSiteAdapter } from './career-site-adapter';

export type { AdapterDeps } from './base-adapter';
export { BaseSiteAdapter, ListingPageError } from './base-adapter';

type AdapterConstructor = new (deps: AdapterDeps) => BaseSiteAdapter;

/** Keyed by resource name; a crawl cycle visits the companies rows whose `resource` matches a key. */
const adapterRegistry = new Map<string, AdapterConstructor>([['careersite', CareerSiteAdapter]]);

export function registerAdapter(resource: string, ctor: AdapterConstructor): void {
  adapterRegistry.set(resource, ctor);
}

export function getAdapter(resource: string, deps: AdapterDeps): BaseSiteAdapter | null {
  const Ctor = adapterRegistry.get(resource);
  return Ctor ? new Ctor(deps) : null;
}

/** Resources in registration order; companies with any other resource are never crawled. */
export function getAvailableAdapters(): string[] {
  return [...adapterRegistry.keys()];
}
