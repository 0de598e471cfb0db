import { deriveServiceKey } from '../memory/serviceKey.js';
import { MemoryChatService, type MemoryChatServiceOptions } from './MemoryChatService.js';

export interface RegistryListing {
  namespaces: string[];
  count: number;
}

/**
 * Keyed instance cache. Entries are created on first lookup and kept for the life of
 * the process. `resolve` is synchronous, so concurrent requests for a new key on the
 * event loop always observe the same instance.
 */
export class ServiceRegistry<T> {
  private readonly services = new Map<string, T>();

  constructor(private readonly create: (key: string) => T) {}

  resolve(namespace: string, userId?: string | null): T {
    const key = deriveServiceKey(namespace, userId);
    const existing = this.services.get(key);
    if (existing) {
      return existing;
    }
    const created = this.create(key);
    this.services.set(key, created);
    return created;
  }

  list(): RegistryListing {
    return {
      namespaces: Array.from(this.services.keys()),
      count: this.services.size
    };
  }
}

export type MemoryChatRegistry = ServiceRegistry<MemoryChatService>;

export function createMemoryChatRegistry(options: Omit<MemoryChatServiceOptions, 'namespace'>): MemoryChatRegistry {
  return new ServiceRegistry((namespace) => new MemoryChatService({ ...options, namespace }));
}
