/**
 * Process-wide resolver chain
 *
 * Generated loader modules and live registrations share one list stored on
 * globalThis, so they are consulted in a single order.
 */

import { RESOLVER_REGISTRY_KEY } from "@declmap/emitter";
import type { RegistrationHandle, Resolver, ResolverHost } from "./types.js";

const REGISTRY = Symbol.for(RESOLVER_REGISTRY_KEY);

const isResolverList = (value: unknown): value is Resolver[] =>
  Array.isArray(value) &&
  value.every((entry) => typeof entry === "function");

/**
 * The shared list, created on first use
 */
export const sharedResolvers = (): Resolver[] => {
  const existing: unknown = Reflect.get(globalThis, REGISTRY);
  if (isResolverList(existing)) {
    return existing;
  }
  const created: Resolver[] = [];
  Reflect.set(globalThis, REGISTRY, created);
  return created;
};

export class ResolverChain implements ResolverHost {
  private readonly resolvers: Resolver[];

  /**
   * @param resolvers - backing list; the shared process-wide list by default
   */
  constructor(resolvers: Resolver[] = sharedResolvers()) {
    this.resolvers = resolvers;
  }

  register(resolver: Resolver, prepend = false): RegistrationHandle {
    if (prepend) {
      this.resolvers.unshift(resolver);
    } else {
      this.resolvers.push(resolver);
    }
    return { resolver };
  }

  unregister(handle: RegistrationHandle): boolean {
    const index = this.resolvers.indexOf(handle.resolver);
    if (index === -1) {
      return false;
    }
    this.resolvers.splice(index, 1);
    return true;
  }

  /**
   * Ask each resolver in order until one loads the identifier
   */
  resolve(identifier: string): boolean {
    for (const resolver of [...this.resolvers]) {
      if (resolver(identifier)) {
        return true;
      }
    }
    return false;
  }

  list(): readonly Resolver[] {
    return [...this.resolvers];
  }

  get size(): number {
    return this.resolvers.length;
  }
}
