import type { IntrospectionProvider } from './types.js';

/**
 * Introspection providers configured on the gateway, by resource id.
 */
export class IntrospectionRegistry {
  private providers = new Map<string, IntrospectionProvider>();

  register(resourceId: string, provider: IntrospectionProvider): this {
    this.providers.set(resourceId, provider);
    return this;
  }

  lookup(resourceId: string): IntrospectionProvider | undefined {
    return this.providers.get(resourceId);
  }
}
