import type { IntrospectionRegistry } from '../introspection/registry.js';
import type { ExecutionContext } from './types.js';

export interface ExecutionContextOptions {
  requestId: string;
  resources: IntrospectionRegistry;
  signal?: AbortSignal;
}

export class SimpleExecutionContext implements ExecutionContext {
  readonly requestId: string;
  readonly resources: IntrospectionRegistry;
  readonly signal?: AbortSignal;
  private readonly values = new Map<string, unknown>();

  constructor(options: ExecutionContextOptions) {
    this.requestId = options.requestId;
    this.resources = options.resources;
    this.signal = options.signal;
  }

  getAttribute(name: string): unknown {
    return this.values.get(name);
  }

  setAttribute(name: string, value: unknown): void {
    this.values.set(name, value);
  }

  attributes(): ReadonlyMap<string, unknown> {
    return this.values;
  }
}
