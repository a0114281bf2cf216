/**
 * Handler registry keyed by full type name
 */

import { DataSourceHandler, Handler, ResourceHandler } from './types';

export class HandlerRegistry {
  private handlers = new Map<string, Handler>();
  private readonly providerTypeName: string;

  constructor(providerTypeName: string) {
    this.providerTypeName = providerTypeName;
  }

  /** Register a handler under its full type name */
  register(handler: Handler): string {
    const typeName = handler.metadata(this.providerTypeName);
    if (this.handlers.has(typeName)) {
      throw new Error(`A handler is already registered for type: ${typeName}`);
    }
    this.handlers.set(typeName, handler);
    return typeName;
  }

  /** Get a data source handler by type name */
  getDataSource(typeName: string): DataSourceHandler | undefined {
    const handler = this.handlers.get(typeName);
    return handler?.kind === 'data' ? handler : undefined;
  }

  /** Get a resource handler by type name */
  getResource(typeName: string): ResourceHandler | undefined {
    const handler = this.handlers.get(typeName);
    return handler?.kind === 'resource' ? handler : undefined;
  }

  has(typeName: string): boolean {
    return this.handlers.has(typeName);
  }

  /** Registered type names of the given kind, or all of them */
  getTypes(kind?: Handler['kind']): string[] {
    return Array.from(this.handlers.entries())
      .filter(([, handler]) => kind === undefined || handler.kind === kind)
      .map(([typeName]) => typeName);
  }
}
