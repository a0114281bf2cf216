/**
 * Handler interfaces: what each entity kind exposes to the sync engine
 */

import { Diagnostics } from '../diagnostics';
import { Schema } from '../schema';
import { AttributeRecord } from '../types';

export type HandlerKind = 'data' | 'resource';

/** Per-call context forwarded to every remote call */
export interface OperationContext {
  signal?: AbortSignal;
}

export interface HandlerResponse {
  /** New state record; null when the operation failed or removed the entity */
  state: AttributeRecord | null;
  diagnostics: Diagnostics;
}

interface BaseHandler {
  readonly kind: HandlerKind;

  /** Full type name, e.g. `atlassian_jira_status` */
  metadata(providerTypeName: string): string;

  schema(): Schema;
}

/**
 * Read-only lookup of a remote entity by id
 */
export interface DataSourceHandler extends BaseHandler {
  readonly kind: 'data';

  read(ctx: OperationContext, request: { config: AttributeRecord }): Promise<HandlerResponse>;
}

/**
 * Full lifecycle of a managed remote entity. The engine decides which
 * operation runs; a handler never chooses between them.
 */
export interface ResourceHandler extends BaseHandler {
  readonly kind: 'resource';

  create(ctx: OperationContext, request: { plan: AttributeRecord }): Promise<HandlerResponse>;

  read(ctx: OperationContext, request: { state: AttributeRecord }): Promise<HandlerResponse>;

  update(
    ctx: OperationContext,
    request: { plan: AttributeRecord; state: AttributeRecord }
  ): Promise<HandlerResponse>;

  delete(ctx: OperationContext, request: { state: AttributeRecord }): Promise<HandlerResponse>;

  /** Seed a state record for an existing remote entity (optional) */
  importState?(id: string): AttributeRecord;
}

export type Handler = DataSourceHandler | ResourceHandler;
