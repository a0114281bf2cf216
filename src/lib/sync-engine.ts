/**
 * Sync engine: refreshes state, plans changes and drives the handlers
 */

import { Diagnostic, DiagnosticsError, Diagnostics } from './diagnostics';
import { HandlerRegistry } from './handlers/registry';
import { HandlerResponse, OperationContext, ResourceHandler } from './handlers/types';
import { logger } from './logger';
import { buildPlan, changedAttributes, validateConfig } from './schema';
import { StateStore } from './state-store';
import { AttributeRecord, ConfigBlock, PlannedChange, SyncConfig, SyncState } from './types';

export interface SyncError {
  address: string;
  diagnostics: Diagnostic[];
}

export interface PlanResult {
  changes: PlannedChange[];
  /** Data source state by address (`data.<type>.<name>`) */
  data: Record<string, AttributeRecord>;
  errors: SyncError[];
}

export interface ApplyResult {
  created: string[];
  updated: string[];
  deleted: string[];
  unchanged: string[];
  errors: SyncError[];
}

export function resourceAddress(block: Pick<ConfigBlock, 'type' | 'name'>): string {
  return `${block.type}.${block.name}`;
}

export function dataAddress(block: Pick<ConfigBlock, 'type' | 'name'>): string {
  return `data.${block.type}.${block.name}`;
}

/**
 * Split `<type>.<name>` into its parts
 */
export function parseAddress(address: string): { type: string; name: string } {
  const separator = address.lastIndexOf('.');
  if (separator <= 0 || separator === address.length - 1) {
    throw new Error(`Invalid resource address: ${address}. Expected "<type>.<name>"`);
  }
  return { type: address.slice(0, separator), name: address.slice(separator + 1) };
}

function unsupportedType(address: string, kind: 'data source' | 'resource', type: string): SyncError {
  return {
    address,
    diagnostics: [
      {
        severity: 'error',
        summary: `Invalid ${kind} type`,
        detail: `The provider does not support ${kind} type "${type}".`,
      },
    ],
  };
}

function errorsOf(address: string, diagnostics: Diagnostics): SyncError {
  return { address, diagnostics: diagnostics.errors() };
}

export class SyncEngine {
  private registry: HandlerRegistry;
  private store: StateStore;

  constructor(registry: HandlerRegistry, store: StateStore) {
    this.registry = registry;
    this.store = store;
  }

  /**
   * Read every data source, refresh every managed resource and work out
   * which lifecycle operation each configured resource needs. Nothing is
   * written to Jira or to the state file.
   */
  async plan(config: SyncConfig, ctx: OperationContext = {}): Promise<PlanResult> {
    const state = this.store.load();
    const result: PlanResult = { changes: [], data: {}, errors: [] };

    for (const block of config.data) {
      const address = dataAddress(block);
      const handler = this.registry.getDataSource(block.type);
      if (!handler) {
        result.errors.push(unsupportedType(address, 'data source', block.type));
        continue;
      }

      const { config: record, diagnostics } = validateConfig(handler.schema(), block.config);
      if (diagnostics.hasError()) {
        result.errors.push(errorsOf(address, diagnostics));
        continue;
      }

      const response = await handler.read(ctx, { config: record });
      if (response.state === null || response.diagnostics.hasError()) {
        result.errors.push(errorsOf(address, response.diagnostics));
        continue;
      }
      result.data[address] = response.state;
    }

    const configured = new Set<string>();

    for (const block of config.resources) {
      const address = resourceAddress(block);
      configured.add(address);

      const handler = this.registry.getResource(block.type);
      if (!handler) {
        result.errors.push(unsupportedType(address, 'resource', block.type));
        continue;
      }

      const schema = handler.schema();
      const { config: record, diagnostics } = validateConfig(schema, block.config);
      if (diagnostics.hasError()) {
        result.errors.push(errorsOf(address, diagnostics));
        continue;
      }

      const stored = state.resources[address];
      if (!stored) {
        const plan = buildPlan(schema, record, null);
        result.changes.push({
          address,
          type: block.type,
          action: 'create',
          changedAttributes: Object.keys(plan),
          plan,
          prior: null,
        });
        continue;
      }

      const refreshed = await handler.read(ctx, { state: stored.attributes });
      if (refreshed.state === null || refreshed.diagnostics.hasError()) {
        result.errors.push(errorsOf(address, refreshed.diagnostics));
        continue;
      }

      const prior = refreshed.state;
      const plan = buildPlan(schema, record, prior);
      const changed = changedAttributes(schema, plan, prior);

      result.changes.push({
        address,
        type: block.type,
        action: changed.length > 0 ? 'update' : 'no-op',
        changedAttributes: changed,
        plan,
        prior,
      });
    }

    for (const [address, stored] of Object.entries(state.resources)) {
      if (configured.has(address)) continue;
      result.changes.push({
        address,
        type: stored.type,
        action: 'delete',
        changedAttributes: [],
        plan: null,
        prior: stored.attributes,
      });
    }

    logger.debug('Planned changes', {
      changes: result.changes.map((c) => `${c.action} ${c.address}`),
      errors: result.errors.length,
    });

    return result;
  }

  /**
   * Run each planned change through its handler. State is saved after every
   * successful operation; a failed change is reported and the rest go on.
   */
  async apply(planned: PlanResult, ctx: OperationContext = {}): Promise<ApplyResult> {
    const state = this.store.load();
    const result: ApplyResult = { created: [], updated: [], deleted: [], unchanged: [], errors: [] };

    state.data = planned.data;

    for (const change of planned.changes) {
      if (change.action === 'no-op') {
        state.resources[change.address] = { type: change.type, attributes: change.prior };
        result.unchanged.push(change.address);
        continue;
      }

      const handler = this.registry.getResource(change.type);
      if (!handler) {
        result.errors.push(unsupportedType(change.address, 'resource', change.type));
        continue;
      }

      const response = await this.run(handler, change, ctx);

      if (response.diagnostics.hasError()) {
        result.errors.push(errorsOf(change.address, response.diagnostics));
        continue;
      }

      if (change.action === 'delete') {
        delete state.resources[change.address];
        result.deleted.push(change.address);
      } else if (response.state !== null) {
        state.resources[change.address] = { type: change.type, attributes: response.state };
        (change.action === 'create' ? result.created : result.updated).push(change.address);
      } else {
        result.errors.push({
          address: change.address,
          diagnostics: [
            {
              severity: 'error',
              summary: 'Provider produced null object',
              detail: `The ${change.action} of ${change.address} returned no state.`,
            },
          ],
        });
        continue;
      }

      this.saveState(state);
    }

    this.saveState(state);
    return result;
  }

  /**
   * Bring an existing Jira entity under management at the given address
   */
  async importResource(address: string, id: string, ctx: OperationContext = {}): Promise<AttributeRecord> {
    const { type } = parseAddress(address);
    const handler = this.registry.getResource(type);
    if (!handler) {
      throw new DiagnosticsError(unsupportedType(address, 'resource', type).diagnostics);
    }
    if (!handler.importState) {
      throw new Error(`Resource type ${type} does not support import`);
    }

    const state = this.store.load();
    if (state.resources[address]) {
      throw new Error(`${address} is already managed`);
    }

    const response = await handler.read(ctx, { state: handler.importState(id) });
    if (response.state === null || response.diagnostics.hasError()) {
      throw new DiagnosticsError(response.diagnostics.errors());
    }

    state.resources[address] = { type, attributes: response.state };
    this.saveState(state);
    return response.state;
  }

  private run(
    handler: ResourceHandler,
    change: Exclude<PlannedChange, { action: 'no-op' }>,
    ctx: OperationContext
  ): Promise<HandlerResponse> {
    switch (change.action) {
      case 'create':
        return handler.create(ctx, { plan: change.plan });
      case 'update':
        return handler.update(ctx, { plan: change.plan, state: change.prior });
      case 'delete':
        return handler.delete(ctx, { state: change.prior });
    }
  }

  private saveState(state: SyncState): void {
    state.lastSync = new Date().toISOString();
    this.store.save(state);
  }
}
