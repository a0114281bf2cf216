/**
 * Attribute schemas: declaration, config validation and plan building
 */

import { Diagnostics } from './diagnostics';
import { AttributeRecord, AttributeValue } from './types';

export interface ValidationFailure {
  summary: string;
  detail: string;
}

export interface StringValidator {
  readonly description: string;
  validate(attribute: string, value: string): ValidationFailure | undefined;
}

export interface PlanModifierRequest {
  configValue: AttributeValue;
  /** Prior state value; undefined when there is no prior state */
  stateValue: AttributeValue | undefined;
  /** Current plan value; undefined when unknown */
  planValue: AttributeValue | undefined;
}

export interface PlanModifier {
  readonly description: string;
  modify(request: PlanModifierRequest): AttributeValue | undefined;
}

interface BaseAttribute {
  markdownDescription: string;
  required?: boolean;
  optional?: boolean;
  computed?: boolean;
  planModifiers?: PlanModifier[];
}

export interface StringAttribute extends BaseAttribute {
  type: 'string';
  validators?: StringValidator[];
}

export interface Int64Attribute extends BaseAttribute {
  type: 'int64';
}

export type Attribute = StringAttribute | Int64Attribute;

export interface Schema {
  version?: number;
  markdownDescription: string;
  attributes: Record<string, Attribute>;
}

export function lengthAtMost(max: number): StringValidator {
  return {
    description: `string length must be at most ${max}`,
    validate(attribute, value) {
      if (value.length <= max) return undefined;
      return {
        summary: 'Invalid Attribute Value Length',
        detail: `Attribute ${attribute} string length must be at most ${max}, got: ${value.length}`,
      };
    },
  };
}

export function oneOf(...allowed: string[]): StringValidator {
  return {
    description: `value must be one of: ${allowed.map((v) => `"${v}"`).join(', ')}`,
    validate(attribute, value) {
      if (allowed.includes(value)) return undefined;
      return {
        summary: 'Invalid Attribute Value Match',
        detail: `Attribute ${attribute} value must be one of: ${allowed.map((v) => `"${v}"`).join(', ')}, got: "${value}"`,
      };
    },
  };
}

/**
 * Plan the given value when the attribute is not configured and no earlier
 * modifier has supplied one
 */
export function defaultValue(value: AttributeValue): PlanModifier {
  return {
    description: `If value is not configured, defaults to ${JSON.stringify(value)}`,
    modify({ configValue, planValue }) {
      if (configValue !== null || (planValue !== undefined && planValue !== null)) {
        return planValue;
      }
      return value;
    },
  };
}

/** Keep the prior state value instead of planning an unknown one */
export function useStateForUnknown(): PlanModifier {
  return {
    description: 'Once set, the value of this attribute in state will not change.',
    modify({ stateValue, planValue }) {
      if (planValue !== undefined || stateValue === undefined || stateValue === null) {
        return planValue;
      }
      return stateValue;
    },
  };
}

function own(record: Record<string, unknown>, name: string): unknown {
  return Object.prototype.hasOwnProperty.call(record, name) ? record[name] : undefined;
}

/**
 * Check a raw configuration object against a schema. Returns the normalized
 * config record (every declared attribute present, unset ones null).
 */
export function validateConfig(
  schema: Schema,
  raw: Record<string, unknown>
): { config: AttributeRecord; diagnostics: Diagnostics } {
  const diagnostics = new Diagnostics();
  const config: AttributeRecord = {};

  for (const name of Object.keys(raw)) {
    if (!Object.prototype.hasOwnProperty.call(schema.attributes, name)) {
      diagnostics.addAttributeError(name, 'Unsupported argument', `An argument named "${name}" is not expected here.`);
    }
  }

  for (const [name, attribute] of Object.entries(schema.attributes)) {
    const value = own(raw, name);

    if (value === undefined || value === null) {
      config[name] = null;
      if (attribute.required) {
        diagnostics.addAttributeError(
          name,
          'Missing required argument',
          `The argument "${name}" is required, but no definition was found.`
        );
      }
      continue;
    }

    if (attribute.computed && !attribute.optional && !attribute.required) {
      diagnostics.addAttributeError(
        name,
        'Invalid Configuration for Read-Only Attribute',
        `Cannot set value for the "${name}" attribute, it is computed.`
      );
      config[name] = null;
      continue;
    }

    if (attribute.type === 'string') {
      if (typeof value !== 'string') {
        diagnostics.addAttributeError(
          name,
          'Incorrect attribute value type',
          `Inappropriate value for attribute "${name}": string required.`
        );
        config[name] = null;
        continue;
      }

      for (const validator of attribute.validators ?? []) {
        const failure = validator.validate(name, value);
        if (failure) {
          diagnostics.addAttributeError(name, failure.summary, failure.detail);
        }
      }
      config[name] = value;
    } else {
      if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
        diagnostics.addAttributeError(
          name,
          'Incorrect attribute value type',
          `Inappropriate value for attribute "${name}": whole number required.`
        );
        config[name] = null;
        continue;
      }
      config[name] = value;
    }
  }

  return { config, diagnostics };
}

/**
 * Build the planned record for a resource. Configured values pass through,
 * plan modifiers run on every attribute, and computed attributes left without
 * a value are unknown (absent from the result).
 */
export function buildPlan(schema: Schema, config: AttributeRecord, priorState: AttributeRecord | null): AttributeRecord {
  const plan: AttributeRecord = {};

  for (const [name, attribute] of Object.entries(schema.attributes)) {
    const configValue: AttributeValue = Object.prototype.hasOwnProperty.call(config, name) ? config[name] : null;
    const stateValue =
      priorState && Object.prototype.hasOwnProperty.call(priorState, name) ? priorState[name] : undefined;

    let planValue: AttributeValue | undefined =
      configValue !== null ? configValue : attribute.computed ? undefined : null;

    for (const modifier of attribute.planModifiers ?? []) {
      planValue = modifier.modify({ configValue, stateValue, planValue });
    }

    if (planValue !== undefined) {
      plan[name] = planValue;
    }
  }

  return plan;
}

/**
 * Attributes whose known planned value differs from state
 */
export function changedAttributes(schema: Schema, plan: AttributeRecord, state: AttributeRecord): string[] {
  return Object.keys(schema.attributes).filter((name) => {
    if (!Object.prototype.hasOwnProperty.call(plan, name)) {
      return false;
    }
    const stateValue = Object.prototype.hasOwnProperty.call(state, name) ? state[name] : null;
    return plan[name] !== stateValue;
  });
}

export function requiresUpdate(schema: Schema, plan: AttributeRecord, state: AttributeRecord): boolean {
  return changedAttributes(schema, plan, state).length > 0;
}
