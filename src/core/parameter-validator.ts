import type { ParamSpec, ParameterType } from '../types/delegation.js';

export interface ParameterValidationResult {
  /** Names of required parameters that are absent. */
  missingRequired: string[];
  /** One message per present, non-null value whose type does not fit. */
  typeErrors: string[];
}

export type ArgumentRecord = Record<string, unknown>;

export function isPlainRecord(value: unknown): value is ArgumentRecord {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

export function describeValueType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (value instanceof Date) return 'datetime';
  if (typeof value === 'number' && Number.isInteger(value)) return 'integer';
  return typeof value;
}

function parseNumeric(value: string): number | undefined {
  const trimmed = value.trim();
  if (!trimmed) return undefined;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/** True when `value` already has, or converts without loss to, the declared type. */
export function isAssignableTo(value: unknown, type: ParameterType): boolean {
  switch (type) {
    case 'string':
      return true;
    case 'number':
      if (typeof value === 'number') return Number.isFinite(value);
      return typeof value === 'string' && parseNumeric(value) !== undefined;
    case 'integer': {
      if (typeof value === 'number') return Number.isInteger(value);
      if (typeof value !== 'string') return false;
      const parsed = parseNumeric(value);
      return parsed !== undefined && Number.isInteger(parsed);
    }
    case 'boolean':
      if (typeof value === 'boolean') return true;
      return typeof value === 'string' && ['true', 'false'].includes(value.trim().toLowerCase());
    case 'datetime':
      if (value instanceof Date) return !Number.isNaN(value.getTime());
      return typeof value === 'string' && value.trim() !== '' && !Number.isNaN(Date.parse(value));
    case 'object':
      return typeof value === 'object' && value !== null && !Array.isArray(value);
    case 'array':
      return Array.isArray(value);
  }
}

/**
 * Checks `args` against `schema`.
 *
 * A parameter is missing only when its key is absent; an explicit `null` counts as
 * present and is never a type error. Objects and arrays are checked structurally.
 */
export function validateParameters(
  schema: readonly ParamSpec[],
  args: ArgumentRecord,
): ParameterValidationResult {
  const missingRequired: string[] = [];
  const typeErrors: string[] = [];

  for (const param of schema) {
    const present = Object.prototype.hasOwnProperty.call(args, param.name);
    if (!present) {
      if (param.required) {
        missingRequired.push(param.name);
      }
      continue;
    }

    const value = args[param.name];
    if (value === null || value === undefined) {
      continue;
    }

    if (!isAssignableTo(value, param.type)) {
      typeErrors.push(
        `Parameter '${param.name}' expected type ${param.type} but got ${describeValueType(value)}`,
      );
    }
  }

  return { missingRequired, typeErrors };
}

export function hasValidationErrors(result: ParameterValidationResult): boolean {
  return result.missingRequired.length > 0 || result.typeErrors.length > 0;
}
