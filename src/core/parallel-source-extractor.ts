import type { ParallelConfig, WorkItem } from '../types/delegation.js';
import { ConfigurationError } from '../types/delegation-errors.js';
import { isPlainRecord, type ArgumentRecord } from './parameter-validator.js';

export const EXTERNAL_LIST_ITEM_NAME = 'ExternalList';

/** Request keys that carry host plumbing rather than task data. Compared case-insensitively. */
export const BUILT_IN_EXCLUDED_PARAMETERS: readonly string[] = [
  '_session',
  'hostSession',
  'session',
  'parentSession',
  'cancellationToken',
  'signal',
];

/** Plain data: primitives, dates, arrays and plain objects. */
export function isPlainDataValue(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
    case 'bigint':
      return true;
    case 'object':
      return value instanceof Date || Array.isArray(value) || isPlainRecord(value);
    default:
      return false;
  }
}

function isIterableObject(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Symbol.iterator in value &&
    typeof value[Symbol.iterator] === 'function'
  );
}

function extractListItems(args: ArgumentRecord, config: ParallelConfig): WorkItem[] {
  const listName = config.listParameterName?.trim();
  if (!listName) {
    throw new ConfigurationError('ListParameterName must be specified for ListBased execution');
  }

  const raw = args[listName];
  if (raw === undefined || raw === null) {
    throw new ConfigurationError(`Parameter '${listName}' not found or is null`);
  }
  if (typeof raw === 'string' || !isIterableObject(raw)) {
    throw new ConfigurationError(`Parameter '${listName}' is not enumerable`);
  }

  const items = Array.from(raw, (value) => ({ name: listName, value }));
  if (items.length === 0) {
    throw new ConfigurationError('List must not be null or empty');
  }
  return items;
}

function extractExternalItems(config: ParallelConfig): WorkItem[] {
  const list = config.externalList ?? [];
  if (list.length === 0) {
    throw new ConfigurationError('ExternalStringList must not be null or empty');
  }
  return list.map((value) => ({ name: EXTERNAL_LIST_ITEM_NAME, value }));
}

function extractParameterItems(args: ArgumentRecord, config: ParallelConfig): WorkItem[] {
  const excluded = new Set(
    [...BUILT_IN_EXCLUDED_PARAMETERS, ...config.excludedParameterNames].map((name) => name.toLowerCase()),
  );

  return Object.entries(args)
    .filter(([name, value]) => !excluded.has(name.toLowerCase()) && isPlainDataValue(value))
    .map(([name, value]) => ({ name, value }));
}

/**
 * Derives the work items of one delegate call.
 *
 * `parameter-based` may legitimately return `[]`; the other parallel modes throw
 * `ConfigurationError` instead of returning an empty set. `none` returns `[]`.
 */
export function extractParallelSources(args: ArgumentRecord, config: ParallelConfig): WorkItem[] {
  switch (config.executionType) {
    case 'none':
      return [];
    case 'parameter-based':
      return extractParameterItems(args, config);
    case 'list-based':
      return extractListItems(args, config);
    case 'external-list':
      return extractExternalItems(config);
  }
}
