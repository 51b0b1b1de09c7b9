import { serializationError } from './errors';
import type { QueryFieldTag, QuerySchema, TaggedQuery, TaggedQueryField } from './types';

export function queryField(name: string, options: { omitEmpty?: boolean } = {}): QueryFieldTag {
  return { name, omitEmpty: options.omitEmpty ?? false };
}

/** Shorthand for the common `name,omitempty` tag. */
export function optionalField(name: string): QueryFieldTag {
  return queryField(name, { omitEmpty: true });
}

/**
 * Pairs a params object with the tags that describe it. Fields are kept in
 * the order the schema declares them.
 */
export function taggedQuery<T extends object>(schema: QuerySchema<T>, values: T): TaggedQuery {
  const present = new Map<string, unknown>(Object.entries(values));
  const tags: Array<[string, QueryFieldTag | null]> = Object.entries(schema);
  const fields: TaggedQueryField[] = tags.map(([field, tag]) => ({
    field,
    tag,
    value: present.get(field),
  }));
  return { fields };
}

/**
 * Flattens a tagged query into `name=value` pairs.
 *
 * - untagged fields never contribute;
 * - `omitEmpty` fields holding a zero value (`''`, `0`, `false`, `[]`,
 *   `null`/`undefined`) are skipped;
 * - arrays of strings or numbers are joined with commas;
 * - dates are written as RFC 3339 in UTC;
 * - a field whose serialized form is empty is dropped.
 *
 * Throws a `serialization` error for values with no query representation.
 */
export function flattenQuery(query: TaggedQuery): Array<[string, string]> {
  const pairs: Array<[string, string]> = [];

  for (const { field, tag, value } of query.fields) {
    if (!tag || tag.name === '' || tag.name === '-') {
      continue;
    }
    if (tag.omitEmpty && isZeroValue(value)) {
      continue;
    }

    const serialized = stringifyQueryValue(value, field);
    if (serialized !== '') {
      pairs.push([tag.name, serialized]);
    }
  }

  return pairs;
}

export function isZeroValue(value: unknown): boolean {
  if (value === undefined || value === null) {
    return true;
  }
  if (typeof value === 'string' || Array.isArray(value)) {
    return value.length === 0;
  }
  if (typeof value === 'number') {
    return value === 0;
  }
  if (typeof value === 'bigint') {
    return value === 0n;
  }
  if (typeof value === 'boolean') {
    return !value;
  }
  return false;
}

export function formatRfc3339(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

function stringifyQueryValue(value: unknown, field: string): string {
  if (value === undefined || value === null) {
    return '';
  }

  switch (typeof value) {
    case 'string':
      return value;
    case 'boolean':
      return value ? 'true' : 'false';
    case 'bigint':
      return value.toString();
    case 'number':
      if (!Number.isFinite(value)) {
        throw serializationError(`failed to convert field ${field}: non-finite number ${value}`);
      }
      return String(value);
    default:
      break;
  }

  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw serializationError(`failed to convert field ${field}: invalid date`);
    }
    return formatRfc3339(value);
  }

  if (Array.isArray(value)) {
    return joinArray(value, field);
  }

  throw serializationError(`failed to convert field ${field}: unsupported type ${describeType(value)}`);
}

function joinArray(items: unknown[], field: string): string {
  if (items.every((item): item is string => typeof item === 'string')) {
    return items.join(',');
  }
  if (items.every((item): item is number => typeof item === 'number' && Number.isFinite(item))) {
    return items.map(String).join(',');
  }
  throw serializationError(`failed to convert field ${field}: unsupported array element type`);
}

function describeType(value: unknown): string {
  if (typeof value === 'object' && value !== null) {
    return value.constructor?.name ?? 'object';
  }
  return typeof value;
}
