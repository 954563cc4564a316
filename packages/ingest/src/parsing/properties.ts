import type { PropertyType, PropertyValue } from '@notion-rag/shared';
import { getArray, getRecord, getString, isRecord } from '../validation.js';

/** Concatenated plain_text of a rich text array. */
export function plainText(richText: unknown[]): string {
  return richText
    .filter(isRecord)
    .map(rt => getString(rt, 'plain_text') ?? '')
    .join('');
}

function optionName(value: unknown): string | null {
  return isRecord(value) ? getString(value, 'name') ?? null : null;
}

function nullableString(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

/** Converts one raw property object into its tagged value. Unknown types are kept as `unsupported`. */
export function parseProperty(raw: unknown): PropertyValue {
  if (!isRecord(raw)) return { type: 'unsupported', rawType: typeof raw };
  const type = getString(raw, 'type') ?? 'unknown';
  const data = raw[type];
  switch (type) {
    case 'title':
    case 'rich_text':
      return { type, text: plainText(Array.isArray(data) ? data : []) };
    case 'number':
      return { type, value: typeof data === 'number' ? data : null };
    case 'checkbox':
      return { type, value: data === true };
    case 'select':
    case 'status':
      return { type, name: optionName(data) };
    case 'multi_select':
      return {
        type,
        names: (Array.isArray(data) ? data : []).flatMap(option => {
          const name = optionName(option);
          return name === null ? [] : [name];
        })
      };
    case 'date': {
      const date = isRecord(data) ? data : {};
      return { type, start: nullableString(date.start), end: nullableString(date.end) };
    }
    case 'url':
    case 'email':
    case 'phone_number':
      return { type, value: nullableString(data) };
    case 'people':
      return {
        type,
        names: (Array.isArray(data) ? data : [])
          .filter(isRecord)
          .map(p => getString(p, 'name') ?? getString(p, 'id') ?? '')
          .filter(Boolean)
      };
    case 'relation':
      return {
        type,
        ids: (Array.isArray(data) ? data : []).filter(isRecord).flatMap(r => {
          const id = getString(r, 'id');
          return id ? [id] : [];
        })
      };
    case 'created_time':
    case 'last_edited_time':
      return { type, value: typeof data === 'string' ? data : '' };
    default:
      return { type: 'unsupported', rawType: type };
  }
}

export function parseProperties(properties: Record<string, unknown> | undefined): Record<string, PropertyValue> {
  const bag: Record<string, PropertyValue> = {};
  for (const [name, raw] of Object.entries(properties ?? {})) {
    bag[name] = parseProperty(raw);
  }
  return bag;
}

/** Title of a page/row: the text of its `title` property, whatever the property is called. */
export function titleOf(bag: Record<string, PropertyValue>): string {
  for (const value of Object.values(bag)) {
    if (value.type === 'title') return value.text;
  }
  return '';
}

/** Text-like values that belong in the searchable body, in property order. */
export function propertyText(bag: Record<string, PropertyValue>): string[] {
  const lines: string[] = [];
  for (const [name, value] of Object.entries(bag)) {
    switch (value.type) {
      case 'rich_text':
        if (value.text.trim()) lines.push(`${name}: ${value.text}`);
        break;
      case 'select':
      case 'status':
        if (value.name) lines.push(`${name}: ${value.name}`);
        break;
      case 'multi_select':
      case 'people':
        if (value.names.length > 0) lines.push(`${name}: ${value.names.join(', ')}`);
        break;
      default:
        break;
    }
  }
  return lines;
}

export interface PropertySchema {
  /** Every tag seen per property name, sorted. */
  properties: Record<string, PropertyType[]>;
  /** Names seen with more than one tag across records, sorted. */
  conflicts: string[];
}

export function collectPropertySchema(bags: Iterable<Record<string, PropertyValue>>): PropertySchema {
  const seen = new Map<string, Set<PropertyType>>();
  for (const bag of bags) {
    for (const [name, value] of Object.entries(bag)) {
      let tags = seen.get(name);
      if (!tags) {
        tags = new Set();
        seen.set(name, tags);
      }
      tags.add(value.type);
    }
  }
  const properties: Record<string, PropertyType[]> = {};
  const conflicts: string[] = [];
  for (const name of [...seen.keys()].sort()) {
    const tags = [...(seen.get(name) ?? [])].sort();
    properties[name] = tags;
    if (tags.length > 1) conflicts.push(name);
  }
  return { properties, conflicts };
}

/** Title of a database object (its `title` is a rich text array, not a property). */
export function databaseTitle(database: Record<string, unknown>): string {
  return plainText(getArray(database, 'title'));
}

export function pagePropertiesOf(page: Record<string, unknown>): Record<string, unknown> | undefined {
  return getRecord(page, 'properties');
}
