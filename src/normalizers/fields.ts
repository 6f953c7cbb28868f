import type { RawEntry } from '../types/feed';

/**
 * One way of pulling a field out of a raw entry.
 * Returns undefined when this entry shape does not carry the field.
 */
export type Extractor<T> = (entry: RawEntry) => T | undefined;

/**
 * Runs extractors in order; the first defined result wins.
 */
export function firstOf<T>(entry: RawEntry, chain: readonly Extractor<T>[]): T | undefined {
  for (const extract of chain) {
    const value = extract(entry);
    if (value !== undefined) {
      return value;
    }
  }
  return undefined;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function cleanString(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Trims and collapses inner whitespace; used for one-line fields like titles.
 */
export function cleanLine(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  return cleanString(value.replace(/[\u200B-\u200D\uFEFF]/g, '').replace(/\s+/g, ' '));
}

/**
 * Attribute bag of a link-like node. xml2js nests attributes under `$`,
 * while hand-built or JSON feeds put them on the node itself.
 */
export function attributesOf(node: unknown): Record<string, unknown> | undefined {
  if (!isRecord(node)) return undefined;
  const nested = node.$;
  return isRecord(nested) ? nested : node;
}

export function listField(entry: RawEntry, key: string): unknown[] {
  const value = entry[key];
  return Array.isArray(value) ? value : [];
}

export function stringField(key: string): Extractor<string> {
  return entry => cleanString(entry[key]);
}

export function lineField(key: string): Extractor<string> {
  return entry => cleanLine(entry[key]);
}

export function nestedStringField(key: string, nestedKey: string): Extractor<string> {
  return entry => {
    const container = entry[key];
    return isRecord(container) ? cleanString(container[nestedKey]) : undefined;
  };
}

const ZONE_SUFFIX = /(?:Z|[+-]\d{2}:?\d{2}|\b(?:GMT|UTC|UT|[ECMP][SD]T))$/i;
const ISO_DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const ISO_LOCAL_DATE_TIME = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)$/;

function validDate(value: string): Date | undefined {
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

/**
 * Parses a feed timestamp. Strings without a zone are read as UTC, never in
 * the host's local zone.
 */
export function parseFeedDate(raw: string): Date | undefined {
  if (ZONE_SUFFIX.test(raw) || ISO_DATE_ONLY.test(raw)) {
    return validDate(raw);
  }
  const isoLocal = ISO_LOCAL_DATE_TIME.exec(raw);
  if (isoLocal) {
    return validDate(`${isoLocal[1]}T${isoLocal[2]}Z`);
  }
  return validDate(`${raw} GMT`) ?? validDate(raw);
}

export function dateField(key: string): Extractor<Date> {
  return entry => {
    const raw = cleanString(entry[key]);
    return raw === undefined ? undefined : parseFeedDate(raw);
  };
}
