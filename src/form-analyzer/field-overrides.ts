import { DateValue, FieldValue, FormField } from '../utils/types';
import { FieldCatalog } from './field-catalog';

export interface FieldOverride {
  label: string;
  raw: string;
}

// Empty or "*" asks for a random pick on the choice widgets
const RANDOM_MARKERS = new Set(['', '*']);

export function parseOverride(input: string): FieldOverride {
  const separator = input.indexOf('=');
  if (separator <= 0) {
    throw new Error(`Override "${input}" must look like "Label=value"`);
  }
  return {
    label: input.slice(0, separator).trim(),
    raw: input.slice(separator + 1).trim()
  };
}

export function parseDate(raw: string): DateValue {
  const match = /^(\d{1,2})[/-](\d{1,2})[/-](\d{4})$/.exec(raw);
  if (!match) {
    throw new Error(`Date "${raw}" must be written as MM/DD/YYYY`);
  }

  const month = parseInt(match[1], 10);
  const day = parseInt(match[2], 10);
  const year = parseInt(match[3], 10);
  if (month < 1 || month > 12 || day < 1 || day > 31) {
    throw new Error(`Date "${raw}" is out of range`);
  }
  return { month, day, year };
}

function parseCheckbox(raw: string): boolean {
  const normalized = raw.toLowerCase();
  if (['true', 'yes', 'y', '1'].includes(normalized)) {
    return true;
  }
  if (['false', 'no', 'n', '0'].includes(normalized)) {
    return false;
  }
  throw new Error(`Checkbox value "${raw}" must be true or false`);
}

export function coerceValue(field: FormField, raw: string): FieldValue {
  switch (field.kind) {
    case 'date':
      return parseDate(raw);
    case 'multi-checkbox':
      return RANDOM_MARKERS.has(raw)
        ? null
        : [...new Set(raw.split('|').map(choice => choice.trim()).filter(choice => choice.length > 0))];
    case 'multi-select':
      return RANDOM_MARKERS.has(raw) ? null : raw;
    case 'single-checkbox':
      return parseCheckbox(raw);
    case 'text':
      return raw === '*' ? null : raw;
  }
}

/**
 * Applies `Label=value` overrides to the catalog. Returns the labels that
 * matched no field.
 */
export function applyOverrides(catalog: FieldCatalog, overrides: string[]): string[] {
  const unknown: string[] = [];

  for (const input of overrides) {
    const { label, raw } = parseOverride(input);
    const field = catalog.get(label);
    if (!field) {
      unknown.push(label);
      continue;
    }
    catalog.changeField(label, coerceValue(field, raw));
  }

  return unknown;
}
