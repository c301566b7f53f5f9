import { DateValue, FieldValue, FormField } from '../utils/types';

function isDateValue(value: FieldValue): value is DateValue {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function withValue(field: FormField, value: FieldValue): FormField {
  // Narrowing on both sides keeps the kind/value pairing checked
  switch (field.kind) {
    case 'date':
      if (isDateValue(value)) return { ...field, value };
      break;
    case 'multi-checkbox':
      if (value === null || Array.isArray(value)) return { ...field, value };
      break;
    case 'multi-select':
      if (value === null || typeof value === 'string') return { ...field, value };
      break;
    case 'single-checkbox':
      if (typeof value === 'boolean') return { ...field, value };
      break;
    case 'text':
      if (value === null || typeof value === 'string' || typeof value === 'number') return { ...field, value };
      break;
  }
  throw new Error(`Value ${JSON.stringify(value)} does not fit ${field.kind} field "${field.label}"`);
}

function copyField(field: FormField): FormField {
  switch (field.kind) {
    case 'date':
      return { ...field, value: { ...field.value } };
    case 'multi-checkbox':
      return { ...field, value: field.value && [...field.value] };
    default:
      return { ...field };
  }
}

/**
 * Ordered list of the fields to fill, indexed by label so single values can
 * be swapped out before a run.
 */
export class FieldCatalog {
  private readonly fields: FormField[];
  private readonly lookup = new Map<string, number>();

  constructor(fields: readonly FormField[]) {
    this.fields = fields.map(copyField);

    this.fields.forEach((field, index) => {
      if (this.lookup.has(field.label)) {
        throw new Error(`Duplicate field label "${field.label}"`);
      }
      this.lookup.set(field.label, index);
    });
  }

  changeField(label: string, value: FieldValue): this {
    const index = this.lookup.get(label);
    if (index === undefined) {
      return this;
    }

    this.fields[index] = withValue(this.fields[index], value);
    return this;
  }

  has(label: string): boolean {
    return this.lookup.has(label);
  }

  get(label: string): FormField | undefined {
    const index = this.lookup.get(label);
    return index === undefined ? undefined : this.fields[index];
  }

  indexOf(label: string): number | undefined {
    return this.lookup.get(label);
  }

  all(): readonly FormField[] {
    return this.fields;
  }

  get size(): number {
    return this.fields.length;
  }
}
