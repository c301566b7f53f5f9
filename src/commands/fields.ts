import { FormField } from '../utils/types';
import { logger } from '../utils/logger';
import { applyOverrides } from '../form-analyzer/field-overrides';
import { createTrainingFormCatalog } from '../form-analyzer/training-form';

export function describeValue(field: FormField): string {
  switch (field.kind) {
    case 'date':
      return `${field.value.month}/${field.value.day}/${field.value.year}`;
    case 'multi-checkbox':
      return field.value === null ? '(random)' : field.value.join(' | ');
    case 'multi-select':
      return field.value ?? '(random)';
    case 'single-checkbox':
      return field.value ? 'checked' : 'unchecked';
    case 'text':
      return field.value === null ? '(random)' : String(field.value);
  }
}

export function listFields(overrides: string[]): FormField[] {
  const catalog = createTrainingFormCatalog();
  const unknownLabels = applyOverrides(catalog, overrides);
  if (unknownLabels.length > 0) {
    logger.warn(`Ignoring overrides for unknown fields: ${unknownLabels.join(', ')}`);
  }

  catalog.all().forEach((field, index) => {
    logger.info(`${String(index + 1).padStart(2)}. [${field.kind}] ${field.label} = ${describeValue(field)}`);
  });
  return [...catalog.all()];
}
