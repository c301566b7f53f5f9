import { FieldFiller, FieldRunSummary, FormField } from '../utils/types';
import { logger } from '../utils/logger';

export interface DispatchOptions {
  // Boxes ticked on a multi-checkbox with no preset choices
  multiCheckboxAmount?: number;
  otherText?: string | null;
}

async function fillField(filler: FieldFiller, field: FormField, options: DispatchOptions): Promise<boolean> {
  switch (field.kind) {
    case 'text':
      return await filler.enterText(field.label, field.value);
    case 'multi-checkbox':
      return await filler.selectMultipleCheckboxes(
        field.label,
        options.multiCheckboxAmount ?? 1,
        options.otherText,
        field.value
      );
    case 'multi-select':
      return await filler.selectMultiselectOption(field.label, field.value);
    case 'single-checkbox':
      return await filler.checkSingleCheckbox(field.label, field.value);
    case 'date': {
      const { month, day, year } = field.value;
      return await filler.enterDate(field.label, month, day, year);
    }
  }
}

export async function processFields(
  fields: readonly FormField[],
  filler: FieldFiller,
  options: DispatchOptions = {}
): Promise<FieldRunSummary> {
  const summary: FieldRunSummary = { filled: [], skipped: [], failed: [] };

  for (const field of fields) {
    logger.info(`Filling "${field.label}" (${field.kind})`);

    try {
      const found = await fillField(filler, field, options);
      (found ? summary.filled : summary.skipped).push(field.label);
    } catch (error) {
      logger.error(`Failed to fill "${field.label}":`, error);
      summary.failed.push(field.label);
    }
  }

  logger.info(
    `Filled ${summary.filled.length} of ${fields.length} fields` +
    ` (${summary.skipped.length} not found, ${summary.failed.length} failed)`
  );
  return summary;
}
