import { FormField } from '../utils/types';
import { FieldCatalog } from './field-catalog';

// In the order the questions appear on the ITA training request form
export const TRAINING_FORM_FIELDS: readonly FormField[] = [
  { kind: 'single-checkbox', label: 'email', value: true },
  { kind: 'text', label: 'Last Name', value: 'Doe' },
  { kind: 'text', label: 'First Name', value: 'Jane' },
  { kind: 'text', label: 'Middle Initial', value: 'Q' },
  { kind: 'text', label: 'Student ID #', value: 700123 },
  { kind: 'multi-select', label: 'Country of Citizenship', value: null },
  { kind: 'multi-select', label: 'Term for ELI ITA Attendance', value: null },
  { kind: 'multi-select', label: 'ELI ITA Session', value: null },
  { kind: 'text', label: 'IBT TOEFL Score (Speaking)', value: 26 },
  { kind: 'text', label: 'IBT TOEFL Score (Total)', value: 104 },
  { kind: 'date', label: 'Begin Date of TA Contract', value: { month: 8, day: 25, year: 2025 } },
  { kind: 'date', label: 'End Date of TA Contract', value: { month: 5, day: 31, year: 2026 } },
  { kind: 'text', label: 'Amount of Stipend', value: 24000 },
  { kind: 'text', label: 'Percentage of Tuition', value: 100 },
  { kind: 'multi-checkbox', label: "Name of Student's Program", value: null },
  { kind: 'text', label: 'Department Contact Name', value: 'Sample Department' },
  { kind: 'text', label: 'Department Contact Campus Address', value: '100 Example Hall' },
  { kind: 'text', label: "Department Contact Person's Telephone Number", value: '555-010-0199' }
];

export function createTrainingFormCatalog(): FieldCatalog {
  return new FieldCatalog(TRAINING_FORM_FIELDS);
}
