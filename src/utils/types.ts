export interface DateValue {
  month: number;
  day: number;
  year: number;
}

export type FormField =
  | { kind: 'date'; label: string; value: DateValue }
  // null picks random options
  | { kind: 'multi-checkbox'; label: string; value: string[] | null }
  | { kind: 'multi-select'; label: string; value: string | null }
  | { kind: 'single-checkbox'; label: string; value: boolean }
  // null types a random string
  | { kind: 'text'; label: string; value: string | number | null };

export type FieldValue = FormField['value'];

export type IdentityProvider = 'google' | 'sso' | 'unknown';

export interface IdentityHosts {
  google: string;
  sso: string;
}

export interface TypingOptions {
  minDelayMs: number;
  maxDelayMs: number;
}

export interface FieldRunSummary {
  filled: string[];
  skipped: string[];
  failed: string[];
}

/**
 * Operations the dispatcher drives, one per widget shape. Each resolves to
 * `false` when the widget for `label` is not on the page.
 */
export interface FieldFiller {
  enterText(label: string, content?: string | number | null): Promise<boolean>;
  selectMultiselectOption(label: string, choice?: string | null): Promise<boolean>;
  checkSingleCheckbox(label: string, checked?: boolean): Promise<boolean>;
  enterDate(label: string, month: number | string, day: number | string, year: number | string): Promise<boolean>;
  selectMultipleCheckboxes(label: string, chooseAmount?: number, otherText?: string | null, choices?: string[] | null): Promise<boolean>;
}
