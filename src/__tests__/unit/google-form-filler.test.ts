import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { GoogleFormFiller } from '../../form-analyzer/google-form-filler';
import { FormElement, FormPage } from '../../form-analyzer/form-page';
import { LocatorKind } from '../../form-analyzer/label-locator';
import { TypeTarget } from '../../browser/typing';

function createElement(text: string = '', attributes: Record<string, string> = {}) {
  return {
    type: vi.fn(async (_text: string) => undefined),
    click: vi.fn(async (): Promise<void> => undefined),
    textContent: vi.fn(async () => text),
    getAttribute: vi.fn(async (name: string) => attributes[name] ?? null)
  };
}

type FakeElement = ReturnType<typeof createElement>;

function typedInto(element: FakeElement): string {
  return element.type.mock.calls.map(([text]) => text).join('');
}

class FakeFormPage implements FormPage {
  focused: TypeTarget | null = null;
  private widgets = new Map<string, FormElement[]>();

  add(kind: LocatorKind, label: string, elements: FormElement[]): this {
    this.widgets.set(`${kind}:${label}`, elements);
    return this;
  }

  locate = vi.fn(async (kind: LocatorKind, label: string) => this.widgets.get(`${kind}:${label}`) ?? []);

  focusedInput = vi.fn(async () => this.focused);

  waitForNetworkIdle = vi.fn(async (_options: { idleTime: number }) => undefined);
}

function createFiller(page: FormPage, random: () => number = () => 0) {
  return new GoogleFormFiller(page, { typing: { minDelayMs: 0, maxDelayMs: 0 }, random, settleMs: 0 });
}

describe('GoogleFormFiller', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('enterText', () => {
    test('types the given content', async () => {
      const input = createElement();
      const page = new FakeFormPage().add('text-input', 'Student ID #', [input]);

      expect(await createFiller(page).enterText('Student ID #', 700123)).toBe(true);
      expect(typedInto(input)).toBe('700123');
    });

    test('types a random string when no content is given', async () => {
      const input = createElement();
      const page = new FakeFormPage().add('text-input', 'Middle Initial', [input]);

      await createFiller(page).enterText('Middle Initial', null);

      expect(typedInto(input)).toBe('a'.repeat(20));
    });

    test('reports a missing input', async () => {
      expect(await createFiller(new FakeFormPage()).enterText('Nickname', 'x')).toBe(false);
      expect(console.warn).toHaveBeenCalledTimes(1);
    });
  });

  describe('selectMultiselectOption', () => {
    test('opens the dropdown and clicks the named option', async () => {
      const listbox = createElement();
      const fall = createElement('Fall  2025');
      const spring = createElement('Spring 2026');
      const page = new FakeFormPage()
        .add('listbox', 'Term', [listbox])
        .add('listbox-options', 'Term', [fall, spring]);

      expect(await createFiller(page).selectMultiselectOption('Term', 'fall 2025')).toBe(true);
      expect(listbox.click).toHaveBeenCalledTimes(1);
      expect(fall.click).toHaveBeenCalledTimes(1);
      expect(spring.click).not.toHaveBeenCalled();
    });

    test('picks a random option when none is named', async () => {
      const first = createElement('Session A');
      const last = createElement('Session B');
      const page = new FakeFormPage()
        .add('listbox', 'Session', [createElement()])
        .add('listbox-options', 'Session', [first, last]);

      await createFiller(page, () => 0.99).selectMultiselectOption('Session', null);

      expect(last.click).toHaveBeenCalledTimes(1);
      expect(first.click).not.toHaveBeenCalled();
    });

    test('throws for an option the dropdown does not have', async () => {
      const page = new FakeFormPage()
        .add('listbox', 'Term', [createElement()])
        .add('listbox-options', 'Term', [createElement('Fall 2025')]);

      await expect(createFiller(page).selectMultiselectOption('Term', 'Spring 2030')).rejects.toThrow(
        'Dropdown "Term" has no option "Spring 2030"'
      );
    });

    test('reports a dropdown without options', async () => {
      const page = new FakeFormPage().add('listbox', 'Term', [createElement()]);

      expect(await createFiller(page).selectMultiselectOption('Term')).toBe(false);
    });
  });

  describe('checkSingleCheckbox', () => {
    test('clicks an unchecked box', async () => {
      const box = createElement('', { 'aria-checked': 'false' });
      const page = new FakeFormPage().add('checkbox', 'email', [box]);

      expect(await createFiller(page).checkSingleCheckbox('email')).toBe(true);
      expect(box.click).toHaveBeenCalledTimes(1);
    });

    test('leaves a checked box alone', async () => {
      const box = createElement('', { 'aria-checked': 'true' });
      const page = new FakeFormPage().add('checkbox', 'email', [box]);

      expect(await createFiller(page).checkSingleCheckbox('email')).toBe(true);
      expect(box.click).not.toHaveBeenCalled();
    });

    test('does not click when asked to leave it unchecked', async () => {
      const box = createElement('', { 'aria-checked': 'false' });
      const page = new FakeFormPage().add('checkbox', 'email', [box]);

      expect(await createFiller(page).checkSingleCheckbox('email', false)).toBe(true);
      expect(box.click).not.toHaveBeenCalled();
    });
  });

  describe('enterDate', () => {
    test('types each part into its own box', async () => {
      const [month, day, year] = [createElement(), createElement(), createElement()];
      const native = createElement();
      const page = new FakeFormPage()
        .add('date-parts', 'Begin Date', [month, day, year])
        .add('date-input', 'Begin Date', [native]);

      expect(await createFiller(page).enterDate('Begin Date', 8, 25, 2025)).toBe(true);
      expect([typedInto(month), typedInto(day), typedInto(year)]).toEqual(['8', '25', '2025']);
      expect(native.type).not.toHaveBeenCalled();
    });

    test('falls back to the native date input unless all three boxes exist', async () => {
      const month = createElement();
      const native = createElement();
      const page = new FakeFormPage()
        .add('date-parts', 'End Date', [month, createElement()])
        .add('date-input', 'End Date', [native]);

      expect(await createFiller(page).enterDate('End Date', 5, 31, 2026)).toBe(true);
      expect(month.type).not.toHaveBeenCalled();
      expect(typedInto(native)).toBe('05312026');
    });

    test('reports a question with no date input', async () => {
      expect(await createFiller(new FakeFormPage()).enterDate('End Date', 5, 31, 2026)).toBe(false);
    });
  });

  describe('selectMultipleCheckboxes', () => {
    test('ticks each named choice once', async () => {
      const physics = createElement('Physics');
      const chemistry = createElement('Chemistry');
      const biology = createElement('Biology');
      const page = new FakeFormPage().add('list-options', 'Program', [physics, chemistry, biology]);

      await createFiller(page).selectMultipleCheckboxes('Program', 1, null, ['Physics', 'chemistry', ' physics ']);

      expect(physics.click).toHaveBeenCalledTimes(1);
      expect(chemistry.click).toHaveBeenCalledTimes(1);
      expect(biology.click).not.toHaveBeenCalled();
    });

    test('throws for a choice the list does not have', async () => {
      const page = new FakeFormPage().add('list-options', 'Program', [createElement('Physics')]);

      await expect(createFiller(page).selectMultipleCheckboxes('Program', 1, null, ['Geology'])).rejects.toThrow(
        'Checkbox list "Program" has no option "Geology"'
      );
    });

    test('ticks distinct random boxes', async () => {
      const options = [createElement('A'), createElement('B'), createElement('C')];
      const page = new FakeFormPage().add('list-options', 'Program', options);

      await createFiller(page).selectMultipleCheckboxes('Program', 2);

      expect(options.map(option => option.click.mock.calls.length)).toEqual([1, 1, 0]);
    });

    test('types the other text into the input the click focused', async () => {
      const page = new FakeFormPage();
      const otherBox = createElement();
      const other = createElement('Other:');
      other.click.mockImplementation(async () => {
        page.focused = otherBox;
      });
      page.add('list-options', 'Program', [createElement('Physics'), other]);

      await createFiller(page).selectMultipleCheckboxes('Program', 1, 'Linguistics', ['Other:']);

      expect(typedInto(otherBox)).toBe('Linguistics');
    });
  });

  describe('submit', () => {
    test('clicks Submit even when the network stays busy', async () => {
      const button = createElement('Submit');
      const page = new FakeFormPage().add('submit-button', 'Submit', [button]);
      page.waitForNetworkIdle.mockRejectedValue(new Error('Timed out after waiting 30000ms'));

      expect(await createFiller(page).submit()).toBe(true);
      expect(button.click).toHaveBeenCalledTimes(1);
    });

    test('reports a form without a Submit button', async () => {
      expect(await createFiller(new FakeFormPage()).submit()).toBe(false);
    });
  });
});
