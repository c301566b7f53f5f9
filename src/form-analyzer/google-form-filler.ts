import { FieldFiller, TypingOptions } from '../utils/types';
import { logger } from '../utils/logger';
import { generateRandomString, pickRandom, RandomSource, sampleWithoutReplacement, sleep } from '../utils/random';
import { DEFAULT_TYPING, simulateTyping } from '../browser/typing';
import { FormElement, FormPage } from './form-page';

export interface GoogleFormFillerOptions {
  typing?: TypingOptions;
  random?: RandomSource;
  // Pause after clicks that open popups or reveal inputs
  settleMs?: number;
}

function normalizeText(text: string | null): string {
  return (text ?? '').replace(/\s+/g, ' ').trim().toLowerCase();
}

export class GoogleFormFiller implements FieldFiller {
  private readonly typing: TypingOptions;
  private readonly random: RandomSource;
  private readonly settleMs: number;

  constructor(private page: FormPage, options: GoogleFormFillerOptions = {}) {
    this.typing = options.typing ?? DEFAULT_TYPING;
    this.random = options.random ?? Math.random;
    this.settleMs = options.settleMs ?? 500;
  }

  async enterText(label: string, content?: string | number | null): Promise<boolean> {
    const [input] = await this.page.locate('text-input', label);
    if (!input) {
      logger.warn(`No text input found for "${label}"`);
      return false;
    }

    const value = content ?? generateRandomString(20, this.random);
    logger.debug(`Typing into "${label}"`);
    await simulateTyping(input, value, this.typing, this.random);
    return true;
  }

  async selectMultiselectOption(label: string, choice?: string | null): Promise<boolean> {
    const [listbox] = await this.page.locate('listbox', label);
    if (!listbox) {
      logger.warn(`No dropdown found for "${label}"`);
      return false;
    }

    // Options only become clickable once the dropdown is open
    await listbox.click();
    await sleep(this.settleMs);

    const options = await this.page.locate('listbox-options', label);
    if (options.length === 0) {
      logger.warn(`Dropdown "${label}" has no options`);
      return false;
    }

    const option = choice ? await this.findByText(options, choice) : pickRandom(options, this.random);
    if (!option) {
      throw new Error(`Dropdown "${label}" has no option "${choice}"`);
    }

    logger.debug(`Picking "${await option.textContent()}" for "${label}"`);
    await option.click();
    await sleep(this.settleMs);
    return true;
  }

  async checkSingleCheckbox(label: string, checked: boolean = true): Promise<boolean> {
    const [checkbox] = await this.page.locate('checkbox', label);
    if (!checkbox) {
      logger.warn(`No checkbox found for "${label}"`);
      return false;
    }

    if (!checked) {
      return true;
    }

    if (await checkbox.getAttribute('aria-checked') === 'true') {
      logger.debug(`Checkbox "${label}" is already checked`);
      return true;
    }

    await checkbox.click();
    return true;
  }

  async enterDate(label: string, month: number | string, day: number | string, year: number | string): Promise<boolean> {
    const parts = await this.page.locate('date-parts', label);
    if (parts.length === 3) {
      const [monthInput, dayInput, yearInput] = parts;
      await simulateTyping(monthInput, month, this.typing, this.random);
      await simulateTyping(dayInput, day, this.typing, this.random);
      await simulateTyping(yearInput, year, this.typing, this.random);
      return true;
    }

    // Newer forms render a single native date picker instead of three boxes
    const [dateInput] = await this.page.locate('date-input', label);
    if (dateInput) {
      const pad = (part: number | string) => String(part).padStart(2, '0');
      await simulateTyping(dateInput, `${pad(month)}${pad(day)}${year}`, this.typing, this.random);
      return true;
    }

    logger.warn(`No date input found for "${label}"`);
    return false;
  }

  async selectMultipleCheckboxes(
    label: string,
    chooseAmount: number = 1,
    otherText?: string | null,
    choices?: string[] | null
  ): Promise<boolean> {
    const options = await this.page.locate('list-options', label);
    if (options.length === 0) {
      logger.warn(`No checkbox list found for "${label}"`);
      return false;
    }

    let picked: FormElement[];
    if (choices && choices.length > 0) {
      picked = [];
      const seen = new Set<string>();
      for (const choice of choices) {
        // A second click would untick the box
        const key = normalizeText(choice);
        if (seen.has(key)) {
          continue;
        }
        seen.add(key);

        const option = await this.findByText(options, choice);
        if (!option) {
          throw new Error(`Checkbox list "${label}" has no option "${choice}"`);
        }
        picked.push(option);
      }
    } else {
      picked = sampleWithoutReplacement(options, chooseAmount, this.random);
    }

    for (const option of picked) {
      logger.debug(`Ticking "${await option.textContent()}" under "${label}"`);
      await option.click();
      await sleep(this.settleMs);

      // Ticking "Other" moves focus into its free-text box
      const focused = await this.page.focusedInput();
      if (focused) {
        await simulateTyping(focused, otherText ?? generateRandomString(20, this.random), this.typing, this.random);
      }
    }

    return true;
  }

  async submit(): Promise<boolean> {
    const [button] = await this.page.locate('submit-button', 'Submit');
    if (!button) {
      logger.warn('No submit button found');
      return false;
    }

    await button.click();
    try {
      await this.page.waitForNetworkIdle({ idleTime: 500 });
    } catch (error) {
      logger.debug(`Network did not go idle after submitting: ${error}`);
    }
    return true;
  }

  private async findByText(elements: FormElement[], text: string): Promise<FormElement | undefined> {
    const wanted = normalizeText(text);
    for (const element of elements) {
      if (normalizeText(await element.textContent()) === wanted) {
        return element;
      }
    }
    return undefined;
  }
}
