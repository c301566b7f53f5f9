import type { KeyInput } from 'puppeteer-core';
import { TypingOptions } from '../utils/types';
import { RandomSource, sleep, uniform } from '../utils/random';

// ElementHandle satisfies both of these
export interface TypeTarget {
  type(text: string): Promise<void>;
}

export interface KeyTarget {
  press(key: KeyInput): Promise<void>;
}

export const DEFAULT_TYPING: TypingOptions = {
  minDelayMs: 150,
  maxDelayMs: 1000
};

/**
 * Types `content` one character at a time, pausing a random interval in
 * [minDelayMs, maxDelayMs) after every character.
 */
export async function simulateTyping(
  element: TypeTarget,
  content: string | number,
  options: TypingOptions = DEFAULT_TYPING,
  random: RandomSource = Math.random
): Promise<void> {
  const text = typeof content === 'string' ? content : String(content);

  for (const letter of text) {
    await element.type(letter);
    const pause = uniform(options.minDelayMs, options.maxDelayMs, random);
    if (pause > 0) {
      await sleep(pause);
    }
  }
}

export async function pressEnterKey(element: KeyTarget): Promise<void> {
  await element.press('Enter');
}
