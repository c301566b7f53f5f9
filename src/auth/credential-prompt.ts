import readline from 'readline/promises';
import type { Credentials } from '../config/env-loader';
import { logger } from '../utils/logger';

export type Ask = (question: string) => Promise<string>;

const EMAIL_PATTERN = /^[^@]+@[^@]+\.[^@]+/;

export function isValidEmail(value: string): boolean {
  return EMAIL_PATTERN.test(value);
}

export function isNonEmpty(value: string): boolean {
  return value.length > 0;
}

export async function promptUntilValid(ask: Ask, question: string, isValid: (answer: string) => boolean): Promise<string> {
  for (;;) {
    const answer = (await ask(question)).trim();
    if (isValid(answer)) {
      return answer;
    }
  }
}

/**
 * Hands out credentials from configuration, asking on the terminal for the
 * ones that were not configured.
 */
export class CredentialPrompter {
  constructor(private credentials: Credentials, private ask: Ask) {}

  async googleEmail(): Promise<string> {
    const configured = this.credentials.googleEmail;
    if (configured) {
      if (isValidEmail(configured)) {
        return configured;
      }
      logger.warn(`Configured GOOGLE_EMAIL "${configured}" is not a valid email address`);
    }
    return await promptUntilValid(this.ask, 'Enter google email address >\t', isValidEmail);
  }

  async googlePassword(): Promise<string> {
    return this.credentials.googlePassword ?? await promptUntilValid(this.ask, 'Enter google account password >\t', isNonEmpty);
  }

  async ssoUsername(): Promise<string> {
    return this.credentials.ssoUsername ?? await promptUntilValid(this.ask, 'Enter university SSO username >\t', isNonEmpty);
  }

  async ssoPassword(): Promise<string> {
    return this.credentials.ssoPassword ?? await promptUntilValid(this.ask, 'Enter university SSO password >\t', isNonEmpty);
  }

  async otpSecret(): Promise<string> {
    return this.credentials.otpSecret ?? await promptUntilValid(this.ask, 'Enter your OTP code or secret >\t', isNonEmpty);
  }
}

export interface TerminalPrompt {
  ask: Ask;
  close(): void;
}

export function createTerminalPrompt(): TerminalPrompt {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  return {
    ask: question => rl.question(question),
    close: () => rl.close()
  };
}
