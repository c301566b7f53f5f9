import { TypingOptions } from '../utils/types';
import { logger } from '../utils/logger';
import { RandomSource } from '../utils/random';
import { DEFAULT_TYPING, KeyTarget, pressEnterKey, simulateTyping, TypeTarget } from '../browser/typing';

export interface LoginInput extends TypeTarget, KeyTarget {}

// The slice of puppeteer's Page the sign-in steps use
export interface LoginPage {
  $$(selector: string): Promise<LoginInput[]>;
  waitForSelector(selector: string, options: { timeout: number }): Promise<unknown>;
  waitForNetworkIdle(options: { idleTime: number; timeout: number }): Promise<void>;
}

export interface AccountLoginOptions {
  typing?: TypingOptions;
  random?: RandomSource;
  // How long to wait for a login step's input to render
  waitTimeoutMs?: number;
}

/**
 * Drives the two sign-in pages the form can bounce to: the Google account
 * chooser and the university's CAS page with its second-factor step.
 */
export class AccountLogin {
  private readonly typing: TypingOptions;
  private readonly random: RandomSource;
  private readonly waitTimeoutMs: number;

  constructor(private page: LoginPage, options: AccountLoginOptions = {}) {
    this.typing = options.typing ?? DEFAULT_TYPING;
    this.random = options.random ?? Math.random;
    this.waitTimeoutMs = options.waitTimeoutMs ?? 15000;
  }

  async enterGoogleEmail(emailOrPhone: string): Promise<void> {
    const input = await this.findLastInput('input[type="email"]', 'email or phone login element for google form');
    await simulateTyping(input, emailOrPhone, this.typing, this.random);
    await pressEnterKey(input);
    await this.waitForSettle();
  }

  async enterGooglePassword(password: string): Promise<void> {
    const input = await this.findLastInput('input[type="password"]', 'password element for google form');
    await simulateTyping(input, password, this.typing, this.random);
    await pressEnterKey(input);
    await this.waitForSettle();
  }

  async logInGoogleAccount(emailOrPhone: string, password: string): Promise<void> {
    logger.info('Signing in to Google account');
    await this.enterGoogleEmail(emailOrPhone);
    await this.enterGooglePassword(password);
  }

  async enterSsoUsername(username: string): Promise<void> {
    const input = await this.findLastInput('input[id="username"]', 'username input', 'the SSO credentials page');
    await simulateTyping(input, username, this.typing, this.random);
  }

  async enterSsoPassword(password: string): Promise<void> {
    const input = await this.findLastInput('input[id="password"]', 'password input', 'the SSO credentials page');
    await simulateTyping(input, password, this.typing, this.random);
    await pressEnterKey(input);
    await this.waitForSettle();
  }

  async enterSsoOtp(otpCode: string): Promise<void> {
    const input = await this.findLastInput('input[id="token"]', 'token input', 'the 2FA page');
    await simulateTyping(input, otpCode, this.typing, this.random);
    await pressEnterKey(input);
    await this.waitForSettle();
  }

  async logInSsoAccount(username: string, password: string, otpCode: string | (() => string)): Promise<void> {
    logger.info('Signing in through university SSO');
    await this.enterSsoUsername(username);
    await this.enterSsoPassword(password);
    await this.enterSsoOtp(typeof otpCode === 'string' ? otpCode : otpCode());
  }

  private async findLastInput(selector: string, description: string, where?: string): Promise<LoginInput> {
    try {
      await this.page.waitForSelector(selector, { timeout: this.waitTimeoutMs });
    } catch (error) {
      logger.debug(`Gave up waiting for ${selector}: ${error}`);
    }

    const inputs = await this.page.$$(selector);
    const input = inputs[inputs.length - 1];
    if (!input) {
      if (where && (await this.page.$$('input')).length === 0) {
        throw new Error(`Unable to find any input elements on ${where}, please try again`);
      }
      throw new Error(`Failed to find ${description}`);
    }
    return input;
  }

  // Sign-in pages swap content over XHR rather than full navigations
  private async waitForSettle(): Promise<void> {
    try {
      await this.page.waitForNetworkIdle({ idleTime: 500, timeout: this.waitTimeoutMs });
    } catch (error) {
      logger.debug(`Network did not go idle: ${error}`);
    }
  }
}
