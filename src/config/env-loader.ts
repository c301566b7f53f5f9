import dotenv from 'dotenv';
import path from 'path';
import { LogLevel, parseLogLevel } from '../utils/logger';
import { BrowserName, BROWSER_NAMES } from '../browser/browser-candidates';

dotenv.config({ path: path.resolve(process.cwd(), '.env') });

export const DEFAULT_FORM_URL =
  'https://docs.google.com/forms/d/e/1FAIpQLSeCnzQ7Kax9u6_uZQDbHiJrPP76iMUg3eJvZMmV3f2xZU8vsQ/viewform';

export interface Credentials {
  googleEmail?: string;
  googlePassword?: string;
  ssoUsername?: string;
  ssoPassword?: string;
  otpSecret?: string;
}

export interface Config {
  formUrl: string;
  googleAccountsHost: string;
  ssoHost: string;
  credentials: Credentials;
  headless: boolean;
  browser?: BrowserName;
  executablePath?: string;
  pageLoadTimeoutMs: number;
  typingDelayMinMs: number;
  typingDelayMaxMs: number;
  logLevel: LogLevel;
}

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function parseBoolean(name: string, value: string | undefined, fallback: boolean): boolean {
  const normalized = optional(value)?.toLowerCase();
  if (normalized === undefined) {
    return fallback;
  }
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  throw new Error(`${name} must be a boolean, got "${value}"`);
}

export function parseNonNegativeInt(name: string, value: string | undefined, fallback: number): number {
  const normalized = optional(value);
  if (normalized === undefined) {
    return fallback;
  }
  if (!/^\d+$/.test(normalized)) {
    throw new Error(`${name} must be a non-negative integer, got "${value}"`);
  }
  return parseInt(normalized, 10);
}

export function parseBrowserName(value: string | undefined): BrowserName | undefined {
  const normalized = optional(value)?.toLowerCase();
  if (normalized === undefined) {
    return undefined;
  }
  const match = BROWSER_NAMES.find(name => name === normalized);
  if (!match) {
    throw new Error(`Unknown browser "${value}" (expected one of: ${BROWSER_NAMES.join(', ')})`);
  }
  return match;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const typingDelayMinMs = parseNonNegativeInt('TYPING_DELAY_MIN_MS', env.TYPING_DELAY_MIN_MS, 150);
  const typingDelayMaxMs = parseNonNegativeInt('TYPING_DELAY_MAX_MS', env.TYPING_DELAY_MAX_MS, 1000);

  if (typingDelayMaxMs < typingDelayMinMs) {
    throw new Error('TYPING_DELAY_MAX_MS must not be smaller than TYPING_DELAY_MIN_MS');
  }

  return {
    formUrl: optional(env.FORM_URL) ?? DEFAULT_FORM_URL,
    googleAccountsHost: optional(env.GOOGLE_ACCOUNTS_HOST) ?? 'accounts.google.com',
    ssoHost: optional(env.SSO_HOST) ?? 'cas.nss.udel.edu',
    credentials: {
      googleEmail: optional(env.GOOGLE_EMAIL),
      googlePassword: optional(env.GOOGLE_PASSWORD),
      ssoUsername: optional(env.SSO_USERNAME),
      ssoPassword: optional(env.SSO_PASSWORD),
      otpSecret: optional(env.OTP_SECRET)
    },
    headless: parseBoolean('HEADLESS', env.HEADLESS, false),
    browser: parseBrowserName(env.BROWSER),
    executablePath: optional(env.BROWSER_EXECUTABLE_PATH),
    pageLoadTimeoutMs: parseNonNegativeInt('PAGE_LOAD_TIMEOUT_MS', env.PAGE_LOAD_TIMEOUT_MS, 60000),
    typingDelayMinMs,
    typingDelayMaxMs,
    logLevel: parseLogLevel(env.LOG_LEVEL)
  };
}
