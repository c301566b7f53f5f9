import { Config } from '../config/env-loader';
import { PuppeteerManager } from '../browser/puppeteer-manager';
import { BROWSER_CANDIDATES, resolveLaunchTargets } from '../browser/browser-candidates';
import { AccountLogin } from '../auth/account-login';
import { createTerminalPrompt, CredentialPrompter } from '../auth/credential-prompt';
import { signIn } from '../auth/sign-in';
import { GoogleFormFiller } from '../form-analyzer/google-form-filler';
import { PuppeteerFormPage } from '../form-analyzer/form-page';
import { processFields } from '../form-analyzer/field-dispatcher';
import { applyOverrides } from '../form-analyzer/field-overrides';
import { createTrainingFormCatalog } from '../form-analyzer/training-form';
import { FieldRunSummary, TypingOptions } from '../utils/types';
import { logger } from '../utils/logger';

export interface FillOptions {
  config: Config;
  overrides: string[];
  submit: boolean;
  multiCheckboxAmount?: number;
  otherText?: string;
}

function isOnForm(currentUrl: string, formUrl: string): boolean {
  const current = new URL(currentUrl);
  const form = new URL(formUrl);
  return current.hostname === form.hostname && current.pathname === form.pathname;
}

export async function fillForm(options: FillOptions): Promise<FieldRunSummary> {
  const { config } = options;

  const catalog = createTrainingFormCatalog();
  const unknownLabels = applyOverrides(catalog, options.overrides);
  if (unknownLabels.length > 0) {
    logger.warn(`Ignoring overrides for unknown fields: ${unknownLabels.join(', ')}`);
  }

  const typing: TypingOptions = {
    minDelayMs: config.typingDelayMinMs,
    maxDelayMs: config.typingDelayMaxMs
  };

  const puppeteerManager = new PuppeteerManager({
    headless: config.headless,
    pageLoadTimeoutMs: config.pageLoadTimeoutMs,
    targets: resolveLaunchTargets(BROWSER_CANDIDATES, {
      preferred: config.browser,
      executablePath: config.executablePath
    })
  });
  const prompt = createTerminalPrompt();

  try {
    logger.info('Launching browser...');
    await puppeteerManager.launch();

    logger.info(`Opening ${config.formUrl}`);
    if (!await puppeteerManager.navigateToPage(config.formUrl)) {
      throw new Error(`Could not open ${config.formUrl}`);
    }

    const page = puppeteerManager.getPage();
    const provider = await signIn({
      login: new AccountLogin(page, { typing }),
      credentials: new CredentialPrompter(config.credentials, prompt.ask),
      hosts: { google: config.googleAccountsHost, sso: config.ssoHost },
      currentUrl: () => puppeteerManager.currentUrl()
    });

    if (provider !== 'unknown' && !isOnForm(puppeteerManager.currentUrl(), config.formUrl)) {
      logger.info('Returning to the form after sign-in');
      if (!await puppeteerManager.navigateToPage(config.formUrl)) {
        throw new Error(`Could not reopen ${config.formUrl} after signing in`);
      }
    }

    const filler = new GoogleFormFiller(new PuppeteerFormPage(page), { typing });
    const summary = await processFields(catalog.all(), filler, {
      multiCheckboxAmount: options.multiCheckboxAmount,
      otherText: options.otherText
    });

    const incomplete = [...summary.skipped, ...summary.failed];
    if (incomplete.length > 0) {
      logger.warn(`Not filled: ${incomplete.join(', ')}`);
    }

    if (options.submit) {
      if (incomplete.length > 0) {
        throw new Error('Refusing to submit a partially filled form');
      }
      if (!await filler.submit()) {
        throw new Error('Could not find the form\'s submit button');
      }
      logger.info('Form submitted');
    } else if (!config.headless) {
      await prompt.ask('Review the form in the browser, then press Enter to close it >\t');
    }

    return summary;
  } finally {
    prompt.close();
    await puppeteerManager.close();
  }
}
