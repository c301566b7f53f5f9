#!/usr/bin/env node

import { Command } from 'commander';
import { Config, loadConfig, parseBrowserName } from './config/env-loader';
import { fillForm } from './commands/fill';
import { listFields } from './commands/fields';
import { logger, LogLevel } from './utils/logger';

const program = new Command();

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parseTypingDelay(value: string): [number, number] {
  const match = /^(\d+)\s*,\s*(\d+)$/.exec(value.trim());
  if (!match) {
    throw new Error(`--typing-delay must look like "min,max" in milliseconds, got "${value}"`);
  }

  const min = parseInt(match[1], 10);
  const max = parseInt(match[2], 10);
  if (max < min) {
    throw new Error('--typing-delay max must not be smaller than min');
  }
  return [min, max];
}

interface FillCommandOptions {
  url?: string;
  headless?: boolean;
  browser?: string;
  executable?: string;
  set: string[];
  submit?: boolean;
  typingDelay?: string;
  checkboxes: string;
  otherText?: string;
  verbose?: boolean;
}

function applyCommandOptions(config: Config, options: FillCommandOptions): Config {
  const [typingDelayMinMs, typingDelayMaxMs] = options.typingDelay
    ? parseTypingDelay(options.typingDelay)
    : [config.typingDelayMinMs, config.typingDelayMaxMs];

  return {
    ...config,
    formUrl: options.url ?? config.formUrl,
    headless: options.headless ?? config.headless,
    browser: parseBrowserName(options.browser) ?? config.browser,
    executablePath: options.executable ?? config.executablePath,
    typingDelayMinMs,
    typingDelayMaxMs,
    logLevel: options.verbose ? LogLevel.DEBUG : config.logLevel
  };
}

program
  .name('form-autofiller')
  .description('Signs in and fills the ITA training request Google Form')
  .version('1.0.0');

program
  .command('fill', { isDefault: true })
  .description('Open the form in a browser, sign in and fill every field')
  .option('-u, --url <url>', 'Form URL (default: FORM_URL or the ITA training form)')
  .option('--headless', 'Run the browser without a window')
  .option('-b, --browser <name>', 'Only try this browser (brave, chrome, chromium, edge, firefox)')
  .option('--executable <path>', 'Launch this browser executable instead of searching for one')
  .option('-s, --set <label=value>', 'Override a field value, repeatable (dates as MM/DD/YYYY, "*" for random)', collect, [])
  .option('--submit', 'Submit the form once every field is filled')
  .option('--typing-delay <min,max>', 'Per-character typing delay range in milliseconds')
  .option('--checkboxes <count>', 'Boxes to tick on multi-checkbox questions without preset choices', '1')
  .option('--other-text <text>', 'Text for an "Other" checkbox answer (default: random)')
  .option('-v, --verbose', 'Debug logging')
  .action(async (options: FillCommandOptions) => {
    try {
      const config = applyCommandOptions(loadConfig(), options);
      logger.setLogLevel(config.logLevel);

      const checkboxes = parseInt(options.checkboxes, 10);
      if (!Number.isInteger(checkboxes) || checkboxes < 1) {
        throw new Error(`--checkboxes must be a positive integer, got "${options.checkboxes}"`);
      }

      const summary = await fillForm({
        config,
        overrides: options.set,
        submit: options.submit ?? false,
        multiCheckboxAmount: checkboxes,
        otherText: options.otherText
      });

      if (summary.failed.length > 0) {
        process.exitCode = 1;
      }
    } catch (error) {
      logger.error('Fill failed:', error);
      process.exit(1);
    }
  });

program
  .command('fields')
  .description('List the fields that would be filled and their values')
  .option('-s, --set <label=value>', 'Override a field value, repeatable', collect, [])
  .action((options: { set: string[] }) => {
    try {
      logger.setLogLevel(loadConfig().logLevel);
      listFields(options.set);
    } catch (error) {
      logger.error('Listing fields failed:', error);
      process.exit(1);
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error('Command failed:', error);
  process.exit(1);
});
