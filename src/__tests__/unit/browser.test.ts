import { beforeEach, describe, expect, test, vi } from 'vitest';
import { BROWSER_CANDIDATES, resolveLaunchTargets } from '../../browser/browser-candidates';
import { buildLaunchConfig, LaunchConfig, PuppeteerManager } from '../../browser/puppeteer-manager';

const INSTALLED = new Set(['/usr/bin/chromium', '/usr/bin/firefox']);

describe('resolveLaunchTargets', () => {
  const fileExists = (path: string) => INSTALLED.has(path);

  test('keeps installed browsers in preference order', () => {
    expect(resolveLaunchTargets(BROWSER_CANDIDATES, { platform: 'linux', fileExists })).toEqual([
      { name: 'chrome', product: 'chrome', channel: 'chrome' },
      { name: 'chromium', product: 'chrome', executablePath: '/usr/bin/chromium' },
      { name: 'firefox', product: 'firefox', executablePath: '/usr/bin/firefox' }
    ]);
  });

  test('narrows to the preferred browser', () => {
    expect(resolveLaunchTargets(BROWSER_CANDIDATES, { platform: 'linux', fileExists, preferred: 'firefox' })).toEqual([
      { name: 'firefox', product: 'firefox', executablePath: '/usr/bin/firefox' }
    ]);
    expect(resolveLaunchTargets(BROWSER_CANDIDATES, { platform: 'linux', fileExists, preferred: 'edge' })).toEqual([]);
  });

  test('skips browsers with no known location on the platform', () => {
    expect(resolveLaunchTargets(BROWSER_CANDIDATES, { platform: 'win32', fileExists, preferred: 'chromium' })).toEqual([]);
  });

  test('uses an explicit executable as the only target', () => {
    expect(resolveLaunchTargets(BROWSER_CANDIDATES, { executablePath: '/opt/browser/bin', fileExists })).toEqual([
      { name: 'chrome', product: 'chrome', executablePath: '/opt/browser/bin' }
    ]);
    expect(resolveLaunchTargets(BROWSER_CANDIDATES, {
      executablePath: '/opt/firefox/firefox',
      preferred: 'firefox',
      fileExists
    })).toEqual([{ name: 'firefox', product: 'firefox', executablePath: '/opt/firefox/firefox' }]);
  });
});

describe('buildLaunchConfig', () => {
  test('passes chromium switches and the release channel to chrome', () => {
    const config = buildLaunchConfig({ name: 'chrome', product: 'chrome', channel: 'chrome' }, true, 5000);

    expect(config).toMatchObject({ browser: 'chrome', channel: 'chrome', headless: true, timeout: 5000 });
    expect(config.executablePath).toBeUndefined();
    expect(config.args).toContain('--no-first-run');
    expect(config.args).not.toContain('--start-maximized');
  });

  test('maximizes visible chromium windows', () => {
    const config = buildLaunchConfig({ name: 'edge', product: 'chrome', executablePath: '/usr/bin/microsoft-edge' }, false, 5000);

    expect(config.executablePath).toBe('/usr/bin/microsoft-edge');
    expect(config.args).toContain('--start-maximized');
  });

  test('gives firefox no chromium switches', () => {
    const config = buildLaunchConfig({ name: 'firefox', product: 'firefox', executablePath: '/usr/bin/firefox' }, false, 5000);

    expect(config.browser).toBe('firefox');
    expect(config.args).toBeUndefined();
  });
});

describe('PuppeteerManager', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  test('tries every target and reports each failure', async () => {
    const launcher = vi.fn(async (config: LaunchConfig) => {
      throw new Error(`cannot start ${config.executablePath ?? config.channel}`);
    });
    const manager = new PuppeteerManager({
      launcher,
      targets: [
        { name: 'chrome', product: 'chrome', channel: 'chrome' },
        { name: 'firefox', product: 'firefox', executablePath: '/usr/bin/firefox' }
      ]
    });

    await expect(manager.launch()).rejects.toThrow(
      'Every browser failed to launch:\n  chrome: cannot start chrome\n  firefox: cannot start /usr/bin/firefox'
    );
    expect(launcher).toHaveBeenCalledTimes(2);
    expect(launcher.mock.calls[1][0]).toMatchObject({ browser: 'firefox', headless: false, timeout: 60000 });
  });

  test('refuses to launch with nothing to try', async () => {
    const manager = new PuppeteerManager({ targets: [] });

    await expect(manager.launch()).rejects.toThrow('No supported browser was found on this machine');
  });

  test('has no page before launch', () => {
    expect(() => new PuppeteerManager({ targets: [] }).getPage()).toThrow('Browser not launched');
  });
});
