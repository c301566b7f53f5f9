import { existsSync } from 'fs';

export const BROWSER_NAMES = ['brave', 'chrome', 'chromium', 'edge', 'firefox'] as const;

export type BrowserName = (typeof BROWSER_NAMES)[number];

export interface BrowserCandidate {
  name: BrowserName;
  // Protocol family puppeteer drives the executable with
  product: 'chrome' | 'firefox';
  // Puppeteer resolves the install location itself for release channels
  channel?: 'chrome';
  executablePaths: Partial<Record<NodeJS.Platform, string[]>>;
}

export interface LaunchTarget {
  name: BrowserName;
  product: 'chrome' | 'firefox';
  channel?: 'chrome';
  executablePath?: string;
}

export interface ResolveOptions {
  platform?: NodeJS.Platform;
  preferred?: BrowserName;
  executablePath?: string;
  fileExists?: (path: string) => boolean;
}

// Tried in this order
export const BROWSER_CANDIDATES: BrowserCandidate[] = [
  {
    name: 'brave',
    product: 'chrome',
    executablePaths: {
      linux: ['/usr/bin/brave-browser', '/usr/bin/brave', '/snap/bin/brave'],
      darwin: ['/Applications/Brave Browser.app/Contents/MacOS/Brave Browser'],
      win32: [
        'C:\\Program Files\\BraveSoftware\\Brave-Browser\\Application\\brave.exe',
        'C:\\Program Files (x86)\\BraveSoftware\\Brave-Browser\\Application\\brave.exe'
      ]
    }
  },
  {
    name: 'chrome',
    product: 'chrome',
    channel: 'chrome',
    executablePaths: {}
  },
  {
    name: 'chromium',
    product: 'chrome',
    executablePaths: {
      linux: ['/usr/bin/chromium', '/usr/bin/chromium-browser', '/snap/bin/chromium'],
      darwin: ['/Applications/Chromium.app/Contents/MacOS/Chromium']
    }
  },
  {
    name: 'edge',
    product: 'chrome',
    executablePaths: {
      linux: ['/usr/bin/microsoft-edge', '/usr/bin/microsoft-edge-stable'],
      darwin: ['/Applications/Microsoft Edge.app/Contents/MacOS/Microsoft Edge'],
      win32: [
        'C:\\Program Files (x86)\\Microsoft\\Edge\\Application\\msedge.exe',
        'C:\\Program Files\\Microsoft\\Edge\\Application\\msedge.exe'
      ]
    }
  },
  {
    name: 'firefox',
    product: 'firefox',
    executablePaths: {
      linux: ['/usr/bin/firefox', '/snap/bin/firefox'],
      darwin: ['/Applications/Firefox.app/Contents/MacOS/firefox'],
      win32: ['C:\\Program Files\\Mozilla Firefox\\firefox.exe']
    }
  }
];

export function resolveLaunchTargets(
  candidates: BrowserCandidate[],
  options: ResolveOptions = {}
): LaunchTarget[] {
  const platform = options.platform ?? process.platform;
  const fileExists = options.fileExists ?? existsSync;
  const pool = options.preferred
    ? candidates.filter(candidate => candidate.name === options.preferred)
    : candidates;

  // An explicit executable skips discovery entirely
  if (options.executablePath) {
    const pinned = options.preferred ? pool[0] : undefined;
    return [{
      name: pinned?.name ?? 'chrome',
      product: pinned?.product ?? 'chrome',
      executablePath: options.executablePath
    }];
  }

  const targets: LaunchTarget[] = [];
  for (const candidate of pool) {
    if (candidate.channel) {
      targets.push({ name: candidate.name, product: candidate.product, channel: candidate.channel });
      continue;
    }

    const executablePath = (candidate.executablePaths[platform] ?? []).find(path => fileExists(path));
    if (executablePath) {
      targets.push({ name: candidate.name, product: candidate.product, executablePath });
    }
  }

  return targets;
}
