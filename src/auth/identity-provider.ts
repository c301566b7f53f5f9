import { IdentityHosts, IdentityProvider } from '../utils/types';

export function detectIdentityProvider(url: string, hosts: IdentityHosts): IdentityProvider {
  let hostname: string;
  try {
    hostname = new URL(url).hostname.toLowerCase();
  } catch {
    return 'unknown';
  }

  if (hostname === hosts.google.toLowerCase()) {
    return 'google';
  }
  if (hostname === hosts.sso.toLowerCase()) {
    return 'sso';
  }
  return 'unknown';
}
