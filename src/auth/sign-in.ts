import { IdentityHosts, IdentityProvider } from '../utils/types';
import { logger } from '../utils/logger';
import type { AccountLogin } from './account-login';
import type { CredentialPrompter } from './credential-prompt';
import { detectIdentityProvider } from './identity-provider';
import { resolveOtpCode } from './totp';

export interface SignInContext {
  login: Pick<AccountLogin, 'enterGoogleEmail' | 'enterGooglePassword' | 'logInSsoAccount'>;
  credentials: Pick<CredentialPrompter, 'googleEmail' | 'googlePassword' | 'ssoUsername' | 'ssoPassword' | 'otpSecret'>;
  hosts: IdentityHosts;
  currentUrl: () => string;
  now?: () => number;
}

/**
 * Gets past whatever sign-in page the form redirected to. The Google email
 * goes in first; where the browser lands afterwards decides whether the
 * password is asked by Google or by the university's SSO.
 */
export async function signIn(context: SignInContext): Promise<IdentityProvider> {
  const { login, credentials, hosts, currentUrl } = context;

  if (detectIdentityProvider(currentUrl(), hosts) !== 'google') {
    logger.info('Form opened without a Google sign-in step');
    return 'unknown';
  }

  await login.enterGoogleEmail(await credentials.googleEmail());

  const provider = detectIdentityProvider(currentUrl(), hosts);
  logger.info(`Sign-in continues on ${provider === 'unknown' ? currentUrl() : provider}`);

  if (provider === 'google') {
    await login.enterGooglePassword(await credentials.googlePassword());
  } else if (provider === 'sso') {
    const username = await credentials.ssoUsername();
    const password = await credentials.ssoPassword();
    const otpSecret = await credentials.otpSecret();
    // Codes rotate every 30s, so derive it only once the OTP page is up
    await login.logInSsoAccount(username, password, () => resolveOtpCode(otpSecret, context.now?.() ?? Date.now()));
  }

  return provider;
}
