import crypto from 'crypto';

const BASE32_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ234567';
const STEP_SECONDS = 30;

export function decodeBase32(secret: string): Buffer {
  const cleaned = secret.toUpperCase().replace(/[\s-]/g, '').replace(/=+$/, '');
  let bits = '';

  for (const char of cleaned) {
    const index = BASE32_ALPHABET.indexOf(char);
    if (index < 0) {
      throw new Error('OTP secret is not valid base32');
    }
    bits += index.toString(2).padStart(5, '0');
  }

  const bytes: number[] = [];
  for (let i = 0; i + 8 <= bits.length; i += 8) {
    bytes.push(parseInt(bits.slice(i, i + 8), 2));
  }
  return Buffer.from(bytes);
}

export function generateTotp(secret: string, now: number = Date.now(), digits: number = 6): string {
  const key = decodeBase32(secret);
  if (key.length === 0) {
    throw new Error('OTP secret is empty');
  }

  const counter = Buffer.alloc(8);
  counter.writeBigUInt64BE(BigInt(Math.floor(now / 1000 / STEP_SECONDS)));
  const hmac = crypto.createHmac('sha1', key).update(counter).digest();

  const offset = hmac[hmac.length - 1] & 0x0f;
  const binary =
    ((hmac[offset] & 0x7f) << 24) |
    (hmac[offset + 1] << 16) |
    (hmac[offset + 2] << 8) |
    hmac[offset + 3];

  return (binary % 10 ** digits).toString().padStart(digits, '0');
}

/**
 * The OTP prompt takes either a code read off an authenticator or the
 * base32 secret behind it.
 */
export function resolveOtpCode(input: string, now: number = Date.now()): string {
  const trimmed = input.trim();
  if (/^\d+$/.test(trimmed)) {
    if (trimmed.length < 6 || trimmed.length > 8) {
      throw new Error(`OTP code must be 6 to 8 digits, got ${trimmed.length}`);
    }
    return trimmed;
  }
  return generateTotp(trimmed, now);
}
