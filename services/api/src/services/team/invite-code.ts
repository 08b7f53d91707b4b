import { randomBytes } from 'node:crypto';

// Excludes look-alike characters (0/O, 1/I/l)
const INVITE_CODE_ALPHABET = 'ABCDEFGHJKLMNPQRSTUVWXYZ23456789';
const INVITE_CODE_LENGTH = 8;

/**
 * Generate a cryptographically random invite code
 * Format: INV-XXXXXXXX
 */
export function generateInviteCode(): string {
  const bytes = randomBytes(INVITE_CODE_LENGTH);
  let code = 'INV-';
  for (const byte of bytes) {
    code += INVITE_CODE_ALPHABET[byte % INVITE_CODE_ALPHABET.length];
  }
  return code;
}
