import crypto from 'crypto';

// Tokens are secrets; logs carry this short digest instead of the value
export function tokenFingerprint(token: string): string {
  return crypto.createHash('sha256').update(token, 'utf8').digest('hex').slice(0, 12);
}
