import * as crypto from 'crypto';

// Unsalted single-pass SHA-256, kept for compatibility with stored
// credentials. Not a safe password hash; changing the scheme needs a migration.
export function hashPassword(password: string): string {
  return crypto.createHash('sha256').update(password).digest('hex');
}
