import crypto from 'crypto';

/**
 * Generates an unguessable share-link token
 * Format: share_<24 random hex characters>
 * Example: share_a7f3b9e1c4d2f8a6b5c3e9d1
 */
export function generateShareToken(): string {
  const randomBytes = crypto.randomBytes(12);
  return `share_${randomBytes.toString('hex')}`;
}
