import * as crypto from 'crypto';

export function sha256(data: string | Uint8Array): string {
  const buffer = typeof data === 'string' ? Buffer.from(data, 'utf8') : data;
  return crypto.createHash('sha256').update(buffer).digest('hex');
}

export function generateTxId(): string {
  return crypto.randomBytes(32).toString('hex');
}
