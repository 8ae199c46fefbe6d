import { randomBytes } from 'node:crypto';

export function generateId(prefix: string): string {
  return `${prefix}_${Date.now().toString(36)}_${randomBytes(4).toString('hex')}`;
}

export function randomHex(bytes: number): string {
  return randomBytes(bytes).toString('hex');
}
