import { customAlphabet } from 'nanoid';

const suffix = customAlphabet('0123456789abcdefghijklmnopqrstuvwxyz', 8);

export function slugify(name: string): string {
  return name
    .trim()
    .toLowerCase()
    .replace(/\s+/g, '_')
    .replace(/[^\p{L}\p{N}_]/gu, '');
}

/**
 * Readable id derived from a display name, e.g. `moby_dick_3k9x0q2a`.
 */
export function createId(name: string, fallback = 'item'): string {
  return `${slugify(name) || fallback}_${suffix()}`;
}
