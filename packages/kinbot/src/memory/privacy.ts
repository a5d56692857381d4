import { z } from 'zod';

import { loadDataFile } from '../data.js';

export const PRIVACY_KEYWORDS: readonly string[] = loadDataFile(
  'privacy_keywords.json',
  z.array(z.string().trim().min(1)).min(1),
).map((keyword) => keyword.toLowerCase());

// Plain substring match: "tarjeta" also blocks "tarjeta de cumpleaños". Over-blocking is accepted.
export function isPrivate(content: string): boolean {
  const lower = content.toLowerCase();
  return PRIVACY_KEYWORDS.some((keyword) => lower.includes(keyword));
}
