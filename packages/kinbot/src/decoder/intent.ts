import { z } from 'zod';

import { loadDataFile } from '../data.js';
import type { CaptureType } from '../protocol.js';

const CaptureKeywordsSchema = z.object({
  video: z.array(z.string().trim().min(1)).min(1),
  photo: z.array(z.string().trim().min(1)).min(1),
});

const CAPTURE_KEYWORDS = loadDataFile('capture_keywords.json', CaptureKeywordsSchema);

const VIDEO_KEYWORDS = CAPTURE_KEYWORDS.video.map((keyword) => keyword.toLowerCase());
const PHOTO_KEYWORDS = CAPTURE_KEYWORDS.photo.map((keyword) => keyword.toLowerCase());

/** Video phrases are checked first, so a text mentioning both asks for video. */
export function classifyCaptureIntent(text: string): CaptureType | null {
  const lower = text.toLowerCase();

  if (VIDEO_KEYWORDS.some((keyword) => lower.includes(keyword))) {
    return 'video';
  }

  if (PHOTO_KEYWORDS.some((keyword) => lower.includes(keyword))) {
    return 'photo';
  }

  return null;
}
