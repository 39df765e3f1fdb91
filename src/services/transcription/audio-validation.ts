import { extname } from 'node:path';
import { createSizeLimitError, createUnsupportedFileTypeError } from '../../core/errors.js';

export const ALLOWED_AUDIO_EXTENSIONS = ['webm', 'mp3', 'wav', 'm4a', 'ogg'] as const;

export function isAllowedAudioFile(fileName: string): boolean {
  const extension = extname(fileName).slice(1).toLowerCase();
  return ALLOWED_AUDIO_EXTENSIONS.some((allowed) => allowed === extension);
}

/**
 * Reject audio files with an unsupported extension or over `maxBytes`
 */
export function validateAudioFile(fileName: string, sizeBytes: number, maxBytes: number): void {
  if (!isAllowedAudioFile(fileName)) {
    throw createUnsupportedFileTypeError(fileName, ALLOWED_AUDIO_EXTENSIONS);
  }
  if (sizeBytes > maxBytes) {
    throw createSizeLimitError('audio file', maxBytes, sizeBytes, 'bytes');
  }
}
