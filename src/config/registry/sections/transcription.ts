/**
 * Transcription Configuration Section
 *
 * AssemblyAI credentials and audio upload limits.
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

export const transcriptionSection = {
  name: 'transcription',
  description: 'Speech-to-text provider configuration.',
  options: {
    assemblyaiApiKey: {
      envKey: 'ASSEMBLYAI_API_KEY',
      defaultValue: undefined,
      description: 'AssemblyAI API key.',
      schema: z.string().optional(),
      sensitive: true,
    },
    assemblyaiBaseUrl: {
      envKey: 'MEETING_NOTES_ASSEMBLYAI_BASE_URL',
      defaultValue: 'https://api.assemblyai.com',
      description: 'AssemblyAI API base URL.',
      schema: z.string().url(),
    },
    timeoutMs: {
      envKey: 'MEETING_NOTES_TRANSCRIPTION_TIMEOUT_MS',
      defaultValue: 300000,
      description: 'Timeout for a single transcription request (upload included) in milliseconds.',
      schema: z.number().int().min(1000),
      parse: 'int',
    },
    maxAudioBytes: {
      envKey: 'MEETING_NOTES_MAX_AUDIO_BYTES',
      defaultValue: 100 * 1024 * 1024,
      description: 'Largest accepted audio file in bytes.',
      schema: z.number().int().min(1),
      parse: 'int',
    },
  },
} satisfies ConfigSectionMeta;
