import type { Config } from '../../config/index.js';
import { AssemblyAITranscriptionProvider } from './assemblyai.provider.js';
import type { TranscriptionProvider } from './types.js';

export { AssemblyAITranscriptionProvider, toTranscriptionResult } from './assemblyai.provider.js';
export { ALLOWED_AUDIO_EXTENSIONS, isAllowedAudioFile, validateAudioFile } from './audio-validation.js';
export type { TranscriptionProvider, TranscriptionResult, TranscriptionStatus } from './types.js';

export function createTranscriptionProvider(
  transcription: Config['transcription']
): TranscriptionProvider {
  return new AssemblyAITranscriptionProvider({
    apiKey: transcription.assemblyaiApiKey ?? '',
    baseUrl: transcription.assemblyaiBaseUrl,
    timeoutMs: transcription.timeoutMs,
  });
}
