/**
 * CLI Context Utilities
 *
 * Lazy construction of the services CLI commands need. Services are cached
 * for reuse within a single CLI invocation.
 */

import { config } from '../../config/index.js';
import { NotesService } from '../../services/notes.service.js';
import {
  createSummarizationService,
  type SummarizationOverrides,
  type SummarizationService,
} from '../../services/summarization/summarization.service.js';
import { createTranscriptionProvider } from '../../services/transcription/index.js';
import type { TranscriptionProvider } from '../../services/transcription/types.js';

let cachedTranscription: TranscriptionProvider | null = null;

export function getSummarizationService(overrides: SummarizationOverrides = {}): SummarizationService {
  return createSummarizationService(config, overrides);
}

export function getTranscriptionProvider(): TranscriptionProvider {
  cachedTranscription ??= createTranscriptionProvider(config.transcription);
  return cachedTranscription;
}

export function getNotesService(): NotesService {
  return new NotesService(getTranscriptionProvider(), getSummarizationService());
}
