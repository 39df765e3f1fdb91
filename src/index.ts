// Main entry point for meeting-notes (library usage).
// The CLI lives in ./cli.ts.

export {
  SummarizationService,
  createSummarizationService,
  resolveSummarizationConfig,
  ChunkSummarizer,
  SummaryCombiner,
  ActionItemExtractor,
  parseActionItems,
  deduplicateActionItems,
  chunkText,
  splitText,
  estimateTokens,
  CHARS_PER_TOKEN,
  DEFAULT_TEMPERATURES,
  DEFAULT_MAX_OUTPUT_TOKENS,
} from './services/summarization/index.js';
export type {
  Chunk,
  ChunkSummary,
  SummaryResult,
  SummarizationStrategy,
  SummarizationConfig,
  SummarizationOverrides,
} from './services/summarization/index.js';

export {
  OpenAIProvider,
  AnthropicProvider,
  OllamaProvider,
  createLanguageModelProvider,
  resolveChunkBudget,
  getContextWindow,
  DEFAULT_MODELS,
} from './services/llm/index.js';
export type {
  ChatMessage,
  GenerateOptions,
  LanguageModelProvider,
  LLMProviderName,
} from './services/llm/index.js';

export {
  AssemblyAITranscriptionProvider,
  createTranscriptionProvider,
  validateAudioFile,
  ALLOWED_AUDIO_EXTENSIONS,
} from './services/transcription/index.js';
export type {
  TranscriptionProvider,
  TranscriptionResult,
  TranscriptionStatus,
} from './services/transcription/index.js';

export { NotesService } from './services/notes.service.js';
export type { NotesResult, CompletedNotes, PendingNotes } from './services/notes.service.js';

export {
  MeetingNotesError,
  ErrorCodes,
  ProviderError,
  SummarizationFailure,
  ActionItemExtractionFailure,
  TimeoutError,
} from './core/errors.js';
export type { SummarizationStage } from './core/errors.js';

export { buildConfig, type Config } from './config/index.js';
