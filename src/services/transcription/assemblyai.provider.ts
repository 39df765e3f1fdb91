/**
 * AssemblyAI transcription provider (REST v2)
 *
 * transcribe() uploads the audio, submits a transcript job and returns right
 * after submission; callers check back with getTranscript().
 */

import { readFile } from 'node:fs/promises';
import { createComponentLogger } from '../../utils/logger.js';
import { fetchWithTimeout, parseJsonResponse } from '../../utils/http.js';
import { createValidationError } from '../../core/errors.js';
import type { TranscriptionProvider, TranscriptionResult } from './types.js';

const logger = createComponentLogger('assemblyai');

const SERVICE = 'AssemblyAI';
const DEFAULT_ERROR = 'Transcription failed';

export interface AssemblyAIProviderOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
}

function readStringField(data: unknown, field: string): string | undefined {
  if (typeof data !== 'object' || data === null || !(field in data)) {
    return undefined;
  }
  const value: unknown = Reflect.get(data, field);
  return typeof value === 'string' ? value : undefined;
}

/**
 * Map an AssemblyAI transcript object onto a TranscriptionResult
 */
export function toTranscriptionResult(data: unknown): TranscriptionResult {
  const id = readStringField(data, 'id');
  const status = readStringField(data, 'status');

  switch (status) {
    case 'completed':
      return { status: 'completed', id, text: readStringField(data, 'text') ?? '' };
    case 'error':
      return { status: 'error', id, error: readStringField(data, 'error') || DEFAULT_ERROR };
    case 'queued':
    case 'processing':
      return { status: 'processing', id };
    default:
      return { status: 'error', id, error: `Unexpected transcript status: ${String(status)}` };
  }
}

export class AssemblyAITranscriptionProvider implements TranscriptionProvider {
  private readonly baseUrl: string;

  constructor(private readonly options: AssemblyAIProviderOptions) {
    if (!options.apiKey) {
      throw createValidationError('assemblyaiApiKey', 'is required', 'Set ASSEMBLYAI_API_KEY');
    }
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
  }

  async transcribe(audioPath: string): Promise<TranscriptionResult> {
    try {
      const audio = await readFile(audioPath);

      const uploaded = parseJsonResponse(
        SERVICE,
        await this.request('/v2/upload', {
          method: 'POST',
          headers: { 'Content-Type': 'application/octet-stream' },
          body: audio,
        })
      );
      const uploadUrl = readStringField(uploaded, 'upload_url');
      if (!uploadUrl) {
        return { status: 'error', error: 'Upload response missing upload_url' };
      }

      const submitted = parseJsonResponse(
        SERVICE,
        await this.request('/v2/transcript', {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ audio_url: uploadUrl }),
        })
      );

      const result = toTranscriptionResult(submitted);
      logger.info({ id: result.id, status: result.status }, 'Transcription submitted');
      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn({ audioPath, error: message }, 'Transcription request failed');
      return { status: 'error', error: message };
    }
  }

  async getTranscript(id: string): Promise<TranscriptionResult> {
    try {
      const data = parseJsonResponse(
        SERVICE,
        await this.request(`/v2/transcript/${encodeURIComponent(id)}`, { method: 'GET' })
      );
      return toTranscriptionResult(data);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn({ id, error: message }, 'Transcript lookup failed');
      return { status: 'error', id, error: message };
    }
  }

  private async request(
    path: string,
    init: { method: 'GET' | 'POST'; headers?: Record<string, string>; body?: string | Uint8Array }
  ): Promise<string> {
    return fetchWithTimeout(
      `${this.baseUrl}${path}`,
      { ...init, headers: { ...init.headers, Authorization: this.options.apiKey } },
      { service: SERVICE, timeoutMs: this.options.timeoutMs }
    );
  }
}
