import { describe, it, expect } from 'vitest';
import {
  ActionItemExtractionFailure,
  ErrorCodes,
  MeetingNotesError,
  ProviderError,
  SummarizationFailure,
  TimeoutError,
  createProviderError,
  createSizeLimitError,
  createValidationError,
} from '../../src/core/errors.js';
import { mapError } from '../../src/utils/error-mapper.js';

describe('Errors', () => {
  it('should format validation errors with a suggestion', () => {
    const error = createValidationError('model', 'is required', 'Set MEETING_NOTES_MODEL');

    expect(error).toBeInstanceOf(MeetingNotesError);
    expect(error.message).toBe(
      'Validation error: model - is required. Suggestion: Set MEETING_NOTES_MODEL'
    );
    expect(error.code).toBe(ErrorCodes.MISSING_REQUIRED_FIELD);
  });

  it('should serialize to JSON with code and context', () => {
    expect(createSizeLimitError('audio file', 10, 20, 'bytes').toJSON()).toEqual({
      error: 'audio file exceeds maximum bytes of 10 (got 20)',
      code: 'E1005',
      context: { field: 'audio file', maxSize: 10, actualSize: 20, unit: 'bytes' },
    });
  });

  it('should pass ProviderErrors through createProviderError unchanged', () => {
    const original = new ProviderError('quota exceeded', 'openai', 'gpt-4o-mini');

    expect(createProviderError('openai', 'gpt-4o-mini', original)).toBe(original);
    expect(createProviderError('ollama', 'llama3.2', 'socket hang up').message).toBe(
      'ollama request failed: socket hang up'
    );
  });

  it('should describe summarization failures by stage', () => {
    expect(new SummarizationFailure('combine', new Error('overloaded')).message).toBe(
      'Failed to generate summary (combine): overloaded'
    );
    expect(new ActionItemExtractionFailure('bad response').message).toBe(
      'Failed to extract action items: bad response'
    );
  });
});

describe('mapError', () => {
  it('should map provider-side failures to 502 and include the cause', () => {
    const mapped = mapError(
      new SummarizationFailure('chunk', new ProviderError('timeout', 'openai', 'gpt-4o-mini'), 2)
    );

    expect(mapped).toEqual({
      message: 'Failed to generate summary (chunk 2): openai request failed: timeout',
      code: ErrorCodes.SUMMARIZATION_FAILED,
      statusCode: 502,
      details: { stage: 'chunk', chunkIndex: 2, cause: 'openai request failed: timeout' },
    });
  });

  it.each([
    [createValidationError('file', 'missing'), 400],
    [new MeetingNotesError('upload failed', ErrorCodes.NETWORK_ERROR), 502],
    [new TimeoutError('AssemblyAI request', 1000), 504],
    [new ProviderError('boom', 'anthropic'), 502],
  ])('should map %s to status %i', (error, statusCode) => {
    expect(mapError(error).statusCode).toBe(statusCode);
  });

  it('should map missing files to an invalid path error', () => {
    const mapped = mapError(new Error("ENOENT: no such file or directory, open 'missing.txt'"));

    expect(mapped.code).toBe(ErrorCodes.INVALID_FILE_PATH);
    expect(mapped.statusCode).toBe(400);
  });

  it('should map unknown values to a generic error', () => {
    expect(mapError('weird')).toEqual({
      message: 'weird',
      code: ErrorCodes.UNKNOWN_ERROR,
      statusCode: 500,
    });
    expect(mapError(new Error('oops')).code).toBe(ErrorCodes.INTERNAL_ERROR);
  });
});
