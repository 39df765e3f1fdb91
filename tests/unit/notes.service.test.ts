import { describe, it, expect } from 'vitest';
import { NotesService, NO_TRANSCRIPTION_TEXT } from '../../src/services/notes.service.js';
import { SummarizationService } from '../../src/services/summarization/summarization.service.js';
import type {
  TranscriptionProvider,
  TranscriptionResult,
} from '../../src/services/transcription/types.js';
import { FakeLanguageModelProvider } from '../fixtures/fake-llm-provider.js';

class StubTranscriptionProvider implements TranscriptionProvider {
  readonly requested: string[] = [];

  constructor(private readonly result: TranscriptionResult) {}

  async transcribe(): Promise<TranscriptionResult> {
    return this.result;
  }

  async getTranscript(id: string): Promise<TranscriptionResult> {
    this.requested.push(id);
    return this.result;
  }
}

const CREATED_AT = new Date('2026-01-05T10:00:00.000Z');

function createNotesService(
  transcript: TranscriptionResult,
  llm: FakeLanguageModelProvider
): NotesService {
  return new NotesService(
    new StubTranscriptionProvider(transcript),
    new SummarizationService(llm, { model: 'gpt-4o-mini' }),
    () => CREATED_AT
  );
}

describe('NotesService', () => {
  it('should return the status of a transcript that is still processing', async () => {
    const llm = new FakeLanguageModelProvider();
    const service = createNotesService({ status: 'processing', id: 'tx-1' }, llm);

    await expect(service.buildNotes('tx-1')).resolves.toEqual({ status: 'processing', id: 'tx-1' });
    expect(llm.calls).toHaveLength(0);
  });

  it('should pass transcription errors through', async () => {
    const llm = new FakeLanguageModelProvider();
    const service = createNotesService(
      { status: 'error', id: 'tx-1', error: 'Audio too short' },
      llm
    );

    await expect(service.buildNotes('tx-1')).resolves.toEqual({
      status: 'error',
      id: 'tx-1',
      error: 'Audio too short',
    });
    expect(llm.calls).toHaveLength(0);
  });

  it('should report a completed transcript without text', async () => {
    const llm = new FakeLanguageModelProvider();
    const service = createNotesService({ status: 'completed', id: 'tx-1', text: '   ' }, llm);

    await expect(service.buildNotes('tx-1')).resolves.toEqual({
      status: 'error',
      id: 'tx-1',
      error: NO_TRANSCRIPTION_TEXT,
    });
    expect(llm.calls).toHaveLength(0);
  });

  it('should summarize and extract action items from a completed transcript', async () => {
    const llm = new FakeLanguageModelProvider([
      '**Main Topics/Themes:** Launch',
      '- Call Bob\n- Email Alice',
    ]);
    const transcription = 'We should call Bob and email Alice before the launch.';
    const service = createNotesService({ status: 'completed', id: 'tx-1', text: transcription }, llm);

    await expect(service.buildNotes('tx-1')).resolves.toEqual({
      status: 'completed',
      id: 'tx-1',
      transcription,
      summary: '**Main Topics/Themes:** Launch',
      actionItems: ['Call Bob', 'Email Alice'],
      createdAt: '2026-01-05T10:00:00.000Z',
    });
    expect(llm.calls).toHaveLength(2);
  });
});
