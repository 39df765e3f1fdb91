/**
 * Notes Service
 *
 * Turns a completed transcript into meeting notes: summary plus action items.
 */

import { createComponentLogger } from '../utils/logger.js';
import type { SummarizationService } from './summarization/summarization.service.js';
import type { TranscriptionProvider, TranscriptionStatus } from './transcription/types.js';

const logger = createComponentLogger('notes');

export const NO_TRANSCRIPTION_TEXT = 'No transcription text available';

export interface CompletedNotes {
  status: 'completed';
  id: string;
  transcription: string;
  summary: string;
  actionItems: string[];
  createdAt: string;
}

export interface PendingNotes {
  status: Exclude<TranscriptionStatus, 'completed'>;
  id: string;
  error?: string;
}

export type NotesResult = CompletedNotes | PendingNotes;

export class NotesService {
  constructor(
    private readonly transcription: TranscriptionProvider,
    private readonly summarization: SummarizationService,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Build notes for a transcript. Model calls are made only once the
   * transcript is completed and has text.
   */
  async buildNotes(transcriptId: string): Promise<NotesResult> {
    const transcript = await this.transcription.getTranscript(transcriptId);

    if (transcript.status !== 'completed') {
      logger.debug({ transcriptId, status: transcript.status }, 'Transcript not ready');
      return {
        status: transcript.status,
        id: transcriptId,
        ...(transcript.error ? { error: transcript.error } : {}),
      };
    }

    const text = transcript.text ?? '';
    if (!text.trim()) {
      return { status: 'error', id: transcriptId, error: NO_TRANSCRIPTION_TEXT };
    }

    const summary = await this.summarization.summarize(text);
    const actionItems = await this.summarization.extractActionItems(text);

    logger.info(
      { transcriptId, summaryLength: summary.length, actionItemCount: actionItems.length },
      'Notes generated'
    );

    return {
      status: 'completed',
      id: transcriptId,
      transcription: text,
      summary,
      actionItems,
      createdAt: this.now().toISOString(),
    };
  }
}
