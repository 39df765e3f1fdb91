/**
 * Transcription provider boundary
 */

export type TranscriptionStatus = 'completed' | 'processing' | 'error';

export interface TranscriptionResult {
  status: TranscriptionStatus;
  /** Provider transcript id, present once the job has been submitted */
  id?: string;
  /** Transcript text, present when completed */
  text?: string;
  /** Failure description, present on error */
  error?: string;
}

/**
 * Speech-to-text provider.
 *
 * Failures are reported as `status: 'error'` results; implementations do not reject.
 */
export interface TranscriptionProvider {
  /** Submit an audio file; returns `processing` with an id once accepted */
  transcribe(audioPath: string): Promise<TranscriptionResult>;

  getTranscript(id: string): Promise<TranscriptionResult>;
}
