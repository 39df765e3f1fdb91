/**
 * Transcription CLI Commands
 *
 * transcribe submits audio, transcript checks on a job, notes turns a
 * completed transcript into a summary and action items.
 */

import { stat } from 'node:fs/promises';
import { basename } from 'node:path';
import type { Command } from 'commander';
import { config } from '../../config/index.js';
import { validateAudioFile } from '../../services/transcription/audio-validation.js';
import { getNotesService, getTranscriptionProvider } from '../utils/context.js';
import { formatOutput } from '../utils/output.js';
import { typedAction } from '../utils/typed-action.js';

export function addTranscribeCommand(program: Command): void {
  program
    .command('transcribe <audio>')
    .description('Upload an audio file and submit it for transcription')
    .action(
      typedAction(async (audio, options) => {
        const { size } = await stat(audio);
        validateAudioFile(basename(audio), size, config.transcription.maxAudioBytes);

        const result = await getTranscriptionProvider().transcribe(audio);

        console.log(formatOutput(result, options.format));
        if (result.status === 'error') {
          process.exitCode = 1;
        }
      })
    );
}

export function addTranscriptCommand(program: Command): void {
  program
    .command('transcript <id>')
    .description('Show the status (and text, once completed) of a transcript')
    .action(
      typedAction(async (id, options) => {
        const result = await getTranscriptionProvider().getTranscript(id);

        console.log(formatOutput(result, options.format));
        if (result.status === 'error') {
          process.exitCode = 1;
        }
      })
    );
}

export function addNotesCommand(program: Command): void {
  program
    .command('notes <id>')
    .description('Summarize a completed transcript and extract its action items')
    .action(
      typedAction(async (id, options) => {
        const result = await getNotesService().buildNotes(id);

        console.log(formatOutput(result, options.format));
        if (result.status === 'error') {
          process.exitCode = 1;
        }
      })
    );
}
