/**
 * Summarization CLI Commands
 *
 * summarize, action-items and chunk over a transcript file (or stdin with `-`).
 */

import { Option, type Command } from 'commander';
import { config } from '../../config/index.js';
import { resolveModel } from '../../services/llm/factory.js';
import { resolveChunkBudget } from '../../services/llm/models.js';
import { chunkText } from '../../services/summarization/chunker.js';
import { estimateTokens } from '../../services/summarization/token-estimator.js';
import { getSummarizationService } from '../utils/context.js';
import { parsePositiveInt, readTranscript } from '../utils/input.js';
import { formatOutput } from '../utils/output.js';
import { typedAction } from '../utils/typed-action.js';

interface SummarizeOptions extends Record<string, unknown> {
  model?: string;
  chunkBudget?: number;
}

interface ChunkOptions extends Record<string, unknown> {
  maxTokens?: number;
}

export function addSummarizeCommand(program: Command): void {
  program
    .command('summarize <file>')
    .description('Summarize a transcript file (use - for stdin)')
    .option('--model <model>', 'Model identifier (defaults to the configured model)')
    .addOption(
      new Option('--chunk-budget <tokens>', 'Estimated-token budget per model call').argParser(
        parsePositiveInt
      )
    )
    .action(
      typedAction<SummarizeOptions>(async (file, options) => {
        const text = await readTranscript(file);
        const service = getSummarizationService({
          model: options.model,
          chunkBudget: options.chunkBudget,
        });
        const result = await service.summarizeDetailed(text);

        console.log(formatOutput(options.format === 'text' ? result.summary : result, options.format));
      })
    );
}

export function addActionItemsCommand(program: Command): void {
  program
    .command('action-items <file>')
    .description('Extract deduplicated action items from a transcript file (use - for stdin)')
    .option('--model <model>', 'Model identifier (defaults to the configured model)')
    .action(
      typedAction<Pick<SummarizeOptions, 'model'>>(async (file, options) => {
        const text = await readTranscript(file);
        const actionItems = await getSummarizationService({ model: options.model }).extractActionItems(
          text
        );

        console.log(formatOutput(actionItems, options.format));
      })
    );
}

export function addChunkCommand(program: Command): void {
  program
    .command('chunk <file>')
    .description('Show how a transcript would be chunked (no model calls)')
    .addOption(
      new Option('--max-tokens <tokens>', 'Estimated-token budget per chunk').argParser(
        parsePositiveInt
      )
    )
    .action(
      typedAction<ChunkOptions>(async (file, options) => {
        const text = await readTranscript(file);
        const configured = config.summarization.chunkBudget;
        const maxTokens =
          options.maxTokens ??
          resolveChunkBudget(resolveModel(config.llm), configured > 0 ? configured : undefined);
        const chunks = chunkText(text, maxTokens);

        const result = {
          maxTokens,
          tokenEstimate: estimateTokens(text),
          chunkCount: chunks.length,
          chunks: chunks.map((chunk) => ({
            index: chunk.index,
            tokenEstimate: chunk.tokenEstimate,
            characters: chunk.content.length,
          })),
        };

        console.log(formatOutput(result, options.format));
      })
    );
}
