/**
 * Prompt templates for transcript summarization and action-item extraction
 *
 * Five templates: structured single-pass summary, per-chunk summary,
 * combine-summaries, whole-text action items and per-chunk action items.
 */

import type { ChatMessage } from '../llm/types.js';
import type { ChunkSummary } from './types.js';

/** Separator between labeled chunk summaries in the combine prompt */
export const SUMMARY_SEPARATOR = '\n\n---\n\n';

// =============================================================================
// SINGLE-PASS: Structured Summary of the Whole Transcription
// =============================================================================

export const SUMMARY_SYSTEM_PROMPT = `You are an expert at summarizing audio notes and transcriptions. Create a well-structured summary that captures the essence of the content.

Format your summary with the following sections:
**Main Topics/Themes:** The primary subjects discussed
**Key Points:** The most important information, ideas or decisions
**Action Items/Next Steps:** Any tasks, follow-ups or commitments mentioned
**Notable Details:** Names, dates, numbers or other specifics worth remembering

Adapt the structure to the type of content (meeting, lecture, personal memo, brainstorm). Omit a section only when there is nothing to put in it. Be clear and concise.`;

const SUMMARY_USER_TEMPLATE = `Please analyze and summarize the following audio transcription:

{{text}}`;

// =============================================================================
// MAP: Per-Chunk Summary
// =============================================================================

const CHUNK_SYSTEM_PROMPT = `You are an expert at summarizing parts of long audio transcriptions. You will receive one part of a longer transcription; other parts are summarized separately and merged afterwards.

Extract comprehensively but concisely:
- Topics discussed
- Key points and information
- Decisions made
- Action items, tasks and follow-ups

Do not add an introduction or refer to other parts.`;

const CHUNK_USER_TEMPLATE = `This is part {{ordinal}} of {{total}} of a transcription. Summarize this part:

{{text}}`;

// =============================================================================
// REDUCE: Combine Chunk Summaries
// =============================================================================

const COMBINE_SYSTEM_PROMPT = `You are an expert editor combining section summaries of one long audio transcription into a single final summary.

Guidelines:
- Remove redundancy across sections
- Group related topics together, even when they appear in different sections
- Keep the structure: **Main Topics/Themes:**, **Key Points:**, **Action Items/Next Steps:**, **Notable Details:**
- Produce one cohesive narrative, not a list of section summaries`;

const COMBINE_USER_TEMPLATE = `The following are summaries of {{count}} consecutive sections of one transcription, in order:

{{summaries}}

Combine them into one comprehensive summary.`;

// =============================================================================
// ACTION ITEMS
// =============================================================================

const ACTION_ITEMS_TEMPLATE = `Extract all actionable tasks, to-dos, reminders, or follow-ups from the following transcription. This could include things to research, people to contact, tasks to complete, or ideas to pursue. Return only the action items as a bullet-point list, one per line, each starting with "- ". If there are none, return nothing.

Transcription:
{{text}}`;

const CHUNK_ACTION_ITEMS_TEMPLATE = `Extract all actionable tasks, to-dos, reminders, or follow-ups from part {{ordinal}} of {{total}} of a transcription. This could include things to research, people to contact, tasks to complete, or ideas to pursue. Return only the action items as a bullet-point list, one per line, each starting with "- ". If there are none, return nothing.

Transcription part {{ordinal}} of {{total}}:
{{text}}`;

// =============================================================================
// PROMPT BUILDERS
// =============================================================================

/**
 * Replace `{{name}}` placeholders in a single pass, so text containing
 * placeholder syntax is never expanded again.
 */
export function renderTemplate(template: string, variables: Record<string, string | number>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, name: string) => {
    const value = variables[name];
    return value === undefined ? match : String(value);
  });
}

export function buildSummaryPrompt(text: string): ChatMessage[] {
  return [
    { role: 'system', content: SUMMARY_SYSTEM_PROMPT },
    { role: 'user', content: renderTemplate(SUMMARY_USER_TEMPLATE, { text }) },
  ];
}

export function buildChunkSummaryPrompt(text: string, ordinal: number, total: number): ChatMessage[] {
  return [
    { role: 'system', content: CHUNK_SYSTEM_PROMPT },
    { role: 'user', content: renderTemplate(CHUNK_USER_TEMPLATE, { text, ordinal, total }) },
  ];
}

/**
 * Label each summary `Section <index> Summary:` and join them in the order given.
 */
export function formatSectionSummaries(summaries: readonly ChunkSummary[]): string {
  return summaries
    .map((summary) => `Section ${summary.index} Summary:\n${summary.content}`)
    .join(SUMMARY_SEPARATOR);
}

export function buildCombinePrompt(summaries: readonly ChunkSummary[]): ChatMessage[] {
  return [
    { role: 'system', content: COMBINE_SYSTEM_PROMPT },
    {
      role: 'user',
      content: renderTemplate(COMBINE_USER_TEMPLATE, {
        count: summaries.length,
        summaries: formatSectionSummaries(summaries),
      }),
    },
  ];
}

export function buildActionItemsPrompt(text: string): ChatMessage[] {
  return [{ role: 'user', content: renderTemplate(ACTION_ITEMS_TEMPLATE, { text }) }];
}

export function buildChunkActionItemsPrompt(
  text: string,
  ordinal: number,
  total: number
): ChatMessage[] {
  return [
    {
      role: 'user',
      content: renderTemplate(CHUNK_ACTION_ITEMS_TEMPLATE, { text, ordinal, total }),
    },
  ];
}
