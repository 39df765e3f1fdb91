import { describe, it, expect } from 'vitest';
import {
  SUMMARY_SYSTEM_PROMPT,
  buildActionItemsPrompt,
  buildChunkActionItemsPrompt,
  buildChunkSummaryPrompt,
  buildCombinePrompt,
  buildSummaryPrompt,
  formatSectionSummaries,
  renderTemplate,
} from '../../src/services/summarization/prompts.js';

describe('Summarization prompts', () => {
  it('should ask for the four-section structure in the single-pass prompt', () => {
    const messages = buildSummaryPrompt('We agreed to ship on Friday.');

    expect(messages).toHaveLength(2);
    expect(messages[0]).toEqual({ role: 'system', content: SUMMARY_SYSTEM_PROMPT });
    for (const section of [
      '**Main Topics/Themes:**',
      '**Key Points:**',
      '**Action Items/Next Steps:**',
      '**Notable Details:**',
    ]) {
      expect(SUMMARY_SYSTEM_PROMPT).toContain(section);
    }
    expect(messages[1]).toEqual({
      role: 'user',
      content:
        'Please analyze and summarize the following audio transcription:\n\nWe agreed to ship on Friday.',
    });
  });

  it('should state the chunk position in the per-chunk prompt', () => {
    const [system, user] = buildChunkSummaryPrompt('chunk text', 2, 5);

    expect(system.role).toBe('system');
    expect(user.content).toBe(
      'This is part 2 of 5 of a transcription. Summarize this part:\n\nchunk text'
    );
  });

  it('should not expand placeholders that appear in the transcript', () => {
    const [, user] = buildChunkSummaryPrompt('say {{total}} and {{text}}', 1, 3);
    expect(user.content.endsWith('\n\nsay {{total}} and {{text}}')).toBe(true);
  });

  it('should leave unknown placeholders in place', () => {
    expect(renderTemplate('{{known}} {{unknown}}', { known: 1 })).toBe('1 {{unknown}}');
  });

  it('should label and separate section summaries', () => {
    expect(
      formatSectionSummaries([
        { index: 1, content: 'Alpha' },
        { index: 2, content: 'Beta' },
      ])
    ).toBe('Section 1 Summary:\nAlpha\n\n---\n\nSection 2 Summary:\nBeta');
  });

  it('should include every section in the combine prompt', () => {
    const [system, user] = buildCombinePrompt([
      { index: 1, content: 'Alpha' },
      { index: 2, content: 'Beta' },
    ]);

    expect(system.content).toContain('Remove redundancy');
    expect(user.content).toBe(
      'The following are summaries of 2 consecutive sections of one transcription, in order:\n\n' +
        'Section 1 Summary:\nAlpha\n\n---\n\nSection 2 Summary:\nBeta\n\n' +
        'Combine them into one comprehensive summary.'
    );
  });

  it('should build action-item prompts as a single user message', () => {
    const whole = buildActionItemsPrompt('Call Bob tomorrow.');
    const chunk = buildChunkActionItemsPrompt('Email Alice.', 1, 2);

    expect(whole).toHaveLength(1);
    expect(whole[0].role).toBe('user');
    expect(whole[0].content.startsWith('Extract all actionable tasks')).toBe(true);
    expect(whole[0].content.endsWith('Transcription:\nCall Bob tomorrow.')).toBe(true);

    expect(chunk).toHaveLength(1);
    expect(chunk[0].content).toContain('from part 1 of 2 of a transcription');
    expect(chunk[0].content.endsWith('Transcription part 1 of 2:\nEmail Alice.')).toBe(true);
  });
});
