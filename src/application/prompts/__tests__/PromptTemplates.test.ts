import { describe, it, expect } from 'vitest';
import { analyzeTicketPrompt, draftResponsePrompt, escalationSummaryPrompt } from '../PromptTemplates.js';

describe('PromptTemplates', () => {
  it('points the analysis at the full article history', () => {
    const lines = analyzeTicketPrompt('42').split('\n');

    expect(lines[0]).toBe('Analyze Zammad ticket ID 42.');
    expect(lines[2]).toBe('1. Fetch it with zammad_get_ticket (ticket_id=42, include_articles=true, article_limit=-1).');
  });

  it('uses the requested tone', () => {
    expect(draftResponsePrompt('42', 'friendly').split('\n')[0]).toBe(
      'Draft a reply to the customer of Zammad ticket ID 42 in a friendly tone.'
    );
  });

  it('scopes the escalation summary to a group when given', () => {
    expect(escalationSummaryPrompt().split('\n')[0]).toBe('Summarize escalated and at-risk Zammad tickets across all groups.');

    const lines = escalationSummaryPrompt('Users').split('\n');
    expect(lines[0]).toBe('Summarize escalated and at-risk Zammad tickets in group "Users".');
    expect(lines[2]).toBe('1. Get the overall numbers with zammad_get_ticket_stats with group="Users".');
  });
});
