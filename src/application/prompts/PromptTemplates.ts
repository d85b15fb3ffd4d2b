/**
 * Prompt texts offered through MCP prompts. Each one steers the model
 * towards the tools that hold the data it needs.
 */

export const DEFAULT_TONE = 'professional';

export function analyzeTicketPrompt(ticketId: string): string {
  return [
    `Analyze Zammad ticket ID ${ticketId}.`,
    '',
    `1. Fetch it with zammad_get_ticket (ticket_id=${ticketId}, include_articles=true, article_limit=-1).`,
    '2. Summarize the customer problem in two or three sentences.',
    '3. List what has been tried so far and who is waiting on whom.',
    '4. Assess urgency from the priority, escalation timestamps and the last customer contact.',
    '5. Recommend the next concrete step and the group or owner best placed to take it.',
    '',
    `If the ticket is not found, ${ticketId} may be the display number rather than the internal ID: ` +
      'search with zammad_search_tickets and use the "id" field of the match.'
  ].join('\n');
}

export function draftResponsePrompt(ticketId: string, tone: string = DEFAULT_TONE): string {
  return [
    `Draft a reply to the customer of Zammad ticket ID ${ticketId} in a ${tone} tone.`,
    '',
    `1. Read the conversation with zammad_get_ticket (ticket_id=${ticketId}, include_articles=true).`,
    '2. Answer the latest customer message; do not repeat information the customer already has.',
    '3. State clearly what happens next and when.',
    '4. Show the draft for review before posting it.',
    '',
    `Once approved, post it with zammad_add_article (ticket_id=${ticketId}, type="email", sender="Agent", internal=false).`
  ].join('\n');
}

export function escalationSummaryPrompt(group?: string): string {
  const scope = group ? `in group "${group}"` : 'across all groups';
  const filter = group ? ` with group="${group}"` : '';
  return [
    `Summarize escalated and at-risk Zammad tickets ${scope}.`,
    '',
    `1. Get the overall numbers with zammad_get_ticket_stats${filter}.`,
    `2. Find open high-priority tickets with zammad_search_tickets${filter} (state="open", priority="3 high").`,
    '3. For each, note the title, owner, age and the escalation timestamps.',
    '4. Group the findings by owner and flag tickets without an owner.',
    '5. Close with the three tickets that need attention first and why.'
  ].join('\n');
}
