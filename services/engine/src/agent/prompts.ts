export const GENERIC_FAILURE_MESSAGE = "I'm sorry, I encountered an error trying to respond.";

export const BUDGET_NOTE =
  'Note: some data lookups were skipped because the lookup limit for this question was reached, so this answer may be incomplete.';

export function buildSystemPrompt(now: Date): string {
  return [
    'You are a stock research assistant. Answer questions about listed companies, their share prices, financials and news.',
    `Today is ${now.toISOString().slice(0, 10)}.`,
    'Use the provided tools to look up data instead of relying on memory; quote the figures you retrieved and the date they refer to.',
    'If a ticker is ambiguous, use search_symbol first. Prefer a single generate_analysis_report call over many separate lookups when the user asks for an overall view.',
    'When a tool returns an error, say which data was unavailable instead of guessing it.',
    'Keep answers concise. This is not investment advice; do not tell the user to buy or sell.',
  ].join('\n');
}

export function describeLookups(lookups: string[]): string {
  return lookups.length ? `Completed lookups: ${lookups.join(', ')}.` : 'No data lookups completed.';
}

export function deadlineMessage(lookups: string[]): string {
  return `I ran out of time before I could finish answering. ${describeLookups(lookups)}`;
}

export function budgetMessage(budget: number, lookups: string[]): string {
  return `I reached the limit of ${budget} data lookups for this question before I could finish. ${describeLookups(lookups)}`;
}
