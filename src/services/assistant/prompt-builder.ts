import type { AnswerContext, MaintenanceRecord } from './answer-types';

export const MAX_PROMPT_RECORDS = 10;

export const MAINTENANCE_SYSTEM_PROMPT = `You are a maintenance assistant for electrical equipment (transformers, generators, breakers).
Answer questions about equipment status, maintenance history, failures and costs.

Rules:
- Use only the records provided with the question; do not invent equipment, dates or values.
- When the records do not cover the question, say what is missing and suggest a narrower question.
- Answer in the language of the question.
- Keep answers short: a direct answer first, then supporting details as a list.`;

function formatRecord(record: MaintenanceRecord, index: number): string {
  const fields = Object.entries(record)
    .filter(([, value]) => value !== undefined && value !== null && value !== '')
    .map(([key, value]) => `${key}: ${typeof value === 'object' ? JSON.stringify(value) : String(value)}`);
  return `${index + 1}. ${fields.join(' | ')}`;
}

/**
 * User prompt: the question, up to 10 supporting records and any context
 * fields the caller passed.
 */
export function buildUserPrompt(
  query: string,
  records: readonly MaintenanceRecord[] = [],
  context: AnswerContext = {}
): string {
  const sections = [`Question: ${query.trim()}`];

  if (records.length > 0) {
    const lines = records.slice(0, MAX_PROMPT_RECORDS).map(formatRecord);
    if (records.length > MAX_PROMPT_RECORDS) {
      lines.push(`... and ${records.length - MAX_PROMPT_RECORDS} more`);
    }
    sections.push(`Records (${records.length}):\n${lines.join('\n')}`);
  } else {
    sections.push('Records: none found');
  }

  const contextLines = Object.entries(context)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `- ${key}: ${typeof value === 'object' ? JSON.stringify(value) : String(value)}`);
  if (contextLines.length > 0) {
    sections.push(`Context:\n${contextLines.join('\n')}`);
  }

  return sections.join('\n\n');
}
