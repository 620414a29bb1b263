/**
 * Best-effort extraction from free-form model text. All pure functions.
 */

const SQL_FENCE = /```sql[ \t]*\r?\n?([\s\S]*?)```/i;
const ANY_FENCE = /```[a-z]*[ \t]*\r?\n?([\s\S]*?)```/i;
const STATEMENT_START = /^(SELECT|WITH)\b/i;

function fenced(text: string): string | undefined {
  const match = text.match(SQL_FENCE) ?? text.match(ANY_FENCE);
  const body = match?.[1]?.trim();
  return body ? body : undefined;
}

/**
 * SQL from a completion: a ```sql block, then any fenced block, then the
 * first line starting with SELECT or WITH through the end, then the
 * whole text.
 */
export function extractSql(text: string): string {
  const block = fenced(text);
  if (block) return block;

  const lines = text.split(/\r?\n/);
  const start = lines.findIndex((line) => STATEMENT_START.test(line.trim()));
  if (start !== -1) {
    return lines.slice(start).join('\n').trim();
  }
  return text.trim();
}

/** The model's reasoning ahead of the query, when it labelled it. */
export function extractExplanation(text: string): string {
  const match = text.match(/Explanation:\s*([\s\S]*?)(?=\n\s*-?\s*(?:\*\*)?(?:Corrected )?SQL Query|```|$)/i);
  return match?.[1]?.trim() ?? '';
}

const CORRECTION_LABELS = /(?:Corrected (?:SQL )?query|Suggested correction|Here's the corrected query)\s*:?[ \t]*\r?\n?([\s\S]+)/i;

/**
 * Corrected query from a validation opinion: fenced block first, then the
 * text after a correction label up to the first blank line.
 */
export function extractCorrection(text: string): string | undefined {
  const block = fenced(text);
  if (block) return block;

  const labelled = text.match(CORRECTION_LABELS)?.[1];
  if (!labelled) return undefined;
  const body = labelled.split(/\r?\n\s*\r?\n/)[0].trim();
  return body ? body : undefined;
}

const VERDICT_LINE = /^\s*VERDICT:\s*(VALID|INVALID)\b/im;
const AFFIRMATIONS = /\b(appears to be correct|appears to be valid|is valid|is correct|no issues found)\b/i;
const NEGATIONS = /\b(not valid|invalid|incorrect|not correct)\b/i;

/**
 * Whether a validation opinion affirms the query. An explicit verdict line
 * decides; without one, an affirmation phrase counts only when the text
 * carries no negation.
 */
export function affirmsValidity(text: string): boolean {
  const verdict = text.match(VERDICT_LINE);
  if (verdict) return verdict[1].toUpperCase() === 'VALID';
  return AFFIRMATIONS.test(text) && !NEGATIONS.test(text);
}

/**
 * Extract JSON from a string that may contain markdown fences or extra text.
 */
export function extractJson(text: string): string {
  const fenceMatch = text.match(/```(?:json)?\s*\n?([\s\S]*?)```/);
  if (fenceMatch) {
    return fenceMatch[1].trim();
  }
  const braceStart = text.indexOf('{');
  const braceEnd = text.lastIndexOf('}');
  if (braceStart !== -1 && braceEnd > braceStart) {
    return text.slice(braceStart, braceEnd + 1);
  }
  return text.trim();
}
