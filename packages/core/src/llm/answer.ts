import { Ajv } from 'ajv';
import { extractJson } from './extract.js';
import { answerPayloadSchema, type AnswerPayload } from './schema_json.js';

export interface FinalAnswer {
  answer: string;
  chartData: Record<string, unknown> | null;
  onlyChart: boolean;
}

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });
const validatePayload = ajv.compile<AnswerPayload>(answerPayloadSchema);

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Reads the answer stage's output. A response that is not a valid payload
 * is taken as the text answer. The result always carries an answer or a
 * chart; `fallback` fills the answer when the model gave neither.
 */
export function parseAnswer(raw: string, fallback: string): FinalAnswer {
  const parsed = tryParse(extractJson(raw));
  if (validatePayload(parsed)) {
    const answer = parsed.nl_response?.trim() ?? '';
    const chartData = parsed.chart_data ?? null;
    if (!answer && !chartData) {
      return { answer: fallback, chartData: null, onlyChart: false };
    }
    return { answer, chartData, onlyChart: chartData !== null && parsed.only_chart === true };
  }

  const text = raw.trim();
  return { answer: text || fallback, chartData: null, onlyChart: false };
}
