/**
 * AJV JSON Schema for the answer payload the model returns.
 * Using plain object schema (not JSONSchemaType) since chart_data is free-form.
 */

export interface AnswerPayload {
  nl_response?: string;
  chart_data?: Record<string, unknown> | null;
  only_chart?: boolean;
}

export const answerPayloadSchema = {
  type: 'object',
  properties: {
    nl_response: { type: 'string' },
    chart_data: { type: ['object', 'null'] },
    only_chart: { type: 'boolean' },
  },
  anyOf: [{ required: ['nl_response'] }, { required: ['chart_data'] }],
} as const;
