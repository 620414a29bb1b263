/**
 * Prompt construction for each completion stage.
 */

import { describeFeatures } from '../dialect/catalog.js';
import type { ExecutionOutcome } from '../db/types.js';

export interface FewShotExample {
  question: string;
  sql: string;
}

/** Rows beyond this are left out of the answer prompt */
export const ANSWER_ROW_LIMIT = 50;

const GENERIC_EXAMPLES: FewShotExample[] = [
  {
    question: 'Show me the top 5 customers by total order amount',
    sql: 'SELECT c.customer_name, SUM(o.total_amount) AS total_spent\nFROM customers c\nJOIN orders o ON c.customer_id = o.customer_id\nGROUP BY c.customer_name\nORDER BY total_spent DESC\nLIMIT 5',
  },
  {
    question: 'How many orders were placed in each month of 2023?',
    sql: 'SELECT EXTRACT(MONTH FROM order_date) AS month, COUNT(*) AS order_count\nFROM orders\nWHERE EXTRACT(YEAR FROM order_date) = 2023\nGROUP BY EXTRACT(MONTH FROM order_date)\nORDER BY month',
  },
  {
    question: 'Find all products that have never been ordered',
    sql: 'SELECT p.product_name\nFROM products p\nLEFT JOIN order_items oi ON p.product_id = oi.product_id\nWHERE oi.order_id IS NULL',
  },
];

/**
 * Three examples built from the relevant table names, so the model sees
 * the real identifiers. Generic e-commerce examples when there are none.
 */
export function fewShotExamples(tables: string[]): FewShotExample[] {
  if (tables.length === 0) return GENERIC_EXAMPLES;

  const [first, second, third] = tables;
  return [
    {
      question: `Show me all records from the ${first} table`,
      sql: `SELECT *\nFROM ${first}\nLIMIT 10`,
    },
    second
      ? { question: `Count the number of records in the ${second} table`, sql: `SELECT COUNT(*) AS record_count\nFROM ${second}` }
      : { question: 'Count the number of records in the orders table', sql: 'SELECT COUNT(*) AS record_count\nFROM orders' },
    third
      ? {
          question: `Show me the relationship between ${first} and ${third}`,
          sql: `SELECT a.*, b.*\nFROM ${first} a\nJOIN ${third} b ON a.id = b.${first}_id\nLIMIT 5`,
        }
      : {
          question: 'Show me the relationship between customers and orders',
          sql: 'SELECT c.*, o.*\nFROM customers c\nJOIN orders o ON c.customer_id = o.customer_id\nLIMIT 5',
        },
  ];
}

const GUIDELINES = (dialect: string) => `1. Use only the tables and columns defined in the schema.
2. Apply appropriate joins based on foreign key relationships in the schema.
3. Use correct SQL syntax and functions supported by ${dialect}.
4. Include necessary filtering, grouping, sorting, or aggregations to match the question's intent.
5. For unbounded queries (no filter, grouping or window function), add LIMIT 10.
6. Keep the query syntactically correct and clear.`;

export interface GenerationPromptInput {
  dialect: string;
  question: string;
  schema: string;
  tables: string[];
}

export function buildGenerationPrompt(input: GenerationPromptInput): string {
  const examples = fewShotExamples(input.tables)
    .map((ex, i) => `${i + 1}. Question: ${ex.question}\nSQL Query:\n\`\`\`sql\n${ex.sql}\n\`\`\``)
    .join('\n\n');

  return `You are an expert SQL query generator. Convert the natural language question into a correct SQL query for the schema and dialect below.

**Database Dialect:** ${input.dialect}

**Schema Information:**
${input.schema}

**Dialect-Specific Features:**
${describeFeatures(input.dialect)}

**Examples:**
${examples}

**User Question:** ${input.question}

**Task:**
${GUIDELINES(input.dialect)}
7. Give a brief step-by-step explanation of your reasoning before the query.

**Output Format:**
- Explanation: [your reasoning]
- SQL Query:
\`\`\`sql
[your SQL query]
\`\`\``;
}

export interface FixerPromptInput extends GenerationPromptInput {
  previousSql: string;
  error: string;
}

export function buildFixerPrompt(input: FixerPromptInput): string {
  return `You are an expert SQL query fixer. A query failed against the database. Work out why from the schema, question, previous query and error, then write a corrected query.

**Database Dialect:** ${input.dialect}

**Schema Information:**
${input.schema}

**Dialect-Specific Features:**
${describeFeatures(input.dialect)}

**User Question:** ${input.question}

**Previous Query:**
\`\`\`sql
${input.previousSql}
\`\`\`

**Error Message:**
${input.error}

**Task:**
${GUIDELINES(input.dialect)}
7. Explain why the previous query failed and how the new one fixes it.

**Output Format:**
- Explanation: [why it failed and how it is fixed]
- Corrected SQL Query:
\`\`\`sql
[your corrected SQL query]
\`\`\``;
}

export interface ValidationPromptInput {
  dialect: string;
  schema: string;
  sql: string;
}

export function buildValidationPrompt(input: ValidationPromptInput): string {
  return `You are an expert SQL validator. Check this query for errors and suggest a correction if needed.

Database Dialect: ${input.dialect}

Schema Information:
${input.schema}

SQL Query to Validate:
${input.sql}

Check for:
1. Syntax errors
2. Missing or incorrect table or column names
3. Incorrect join conditions
4. Incorrect use of functions or operators
5. Incorrect use of GROUP BY, ORDER BY, or HAVING
6. Anything else that would stop the query from executing correctly

Start your reply with exactly one line: "VERDICT: VALID" or "VERDICT: INVALID".
If the query is invalid, explain each problem and give the corrected query in a \`\`\`sql fenced block.`;
}

function formatOutcome(outcome: ExecutionOutcome): string {
  if (outcome.kind === 'affected') {
    return `${outcome.affectedRowCount} row(s) affected.`;
  }
  const shown = outcome.rows.slice(0, ANSWER_ROW_LIMIT);
  const more = outcome.rowCount > shown.length ? `\n(${outcome.rowCount - shown.length} more rows not shown)` : '';
  return `Columns: ${outcome.columns.join(', ')}\n${JSON.stringify(shown, (_key, value: unknown) =>
    typeof value === 'bigint' ? value.toString() : value,
  )}${more}`;
}

export interface AnswerPromptInput {
  question: string;
  sql: string;
  outcome: ExecutionOutcome;
}

export function buildAnswerPrompt(input: AnswerPromptInput): string {
  return `Based on the following information, answer the user's question.

User's Question: ${input.question}

SQL Query Used:
${input.sql}

Query Results:
${formatOutcome(input.outcome)}

Respond with ONLY a JSON object of this shape:
{
  "nl_response": "<clear, concise answer that uses the data; empty string when a chart says it all>",
  "chart_data": <an ECharts option object (xAxis, yAxis, series) when a chart helps, otherwise null>,
  "only_chart": <true when the chart alone answers the question>
}
Do NOT wrap the JSON in markdown code fences.`;
}
