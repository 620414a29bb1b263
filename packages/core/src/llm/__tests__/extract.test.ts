import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { affirmsValidity, extractCorrection, extractExplanation, extractJson, extractSql } from '../extract.js';
import { parseAnswer } from '../answer.js';
import { fewShotExamples } from '../prompt.js';

describe('extractSql', () => {
  it('prefers a sql fenced block', () => {
    const text = 'Explanation: count rows.\n```text\nignore me\n```\n```sql\nSELECT COUNT(*) FROM t;\n```';
    assert.equal(extractSql(text), 'SELECT COUNT(*) FROM t;');
  });

  it('takes any fenced block when none is tagged sql', () => {
    assert.equal(extractSql('Here:\n```\nSELECT 1 FROM t\n```\nDone.'), 'SELECT 1 FROM t');
  });

  it('falls back to the first SELECT line through the end', () => {
    const text = 'The query is below.\nSELECT id\nFROM t\nWHERE x = 1';
    assert.equal(extractSql(text), 'SELECT id\nFROM t\nWHERE x = 1');
  });

  it('recognises a leading WITH', () => {
    assert.equal(extractSql('Answer:\n  with c as (select 1) select * from c'), 'with c as (select 1) select * from c');
  });

  it('falls back to the whole text', () => {
    assert.equal(extractSql('  no query here  '), 'no query here');
  });
});

describe('extractExplanation', () => {
  it('reads the labelled reasoning ahead of the query', () => {
    const text = '- Explanation: Join orders to customers.\n- SQL Query:\n```sql\nSELECT 1 FROM t\n```';
    assert.equal(extractExplanation(text), 'Join orders to customers.');
  });

  it('is empty without a label', () => {
    assert.equal(extractExplanation('```sql\nSELECT 1 FROM t\n```'), '');
  });
});

describe('extractCorrection', () => {
  it('prefers a fenced block', () => {
    const text = 'VERDICT: INVALID\nCorrected query: SELECT 2 FROM t\n```sql\nSELECT 3 FROM t;\n```';
    assert.equal(extractCorrection(text), 'SELECT 3 FROM t;');
  });

  it('reads text after a correction label up to a blank line', () => {
    const text = "The table name is wrong.\nHere's the corrected query:\nSELECT name\nFROM users;\n\nThat should work.";
    assert.equal(extractCorrection(text), 'SELECT name\nFROM users;');
  });

  it('returns undefined when there is nothing to extract', () => {
    assert.equal(extractCorrection('The query has a problem with the join.'), undefined);
  });
});

describe('affirmsValidity', () => {
  it('follows an explicit verdict line', () => {
    assert.equal(affirmsValidity('VERDICT: VALID\nLooks fine.'), true);
    assert.equal(affirmsValidity('VERDICT: INVALID\nThe query appears to be correct otherwise.'), false);
  });

  it('accepts an affirmation phrase without negations', () => {
    assert.equal(affirmsValidity('The query appears to be correct.'), true);
  });

  it('rejects an affirmation next to a negation', () => {
    assert.equal(affirmsValidity('The join is valid but the column name is incorrect.'), false);
  });

  it('rejects text with no affirmation', () => {
    assert.equal(affirmsValidity('Consider adding an index.'), false);
  });
});

describe('extractJson', () => {
  it('strips fences', () => {
    assert.equal(extractJson('```json\n{"a":1}\n```'), '{"a":1}');
  });

  it('finds the outer object inside prose', () => {
    assert.equal(extractJson('Sure! {"a":{"b":2}} hope that helps'), '{"a":{"b":2}}');
  });
});

describe('parseAnswer', () => {
  it('reads a valid payload', () => {
    const raw = '{"nl_response":"Ada spent the most.","chart_data":{"xAxis":{"type":"category"}},"only_chart":false}';
    assert.deepEqual(parseAnswer(raw, 'fallback'), {
      answer: 'Ada spent the most.',
      chartData: { xAxis: { type: 'category' } },
      onlyChart: false,
    });
  });

  it('allows a chart-only answer', () => {
    const raw = '{"nl_response":"","chart_data":{"series":[]},"only_chart":true}';
    assert.deepEqual(parseAnswer(raw, 'fallback'), { answer: '', chartData: { series: [] }, onlyChart: true });
  });

  it('uses the fallback when the payload carries neither answer nor chart', () => {
    const raw = '{"nl_response":"  ","chart_data":null}';
    assert.deepEqual(parseAnswer(raw, 'Query returned 2 row(s).'), {
      answer: 'Query returned 2 row(s).',
      chartData: null,
      onlyChart: false,
    });
  });

  it('takes plain text as the answer', () => {
    assert.deepEqual(parseAnswer('There are 4 customers.', 'fallback'), {
      answer: 'There are 4 customers.',
      chartData: null,
      onlyChart: false,
    });
  });

  it('rejects a payload of the wrong shape', () => {
    const raw = '{"nl_response":42}';
    assert.equal(parseAnswer(raw, 'fallback').answer, '{"nl_response":42}');
  });
});

describe('fewShotExamples', () => {
  it('builds examples from the relevant tables', () => {
    const examples = fewShotExamples(['orders', 'customers', 'payments']);
    assert.equal(examples[0].sql, 'SELECT *\nFROM orders\nLIMIT 10');
    assert.equal(examples[1].sql, 'SELECT COUNT(*) AS record_count\nFROM customers');
    assert.equal(examples[2].question, 'Show me the relationship between orders and payments');
  });

  it('uses generic examples without tables', () => {
    assert.equal(fewShotExamples([])[0].question, 'Show me the top 5 customers by total order amount');
  });
});
