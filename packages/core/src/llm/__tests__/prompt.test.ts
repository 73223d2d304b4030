import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { PromptBuilder } from '../prompt.js';
import { estimateTokens, selectSchemaContext, tokenize } from '../schema.js';
import { snapshotOf, table } from '../../__tests__/fixtures.js';

const shop = snapshotOf(table('orders', ['id', 'status']), table('customers', ['id', 'email']));

describe('tokenize', () => {
  it('lowercases and drops one-letter tokens', () => {
    assert.deepEqual(tokenize('Delete order #456, a_b X'), ['delete', 'order', '456', 'a_b']);
  });
});

describe('selectSchemaContext', () => {
  it('includes only the tables the request matches', () => {
    const selection = selectSchemaContext('delete order 456', shop, 2000);
    assert.deepEqual(selection.tables, ['orders']);
    assert.equal(
      selection.text,
      '-- Database schema (relevant subset)\n\nTABLE orders\n  id integer NOT NULL PK\n  status text NULL\n',
    );
  });

  it('falls back to every table in name order when nothing matches', () => {
    assert.deepEqual(selectSchemaContext('hello there', shop, 2000).tables, ['customers', 'orders']);
  });

  it('cuts the columns of a table that alone exceeds the budget', () => {
    const wide = snapshotOf(table('orders', ['id', 'status', 'note']));
    const selection = selectSchemaContext('orders', wide, 10);
    assert.equal(
      selection.text,
      '-- Database schema (relevant subset)\n\nTABLE orders\n  id integer NOT NULL PK\n  -- 2 more columns omitted\n',
    );
  });
});

describe('PromptBuilder', () => {
  const input = {
    request: 'delete order 456',
    snapshot: shop,
    historyTail: [
      { requestText: 'show orders', sql: 'SELECT id FROM orders' },
      { requestText: 'gibberish', sql: null },
      { requestText: 'show order 455', sql: 'SELECT id FROM orders WHERE id = $1' },
      { requestText: 'show order 456', sql: 'SELECT id FROM orders WHERE id = $1' },
    ],
    dialect: 'sqlite' as const,
    intent: 'delete' as const,
  };

  it('is deterministic', () => {
    const builder = new PromptBuilder({ historyTail: 2 });
    assert.deepEqual(builder.build(input), builder.build(input));
  });

  it('states the dialect and the intent in the system message', () => {
    const [system] = new PromptBuilder().build(input).messages;
    assert.equal(system.role, 'system');
    assert.match(system.content, /^You are a SQL generator for SQLite databases\./);
    assert.ok(
      system.content.includes(
        '- You MUST generate exactly one DELETE statement with a WHERE clause that identifies the rows to remove.',
      ),
    );
  });

  it('includes the newest compiled history turns, oldest first', () => {
    const prompt = new PromptBuilder({ historyTail: 2 }).build(input);
    const user = prompt.messages[1];
    assert.equal(user.role, 'user');
    assert.ok(
      user.content.endsWith(
        [
          'Previous requests in this session (oldest first):',
          '- Request: show order 455',
          '  SQL: SELECT id FROM orders WHERE id = $1',
          '- Request: show order 456',
          '  SQL: SELECT id FROM orders WHERE id = $1',
          '',
          'Request: delete order 456',
          '',
          'Generate the SQL statement as a JSON object.',
        ].join('\n'),
      ),
    );
  });

  it('leaves history out when the tail is zero', () => {
    const prompt = new PromptBuilder({ historyTail: 0 }).build(input);
    assert.equal(prompt.messages[1].content.includes('Previous requests'), false);
  });

  it('reports the schema tables and token estimate', () => {
    const prompt = new PromptBuilder().build(input);
    assert.deepEqual(prompt.tables, ['orders']);
    assert.equal(
      prompt.estimatedTokens,
      estimateTokens(prompt.messages[0].content) + estimateTokens(prompt.messages[1].content),
    );
  });
});
