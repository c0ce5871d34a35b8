import assert from 'node:assert/strict';
import { test } from 'node:test';

import { normalizeFieldSchema, operationKey, toOperationDocument } from '../src';

test('normalizes ingestion field lists encoded as JSON text', () => {
  const fields = normalizeFieldSchema(
    '[{"key":"state","schema":{"type":"string"},"required":false,"description":"Issue state"}]'
  );
  assert.deepEqual(fields, [{ name: 'state', type: 'string', required: false, description: 'Issue state' }]);
});

test('reads JSON Schema objects with a required list', () => {
  const fields = normalizeFieldSchema({
    type: 'object',
    properties: {
      title: { type: 'string' },
      labels: { type: 'array', items: { type: 'string' } }
    },
    required: ['title']
  });
  assert.deepEqual(fields, [
    { name: 'title', type: 'string', required: true },
    { name: 'labels', type: 'array', required: false, items: { type: 'string' } }
  ]);
});

test('takes the first non-null type of a union', () => {
  const fields = normalizeFieldSchema([{ name: 'due', anyOf: [{ type: 'null' }, { type: 'integer' }] }]);
  assert.deepEqual(fields, [{ name: 'due', type: 'integer', required: true }]);
});

test('keeps nested object fields', () => {
  const fields = normalizeFieldSchema([
    {
      key: 'assignee',
      schema: { type: 'object', properties: { id: { type: 'string' }, email: { type: 'string' } }, required: ['id'] }
    }
  ]);
  assert.deepEqual(fields, [
    {
      name: 'assignee',
      type: 'object',
      required: true,
      fields: [
        { name: 'id', type: 'string', required: true },
        { name: 'email', type: 'string', required: false }
      ]
    }
  ]);
});

test('treats blank and malformed schemas as empty', () => {
  assert.deepEqual(normalizeFieldSchema(''), []);
  assert.deepEqual(normalizeFieldSchema(null), []);
  assert.deepEqual(normalizeFieldSchema('{not json'), []);
});

test('builds operation documents from stored payloads', () => {
  const document = toOperationDocument('doc-1', 'issues', {
    method: 'get',
    url: '/issues',
    description: 'List issues',
    parameters: '[]',
    body: '',
    response: '{"type":"array"}'
  });
  assert.deepEqual(document, {
    id: 'doc-1',
    namespace: 'issues',
    method: 'GET',
    url: '/issues',
    description: 'List issues',
    parameters: [],
    body: [],
    response: { type: 'array' }
  });
  assert.equal(operationKey('get', 'https://api.example.test/issues'), 'GET_https://api.example.test/issues');
});
