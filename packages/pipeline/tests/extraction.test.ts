import assert from 'node:assert/strict';
import { test } from 'node:test';

import {
  ExecutionContext,
  SchemaExtractor,
  ScriptedOracle,
  buildEnrichedQuery,
  conformToSchema,
  extractDataTask,
  type FieldSchema,
  type PipelineLogger
} from '../src';
import { TEST_MODEL } from './helpers';

const schema: FieldSchema = [
  { name: 'title', type: 'string', required: true },
  { name: 'labels', type: 'array', required: false, items: { type: 'string' } },
  {
    name: 'assignee',
    type: 'object',
    required: false,
    fields: [{ name: 'id', type: 'string', required: true }]
  },
  {
    name: 'tasks',
    type: 'array',
    required: false,
    items: { type: 'object', fields: [{ name: 'name', type: 'string', required: true }] }
  }
];

const recordingLogger = () => {
  const warnings: Array<{ message: string; meta?: Record<string, unknown> }> = [];
  const logger: PipelineLogger = {
    debug: () => {},
    info: () => {},
    warn: (message, meta) => {
      warnings.push({ message, meta });
    },
    error: () => {}
  };
  return { logger, warnings };
};

test('output keys are always a subset of the declared top-level keys', async () => {
  const injected = [
    { title: 'Bug', extra: 1 },
    { title: 'Bug', labels: ['p1'], __proto_like: true, nested: { x: 1 } },
    { unrelated: 'value' },
    {}
  ];
  const declared = new Set(schema.map((field) => field.name));

  for (const data of injected) {
    const oracle = new ScriptedOracle().on(extractDataTask, () => ({ data }));
    const extractor = new SchemaExtractor({ oracle });
    const result = await extractor.extract({ schema, schemaType: 'body', query: 'file a bug', model: TEST_MODEL });
    for (const key of Object.keys(result)) {
      assert.ok(declared.has(key), `unexpected key ${key}`);
    }
  }
});

test('strips undeclared keys and logs a schema violation', async () => {
  const oracle = new ScriptedOracle().on(extractDataTask, () => ({
    data: { title: 'Bug', priority: 'high', assignee: { id: 'u1', name: 'Ada' } }
  }));
  const { logger, warnings } = recordingLogger();
  const extractor = new SchemaExtractor({ oracle, logger });

  const result = await extractor.extract({ schema, schemaType: 'body', query: 'file a bug', model: TEST_MODEL });

  assert.deepEqual(result, { title: 'Bug', assignee: { id: 'u1', name: 'Ada' } });
  assert.equal(warnings.length, 1);
  assert.deepEqual(warnings[0].meta, { code: 'SCHEMA_VIOLATION', schemaType: 'body', stripped: ['priority'] });
});

test('prunes nested objects and arrays of objects when enforceNested is set', async () => {
  const oracle = new ScriptedOracle().on(extractDataTask, () => ({
    data: {
      title: 'Bug',
      assignee: { id: 'u1', name: 'Ada' },
      tasks: [{ name: 'triage', owner: 'x' }, 'loose']
    }
  }));
  const extractor = new SchemaExtractor({ oracle, enforceNested: true });

  const result = await extractor.extract({ schema, schemaType: 'body', query: 'file a bug', model: TEST_MODEL });

  assert.deepEqual(result, {
    title: 'Bug',
    assignee: { id: 'u1' },
    tasks: [{ name: 'triage' }, 'loose']
  });
});

test('conformToSchema reports nested paths', () => {
  const { data, stripped } = conformToSchema(
    { title: 'Bug', tasks: [{ name: 'a', due: 1 }], extra: true },
    schema,
    { enforceNested: true }
  );
  assert.deepEqual(data, { title: 'Bug', tasks: [{ name: 'a' }] });
  assert.deepEqual(stripped, ['tasks[0].due', 'extra']);
});

test('empty schema returns an empty object without calling the oracle', async () => {
  const oracle = new ScriptedOracle();
  const extractor = new SchemaExtractor({ oracle });
  const result = await extractor.extract({ schema: [], schemaType: 'parameters', query: 'list issues', model: TEST_MODEL });
  assert.deepEqual(result, {});
  assert.equal(oracle.calls.length, 0);
});

test('non-object extractor output becomes an empty object', async () => {
  const oracle = new ScriptedOracle().on(extractDataTask, () => ({ data: ['title'] }));
  const { logger, warnings } = recordingLogger();
  const extractor = new SchemaExtractor({ oracle, logger });
  const result = await extractor.extract({ schema, schemaType: 'body', query: 'x', model: TEST_MODEL });
  assert.deepEqual(result, {});
  assert.equal(warnings[0].meta?.received, 'array');
});

test('enriches the query with previous results and usage guidance', async () => {
  const context = new ExecutionContext();
  context.append({
    step: 'Find the repository',
    namespace: 'git',
    response: { id: 42 },
    reasoning: 'needed first',
    guidanceUsed: false
  });

  assert.equal(
    buildEnrichedQuery('Open an issue', context, 'Use numeric ids.'),
    'Open an issue\n\nPrevious steps results:\nFind the repository: {"id":42}\n\nPlatform usage guidance:\nUse numeric ids.'
  );

  const oracle = new ScriptedOracle().on(extractDataTask, () => ({ data: { title: 'x' } }));
  const extractor = new SchemaExtractor({ oracle });
  await extractor.extract({
    schema,
    schemaType: 'body',
    query: 'Open an issue',
    context,
    guidance: 'Use numeric ids.',
    model: TEST_MODEL
  });
  assert.deepEqual(oracle.calls[0].input, {
    query: 'Open an issue\n\nPrevious steps results:\nFind the repository: {"id":42}\n\nPlatform usage guidance:\nUse numeric ids.',
    schemaType: 'body',
    schema
  });
});
