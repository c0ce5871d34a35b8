import assert from 'node:assert/strict';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { after, before, test } from 'node:test';

import {
  FileGuidanceSource,
  MissingCredentialError,
  OpenAiOracle,
  OracleError,
  loadNamespaceRegistry,
  loadWorkflowGuidance,
  nextStepTask,
  resolveModel,
  selectNamespaceTask
} from '../src';
import { json, startServer, type TestServer } from './helpers';

let server: TestServer;
let nextContent = '';

before(async () => {
  server = await startServer((request) => {
    if (request.url.startsWith('/failing')) {
      return json({ error: { message: 'quota exceeded' } }, 429);
    }
    return json({ choices: [{ message: { content: nextContent } }] });
  });
});

after(async () => {
  await server.close();
});

const createOracle = (prefix = '') =>
  new OpenAiOracle({
    credentials: { openai: 'test-secret', openrouter: 'test-router-secret' },
    openAiBaseUrl: `${server.baseUrl}${prefix}/openai`,
    openRouterBaseUrl: `${server.baseUrl}${prefix}/openrouter`,
    referer: 'https://switchyard.test',
    title: 'Switchyard tests'
  });

test('model ids route to a provider', () => {
  assert.deepEqual(resolveModel({ model: 'gpt-4.1-mini' }), { provider: 'openai', modelId: 'gpt-4.1-mini' });
  assert.deepEqual(resolveModel({ model: 'openai/gpt-4.1' }), { provider: 'openai', modelId: 'gpt-4.1' });
  assert.deepEqual(resolveModel({ model: 'openrouter/auto' }), { provider: 'openrouter', modelId: 'auto' });
  assert.deepEqual(resolveModel({ model: 'x-ai/grok-4-fast:free' }), {
    provider: 'openrouter',
    modelId: 'x-ai/grok-4-fast:free'
  });
});

test('OpenAI models receive a JSON schema response format', async () => {
  nextContent = '{"namespace":"calendar"}';
  const oracle = createOracle();

  const result = await oracle.invoke(
    selectNamespaceTask,
    { step: 'Book a room', namespaces: [{ id: 'calendar', name: 'Calendar' }] },
    { model: 'openai/gpt-4.1-mini' }
  );

  assert.deepEqual(result, { namespace: 'calendar' });
  const request = server.requests.at(-1);
  assert.ok(request);
  assert.equal(request.url, '/openai/chat/completions');
  assert.equal(request.headers.authorization, 'Bearer test-secret');
  assert.equal(request.headers['http-referer'], undefined);
  const body = JSON.parse(request.body);
  assert.equal(body.model, 'gpt-4.1-mini');
  assert.equal(body.response_format.type, 'json_schema');
  assert.equal(body.response_format.json_schema.name, 'selectNamespace');
  assert.deepEqual(body.response_format.json_schema.schema.required, ['namespace']);
  assert.equal(body.messages[0].role, 'system');
  assert.match(body.messages[1].content, /"step": "Book a room"/);
});

test('OpenRouter models receive json_object and attribution headers', async () => {
  nextContent = '```json\n{"nextStep":null,"isComplete":true,"reasoning":"done"}\n```';
  const oracle = createOracle();

  const result = await oracle.invoke(
    nextStepTask,
    { goal: 'g', previousSteps: null, workflowInstructions: null },
    { model: 'x-ai/grok-4-fast:free' }
  );

  assert.deepEqual(result, { nextStep: null, isComplete: true, reasoning: 'done' });
  const request = server.requests.at(-1);
  assert.ok(request);
  assert.equal(request.url, '/openrouter/chat/completions');
  assert.equal(request.headers.authorization, 'Bearer test-router-secret');
  assert.equal(request.headers['http-referer'], 'https://switchyard.test');
  assert.equal(request.headers['x-title'], 'Switchyard tests');
  const body = JSON.parse(request.body);
  assert.equal(body.model, 'x-ai/grok-4-fast:free');
  assert.deepEqual(body.response_format, { type: 'json_object' });
  assert.match(body.messages[0].content, /Return only JSON matching this schema/);
});

test('output that breaks the task contract raises OracleError', async () => {
  const oracle = createOracle();

  nextContent = 'not json at all';
  await assert.rejects(
    oracle.invoke(selectNamespaceTask, { step: 's', namespaces: [] }, { model: 'gpt-4.1-mini' }),
    (err: unknown) => {
      assert.ok(err instanceof OracleError);
      assert.equal(err.message, 'Oracle task selectNamespace failed: response was not valid JSON');
      return true;
    }
  );

  nextContent = '{"namespace":42}';
  await assert.rejects(
    oracle.invoke(selectNamespaceTask, { step: 's', namespaces: [] }, { model: 'gpt-4.1-mini' }),
    { code: 'ORACLE_FAILED' }
  );
});

test('provider errors surface their message', async () => {
  const oracle = createOracle('/failing');
  await assert.rejects(
    oracle.invoke(selectNamespaceTask, { step: 's', namespaces: [] }, { model: 'gpt-4.1-mini' }),
    { message: 'Oracle task selectNamespace failed: openai request failed (429): quota exceeded' }
  );
});

test('a missing provider key fails readiness without a request', () => {
  const oracle = new OpenAiOracle({ credentials: { openai: 'test-secret' }, openRouterBaseUrl: server.baseUrl });
  const requestCount = server.requests.length;

  assert.doesNotThrow(() => oracle.assertReady({ model: 'gpt-4.1-mini' }));
  assert.throws(() => oracle.assertReady({ model: 'openrouter/auto' }), (err: unknown) => {
    assert.ok(err instanceof MissingCredentialError);
    assert.equal(err.message, 'No API key configured for model openrouter/auto: set OPENROUTER_API_KEY');
    return true;
  });
  assert.equal(server.requests.length, requestCount);
});

test('file guidance and the namespace registry load from disk', async () => {
  const directory = await mkdtemp(path.join(os.tmpdir(), 'switchyard-'));
  try {
    await writeFile(path.join(directory, 'tracker.md'), '\nUse numeric issue ids.\n');
    await writeFile(
      path.join(directory, 'registry.json'),
      JSON.stringify({ namespaces: [{ id: 'tracker', name: 'Issue tracker', description: 'Bugs' }] })
    );
    await writeFile(path.join(directory, 'broken.json'), JSON.stringify([{ name: 'missing id' }]));

    const guidance = new FileGuidanceSource(directory);
    assert.equal(await guidance.load('tracker'), 'Use numeric issue ids.');
    assert.equal(await guidance.load('calendar'), null);
    assert.equal(await guidance.load('../tracker'), null);
    assert.equal(
      await loadWorkflowGuidance(guidance, ['calendar', 'tracker']),
      'Integration tracker manual:\nUse numeric issue ids.'
    );

    const registry = await loadNamespaceRegistry(path.join(directory, 'registry.json'));
    assert.deepEqual(await registry.describe(['tracker', 'calendar', 'tracker']), [
      { id: 'tracker', name: 'Issue tracker', description: 'Bugs' },
      { id: 'calendar', name: 'calendar' }
    ]);
    await assert.rejects(loadNamespaceRegistry(path.join(directory, 'broken.json')), {
      code: 'NAMESPACE_REGISTRY_INVALID'
    });
  } finally {
    await rm(directory, { recursive: true, force: true });
  }
});
