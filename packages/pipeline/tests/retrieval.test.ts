import assert from 'node:assert/strict';
import { test } from 'node:test';

import { QdrantClient } from '@qdrant/js-client-rest';

import {
  HybridRetriever,
  InMemoryVectorStore,
  LATE_INTERACTION_DIMENSIONS,
  LOCAL_DENSE_DIMENSIONS,
  LocalEmbedder,
  NamespaceNotFoundError,
  OperationCatalog,
  QdrantVectorStore,
  deriveDocumentId
} from '../src';

const setup = () => {
  const store = new InMemoryVectorStore();
  const embedder = new LocalEmbedder();
  return {
    store,
    catalog: new OperationCatalog({ store, embedder }),
    retriever: new HybridRetriever({ store, embedder })
  };
};

test('round-trips inserted metadata unchanged', async () => {
  const { catalog, retriever } = setup();
  const metadata = {
    method: 'GET',
    url: '/calendars/{calendarId}/events',
    description: 'List events on a calendar',
    parameters: [{ key: 'calendarId', schema: { type: 'string' }, required: true }],
    body: '[]',
    response: '{"type":"object"}'
  };
  const id = await catalog.insertDocument('calendar', 'List events on a calendar between two dates', metadata);

  const candidates = await retriever.retrieve('calendar', 'show calendar events for next week');
  assert.equal(candidates.length, 1);
  assert.equal(candidates[0].id, id);
  assert.equal(candidates[0].rank, 1);
  assert.deepEqual(candidates[0].payload, metadata);
});

test('returns at most N candidates for fewer than five documents, without duplicates', async () => {
  const { catalog, retriever } = setup();
  await catalog.insertDocument('payments', 'create a payment charge', { method: 'POST', url: '/charges' });
  await catalog.insertDocument('payments', 'list payment charges', { method: 'GET', url: '/charges' });
  await catalog.insertDocument('payments', 'refund a charge', { method: 'POST', url: '/refunds' });

  const candidates = await retriever.retrieve('payments', 'refund the last charge');
  assert.equal(candidates.length, 3);
  assert.equal(new Set(candidates.map((candidate) => candidate.id)).size, 3);
  assert.deepEqual(
    candidates.map((candidate) => candidate.rank),
    [1, 2, 3]
  );
});

test('caps fused results at five', async () => {
  const { catalog, retriever } = setup();
  for (let index = 0; index < 8; index += 1) {
    await catalog.insertDocument('tracker', `operation number ${index} on tracker resources`, {
      method: 'GET',
      url: `/resources/${index}`
    });
  }

  const candidates = await retriever.retrieve('tracker', 'tracker resources operation');
  assert.equal(candidates.length, 5);
  assert.equal(new Set(candidates.map((candidate) => candidate.id)).size, 5);
  for (let index = 1; index < candidates.length; index += 1) {
    assert.ok(candidates[index - 1].score >= candidates[index].score);
  }
});

test('throws NamespaceNotFoundError for an unknown namespace', async () => {
  const { retriever } = setup();
  await assert.rejects(retriever.retrieve('missing', 'anything'), NamespaceNotFoundError);
});

test('repeated method and url overwrite the earlier document', async () => {
  const { catalog, store } = setup();
  const first = await catalog.insertDocument('issues', 'list issues', { method: 'GET', url: '/issues', description: 'v1' });
  const second = await catalog.insertDocument('issues', 'list all issues', {
    method: 'get',
    url: '/issues',
    description: 'v2'
  });

  assert.equal(first, second);
  assert.equal(first, deriveDocumentId('issues', { method: 'GET', url: '/issues' }));
  const documents = await catalog.listDocuments('issues');
  assert.equal(documents.length, 1);
  assert.equal(documents[0].payload.description, 'v2');
  assert.deepEqual(store.getNamespaceConfig('issues'), {
    denseSize: LOCAL_DENSE_DIMENSIONS,
    lateSize: LATE_INTERACTION_DIMENSIONS
  });
});

test('documents without method and url get distinct ids', async () => {
  const { catalog } = setup();
  const first = await catalog.insertDocument('notes', 'free text one', { topic: 'a' });
  const second = await catalog.insertDocument('notes', 'free text two', { topic: 'a' });
  assert.notEqual(first, second);
});

test('editDocument replaces the payload of an existing record', async () => {
  const { catalog, retriever } = setup();
  const id = await catalog.insertDocument('issues', 'list issues', { method: 'GET', url: '/issues', description: 'old' });
  await catalog.editDocument('issues', id, { method: 'GET', url: '/issues', description: 'new' });

  const [candidate] = await retriever.retrieve('issues', 'list issues');
  assert.equal(candidate.payload.description, 'new');
  await assert.rejects(catalog.editDocument('issues', 'unknown-id', {}), { code: 'DOCUMENT_NOT_FOUND' });
});

test('editing method and url moves the document to the new operation key', async () => {
  const { catalog, retriever } = setup();
  const original = await catalog.insertDocument('ops', 'fetch a', { method: 'GET', url: '/a', description: 'Fetch a' });
  const moved = await catalog.editDocument('ops', original, { method: 'GET', url: '/b', description: 'Fetch b' });
  assert.equal(moved, deriveDocumentId('ops', { method: 'GET', url: '/b' }));

  await catalog.insertDocument('ops', 'fetch b again', { method: 'GET', url: '/b', description: 'Fetch b v2' });

  const documents = await catalog.listDocuments('ops');
  assert.deepEqual(documents, [{ id: moved, payload: { method: 'GET', url: '/b', description: 'Fetch b v2' } }]);
  await assert.rejects(catalog.editDocument('ops', original, {}), { code: 'DOCUMENT_NOT_FOUND' });
  const [candidate] = await retriever.retrieve('ops', 'fetch b');
  assert.equal(candidate.id, moved);
});

test('editing only non-indexed fields keeps the record in place', async () => {
  const { catalog, store } = setup();
  const id = await catalog.insertDocument('ops', 'fetch a', { method: 'GET', url: '/a', description: 'Fetch a' });
  const edited = await catalog.editDocument('ops', id, { method: 'GET', url: '/a', description: 'Fetch a', body: '[]' });

  assert.equal(edited, id);
  assert.deepEqual(await store.get('ops', id), {
    id,
    payload: { method: 'GET', url: '/a', description: 'Fetch a', body: '[]' }
  });
  assert.equal(await store.delete('ops', 'missing'), false);
});

const QDRANT_OPTIONS = { url: 'http://127.0.0.1:6333', checkCompatibility: false };

class RacingQdrantClient extends QdrantClient {
  existsChecks = 0;
  createAttempts = 0;
  private readonly createdElsewhere: boolean;

  constructor(createdElsewhere: boolean) {
    super(QDRANT_OPTIONS);
    this.createdElsewhere = createdElsewhere;
  }

  override async collectionExists(): Promise<{ exists: boolean }> {
    this.existsChecks += 1;
    return { exists: this.createdElsewhere && this.createAttempts > 0 };
  }

  override async createCollection(): Promise<boolean> {
    this.createAttempts += 1;
    throw new Error('Collection already exists');
  }
}

test('ensureNamespace accepts a collection created concurrently', async () => {
  const client = new RacingQdrantClient(true);
  const store = new QdrantVectorStore({ url: 'http://127.0.0.1:6333', client });

  await store.ensureNamespace('ops', { denseSize: 8, lateSize: 4 });
  assert.equal(client.createAttempts, 1);
  assert.equal(client.existsChecks, 2);
});

test('ensureNamespace rethrows a creation failure when the collection is still missing', async () => {
  const client = new RacingQdrantClient(false);
  const store = new QdrantVectorStore({ url: 'http://127.0.0.1:6333', client });

  await assert.rejects(store.ensureNamespace('ops', { denseSize: 8, lateSize: 4 }), {
    message: 'Collection already exists'
  });
});
