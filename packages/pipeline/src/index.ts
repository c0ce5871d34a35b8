export * from './errors';
export * from './logger';
export * from './schema';
export * from './temporal';
export * from './guidance';
export * from './namespaces';
export * from './catalog/lexical';
export * from './catalog/embeddings';
export * from './catalog/vectorStore';
export * from './catalog/memoryStore';
export * from './catalog/qdrantStore';
export * from './catalog/documents';
export * from './retrieval/fusion';
export * from './retrieval/hybridRetriever';
export * from './oracle/types';
export * from './oracle/tasks';
export * from './oracle/openAiOracle';
export * from './oracle/scripted';
export * from './resolver/endpointResolver';
export * from './extraction/schemaExtractor';
export * from './execution/headers';
export * from './execution/operationCommand';
export * from './execution/executor';
export * from './planning/context';
export * from './planning/planner';
export * from './planning/integrationSelector';
export * from './planning/loop';
export * from './streaming/protocol';
export * from './session';
