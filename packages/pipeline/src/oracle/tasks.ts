import { z } from 'zod';

import { fieldSchemaSchema, namespaceDescriptorSchema } from '../schema';
import {
  DECOMPOSE_INSTRUCTIONS,
  EXTRACT_INSTRUCTIONS,
  FILTER_INSTRUCTIONS,
  FINAL_RESPONSE_INSTRUCTIONS,
  NEXT_STEP_INSTRUCTIONS,
  REPHRASE_INSTRUCTIONS,
  SELECT_NAMESPACE_INSTRUCTIONS,
  SUMMARIZE_INSTRUCTIONS
} from './prompts';
import { defineTask } from './types';

const endpointSummarySchema = z.object({
  url: z.string(),
  method: z.string(),
  description: z.string()
});

export type EndpointSummary = z.infer<typeof endpointSummarySchema>;

export const rephraseQueryTask = defineTask({
  name: 'rephraseQuery',
  instructions: REPHRASE_INSTRUCTIONS,
  input: z.object({
    query: z.string(),
    rephraseInstructions: z.string()
  }),
  output: z.object({
    rephrasedQuery: z.string()
  })
});

export const filterEndpointsTask = defineTask({
  name: 'filterEndpoints',
  instructions: FILTER_INSTRUCTIONS,
  input: z.object({
    query: z.string(),
    endpoints: z.array(endpointSummarySchema)
  }),
  output: z.object({
    selected: z.array(
      z.object({
        url: z.string(),
        method: z.string()
      })
    )
  })
});

export const decomposeGoalTask = defineTask({
  name: 'decomposeGoal',
  instructions: DECOMPOSE_INSTRUCTIONS,
  input: z.object({
    goal: z.string(),
    workflowInstructions: z.string().nullable()
  }),
  output: z.object({
    steps: z.array(z.string())
  })
});

export const nextStepTask = defineTask({
  name: 'nextStep',
  instructions: NEXT_STEP_INSTRUCTIONS,
  input: z.object({
    goal: z.string(),
    previousSteps: z.string().nullable(),
    workflowInstructions: z.string().nullable()
  }),
  output: z.object({
    nextStep: z.string().nullable(),
    isComplete: z.boolean(),
    reasoning: z.string()
  })
});

export const selectNamespaceTask = defineTask({
  name: 'selectNamespace',
  instructions: SELECT_NAMESPACE_INSTRUCTIONS,
  input: z.object({
    step: z.string(),
    namespaces: z.array(namespaceDescriptorSchema)
  }),
  output: z.object({
    namespace: z.string()
  })
});

export const extractDataTask = defineTask({
  name: 'extractData',
  instructions: EXTRACT_INSTRUCTIONS,
  input: z.object({
    query: z.string(),
    schemaType: z.enum(['parameters', 'body']),
    schema: fieldSchemaSchema
  }),
  output: z.object({
    data: z.unknown()
  })
});

export const summarizeResponseTask = defineTask({
  name: 'summarizeResponse',
  instructions: SUMMARIZE_INSTRUCTIONS,
  input: z.object({
    query: z.string(),
    responseSchema: z.unknown(),
    data: z.unknown()
  }),
  output: z.object({
    response: z.string()
  })
});

export const finalResponseTask = defineTask({
  name: 'finalResponse',
  instructions: FINAL_RESPONSE_INSTRUCTIONS,
  input: z.object({
    query: z.string(),
    context: z.string()
  }),
  output: z.object({
    response: z.string()
  })
});
