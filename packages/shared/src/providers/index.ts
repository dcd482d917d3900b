export type {
  CompletionClient,
  CompletionRequest,
  EmbeddingProvider,
  StructuredOutputSchema,
} from './types';
export {
  OpenAiCompletionClient,
  OpenAiEmbeddingProvider,
  createOpenAiProviders,
  type Providers,
} from './openai';
