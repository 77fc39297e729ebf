export * from './interface';
export { OpenAIClient } from './clients/openai-client';
export { ClaudeClient } from './clients/claude-client';
export { ClientFactory } from './client-factory';
export { EmbeddingProvider, OpenAIEmbeddingProvider } from './embedding';
export { ResponseParser, JsonObject, isJsonObject, clamp } from './response-parser';
