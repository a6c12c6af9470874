// @persona-desk/runtime
// Config, LLM routing, logging, templates and output

export * from './errors';
export * from './redact';
export * from './logger';
export * from './config';
export * from './datetime';
export * from './output';
export * from './templates';
export { createAnthropicClient } from './llm/anthropic';
export { buildChatCompletionRequest, createOpenAIClient } from './llm/openai';
export { createMockClient, MOCK_MODEL, type MockClientOptions } from './llm/mock';
export { LLMRouter, type LLMRouterDeps } from './llm/router';
export { parseBracketSections, buildStructuredPrompt } from './llm/sections';
