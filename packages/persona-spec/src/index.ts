// @persona-desk/persona-spec
// Persona, model and agent contracts

export * from './types';
export * from './schemas';
export * from './llm-policy';
