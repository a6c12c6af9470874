// @persona-desk/agents
// Persona agent and its prompt

export * from './types';
export * from './persona-prompt';
export * from './persona-agent';
