export { CommandProviderClient, type CommandProviderConfig } from './command-provider.js';
export { parseCandidate } from './response-parser.js';
export { buildSystemPrompt, type SystemPromptContext } from './prompts.js';
