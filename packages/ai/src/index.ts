// Core Gemini client
export {
  GeminiClient,
  createGeminiClient,
  isRetryableError,
  DEFAULT_GEMINI_MODEL,
  type GeminiClientConfig,
  type TextGenerator,
} from './gemini-client.js';

// Tools
export * from './tools/index.js';

// Agent
export {
  runAgentLoop,
  parseResponse,
  buildFullPrompt,
  createLocalToolRunner,
  type AgentLoopOptions,
  type ParsedResponse,
} from './agent/loop.js';
export { buildAgentSystemPrompt, buildToolInstructions } from './agent/prompts.js';
