/**
 * Orchestrator Exports
 *
 * LLM PROVIDER: OpenRouter (https://openrouter.ai)
 * - Uses OpenAI-compatible API via 'openai' package
 * - Base URL: https://openrouter.ai/api/v1
 * - Required env: OPENROUTER_API_KEY
 */

export { createLLMClient } from './llm-client.js';
export type { LLMClientConfig } from './llm-client.js';
export {
  createPromptBuilder,
  CORE_INSTRUCTIONS,
  CACHE_HINT_HEADING,
  toolsToLLMFormat,
} from './prompt-builder.js';
export type { PromptBuilder } from './prompt-builder.js';
export { createRateGate } from './rate-gate.js';
export type { RateGate, RateGateOptions } from './rate-gate.js';
export { createToolLoop, FALLBACK_ANSWER, LIMIT_INSTRUCTION } from './tool-loop.js';
export type {
  ToolLoop,
  ToolLoopConfig,
  ToolLoopInput,
  ToolLoopResult,
} from './tool-loop.js';
export { createChatSession, createOrchestrator } from './orchestrator.js';
export type {
  Orchestrator,
  OrchestratorDeps,
  OrchestratorPricingService,
} from './orchestrator.js';
