/**
 * Core type definitions for Pricing Scout
 * This file exports all shared types used across the application
 */

export type { Result, Success, Failure, ErrorCode } from './result.js';
export {
  success,
  failure,
  errorMessage,
} from './result.js';
export type {
  LLMMessage,
  LLMToolCall,
  LLMRequest,
  LLMToolDefinition,
  LLMFinishReason,
  LLMResponse,
  LLMClient,
  PromptBuilderInput,
  PromptBuilderOutput,
  OrchestratorConfig,
  ToolExecutionResult,
  ToolExecutor,
  ToolCallRecord,
} from './orchestrator.js';
export { DEFAULT_ORCHESTRATOR_CONFIG } from './orchestrator.js';
export type { PricingRecord, NewPricingRecord } from './pricing.js';
export type { ChatSession, TurnOutcome } from './session.js';
export type {
  ToolName,
  ScrapeArgs,
  ExtractArgs,
  ScrapeResult,
  ExtractedPlan,
  ExtractResult,
  ToolArgs,
  ToolResults,
  ToolCall,
  ToolDescriptor,
} from './tool.js';
export { TOOL_NAMES } from './tool.js';
