/**
 * Orchestrator Domain Types
 *
 * SCOPE: Completion service messages, tool loop records, orchestrator config
 */

import type { PricingRecord } from './pricing.js';
import type { ToolDescriptor } from './tool.js';

// ─────────────────────────────────────────────────────────────
// LLM CLIENT TYPES
// ─────────────────────────────────────────────────────────────

/**
 * OpenRouter-compatible message format
 */
export interface LLMMessage {
  role: 'system' | 'user' | 'assistant' | 'tool';
  content: string;
  name?: string;
  tool_call_id?: string;
  tool_calls?: LLMToolCall[];
}

/**
 * Tool call from LLM response
 */
export interface LLMToolCall {
  id: string;
  type: 'function';
  function: {
    name: string;
    arguments: string; // JSON string
  };
}

/**
 * OpenRouter chat completion request
 */
export interface LLMRequest {
  model: string;
  messages: LLMMessage[];
  tools?: LLMToolDefinition[];
  tool_choice?:
    | 'none'
    | 'auto'
    | 'required'
    | { type: 'function'; function: { name: string } };
  response_format?: { type: 'json_object' | 'text' };
  max_tokens?: number;
  temperature?: number;
}

/**
 * Tool definition in OpenRouter format
 */
export interface LLMToolDefinition {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>; // JSON Schema
  };
}

export type LLMFinishReason =
  | 'stop'
  | 'tool_calls'
  | 'length'
  | 'content_filter'
  | 'error';

/**
 * Non-streaming LLM response
 */
export interface LLMResponse {
  id: string;
  model: string;
  choices: Array<{
    index: number;
    message: LLMMessage;
    finish_reason: LLMFinishReason;
  }>;
}

/**
 * LLM Client interface for making requests to OpenRouter
 */
export interface LLMClient {
  complete(request: LLMRequest): Promise<LLMResponse>;
}

// ─────────────────────────────────────────────────────────────
// PROMPT BUILDER TYPES
// ─────────────────────────────────────────────────────────────

/**
 * Input for building the messages of one turn
 */
export interface PromptBuilderInput {
  /** Fixed assistant instructions */
  coreInstructions: string;

  /** Stored plans matching the user's message */
  cachedRecords: PricingRecord[];

  /** Earlier user / assistant / tool turns of the session */
  conversationHistory: LLMMessage[];

  /** Current user message */
  userMessage: string;

  /** Tool catalog from the tool server */
  tools: ToolDescriptor[];
}

export interface PromptBuilderOutput {
  messages: LLMMessage[];
  tools: LLMToolDefinition[];
}

// ─────────────────────────────────────────────────────────────
// ORCHESTRATOR CONFIG
// ─────────────────────────────────────────────────────────────

export interface OrchestratorConfig {
  /** Model identifier (e.g., 'openai/gpt-4o-mini') */
  model: string;

  /** Maximum output tokens for a completion */
  maxOutputTokens: number;

  /** Maximum completion calls per user message */
  maxIterations: number;

  /** Maximum tool calls per user message */
  maxToolCalls: number;

  /** Minimum interval between consecutive tool invocations (ms) */
  toolCallDelayMs: number;

  /** Temperature for generation (0-2) */
  temperature: number;

  /** Maximum cached records listed in the prompt */
  cacheHintLimit: number;
}

export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
  model: 'openai/gpt-4o-mini',
  maxOutputTokens: 2048,
  maxIterations: 8,
  maxToolCalls: 12,
  toolCallDelayMs: 1000,
  temperature: 0.2,
  cacheHintLimit: 5,
};

// ─────────────────────────────────────────────────────────────
// TOOL EXECUTION
// ─────────────────────────────────────────────────────────────

/**
 * Result from executing a tool
 */
export interface ToolExecutionResult {
  success: boolean;
  output: Record<string, unknown>;
  errorMessage?: string;
  durationMs: number;
}

/**
 * Tool executor interface (the orchestrator's view of the tool server)
 */
export interface ToolExecutor {
  /**
   * Catalog of tools the tool server exposes
   */
  listTools(): Promise<ToolDescriptor[]>;

  /**
   * Execute a tool by name with given input
   */
  execute(
    toolName: string,
    input: Record<string, unknown>
  ): Promise<ToolExecutionResult>;
}

/**
 * Record of one tool call made during a tool loop run
 */
export interface ToolCallRecord {
  toolCallId: string;
  toolName: string;
  input: Record<string, unknown>;
  output: Record<string, unknown>;
  status: 'success' | 'failure';
  errorMessage?: string;
  durationMs: number;
}
