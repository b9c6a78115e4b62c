/**
 * Tool Loop Implementation
 *
 * Alternates completion calls and tool calls until the model answers
 * without requesting tools. Tool calls run strictly one after another,
 * spaced by the rate gate. When a limit is hit the model is asked once
 * more, with tools disabled, for a best-effort answer, so every run ends
 * with a final answer.
 */

import { isRecord, tryParseJson } from '../lib/json.js';
import { errorMessage } from '../types/index.js';
import type {
  LLMClient,
  LLMMessage,
  LLMRequest,
  LLMResponse,
  LLMToolCall,
  ToolCallRecord,
  ToolExecutionResult,
  ToolExecutor,
} from '../types/index.js';

import { createRateGate } from './rate-gate.js';
import type { RateGate } from './rate-gate.js';

export const LIMIT_INSTRUCTION =
  'The tool budget for this question is used up. Do not request any more tools. ' +
  'Answer now as well as you can from the information gathered so far, and say what is missing.';

export const FALLBACK_ANSWER =
  'I apologize, but I was unable to complete the task within the allowed limits. ' +
  'Please try a narrower question.';

/**
 * Tool Loop configuration
 */
export interface ToolLoopConfig {
  /** Maximum completion calls before stopping */
  maxIterations: number;

  /** Maximum total tool calls across all iterations */
  maxToolCalls: number;

  /** Minimum spacing between consecutive tool calls (ms) */
  toolCallDelayMs: number;
}

/**
 * Input for tool loop run
 */
export interface ToolLoopInput {
  /** Initial messages for LLM */
  messages: LLMMessage[];

  /** Model to use */
  model: string;

  /** Optional tools list */
  tools?: LLMRequest['tools'];

  /** Optional temperature */
  temperature?: number;

  /** Optional max tokens */
  maxTokens?: number;

  /** Awaited after every tool call, before the next completion call */
  onToolResult?: (record: ToolCallRecord) => Promise<void>;
}

/**
 * Result from tool loop execution
 */
export interface ToolLoopResult {
  /** Final response content */
  content: string;

  /** Number of completion calls made while tools were allowed */
  iterations: number;

  /** All tool calls made */
  toolCalls: ToolCallRecord[];

  /** Messages added after the input messages, final answer included */
  transcript: LLMMessage[];

  /** Reason loop stopped (if not natural completion) */
  stoppedReason?: 'max_iterations' | 'max_tool_calls';
}

/**
 * Tool Loop interface
 */
export interface ToolLoop {
  run(input: ToolLoopInput): Promise<ToolLoopResult>;
}

/**
 * Dependencies for tool loop
 */
export interface ToolLoopDeps {
  llmClient: LLMClient;
  toolExecutor: ToolExecutor;
  config: ToolLoopConfig;
  /** Gate factory, one gate per run */
  createGate?: (minIntervalMs: number) => RateGate;
}

function toolMessage(record: ToolCallRecord): LLMMessage {
  return {
    role: 'tool',
    tool_call_id: record.toolCallId,
    content:
      record.status === 'success'
        ? JSON.stringify(record.output)
        : JSON.stringify({
            error: record.errorMessage ?? 'Tool execution failed',
          }),
  };
}

/**
 * Create a tool loop instance
 */
export function createToolLoop(deps: ToolLoopDeps): ToolLoop {
  const {
    llmClient,
    toolExecutor,
    config,
    createGate = (minIntervalMs: number) => createRateGate({ minIntervalMs }),
  } = deps;

  async function executeToolCall(tc: LLMToolCall): Promise<ToolCallRecord> {
    const startTime = Date.now();
    const rawArgs = tc.function.arguments.trim();
    const parsed = tryParseJson(rawArgs === '' ? '{}' : rawArgs);

    if (!isRecord(parsed)) {
      return {
        toolCallId: tc.id,
        toolName: tc.function.name,
        input: {},
        output: {},
        status: 'failure',
        errorMessage: `Invalid JSON arguments for ${tc.function.name}`,
        durationMs: Date.now() - startTime,
      };
    }

    let result: ToolExecutionResult;
    try {
      result = await toolExecutor.execute(tc.function.name, parsed);
    } catch (error) {
      result = {
        success: false,
        output: {},
        errorMessage: errorMessage(error),
        durationMs: Date.now() - startTime,
      };
    }

    return {
      toolCallId: tc.id,
      toolName: tc.function.name,
      input: parsed,
      output: result.output,
      status: result.success ? 'success' : 'failure',
      ...(result.errorMessage !== undefined && {
        errorMessage: result.errorMessage,
      }),
      durationMs: result.durationMs,
    };
  }

  return {
    async run(input: ToolLoopInput): Promise<ToolLoopResult> {
      const transcript: LLMMessage[] = [];
      const toolCalls: ToolCallRecord[] = [];
      const gate = createGate(config.toolCallDelayMs);
      let iterations = 0;
      let stoppedReason: ToolLoopResult['stoppedReason'];

      const complete = async (
        messages: LLMMessage[],
        toolChoice?: LLMRequest['tool_choice']
      ): Promise<LLMResponse> => {
        const hasTools = input.tools !== undefined && input.tools.length > 0;
        return llmClient.complete({
          model: input.model,
          messages,
          ...(hasTools && { tools: input.tools }),
          ...(hasTools && toolChoice !== undefined && { tool_choice: toolChoice }),
          ...(input.temperature !== undefined && {
            temperature: input.temperature,
          }),
          ...(input.maxTokens !== undefined && { max_tokens: input.maxTokens }),
        });
      };

      while (stoppedReason === undefined) {
        if (iterations >= config.maxIterations) {
          stoppedReason = 'max_iterations';
          break;
        }
        iterations++;

        const response = await complete([...input.messages, ...transcript]);
        const choice = response.choices[0];
        if (!choice) {
          throw new Error('No choice returned from LLM');
        }
        const assistantMessage = choice.message;
        const requested = assistantMessage.tool_calls ?? [];

        if (requested.length === 0) {
          let answer = assistantMessage.content;
          if (answer.trim() === '') {
            console.error(
              `[chat] Empty answer from completion service (finish reason: ${choice.finish_reason})`
            );
            answer = FALLBACK_ANSWER;
          }
          transcript.push({ role: 'assistant', content: answer });
          return {
            content: answer,
            iterations,
            toolCalls,
            transcript,
          };
        }

        transcript.push({
          role: 'assistant',
          content: assistantMessage.content,
          tool_calls: requested,
        });

        for (const tc of requested) {
          // Every requested call needs a tool message, executed or not
          if (toolCalls.length >= config.maxToolCalls) {
            stoppedReason = 'max_tool_calls';
            transcript.push({
              role: 'tool',
              tool_call_id: tc.id,
              content: JSON.stringify({
                error: 'Tool call limit reached; call not executed',
              }),
            });
            continue;
          }

          await gate.wait();
          const record = await executeToolCall(tc);
          toolCalls.push(record);
          transcript.push(toolMessage(record));

          if (input.onToolResult) {
            await input.onToolResult(record);
          }
        }
      }

      // Limit reached: one more completion without tools
      let content = '';
      try {
        const response = await complete(
          [
            ...input.messages,
            ...transcript,
            { role: 'user', content: LIMIT_INSTRUCTION },
          ],
          'none'
        );
        content = response.choices[0]?.message.content.trim() ?? '';
      } catch (error) {
        console.error(
          `[chat] Final answer request failed: ${errorMessage(error)}`
        );
      }

      const answer = content === '' ? FALLBACK_ANSWER : content;
      transcript.push({ role: 'assistant', content: answer });

      return {
        content: answer,
        iterations,
        toolCalls,
        transcript,
        stoppedReason,
      };
    },
  };
}
