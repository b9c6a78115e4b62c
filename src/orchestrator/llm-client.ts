/**
 * LLM Client Implementation
 *
 * Wraps the OpenAI SDK to talk to OpenRouter (or any OpenAI-compatible
 * endpoint).
 */

import OpenAI from 'openai';
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';

import { OPENROUTER_BASE_URL } from '../lib/config.js';
import type {
  LLMClient,
  LLMFinishReason,
  LLMMessage,
  LLMRequest,
  LLMResponse,
} from '../types/index.js';

/**
 * LLM Client configuration options
 */
export interface LLMClientConfig {
  /** OpenRouter API key (required) */
  apiKey: string;

  /** Base URL override (default: OpenRouter) */
  baseURL?: string;

  /** Site URL for OpenRouter attribution */
  siteUrl?: string;

  /** Site name for OpenRouter attribution */
  siteName?: string;

  /** Request timeout in milliseconds */
  timeout?: number;
}

function mapFinishReason(
  reason: ChatCompletion.Choice['finish_reason']
): LLMFinishReason {
  switch (reason) {
    case 'stop':
    case 'tool_calls':
    case 'length':
    case 'content_filter':
      return reason;
    case 'function_call':
      return 'tool_calls';
    default:
      return 'error';
  }
}

/**
 * Convert our LLMMessage to OpenAI's ChatCompletionMessageParam
 */
function toOpenAIMessage(msg: LLMMessage): ChatCompletionMessageParam {
  switch (msg.role) {
    case 'system':
      return {
        role: 'system',
        content: msg.content,
        ...(msg.name !== undefined && { name: msg.name }),
      };
    case 'user':
      return {
        role: 'user',
        content: msg.content,
        ...(msg.name !== undefined && { name: msg.name }),
      };
    case 'assistant':
      return {
        role: 'assistant',
        content: msg.content,
        ...(msg.tool_calls !== undefined &&
          msg.tool_calls.length > 0 && {
            tool_calls: msg.tool_calls.map((tc) => ({
              id: tc.id,
              type: 'function' as const,
              function: {
                name: tc.function.name,
                arguments: tc.function.arguments,
              },
            })),
          }),
      };
    case 'tool':
      return {
        role: 'tool',
        content: msg.content,
        tool_call_id: msg.tool_call_id ?? '',
      };
  }
}

function toOpenAIRequest(
  request: LLMRequest
): ChatCompletionCreateParamsNonStreaming {
  return {
    model: request.model,
    messages: request.messages.map(toOpenAIMessage),
    ...(request.tools !== undefined &&
      request.tools.length > 0 && { tools: request.tools }),
    ...(request.tool_choice !== undefined && {
      tool_choice: request.tool_choice,
    }),
    ...(request.response_format !== undefined && {
      response_format:
        request.response_format.type === 'json_object'
          ? { type: 'json_object' as const }
          : { type: 'text' as const },
    }),
    ...(request.max_tokens !== undefined && {
      max_tokens: request.max_tokens,
    }),
    ...(request.temperature !== undefined && {
      temperature: request.temperature,
    }),
    stream: false,
  };
}

/**
 * Create an LLM client for OpenRouter
 */
export function createLLMClient(config: LLMClientConfig): LLMClient {
  if (config.apiKey.trim() === '') {
    throw new Error('API key is required');
  }

  // OpenRouter attribution headers
  const defaultHeaders: Record<string, string> = {};
  if (config.siteUrl !== undefined) {
    defaultHeaders['HTTP-Referer'] = config.siteUrl;
  }
  if (config.siteName !== undefined) {
    defaultHeaders['X-Title'] = config.siteName;
  }

  const openai = new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseURL ?? OPENROUTER_BASE_URL,
    defaultHeaders,
    timeout: config.timeout ?? 120000,
  });

  return {
    async complete(request: LLMRequest): Promise<LLMResponse> {
      const response = await openai.chat.completions.create(
        toOpenAIRequest(request)
      );

      return {
        id: response.id,
        model: response.model,
        choices: response.choices.map((choice) => ({
          index: choice.index,
          message: {
            role: 'assistant' as const,
            content: choice.message.content ?? '',
            ...(choice.message.tool_calls !== undefined &&
              choice.message.tool_calls.length > 0 && {
                tool_calls: choice.message.tool_calls.map((tc) => ({
                  id: tc.id,
                  type: 'function' as const,
                  function: {
                    name: tc.function.name,
                    arguments: tc.function.arguments,
                  },
                })),
              }),
          },
          finish_reason: mapFinishReason(choice.finish_reason),
        })),
      };
    },
  };
}
