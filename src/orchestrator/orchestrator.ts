/**
 * Main Orchestrator Implementation
 *
 * Handles one user message: looks up cached pricing, builds the prompt,
 * runs the tool loop, stores every plan the extract tool returns, and
 * appends the turn to the session history.
 */

import { nanoid } from 'nanoid';

import type { PricingService } from '../services/pricing.service.js';
import { extractResultSchema } from '../tools/extract/schema.js';
import { errorMessage, failure, success } from '../types/index.js';
import type {
  ChatSession,
  OrchestratorConfig,
  LLMClient,
  PricingRecord,
  Result,
  ToolCallRecord,
  ToolDescriptor,
  ToolExecutor,
  TurnOutcome,
} from '../types/index.js';

import { createPromptBuilder, CORE_INSTRUCTIONS } from './prompt-builder.js';
import type { RateGate } from './rate-gate.js';
import { createToolLoop } from './tool-loop.js';
import type { ToolLoopResult } from './tool-loop.js';

/**
 * Pricing service subset used by the orchestrator
 */
export type OrchestratorPricingService = Pick<
  PricingService,
  'findMatching' | 'recordPlan'
>;

/**
 * Orchestrator interface
 */
export interface Orchestrator {
  /**
   * Answer one user message within the given session
   */
  handleUserMessage(
    session: ChatSession,
    text: string
  ): Promise<Result<TurnOutcome>>;
}

/**
 * Dependencies for orchestrator
 */
export interface OrchestratorDeps {
  llmClient: LLMClient;
  toolExecutor: ToolExecutor;
  pricingService: OrchestratorPricingService;
  config: OrchestratorConfig;
  createGate?: (minIntervalMs: number) => RateGate;
}

export function createChatSession(): ChatSession {
  return {
    id: nanoid(),
    startedAt: new Date(),
    history: [],
  };
}

/**
 * Create an orchestrator instance
 */
export function createOrchestrator(deps: OrchestratorDeps): Orchestrator {
  const { llmClient, toolExecutor, pricingService, config } = deps;
  const promptBuilder = createPromptBuilder();
  const toolLoop = createToolLoop({
    llmClient,
    toolExecutor,
    config: {
      maxIterations: config.maxIterations,
      maxToolCalls: config.maxToolCalls,
      toolCallDelayMs: config.toolCallDelayMs,
    },
    ...(deps.createGate !== undefined && { createGate: deps.createGate }),
  });

  // Fetched once; a failed fetch is retried on the next turn
  let catalog: ToolDescriptor[] | null = null;

  async function loadCatalog(warnings: string[]): Promise<ToolDescriptor[]> {
    if (catalog !== null) {
      return catalog;
    }
    try {
      catalog = await toolExecutor.listTools();
      return catalog;
    } catch (error) {
      const message = errorMessage(error, 'Tool server unavailable');
      console.error(`[chat] Could not load tools: ${message}`);
      warnings.push(`Tools are unavailable: ${message}`);
      return [];
    }
  }

  /**
   * Persist the plans of a successful extract call
   * @returns number of records inserted
   */
  async function storeExtraction(
    record: ToolCallRecord,
    sourceQuery: string,
    warnings: string[]
  ): Promise<number> {
    const parsed = extractResultSchema.safeParse(record.output);
    if (!parsed.success) {
      warnings.push('Extraction output was malformed; nothing was stored');
      return 0;
    }
    if (parsed.data.plans.length === 0) {
      warnings.push('Extraction found no pricing plans');
      return 0;
    }

    let inserted = 0;
    for (const plan of parsed.data.plans) {
      const result = await pricingService.recordPlan({ ...plan, sourceQuery });
      if (result.success) {
        inserted++;
      } else {
        warnings.push(
          `Could not store ${plan.companyName} ${plan.planName}: ${result.error.message}`
        );
      }
    }
    return inserted;
  }

  return {
    async handleUserMessage(
      session: ChatSession,
      text: string
    ): Promise<Result<TurnOutcome>> {
      const userMessage = text.trim();
      if (userMessage === '') {
        return success({ kind: 'ignored' });
      }

      const cached = await pricingService.findMatching(
        userMessage,
        config.cacheHintLimit
      );
      if (!cached.success) {
        return failure('STORE_ERROR', cached.error.message);
      }
      const cachedRecords: PricingRecord[] = cached.data;

      const warnings: string[] = [];
      const tools = await loadCatalog(warnings);

      const prompt = promptBuilder.build({
        coreInstructions: CORE_INSTRUCTIONS,
        cachedRecords,
        conversationHistory: session.history,
        userMessage,
        tools,
      });

      let recordsInserted = 0;
      let loopResult: ToolLoopResult;
      try {
        loopResult = await toolLoop.run({
          messages: prompt.messages,
          model: config.model,
          tools: prompt.tools,
          temperature: config.temperature,
          maxTokens: config.maxOutputTokens,
          onToolResult: async (record) => {
            if (record.toolName === 'extract' && record.status === 'success') {
              recordsInserted += await storeExtraction(
                record,
                userMessage,
                warnings
              );
            }
          },
        });
      } catch (error) {
        return failure(
          'LLM_ERROR',
          `Completion service failed: ${errorMessage(error)}`
        );
      }

      session.history.push(
        { role: 'user', content: userMessage },
        ...loopResult.transcript
      );

      return success({
        kind: 'answer',
        content: loopResult.content,
        iterations: loopResult.iterations,
        toolCalls: loopResult.toolCalls,
        recordsInserted,
        cacheHits: cachedRecords.length,
        warnings,
        ...(loopResult.stoppedReason !== undefined && {
          stoppedReason: loopResult.stoppedReason,
        }),
      });
    },
  };
}
