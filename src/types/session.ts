/**
 * Chat Session Types
 *
 * SCOPE: Conversation state for one interactive session
 */

import type { LLMMessage, ToolCallRecord } from './orchestrator.js';

/**
 * One interactive chat session
 *
 * The session owns its history. History holds user, assistant and tool
 * turns only; the system prompt is rebuilt for every turn.
 */
export interface ChatSession {
  id: string;
  startedAt: Date;
  history: LLMMessage[];
}

/**
 * Outcome of handling one user message
 */
export type TurnOutcome =
  | { kind: 'ignored' }
  | {
      kind: 'answer';
      content: string;
      iterations: number;
      toolCalls: ToolCallRecord[];
      /** Number of pricing records written during this turn */
      recordsInserted: number;
      /** Number of cached records offered to the model */
      cacheHits: number;
      /** Non-fatal problems (malformed extraction, failed insert) */
      warnings: string[];
      stoppedReason?: 'max_iterations' | 'max_tool_calls';
    };
