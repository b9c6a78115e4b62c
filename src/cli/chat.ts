/**
 * Interactive Chat Loop
 *
 * Reads one line at a time. "show data" and "quit" are handled here;
 * everything else goes to the orchestrator.
 */

import { createInterface } from 'node:readline/promises';

import type { Orchestrator } from '../orchestrator/orchestrator.js';
import { createChatSession } from '../orchestrator/orchestrator.js';
import type { PricingService } from '../services/pricing.service.js';
import { errorMessage } from '../types/index.js';
import type { ChatSession } from '../types/index.js';

import { formatRecordsTable } from './format.js';

export const PROMPT = '\nQuery: ';

export const WELCOME_MESSAGE = [
  'Pricing Scout',
  'Ask about LLM inference pricing, e.g. "How much does CloudRift AI charge for DeepSeek V3?"',
  'Commands: "show data" lists stored pricing, "quit" exits.',
].join('\n');

export const GOODBYE_MESSAGE = 'Goodbye!';

/**
 * Line-oriented terminal IO
 */
export interface ChatIO {
  /** Resolves to null once input has ended */
  readLine(prompt: string): Promise<string | null>;
  write(text: string): void;
  writeError(text: string): void;
  close(): void;
}

export type ChatCommand =
  | { kind: 'empty' }
  | { kind: 'quit' }
  | { kind: 'show-data' }
  | { kind: 'query'; text: string };

/**
 * Classify one input line; commands are case-insensitive
 */
export function parseCommand(line: string): ChatCommand {
  const text = line.trim();
  const normalized = text.toLowerCase().replace(/\s+/g, ' ');

  if (normalized === '') {
    return { kind: 'empty' };
  }
  if (normalized === 'quit') {
    return { kind: 'quit' };
  }
  if (normalized === 'show data') {
    return { kind: 'show-data' };
  }
  return { kind: 'query', text };
}

export interface ChatDeps {
  io: ChatIO;
  orchestrator: Orchestrator;
  pricingService: Pick<PricingService, 'listRecent'>;
  /** Rows shown by "show data" */
  showDataLimit: number;
  session?: ChatSession;
}

/**
 * Run the read loop until "quit" or end of input
 */
export async function runChat(deps: ChatDeps): Promise<void> {
  const { io, orchestrator, pricingService, showDataLimit } = deps;
  const session = deps.session ?? createChatSession();

  async function showData(): Promise<void> {
    const result = await pricingService.listRecent(showDataLimit);
    if (!result.success) {
      io.writeError(`Error: ${result.error.message}`);
      return;
    }
    io.write(formatRecordsTable(result.data));
  }

  async function answer(text: string): Promise<void> {
    const result = await orchestrator.handleUserMessage(session, text);
    if (!result.success) {
      io.writeError(`Error: ${result.error.message}`);
      return;
    }

    const outcome = result.data;
    if (outcome.kind === 'ignored') {
      return;
    }

    io.write(`\n${outcome.content}`);
    for (const warning of outcome.warnings) {
      io.writeError(`Warning: ${warning}`);
    }
    if (outcome.recordsInserted > 0) {
      const noun = outcome.recordsInserted === 1 ? 'record' : 'records';
      io.write(`(saved ${outcome.recordsInserted} pricing ${noun})`);
    }
  }

  io.write(WELCOME_MESSAGE);
  try {
    for (;;) {
      const line = await io.readLine(PROMPT);
      if (line === null) {
        break;
      }

      const command = parseCommand(line);
      if (command.kind === 'quit') {
        io.write(GOODBYE_MESSAGE);
        break;
      }

      try {
        if (command.kind === 'show-data') {
          await showData();
        } else if (command.kind === 'query') {
          await answer(command.text);
        }
      } catch (error) {
        io.writeError(`Error: ${errorMessage(error)}`);
      }
    }
  } finally {
    io.close();
  }
}

/**
 * ChatIO over a readline interface on stdin / stdout
 *
 * Lines are read through the interface's async iterator, which queues
 * lines that arrive between reads (piped or pasted input).
 */
export function createReadlineIO(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): ChatIO {
  const rl = createInterface({ input, output });
  const lines = rl[Symbol.asyncIterator]();
  let closed = false;

  rl.once('close', () => {
    closed = true;
  });

  // Ctrl+C ends the session like "quit"
  rl.on('SIGINT', () => rl.close());

  return {
    async readLine(prompt: string): Promise<string | null> {
      output.write(prompt);
      const next = await lines.next();
      return next.done === true ? null : next.value;
    },

    write(text: string): void {
      output.write(`${text}\n`);
    },

    writeError(text: string): void {
      console.error(text);
    },

    close(): void {
      if (!closed) {
        rl.close();
      }
    },
  };
}
