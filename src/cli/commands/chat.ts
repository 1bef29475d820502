/**
 * Chat Command
 *
 * Interactive question loop over the filing and live web data:
 *
 *   fra chat
 *   fra chat --no-web
 *
 * Each line is answered independently; there is no conversation memory.
 * `exit`, `quit` or `q` (or Ctrl+C / Ctrl+D) leaves the loop.
 */

import * as readline from 'node:readline';
import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { CLIError } from '../../errors/index.js';
import type { ResearchAgent } from '../../agent/research-agent.js';
import { openResearchSession, parseTopK } from '../utils/agent-session.js';
import { answerQuestion, MAX_TOP_K } from './ask.js';

// ============================================================================
// Types
// ============================================================================

interface ChatCommandOptions {
  topK?: string;
  web: boolean;
}

/** What the loop should do after a line */
export type LineOutcome = 'continue' | 'exit';

// ============================================================================
// Constants
// ============================================================================

export const EXIT_COMMANDS: ReadonlySet<string> = new Set(['exit', 'quit', 'q']);

const PROMPT = chalk.cyan('fra> ');

const EXAMPLE_QUESTIONS = [
  'What are the main risk factors?',
  'What is the current stock price?',
  "How does the gross margin compare to Microsoft's?",
];

// ============================================================================
// Line Handling
// ============================================================================

/**
 * Handle one line of input. Errors are printed, never thrown, so the loop
 * survives a failed question.
 */
export async function handleChatLine(
  ctx: CommandContext,
  agent: Pick<ResearchAgent, 'ask'>,
  line: string
): Promise<LineOutcome> {
  const input = line.trim();
  if (input === '') {
    return 'continue';
  }

  if (EXIT_COMMANDS.has(input.toLowerCase())) {
    return 'exit';
  }

  if (input.toLowerCase() === 'help') {
    displayHelp(ctx);
    return 'continue';
  }

  try {
    await answerQuestion(ctx, (q) => agent.ask(q), input);
  } catch (error) {
    if (error instanceof CLIError) {
      ctx.error(error.message);
      if (error.hint) {
        ctx.log(chalk.dim(error.hint));
      }
    } else {
      ctx.error(`Failed to answer: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  ctx.log('');
  return 'continue';
}

function displayWelcome(ctx: CommandContext): void {
  ctx.log('');
  ctx.log(chalk.bold('Filing research chat'));
  ctx.log(chalk.dim('Ask about the 10-K filing or current market data. Type "help" for examples, "exit" to leave.'));
  ctx.log('');
}

function displayHelp(ctx: CommandContext): void {
  ctx.log(chalk.bold('Examples:'));
  for (const question of EXAMPLE_QUESTIONS) {
    ctx.log(`  ${chalk.cyan(question)}`);
  }
  ctx.log('');
  ctx.log(chalk.dim('Leave with exit, quit or q.'));
}

// ============================================================================
// REPL
// ============================================================================

/**
 * Lines are answered one at a time, in the order they were typed.
 */
async function runChatREPL(ctx: CommandContext, agent: ResearchAgent): Promise<void> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      prompt: PROMPT,
    });

    // exiting: the user asked to leave; inputClosed: stdin ended or rl closed
    let exiting = false;
    let inputClosed = false;
    let queue: Promise<void> = Promise.resolve();

    // Register all event handlers BEFORE calling prompt()
    rl.on('line', (line) => {
      queue = queue.then(async () => {
        if (exiting) return;
        const outcome = await handleChatLine(ctx, agent, line);
        if (outcome === 'exit') {
          exiting = true;
          ctx.log(chalk.dim('Goodbye!'));
          if (!inputClosed) rl.close();
          return;
        }
        if (!inputClosed) rl.prompt();
      });
    });

    rl.on('SIGINT', () => {
      exiting = true;
      ctx.log('');
      ctx.log(chalk.dim('Goodbye!'));
      rl.close();
    });

    // Piped input keeps being answered after EOF; resolve once the queue drains
    rl.on('close', () => {
      inputClosed = true;
      void queue.then(resolve);
    });

    displayWelcome(ctx);
    rl.prompt();
  });
}

// ============================================================================
// Command Factory
// ============================================================================

/**
 * Create the chat command.
 *
 * @param getContext - Factory to get command context with global options
 */
export function createChatCommand(getContext: () => CommandContext): Command {
  return new Command('chat')
    .description('Ask questions interactively')
    .option('-k, --top-k <number>', 'Number of filing passages to retrieve')
    .option('--no-web', 'Answer from the 10-K filing only')
    .action(async (cmdOptions: ChatCommandOptions) => {
      const ctx = getContext();

      if (ctx.options.json) {
        throw new CLIError('chat does not support --json', 'Use: fra ask "<question>" --json');
      }

      ctx.debug('Starting chat session...');
      const topK = cmdOptions.topK === undefined ? undefined : parseTopK(cmdOptions.topK, MAX_TOP_K);
      const { agent } = await openResearchSession(ctx, { disableWeb: !cmdOptions.web, topK });

      await runChatREPL(ctx, agent);
    });
}
