/**
 * Ask Command
 *
 * One question, one cited answer:
 *
 *   fra ask "What are the main risk factors?"
 *   fra ask "How does the gross margin compare to Microsoft's?" --json
 *   fra ask "What drove revenue growth?" --no-web --top-k 8
 *
 * The agent routes the question to the filing, the web or both, then has
 * the model write an answer that cites what was found. When the model is
 * unreachable the evidence is still printed before the command fails.
 */

import { Command } from 'commander';
import type { CommandContext } from '../types.js';
import { SynthesisUnavailableError } from '../../agent/errors.js';
import type { AgentAnswer } from '../../agent/research-agent.js';
import { openResearchSession, parseTopK } from '../utils/agent-session.js';
import { answerToJSON, evidenceToJSON, renderAnswer, renderEvidence } from '../utils/answer-renderer.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Command-specific options parsed from CLI arguments.
 * Commander turns --no-web into `web: false`.
 */
interface AskCommandOptions {
  topK?: string;
  web: boolean;
}

// ============================================================================
// Constants
// ============================================================================

export const MAX_TOP_K = 20;

// ============================================================================
// Command
// ============================================================================

/**
 * Answer `question` with an open session and print the result.
 *
 * @throws SynthesisUnavailableError after printing the evidence
 */
export async function answerQuestion(
  ctx: CommandContext,
  ask: (question: string) => Promise<AgentAnswer>,
  question: string
): Promise<void> {
  try {
    const answer = await ask(question);

    if (ctx.options.json) {
      console.log(JSON.stringify(answerToJSON(answer), null, 2));
      return;
    }

    for (const line of renderAnswer(answer, { verbose: ctx.options.verbose })) {
      ctx.log(line);
    }
  } catch (error) {
    if (error instanceof SynthesisUnavailableError && error.toolResults.length > 0) {
      if (ctx.options.json) {
        console.log(JSON.stringify(evidenceToJSON(error), null, 2));
      } else {
        for (const line of renderEvidence(error)) {
          ctx.log(line);
        }
        ctx.log('');
      }
    }
    throw error;
  }
}

/**
 * Create the ask command.
 *
 * @param getContext - Factory to get command context with global options
 */
export function createAskCommand(getContext: () => CommandContext): Command {
  return new Command('ask')
    .argument('<question>', 'Question about the filing or the company')
    .description('Ask a question answered from the 10-K filing and live web data')
    .option('-k, --top-k <number>', 'Number of filing passages to retrieve')
    .option('--no-web', 'Answer from the 10-K filing only')
    .action(async (question: string, cmdOptions: AskCommandOptions) => {
      const ctx = getContext();

      ctx.debug(`Question: "${question}"`);
      ctx.debug(`Options: ${JSON.stringify(cmdOptions)}`);

      const topK = cmdOptions.topK === undefined ? undefined : parseTopK(cmdOptions.topK, MAX_TOP_K);
      const { agent } = await openResearchSession(ctx, { disableWeb: !cmdOptions.web, topK });

      if (!ctx.options.json) {
        ctx.log('');
      }

      await answerQuestion(ctx, (q) => agent.ask(q), question);
    });
}
