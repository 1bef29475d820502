/**
 * Route Command
 *
 * Shows which tools a question would be sent to, and why, without running
 * anything. Useful when tuning the [routing] keyword lists.
 *
 *   fra route "How does the gross margin compare to Microsoft's?"
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { loadConfig } from '../../config/loader.js';
import { ValidationError } from '../../errors/index.js';
import { createToolRouter } from '../../agent/factory.js';
import { describePlan, type KeywordCategory } from '../../agent/tool-router.js';

const CATEGORIES: ReadonlyArray<[KeywordCategory, string]> = [
  ['document', 'Document keywords'],
  ['live', 'Live keywords'],
  ['comparative', 'Comparative keywords'],
];

export function createRouteCommand(getContext: () => CommandContext): Command {
  return new Command('route')
    .argument('<question>', 'Question to route')
    .description('Show which tools would answer a question')
    .action((question: string) => {
      const ctx = getContext();
      const trimmed = question.trim();
      if (trimmed === '') {
        throw new ValidationError('Question cannot be empty');
      }

      const config = loadConfig();
      const decision = createToolRouter(config).route(trimmed);
      const plan = describePlan(decision);

      if (ctx.options.json) {
        console.log(JSON.stringify({ question: trimmed, ...decision, plan }, null, 2));
        return;
      }

      ctx.log(`${chalk.cyan('Tools:')} ${decision.tools.join(', ')}`);
      ctx.log(`${chalk.cyan('Rule:')}  ${decision.rule}`);
      ctx.log(chalk.dim(plan));
      ctx.log('');
      for (const [category, label] of CATEGORIES) {
        const found = decision.matches[category];
        ctx.log(`  ${label}: ${found.length > 0 ? found.join(', ') : chalk.dim('none')}`);
      }
    });
}
