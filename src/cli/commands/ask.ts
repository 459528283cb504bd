/**
 * Ask Command
 *
 * One-shot question answering over a documents directory:
 *
 *   docqa ask "What is AWS Bedrock?"             # grounded in ./data
 *   docqa ask "Summarize RAG" --dir ./notes -k 5  # other directory, 5 sources
 *   docqa ask "Tell me a joke" --bypass          # model only, no retrieval
 *
 * Grounded mode indexes the directory first; the index lives only for
 * this run.
 */

import { Command } from 'commander';

import { getFailureExitCode, ValidationError } from '../../errors/index.js';
import type { CommandContext } from '../types.js';
import { formatQueryResult } from '../utils/render.js';
import {
  ingestDocuments,
  parseTopK,
  setupCommandPipeline,
} from '../utils/pipeline-setup.js';

interface AskCommandOptions {
  bypass?: boolean;
  topK?: string;
  dir?: string;
  detailed?: boolean;
}

export function createAskCommand(getContext: () => CommandContext): Command {
  return new Command('ask')
    .description('Ask a question about your documents')
    .argument('<question>', 'The question to answer')
    .option('--bypass', 'Skip retrieval and ask the model directly')
    .option('-k, --top-k <number>', 'Number of sources to retrieve')
    .option('-d, --dir <path>', 'Documents directory (overrides documents.directory)')
    .option('--detailed', 'Show a text preview under each source')
    .action(async (question: string, cmdOptions: AskCommandOptions) => {
      const ctx = getContext();

      const trimmed = question.trim();
      if (!trimmed) {
        throw new ValidationError('Question cannot be empty', [
          'Provide a question, e.g.: docqa ask "What is AWS Bedrock?"',
        ]);
      }

      const topK = cmdOptions.topK !== undefined ? parseTopK(cmdOptions.topK) : undefined;
      const mode = cmdOptions.bypass ? 'bypass' : 'grounded';

      const { pipeline, tracer, reporter } = setupCommandPipeline(ctx, {
        ...(cmdOptions.dir !== undefined && { directory: cmdOptions.dir }),
        ...(topK !== undefined && { topK }),
      });

      try {
        if (mode === 'grounded') {
          await ingestDocuments(pipeline, reporter);
        }

        ctx.debug(`Asking (${mode}): ${trimmed}`);
        const result = await pipeline.ask(trimmed, { mode });

        if (ctx.options.json) {
          console.log(JSON.stringify(result, null, 2));
        } else {
          ctx.log('');
          ctx.log(
            formatQueryResult(result, { style: cmdOptions.detailed ? 'detailed' : 'compact' })
          );
        }

        if (result.error) {
          process.exitCode = getFailureExitCode(result.error);
        }
      } finally {
        await tracer.shutdown();
      }
    });
}
