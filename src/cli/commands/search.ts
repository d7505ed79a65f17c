import type { Command } from '../types.js';
import { ExitCode } from '../types.js';
import { getFlagValue, loadCommandConfig, parseList, parsePositiveInt, positionalArgs } from '../utils.js';
import { NoResultsError, errorMessage } from '../../utils/errors.js';

export const searchCommand: Command = {
  name: 'search',
  description: 'Retrieve ranked context for a question',
  usage: 'kbrank search <query> --kb <id,id...> [--top-k <n>] [--session <id>] [--config <path>] [--json]',
  handler: async (args) => {
    const query = positionalArgs(args).join(' ');
    const kbIds = parseList(getFlagValue(args, '--kb'));
    if (!query || kbIds.length === 0) {
      console.error('Error: Query and --kb are required');
      console.log(`Usage: ${searchCommand.usage}`);
      process.exit(ExitCode.USAGE);
    }

    let topK: number | undefined;
    try {
      topK = parsePositiveInt('--top-k', getFlagValue(args, '--top-k'));
    } catch (error) {
      console.error(`Error: ${errorMessage(error)}`);
      process.exit(ExitCode.USAGE);
    }

    const config = loadCommandConfig(args);
    const { createOrchestrator } = await import('../../retrieval/create-orchestrator.js');
    const { assembleContext } = await import('../../retrieval/context-assembler.js');
    const orchestrator = createOrchestrator(config);

    try {
      const { context, history } = await orchestrator.answerContext({
        query,
        kbIds,
        topK,
        sessionId: getFlagValue(args, '--session') ?? 'cli',
      });

      if (args.includes('--json')) {
        console.log(JSON.stringify(context, null, 2));
        return;
      }

      const assembled = assembleContext(context, history, { maxTokens: config.contextMaxTokens });
      console.log(assembled.text);
      for (const omission of context.omissions) {
        console.error(`Omitted ${omission.kbId} [${omission.code}]: ${omission.reason}`);
      }
    } catch (error) {
      if (error instanceof NoResultsError) {
        console.error(`No results: ${error.message}`);
        for (const omission of error.omissions) {
          console.error(`  ${omission.kbId} [${omission.code}]: ${omission.reason}`);
        }
        process.exit(ExitCode.ERROR);
      }
      throw error;
    }
  },
};
