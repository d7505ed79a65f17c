import type { Command } from '../types.js';
import { ExitCode } from '../types.js';
import { loadCommandConfig, positionalArgs } from '../utils.js';
import { getDb } from '../../storage/db.js';
import { DocumentStore } from '../../storage/document-store.js';

export const statusCommand: Command = {
  name: 'status',
  description: 'Show knowledge-base health',
  usage: 'kbrank status [kb...] [--config <path>] [--json]',
  handler: async (args) => {
    const config = loadCommandConfig(args);
    const store = new DocumentStore(getDb(config.dbPath, config.dbKey));

    const requested = positionalArgs(args);
    const kbIds = requested.length > 0 ? requested : store.listKnowledgeBases().map((kb) => kb.id);
    const health = store.checkKnowledgeBases(kbIds);

    if (args.includes('--json')) {
      console.log(JSON.stringify(health, null, 2));
    } else if (health.length === 0) {
      console.log('No knowledge bases.');
    } else {
      console.log('Knowledge Bases:');
      for (const kb of health) {
        const state = kb.exists ? `${kb.documentCount} documents, ${kb.vectorCount} vectors` : 'MISSING';
        console.log(`  ${kb.kbId.padEnd(16)} ${state}`);
      }
    }

    if (health.some((kb) => !kb.exists)) {
      process.exit(ExitCode.ERROR);
    }
  },
};
