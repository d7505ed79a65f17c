import type { Command } from '../types.js';
import { ExitCode } from '../types.js';
import { getFlagValue, loadCommandConfig, positionalArgs } from '../utils.js';
import { getDb } from '../../storage/db.js';
import { DocumentStore } from '../../storage/document-store.js';
import type { EmbeddingClient } from '../../models/embedder.js';

export const ingestCommand: Command = {
  name: 'ingest',
  description: 'Index a JSON or JSON Lines file into a knowledge base',
  usage: 'kbrank ingest <kb> <file> [--name <name>] [--no-embed] [--config <path>]',
  handler: async (args) => {
    const [kbId, file] = positionalArgs(args);
    if (!kbId || !file) {
      console.error('Error: Knowledge base and file required');
      console.log(`Usage: ${ingestCommand.usage}`);
      process.exit(ExitCode.USAGE);
    }

    const config = loadCommandConfig(args);

    let embedder: EmbeddingClient | undefined;
    if (!args.includes('--no-embed')) {
      if (!process.env[config.embedding.apiKeyEnv]) {
        console.error(`Error: ${config.embedding.apiKeyEnv} is not set (use --no-embed to index for keyword search only)`);
        process.exit(ExitCode.CONFIG);
      }
      const { createEmbedderFromConfig } = await import('../../retrieval/create-orchestrator.js');
      embedder = createEmbedderFromConfig(config, process.env, true);
    }

    const { readDocumentFile, importDocuments } = await import('../../ingest/import-documents.js');
    const documents = await readDocumentFile(file);

    const result = await importDocuments(new DocumentStore(getDb(config.dbPath, config.dbKey)), kbId, documents, {
      embedder,
      name: getFlagValue(args, '--name'),
      progressCallback: ({ done, total }) => {
        process.stderr.write(`\r  ${done}/${total} documents`);
      },
    });
    if (documents.length > 0) process.stderr.write('\n');

    const action = result.created ? 'Created' : 'Updated';
    console.log(`${action} ${kbId}: ${result.documentCount} documents indexed, ${result.embeddedCount} embedded.`);
  },
};
