import type { Command } from '../types.js';
import { ExitCode } from '../types.js';
import { getFlagValue } from '../utils.js';
import { loadConfig, validateExternalConfig } from '../../config/loader.js';

export const configCommand: Command = {
  name: 'config',
  description: 'Show or validate configuration',
  usage: 'kbrank config <show|validate> [--config <path>]',
  handler: async (args) => {
    const subcommand = args[0];
    const projectConfigPath = getFlagValue(args, '--config');

    switch (subcommand) {
      case 'show': {
        const config = loadConfig({ projectConfigPath });
        const shown = config.storage.key ? { ...config, storage: { ...config.storage, key: '<redacted>' } } : config;
        console.log(JSON.stringify(shown, null, 2));
        break;
      }
      case 'validate': {
        const config = loadConfig({ projectConfigPath });
        const errors = validateExternalConfig(config);
        if (errors.length === 0) {
          console.log('Configuration is valid.');
        } else {
          console.error('Configuration errors:');
          for (const error of errors) {
            console.error(`  - ${error}`);
          }
          process.exit(ExitCode.CONFIG);
        }
        break;
      }
      default:
        console.error('Error: Unknown subcommand');
        console.log(`Usage: ${configCommand.usage}`);
        process.exit(ExitCode.USAGE);
    }
  },
};
