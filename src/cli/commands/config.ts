import type { Command } from '../types.js';
import { EXIT_CONFIG } from '../utils.js';
import { loadConfig, validateExternalConfig } from '../../config/loader.js';

const USAGE = 'chatstrata config <show|validate>';

/** Config with the index API key masked. */
function redacted(config: ReturnType<typeof loadConfig>): ReturnType<typeof loadConfig> {
  if (!config.index.apiKey) return config;
  return { ...config, index: { ...config.index, apiKey: '********' } };
}

export const configCommand: Command = {
  name: 'config',
  description: 'Show or validate configuration',
  usage: USAGE,
  handler: async (args) => {
    const subcommand = args[0];

    switch (subcommand) {
      case 'show': {
        const config = loadConfig();
        console.log(JSON.stringify(redacted(config), null, 2));
        break;
      }
      case 'validate': {
        const config = loadConfig();
        const errors = validateExternalConfig(config);
        if (errors.length === 0) {
          console.log('Configuration is valid.');
        } else {
          console.error('Configuration errors:');
          for (const error of errors) {
            console.error(`  - ${error}`);
          }
          process.exit(EXIT_CONFIG);
        }
        break;
      }
      default:
        console.error('Error: Unknown subcommand');
        console.log(`Usage: ${USAGE}`);
        process.exit(2);
    }
  },
};
