import type { Command } from '../types.js';
import { intFlag, loadCliConfig, usageError } from '../utils.js';

const USAGE = 'chatstrata serve [--port <port>]';

export const serveCommand: Command = {
  name: 'serve',
  description: 'Start the search API',
  usage: USAGE,
  handler: async (args) => {
    const port = intFlag(args, 'port');
    if (port !== undefined && (!Number.isInteger(port) || port < 0 || port > 65535)) {
      usageError('--port must be an integer between 0 and 65535', USAGE);
      return;
    }

    const config = loadCliConfig();
    const { createServices } = await import('../../services.js');
    const { startServer } = await import('../../server/server.js');
    const { dispatcher } = createServices(config);
    await startServer({ dispatcher }, port ?? config.server.port ?? 8000);
  },
};
