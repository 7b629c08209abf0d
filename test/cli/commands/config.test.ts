/**
 * Tests for the config CLI command handler.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

// Mock dependencies before importing the command
vi.mock('../../../src/config/loader.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../../src/config/loader.js')>()),
  loadConfig: vi.fn(),
}));

import { configCommand } from '../../../src/cli/commands/config.js';
import { EXTERNAL_DEFAULTS, loadConfig } from '../../../src/config/loader.js';

const mockLoadConfig = vi.mocked(loadConfig);

beforeEach(() => {
  vi.clearAllMocks();
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
  vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);
});

describe('configCommand', () => {
  it('has correct name and usage', () => {
    expect(configCommand.name).toBe('config');
    expect(configCommand.usage).toBe('chatstrata config <show|validate>');
  });

  describe('show subcommand', () => {
    it('prints the loaded config as JSON', async () => {
      mockLoadConfig.mockReturnValue(EXTERNAL_DEFAULTS);

      await configCommand.handler(['show']);

      expect(mockLoadConfig).toHaveBeenCalledOnce();
      expect(console.log).toHaveBeenCalledWith(JSON.stringify(EXTERNAL_DEFAULTS, null, 2));
    });

    it('masks the index API key', async () => {
      const config = { ...EXTERNAL_DEFAULTS, index: { ...EXTERNAL_DEFAULTS.index, apiKey: 'test-secret' } };
      mockLoadConfig.mockReturnValue(config);

      await configCommand.handler(['show']);

      const expected = { ...config, index: { ...config.index, apiKey: '********' } };
      expect(console.log).toHaveBeenCalledWith(JSON.stringify(expected, null, 2));
    });
  });

  describe('validate subcommand', () => {
    it('prints success when config is valid', async () => {
      mockLoadConfig.mockReturnValue(EXTERNAL_DEFAULTS);

      await configCommand.handler(['validate']);

      expect(console.log).toHaveBeenCalledWith('Configuration is valid.');
      expect(process.exit).not.toHaveBeenCalled();
    });

    it('prints errors and exits with code 3 when config is invalid', async () => {
      mockLoadConfig.mockReturnValue({
        ...EXTERNAL_DEFAULTS,
        retrieval: { ...EXTERNAL_DEFAULTS.retrieval, mmrLambda: 2 },
        server: { port: -1 },
      });

      await configCommand.handler(['validate']);

      expect(console.error).toHaveBeenCalledWith('Configuration errors:');
      expect(console.error).toHaveBeenCalledWith(
        '  - retrieval.mmrLambda must be between 0 and 1 (inclusive)',
      );
      expect(console.error).toHaveBeenCalledWith(
        '  - server.port must be an integer between 0 and 65535',
      );
      expect(process.exit).toHaveBeenCalledWith(3);
    });
  });

  describe('unknown subcommand', () => {
    it('prints usage and exits with code 2', async () => {
      await configCommand.handler(['set-key']);

      expect(console.error).toHaveBeenCalledWith('Error: Unknown subcommand');
      expect(console.log).toHaveBeenCalledWith('Usage: chatstrata config <show|validate>');
      expect(process.exit).toHaveBeenCalledWith(2);
    });
  });
});
