import { describe, it, expect } from 'vitest';
import { EXTERNAL_DEFAULTS } from '../src/config/loader.js';
import { HttpEmbeddingService } from '../src/models/embedding-service.js';
import { SearchDispatcher } from '../src/retrieval/dispatcher.js';
import { assertValidConfig, createServices } from '../src/services.js';
import { QdrantIndexService } from '../src/storage/qdrant-index.js';
import { ConfigError } from '../src/utils/errors.js';

describe('assertValidConfig', () => {
  it('accepts the defaults', () => {
    expect(() => assertValidConfig(EXTERNAL_DEFAULTS)).not.toThrow();
  });

  it('lists every invalid value', () => {
    const config = {
      ...EXTERNAL_DEFAULTS,
      retrieval: { ...EXTERNAL_DEFAULTS.retrieval, mmrLambda: 2 },
      server: { port: 70000 },
    };

    expect(() => assertValidConfig(config)).toThrow(ConfigError);
    expect(() => assertValidConfig(config)).toThrow(
      'Invalid configuration:\n' +
        '  - retrieval.mmrLambda must be between 0 and 1 (inclusive)\n' +
        '  - server.port must be an integer between 0 and 65535',
    );
  });
});

describe('createServices', () => {
  it('builds the index, embedder and dispatcher', () => {
    const services = createServices(EXTERNAL_DEFAULTS);

    expect(services.index).toBeInstanceOf(QdrantIndexService);
    expect(services.embedder).toBeInstanceOf(HttpEmbeddingService);
    expect(services.dispatcher).toBeInstanceOf(SearchDispatcher);
    expect(services.embedder.loaded).toBe(false);
  });

  it('passes retrieval settings to the dispatcher', () => {
    const { dispatcher } = createServices({
      ...EXTERNAL_DEFAULTS,
      retrieval: { defaultLimit: 25, mmrLambda: 0.8, defaultGroupSize: 4 },
    });

    expect(dispatcher.settings).toMatchObject({
      defaultLimit: 25,
      mmrLambda: 0.8,
      defaultGroupSize: 4,
    });
  });

  it('rejects a config without an index URL', () => {
    const config = { ...EXTERNAL_DEFAULTS, index: { ...EXTERNAL_DEFAULTS.index, url: '' } };

    expect(() => createServices(config)).toThrow(ConfigError);
  });
});
