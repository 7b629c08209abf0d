import { describe, it, expect, vi } from 'vitest';
import { SearchDispatcher } from '../../src/retrieval/dispatcher.js';
import { startServer } from '../../src/server/server.js';
import { FakeEmbeddingService, FakeIndexService } from '../helpers/fakes.js';

describe('startServer', () => {
  it('loads the model, then stops on SIGTERM and removes its signal listeners', async () => {
    const embedder = new FakeEmbeddingService();
    const dispatcher = new SearchDispatcher({ index: new FakeIndexService(), embedder });
    const sigint = process.listenerCount('SIGINT');
    const sigterm = process.listenerCount('SIGTERM');

    const running = startServer({ dispatcher }, 0);
    await vi.waitFor(() => {
      expect(process.listenerCount('SIGTERM')).toBe(sigterm + 1);
    });
    expect(embedder.loaded).toBe(true);
    expect(process.listenerCount('SIGINT')).toBe(sigint + 1);

    process.emit('SIGTERM');
    await running;

    expect(process.listenerCount('SIGINT')).toBe(sigint);
    expect(process.listenerCount('SIGTERM')).toBe(sigterm);
  });

  it('rejects when the model fails to load', async () => {
    const embedder = new FakeEmbeddingService();
    embedder.failWith = new Error('model offline');
    const dispatcher = new SearchDispatcher({ index: new FakeIndexService(), embedder });

    await expect(startServer({ dispatcher }, 0)).rejects.toThrow('model offline');
  });
});
