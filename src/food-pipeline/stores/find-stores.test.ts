import { describe, expect, it } from 'vitest';
import { findStores } from './find-stores.js';
import type { StoreFinderBackend, StoreQuery, StoreSuggestion } from './types.js';

function backend(name: string, run: (query: StoreQuery, signal: AbortSignal) => Promise<StoreSuggestion[]>): StoreFinderBackend {
  return { name, findStores: run };
}

describe('findStores', () => {
  it('returns the backend result within the deadline', async () => {
    const quick = backend('quick', async () => [{ name: 'Corner Organics' }]);
    await expect(findStores(quick, {}, { deadlineMs: 1000 })).resolves.toEqual({
      status: 'ok',
      backend: 'quick',
      stores: [{ name: 'Corner Organics' }],
    });
  });

  it('reports a timeout and aborts the backend', async () => {
    let seen: AbortSignal | undefined;
    const stuck = backend('stuck', (_query, signal) => {
      seen = signal;
      return new Promise<StoreSuggestion[]>((_resolve, reject) => {
        signal.addEventListener('abort', () => reject(new Error('aborted')));
      });
    });

    const outcome = await findStores(stuck, { productName: 'Cola' }, { deadlineMs: 20 });

    expect(outcome).toEqual({ status: 'timeout', backend: 'stuck', deadlineMs: 20 });
    expect(seen?.aborted).toBe(true);
  });

  it('reports a timeout even when the backend ignores the signal', async () => {
    const deaf = backend('deaf', () => new Promise<StoreSuggestion[]>(() => {}));
    await expect(findStores(deaf, {}, { deadlineMs: 10 })).resolves.toEqual({
      status: 'timeout',
      backend: 'deaf',
      deadlineMs: 10,
    });
  });

  it('keeps failures apart from timeouts', async () => {
    const broken = backend('broken', async () => {
      throw new Error('quota exceeded');
    });
    await expect(findStores(broken, {}, { deadlineMs: 1000 })).resolves.toEqual({
      status: 'error',
      backend: 'broken',
      message: 'quota exceeded',
    });
  });
});
