import { describe, it, expect, vi, beforeEach } from 'vitest';

/**
 * ESM-safe mock: vi.mock is hoisted above imports by Vitest.
 * We mock the DB barrel to control findActiveDefinitions.
 */
vi.mock('../../src/infrastructure/db/index.js', () => ({
  findActiveDefinitions: vi.fn(),
}));

import { reloadDefinitions } from '../../src/infrastructure/worker/definition-subscriber.js';
import type { ReloadState } from '../../src/infrastructure/worker/definition-subscriber.js';
import { DefinitionStore } from '../../src/application/definition-store.js';
import { findActiveDefinitions } from '../../src/infrastructure/db/index.js';
import { ValidationError } from '../../src/domain/index.js';
import { makeDefinition, makeDefinitionRow } from '../fixtures.js';

const mockFindActiveDefinitions = vi.mocked(findActiveDefinitions);

/** Minimal fake logger. */
function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as import('pino').Logger;
}

const fakeDb = {} as import('../../src/infrastructure/db/index.js').Database;

describe('reloadDefinitions', () => {
  let store: DefinitionStore;
  let log: ReturnType<typeof fakeLogger>;
  let state: ReloadState;

  beforeEach(() => {
    vi.clearAllMocks();
    store = new DefinitionStore();
    log = fakeLogger();
    state = { reloading: false, rerun: false };
  });

  it('loads active definitions and swaps the store snapshot', async () => {
    mockFindActiveDefinitions.mockResolvedValue([makeDefinitionRow({ definition_id: 'd1' })]);

    await reloadDefinitions(fakeDb, log, store, '{"reason":"update","definition_id":"d1"}', state);

    expect(mockFindActiveDefinitions).toHaveBeenCalledWith(fakeDb);
    expect(store.get()).toEqual([makeDefinition({ definition_id: 'd1' })]);
    expect(log.info).toHaveBeenCalledWith(
      { reason: 'update', definition_id: 'd1' },
      'Definition change detected, reloading definitions from database…',
    );
    expect(log.info).toHaveBeenCalledWith(
      { definitionCount: 1, definitionIds: ['d1'] },
      'Definitions reloaded successfully',
    );
    expect(state).toEqual({ reloading: false, rerun: false });
  });

  it('skips rows whose stored rule no longer validates', async () => {
    mockFindActiveDefinitions.mockResolvedValue([
      makeDefinitionRow({ definition_id: 'broken', rule: { rule_type: 'sequence', events: [], time_window_hours: 1 } }),
      makeDefinitionRow({ definition_id: 'ok' }),
    ]);

    await reloadDefinitions(fakeDb, log, store, 'not json', state);

    expect(store.get().map((d) => d.definition_id)).toEqual(['ok']);
    expect(log.warn).toHaveBeenCalledWith(
      { err: expect.any(ValidationError), definition_id: 'broken' },
      'Skipping definition with invalid stored rule',
    );
  });

  it('queues another pass when a reload is already running', async () => {
    state.reloading = true;

    await reloadDefinitions(fakeDb, log, store, '{}', state);

    expect(mockFindActiveDefinitions).not.toHaveBeenCalled();
    expect(state.rerun).toBe(true);
    expect(log.debug).toHaveBeenCalledWith('Reload already in progress, queued another pass');
  });

  it('reloads again when a change arrives during a reload', async () => {
    let release: (rows: ReturnType<typeof makeDefinitionRow>[]) => void = () => {};
    mockFindActiveDefinitions
      .mockImplementationOnce(() => new Promise((resolve) => { release = resolve; }))
      .mockResolvedValueOnce([makeDefinitionRow({ definition_id: 'after-change' })]);

    const first = reloadDefinitions(fakeDb, log, store, '{}', state);
    await reloadDefinitions(fakeDb, log, store, '{}', state);
    release([makeDefinitionRow({ definition_id: 'before-change' })]);
    await first;

    expect(mockFindActiveDefinitions).toHaveBeenCalledTimes(2);
    expect(store.get().map((d) => d.definition_id)).toEqual(['after-change']);
    expect(state).toEqual({ reloading: false, rerun: false });
  });

  it('keeps the previous snapshot when the database fails', async () => {
    const previous = [makeDefinition({ definition_id: 'kept' })];
    store.set(previous);
    mockFindActiveDefinitions.mockRejectedValue(new Error('connection refused'));

    await reloadDefinitions(fakeDb, log, store, '{}', state);

    expect(store.get()).toBe(previous);
    expect(log.error).toHaveBeenCalledWith(
      { err: expect.any(Error) },
      'Failed to reload definitions from database',
    );
    expect(state).toEqual({ reloading: false, rerun: false });
  });
});
