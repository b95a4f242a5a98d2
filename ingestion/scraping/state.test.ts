import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { StateCorruptError } from '../shared/errors';
import { ScrapeState, getStatePath } from './state';

describe('ScrapeState', () => {
  let stateDir: string;

  beforeEach(async () => {
    stateDir = await fs.mkdtemp(path.join(os.tmpdir(), 'scrape-state-'));
  });

  afterEach(async () => {
    await fs.rm(stateDir, { recursive: true, force: true });
  });

  it('starts empty when no file exists', async () => {
    const state = await ScrapeState.load('sfbos', { stateDir });

    expect(state.size).toBe(0);
    expect(state.lastUpdated).toBeNull();
    expect(state.statePath).toBe(path.join(stateDir, 'sfbos_state.json'));
  });

  it('round-trips seen and rejected ids through save and load', async () => {
    const state = await ScrapeState.load('sfbos', { stateDir });
    state.markSeen('aaa');
    state.markSeen('bbb');
    state.markRejected('ccc', 'HTTP 404');
    await state.save();

    const reloaded = await ScrapeState.load('sfbos', { stateDir });

    expect(reloaded.seen().sort()).toEqual(['aaa', 'bbb']);
    expect(reloaded.isRejected('ccc')).toBe(true);
    expect(reloaded.rejectionReason('ccc')).toBe('HTTP 404');
    expect(reloaded.toJSON()).toEqual(state.toJSON());
  });

  it('leaves no temporary file behind', async () => {
    const state = await ScrapeState.load('sfbos', { stateDir });
    state.markSeen('aaa');
    await state.save();

    expect(await fs.readdir(stateDir)).toEqual(['sfbos_state.json']);
  });

  it('clears a rejection once the document is acquired', async () => {
    const state = await ScrapeState.load('sfbos', { stateDir });
    state.markRejected('aaa', 'HTTP 404');
    state.markSeen('aaa');

    expect(state.isRejected('aaa')).toBe(false);
    expect(state.contains('aaa')).toBe(true);
  });

  it('does not reject an already acquired document', async () => {
    const state = await ScrapeState.load('sfbos', { stateDir });
    state.markSeen('aaa');
    state.markRejected('aaa', 'HTTP 410');

    expect(state.isRejected('aaa')).toBe(false);
  });

  it('throws StateCorruptError for invalid JSON', async () => {
    await fs.writeFile(getStatePath(stateDir, 'sfbos'), '{ not json', 'utf8');

    await expect(ScrapeState.load('sfbos', { stateDir })).rejects.toBeInstanceOf(StateCorruptError);
  });

  it('throws StateCorruptError for a file of the wrong shape', async () => {
    await fs.writeFile(getStatePath(stateDir, 'sfbos'), JSON.stringify({ seenIds: 'abc' }), 'utf8');

    await expect(ScrapeState.load('sfbos', { stateDir })).rejects.toBeInstanceOf(StateCorruptError);
  });

  it('throws StateCorruptError for another source', async () => {
    await fs.writeFile(
      getStatePath(stateDir, 'sfbos'),
      JSON.stringify({ sourceName: 'legistar', seenIds: [], lastUpdated: null }),
      'utf8'
    );

    await expect(ScrapeState.load('sfbos', { stateDir })).rejects.toThrow("belongs to source 'legistar'");
  });

  it('starts empty over a corrupt file when reset is requested', async () => {
    await fs.writeFile(getStatePath(stateDir, 'sfbos'), '{ not json', 'utf8');

    const state = await ScrapeState.load('sfbos', { stateDir, reset: true });

    expect(state.size).toBe(0);
  });

  it('reset() forgets seen and rejected ids', async () => {
    const state = await ScrapeState.load('sfbos', { stateDir });
    state.markSeen('aaa');
    state.markRejected('bbb', 'HTTP 404');
    state.reset();

    expect(state.size).toBe(0);
    expect(state.isRejected('bbb')).toBe(false);
  });
});
