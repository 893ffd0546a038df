import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { SyncCoordinator, syncDirectory } from '../sync/sync-coordinator.js';
import { SyncError } from '../sync/errors.js';
import type { SyncCoordinatorOptions, SyncPhase } from '../sync/types.js';
import { createFakeServer, createMockLogger, manifestFor, sha256 } from './helpers.js';
import type { FakeServer } from './helpers.js';

const ROOT = 'https://patch.example.test';
const MAINTENANCE_URL = `${ROOT}/MaintenanceLock.lck`;
const MANIFEST_URL = `${ROOT}/PatchFileList.txt`;

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'patchsync-sync-test-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function local(name: string): string {
  return path.join(tmpDir, name);
}

/** Serve a manifest for `listed` and the bodies in `served` */
function patchServer(listed: Record<string, string>, served: Record<string, string> = listed): FakeServer {
  const server = createFakeServer({ [MANIFEST_URL]: { body: manifestFor(listed) } });
  for (const [name, content] of Object.entries(served)) {
    server.route(`${ROOT}/Patch/${name}`, { body: content });
  }
  return server;
}

function coordinator(server: FakeServer, extra?: Partial<SyncCoordinatorOptions>): SyncCoordinator {
  return new SyncCoordinator({
    logger: createMockLogger(),
    fetchFn: server.fetch,
    platform: 'win32',
    config: { hashConcurrency: 2, maxConcurrentDownloads: 4 },
    ...extra,
  });
}

function recordPhases(sync: SyncCoordinator): SyncPhase[] {
  const phases: SyncPhase[] = [];
  sync.on('phase', (p) => phases.push(p));
  return phases;
}

describe('SyncCoordinator', () => {
  describe('maintenance', () => {
    it('defers without touching the manifest or disk when the server is in maintenance', async () => {
      const server = patchServer({ 'a.txt': 'alpha' });
      server.route(MAINTENANCE_URL, { status: 200, body: 'down for patching' });
      const sync = coordinator(server);
      const phases = recordPhases(sync);

      const outcome = await sync.sync({ rootDomain: ROOT, outputDir: tmpDir, validate: false });

      expect(outcome).toEqual({ status: 'deferred', failedDownloads: [], hashMismatches: [] });
      expect(server.requests).toEqual([MAINTENANCE_URL]);
      expect(phases).toEqual(['check-maintenance', 'deferred']);
      expect(fs.readdirSync(tmpDir)).toEqual([]);
    });

    it('fails when the maintenance probe cannot reach the server', async () => {
      const server = patchServer({ 'a.txt': 'alpha' });
      server.route(MAINTENANCE_URL, { networkError: 'getaddrinfo ENOTFOUND' });

      const run = coordinator(server).sync({ rootDomain: ROOT, outputDir: tmpDir, validate: false });

      await expect(run).rejects.toBeInstanceOf(SyncError);
      await expect(run).rejects.toMatchObject({
        phase: 'check-maintenance',
        message: 'Failed to check maintenance status: getaddrinfo ENOTFOUND',
      });
    });
  });

  it('fails with the manifest phase when the manifest is unavailable', async () => {
    const server = createFakeServer();

    await expect(
      coordinator(server).sync({ rootDomain: ROOT, outputDir: tmpDir, validate: false })
    ).rejects.toMatchObject({ phase: 'fetch-manifest', status: 404 });
  });

  it('downloads everything on a cold start', async () => {
    const files = { 'a.txt': 'alpha', 'Data/b.bin': 'bravo-bytes' };
    const server = patchServer(files);
    const sync = coordinator(server);
    const phases = recordPhases(sync);

    const outcome = await sync.sync({ rootDomain: ROOT, outputDir: tmpDir, validate: false });

    const expected = {
      [local('a.txt')]: sha256('alpha'),
      [local('Data/b.bin')]: sha256('bravo-bytes'),
    };
    expect(outcome.status).toBe('completed');
    expect(outcome.newHashes).toEqual(expected);
    expect(outcome.hashes).toEqual(expected);
    expect(outcome.deletedHashes).toBeUndefined();
    expect(outcome.failedDownloads).toEqual([]);
    expect(outcome.hashMismatches).toEqual([]);
    expect(fs.readFileSync(local('Data/b.bin'), 'utf-8')).toBe('bravo-bytes');
    expect(phases).toEqual([
      'check-maintenance',
      'fetch-manifest',
      'detect-staleness',
      'download',
      'verify',
      'done',
    ]);
  });

  it('does nothing on a second run over an up-to-date directory', async () => {
    const files = { 'a.txt': 'alpha', 'b.txt': 'bravo' };
    const server = patchServer(files);
    const sync = coordinator(server);

    const first = await sync.sync({ rootDomain: ROOT, outputDir: tmpDir, validate: false });
    server.requests.length = 0;
    const second = await sync.sync({
      rootDomain: ROOT,
      outputDir: tmpDir,
      validate: false,
      cachedHashes: first.hashes,
    });

    expect(second.newHashes).toBeUndefined();
    expect(second.hashes).toEqual(first.hashes);
    expect(server.requests).toEqual([MAINTENANCE_URL, MANIFEST_URL]);
  });

  it('reports a hash mismatch after download without failing the run', async () => {
    // Same size as 'alpha', different bytes
    const server = patchServer({ 'a.txt': 'alpha' }, { 'a.txt': 'alphA' });
    const sync = coordinator(server);
    const onMismatch = vi.fn();
    sync.on('hashMismatch', onMismatch);

    const outcome = await sync.sync({ rootDomain: ROOT, outputDir: tmpDir, validate: false });

    const mismatch = { path: local('a.txt'), expected: sha256('alpha'), actual: sha256('alphA') };
    expect(outcome.status).toBe('completed');
    expect(outcome.hashMismatches).toEqual([mismatch]);
    expect(outcome.newHashes).toEqual({ [local('a.txt')]: sha256('alphA') });
    expect(onMismatch).toHaveBeenCalledWith(mismatch);
  });

  it('records failed downloads and drops missing files from the cache', async () => {
    const server = patchServer({ 'a.txt': 'alpha', 'b.txt': 'bravo' }, { 'a.txt': 'alpha' });
    const sync = coordinator(server);
    const onFailed = vi.fn();
    sync.on('downloadFailed', onFailed);

    const outcome = await sync.sync({ rootDomain: ROOT, outputDir: tmpDir, validate: false });

    const failure = { path: local('b.txt'), url: `${ROOT}/Patch/b.txt`, error: 'HTTP 404' };
    expect(outcome.status).toBe('completed');
    expect(outcome.failedDownloads).toEqual([failure]);
    expect(outcome.newHashes).toEqual({ [local('a.txt')]: sha256('alpha') });
    expect(outcome.hashes).toEqual({ [local('a.txt')]: sha256('alpha') });
    expect(onFailed).toHaveBeenCalledWith(failure);
  });

  it('keeps the known hash of an outdated file whose replacement failed', async () => {
    fs.writeFileSync(local('a.txt'), 'old!!');
    const server = patchServer({ 'a.txt': 'alpha' }, {});
    const cachedHashes = { [local('a.txt')]: sha256('old!!') };

    const outcome = await coordinator(server).sync({
      rootDomain: ROOT,
      outputDir: tmpDir,
      validate: false,
      cachedHashes,
    });

    expect(outcome.failedDownloads).toHaveLength(1);
    expect(outcome.hashes).toEqual(cachedHashes);
  });

  it('re-downloads a corrupted file in validate mode even when the cache trusts it', async () => {
    fs.writeFileSync(local('a.txt'), 'alphA');
    const server = patchServer({ 'a.txt': 'alpha' });
    const sync = coordinator(server);
    const stale = vi.fn();
    sync.on('fileStale', stale);

    const outcome = await sync.sync({
      rootDomain: ROOT,
      outputDir: tmpDir,
      validate: true,
      cachedHashes: { [local('a.txt')]: sha256('alpha') },
    });

    expect(stale).toHaveBeenCalledWith(local('a.txt'), 'hash-mismatch');
    expect(fs.readFileSync(local('a.txt'), 'utf-8')).toBe('alpha');
    expect(outcome.newHashes).toEqual({ [local('a.txt')]: sha256('alpha') });
  });

  describe('redundant files', () => {
    it('removes unlisted cached files when asked', async () => {
      fs.writeFileSync(local('a.txt'), 'alpha');
      fs.writeFileSync(local('old.txt'), 'gone soon');
      const server = patchServer({ 'a.txt': 'alpha' });
      const cachedHashes = { [local('a.txt')]: sha256('alpha'), [local('old.txt')]: sha256('gone soon') };
      const sync = coordinator(server);
      const phases = recordPhases(sync);

      const outcome = await sync.sync({
        rootDomain: ROOT,
        outputDir: tmpDir,
        validate: false,
        cachedHashes,
        removeStale: true,
      });

      expect(outcome.deletedHashes).toEqual({ [local('old.txt')]: sha256('gone soon') });
      expect(outcome.hashes).toEqual({ [local('a.txt')]: sha256('alpha') });
      expect(fs.existsSync(local('old.txt'))).toBe(false);
      expect(phases).toEqual(['check-maintenance', 'fetch-manifest', 'detect-staleness', 'reconcile', 'done']);
    });

    it('leaves unlisted files in place when removal is not requested', async () => {
      fs.writeFileSync(local('old.txt'), 'stays');
      const server = patchServer({});
      const cachedHashes = { [local('old.txt')]: sha256('stays') };

      const outcome = await coordinator(server).sync({
        rootDomain: ROOT,
        outputDir: tmpDir,
        validate: false,
        cachedHashes,
      });

      expect(outcome.deletedHashes).toBeUndefined();
      expect(outcome.hashes).toEqual(cachedHashes);
      expect(fs.existsSync(local('old.txt'))).toBe(true);
    });

    it('changes nothing when a bulk deletion is declined', async () => {
      const cachedHashes: Record<string, string> = {};
      for (let i = 0; i < 11; i++) {
        fs.writeFileSync(local(`old${i}.txt`), `old ${i}`);
        cachedHashes[local(`old${i}.txt`)] = sha256(`old ${i}`);
      }
      const confirm = vi.fn(async (_question: string, _defaultAnswer: boolean) => false);
      const server = patchServer({});
      const sync = coordinator(server, { confirm });
      const declined = vi.fn();
      sync.on('deletionDeclined', declined);

      const outcome = await sync.sync({
        rootDomain: ROOT,
        outputDir: tmpDir,
        validate: false,
        cachedHashes,
        removeStale: true,
      });

      expect(confirm).toHaveBeenCalledTimes(1);
      expect(confirm.mock.calls[0]?.[1]).toBe(false);
      expect(declined).toHaveBeenCalledWith(11);
      expect(outcome.deletedHashes).toBeUndefined();
      expect(outcome.hashes).toEqual(cachedHashes);
      expect(fs.readdirSync(tmpDir)).toHaveLength(11);
    });
  });

  it('strips trailing slashes from the root domain', async () => {
    const server = patchServer({ 'a.txt': 'alpha' });

    await coordinator(server).sync({ rootDomain: `${ROOT}//`, outputDir: tmpDir, validate: false });

    expect(server.requests).toEqual([MAINTENANCE_URL, MANIFEST_URL, `${ROOT}/Patch/a.txt`]);
  });

  it('does not mutate the cached hashes it was given', async () => {
    const server = patchServer({ 'a.txt': 'alpha' });
    const cachedHashes = { [local('zzz.txt')]: 'f'.repeat(64) };

    await coordinator(server).sync({ rootDomain: ROOT, outputDir: tmpDir, validate: false, cachedHashes });

    expect(cachedHashes).toEqual({ [local('zzz.txt')]: 'f'.repeat(64) });
  });

  it('emits aggregate download progress', async () => {
    const server = patchServer({ 'a.txt': 'alpha', 'b.txt': 'bravo!' });
    const sync = coordinator(server);
    const totals: number[] = [];
    sync.on('downloadProgress', (p) => totals.push(p.totalBytes));

    await sync.sync({ rootDomain: ROOT, outputDir: tmpDir, validate: false });

    expect(totals.length).toBeGreaterThan(0);
    expect(new Set(totals)).toEqual(new Set([11]));
  });

  it('rejects an invalid engine config', () => {
    expect(() => coordinator(createFakeServer(), { config: { maxConcurrentDownloads: 0 } })).toThrow(
      'Invalid sync config: maxConcurrentDownloads must be at least 1'
    );
  });

  it('runs a single sync through syncDirectory', async () => {
    const server = patchServer({ 'a.txt': 'alpha' });

    const outcome = await syncDirectory(
      { rootDomain: ROOT, outputDir: tmpDir, validate: false },
      { logger: createMockLogger(), fetchFn: server.fetch, platform: 'win32' }
    );

    expect(outcome.newHashes).toEqual({ [local('a.txt')]: sha256('alpha') });
  });
});
