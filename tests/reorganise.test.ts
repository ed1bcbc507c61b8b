import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { IndexConnectionError } from '../src/common/errors';
import { resolveConfig } from '../src/main/config';
import { runReorganisation } from '../src/main/organiser/reorganise';
import { createProviders } from '../src/main/providers/createProviders';
import { FileIndexClient } from '../src/main/searchIndex/fileIndexClient';
import type { IndexClient } from '../src/types/providers';
import type { MovePlan, PlanEntry } from '../src/types/plan';

const exists = async (target: string) =>
  fs.access(target).then(
    () => true,
    () => false,
  );

describe('reorganising a real tree', () => {
  const config = resolveConfig({}, { env: {} });
  const providers = createProviders(config);
  let root: string;
  let indexDir: string;
  let indexClient: FileIndexClient;

  const at = (...segments: string[]) => path.join(root, ...segments);

  beforeEach(async () => {
    root = path.resolve(await fs.mkdtemp(path.join(os.tmpdir(), 'reorganise-')));
    indexDir = await fs.mkdtemp(path.join(os.tmpdir(), 'reorganise-index-'));
    indexClient = new FileIndexClient(path.join(indexDir, 'index.json'));

    await fs.writeFile(at('invoice-may.txt'), 'invoice payment');
    await fs.writeFile(at('receipt-june.txt'), 'receipt');
    await fs.writeFile(at('lonely.txt'), 'hello');
    await fs.mkdir(at('repo', '.git'), { recursive: true });
    await fs.writeFile(at('repo', 'main.c'), 'int main(void) { return 0; }');
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
    await fs.rm(indexDir, { recursive: true, force: true });
  });

  it('previews without touching anything', async () => {
    const report = await runReorganisation({ rootPath: root, config, providers, indexClient, mode: 'preview' });

    expect(report.zones.map((zone) => [zone.path, zone.reason])).toEqual([[at('repo'), 'vcs']]);
    expect(report.clusters.map((cluster) => cluster.folderName)).toEqual(['financial', 'misc']);
    expect(report.plan.folders).toEqual([at('financial'), at('misc')]);
    expect(report.execution.counts).toEqual({ planned: 0, skipped: 1, confirmed: 3, moved: 0, failed: 0 });
    expect(await exists(at('invoice-may.txt'))).toBe(true);
    expect(await exists(at('financial'))).toBe(false);
    expect(report.reindex).toBeUndefined();
  });

  it('never moves files into a protected project that shares a tag name', async () => {
    await fs.mkdir(at('financial'));
    await fs.writeFile(at('financial', 'package.json'), '{}');
    await fs.writeFile(at('financial', 'index.js'), 'module.exports = {};');
    await fs.mkdir(at('a'));
    await fs.mkdir(at('b'));
    await fs.writeFile(at('a', 'invoices.txt'), 'invoices');
    await fs.writeFile(at('b', 'invoices.txt'), 'invoices');

    const report = await runReorganisation({
      rootPath: root,
      config,
      providers,
      indexClient,
      mode: 'apply',
      confirmed: true,
    });

    expect(report.zones.map((zone) => [zone.path, zone.reason])).toEqual([
      [at('financial'), 'project-config'],
      [at('repo'), 'vcs'],
    ]);
    expect(report.clusters.map((cluster) => cluster.folderName)).toEqual(['financial-1', 'misc']);
    expect((await fs.readdir(at('financial'))).sort()).toEqual(['index.js', 'package.json']);
    expect((await fs.readdir(at('financial-1'))).sort()).toEqual([
      'invoice-may.txt',
      'invoices.txt',
      'invoices_1.txt',
      'receipt-june.txt',
    ]);
  });

  it('moves files into tag folders and updates the index', async () => {
    const report = await runReorganisation({
      rootPath: root,
      config,
      providers,
      indexClient,
      mode: 'apply',
      confirmed: true,
    });

    expect(report.execution.entries.map((entry) => [entry.sourcePath, entry.destinationPath, entry.status])).toEqual([
      [at('invoice-may.txt'), at('financial', 'invoice-may.txt'), { kind: 'moved' }],
      [at('lonely.txt'), at('misc', 'lonely.txt'), { kind: 'moved' }],
      [at('receipt-june.txt'), at('financial', 'receipt-june.txt'), { kind: 'moved' }],
      [at('repo', 'main.c'), at('repo', 'main.c'), { kind: 'skipped', reason: 'protected' }],
    ]);
    await expect(fs.readFile(at('financial', 'invoice-may.txt'), 'utf8')).resolves.toBe('invoice payment');
    expect(await exists(at('repo', 'main.c'))).toBe(true);
    expect(report.reindex).toEqual({ removed: 3, upserted: 3 });
    expect((await indexClient.snapshot()).map((document) => document.path)).toEqual([
      at('financial', 'invoice-may.txt'),
      at('financial', 'receipt-june.txt'),
      at('misc', 'lonely.txt'),
    ]);
  });

  it('leaves an organised tree as it is', async () => {
    await runReorganisation({ rootPath: root, config, providers, indexClient, mode: 'apply', confirmed: true });

    const second = await runReorganisation({
      rootPath: root,
      config,
      providers,
      indexClient,
      mode: 'apply',
      confirmed: true,
    });

    expect(second.execution.counts.moved).toBe(0);
    expect(second.execution.skipped.map((item) => item.reason)).toEqual(['no-op', 'no-op', 'no-op', 'protected']);
    expect(second.reindex).toBeUndefined();
  });

  it('moves nothing when the apply is refused', async () => {
    const confirmApply = jest.fn(async (_preview: PlanEntry[], _plan: MovePlan) => false);

    const report = await runReorganisation({
      rootPath: root,
      config,
      providers,
      indexClient,
      mode: 'apply',
      confirmApply,
    });

    expect(confirmApply).toHaveBeenCalledTimes(1);
    expect(confirmApply.mock.calls[0][1].folders).toEqual([at('financial'), at('misc')]);
    expect(report.execution.aborted).toBe(true);
    expect(await exists(at('lonely.txt'))).toBe(true);
  });

  it('keeps the moves when the index cannot be updated afterwards', async () => {
    const failingIndex: IndexClient = {
      name: 'failing',
      snapshot: async () => [],
      upsert: async () => undefined,
      delete: async () => {
        throw new IndexConnectionError('index offline');
      },
      search: async () => [],
    };

    const report = await runReorganisation({
      rootPath: root,
      config,
      providers,
      indexClient: failingIndex,
      mode: 'apply',
      confirmed: true,
    });

    expect(report.execution.counts.moved).toBe(3);
    expect(report.reindex).toEqual({ removed: 0, upserted: 0, error: 'index offline' });
    expect(await exists(at('misc', 'lonely.txt'))).toBe(true);
  });
});
