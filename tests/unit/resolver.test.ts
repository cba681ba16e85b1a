/**
 * Unit tests for layers/resolver.ts
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { layerForEntry, mergeOrder, resolveLayers } from '../../src/layers/resolver.js';
import {
  TEST_LAYER_OPTIONS,
  createEnvironment,
  makeTempDir,
  removeTempDir,
} from '../fixtures/layers.js';

describe('layerForEntry', () => {
  it('should derive the environment root three levels above the marker', () => {
    const layer = layerForEntry('/envs/one/lib/python3.12/site-packages', TEST_LAYER_OPTIONS);

    expect(layer).toEqual({
      searchRoot: '/envs/one',
      dataPath: '/envs/one/share/app',
      configPath: '/envs/one/etc/app',
    });
  });

  it('should accept a trailing separator on the entry', () => {
    const layer = layerForEntry('/envs/one/lib/python3.12/site-packages/', TEST_LAYER_OPTIONS);
    expect(layer?.searchRoot).toBe('/envs/one');
  });

  it('should return null for entries that are not package directories', () => {
    expect(layerForEntry('/usr/lib/python312.zip', TEST_LAYER_OPTIONS)).toBeNull();
    expect(layerForEntry('/usr/lib/python3.12/lib-dynload', TEST_LAYER_OPTIONS)).toBeNull();
    expect(layerForEntry('', TEST_LAYER_OPTIONS)).toBeNull();
  });

  it('should honour a custom marker', () => {
    const layer = layerForEntry('/envs/two/lib/node/node_modules', {
      ...TEST_LAYER_OPTIONS,
      marker: 'node_modules',
    });
    expect(layer?.searchRoot).toBe('/envs/two');
  });
});

describe('resolveLayers', () => {
  let tempDir: string;
  let root: string;

  beforeEach(async () => {
    tempDir = await makeTempDir('resolver');
    root = path.join(tempDir, 'root');
    await fs.mkdir(path.join(root, 'share', 'app'), { recursive: true });
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  it('should list the canonical data path first and environments in encounter order', async () => {
    const e1 = path.join(tempDir, 'e1');
    const e2 = path.join(tempDir, 'e2');
    const e1Entry = await createEnvironment(e1, { 'a.txt': 'E1' });
    const e2Entry = await createEnvironment(e2, { 'a.txt': 'E2' });

    const plan = await resolveLayers([e1Entry, e2Entry], root, TEST_LAYER_OPTIONS);

    expect(plan.canonicalDataPath).toBe(path.join(root, 'share', 'app'));
    expect(plan.dataPaths).toEqual([
      path.join(root, 'share', 'app'),
      path.join(e1, 'share', 'app'),
      path.join(e2, 'share', 'app'),
    ]);
    expect(plan.configPaths).toEqual([
      path.join(e1, 'etc', 'app'),
      path.join(e2, 'etc', 'app'),
    ]);
  });

  it('should keep the config path of an environment without data', async () => {
    const bare = path.join(tempDir, 'bare');
    const entry = await createEnvironment(bare);

    const plan = await resolveLayers([entry], root, TEST_LAYER_OPTIONS);

    expect(plan.dataPaths).toEqual([path.join(root, 'share', 'app')]);
    expect(plan.configPaths).toEqual([path.join(bare, 'etc', 'app')]);
  });

  it('should not add the canonical data path twice', async () => {
    const rootEntry = await createEnvironment(root);

    const plan = await resolveLayers([rootEntry], root, TEST_LAYER_OPTIONS);

    expect(plan.dataPaths).toEqual([path.join(root, 'share', 'app')]);
    expect(plan.configPaths).toEqual([path.join(root, 'etc', 'app')]);
  });

  it('should list a repeated environment once as data but every time as config', async () => {
    const env = path.join(tempDir, 'env');
    const entry = await createEnvironment(env, { 'x.txt': 'x' });

    const plan = await resolveLayers([entry, entry], root, TEST_LAYER_OPTIONS);

    expect(plan.dataPaths).toEqual([
      path.join(root, 'share', 'app'),
      path.join(env, 'share', 'app'),
    ]);
    expect(plan.configPaths).toEqual([
      path.join(env, 'etc', 'app'),
      path.join(env, 'etc', 'app'),
    ]);
  });

  it('should skip entries that are not package directories or do not exist', async () => {
    const missing = path.join(tempDir, 'missing', 'lib', 'python3.12', 'site-packages');

    const plan = await resolveLayers(
      [path.join(tempDir, 'python312.zip'), '', missing],
      root,
      TEST_LAYER_OPTIONS
    );

    expect(plan.dataPaths).toEqual([path.join(root, 'share', 'app')]);
    expect(plan.configPaths).toEqual([path.join(tempDir, 'missing', 'etc', 'app')]);
  });

  it('should not treat a data path that is a file as a layer', async () => {
    const env = path.join(tempDir, 'filey');
    const entry = await createEnvironment(env);
    await fs.mkdir(path.join(env, 'share'), { recursive: true });
    await fs.writeFile(path.join(env, 'share', 'app'), 'not a directory');

    const plan = await resolveLayers([entry], root, TEST_LAYER_OPTIONS);

    expect(plan.dataPaths).toEqual([path.join(root, 'share', 'app')]);
  });

  it('should return the same plan on repeated resolution', async () => {
    const entries = [
      await createEnvironment(path.join(tempDir, 'a'), { 'f.txt': 'a' }),
      await createEnvironment(path.join(tempDir, 'b')),
      await createEnvironment(path.join(tempDir, 'c'), { 'f.txt': 'c' }),
    ];

    const first = await resolveLayers(entries, root, TEST_LAYER_OPTIONS);
    const second = await resolveLayers(entries, root, TEST_LAYER_OPTIONS);

    expect(second).toEqual(first);
  });
});

describe('mergeOrder', () => {
  it('should walk discovered environments first and the canonical path last', () => {
    const order = mergeOrder({
      canonicalDataPath: '/root/share/app',
      dataPaths: ['/root/share/app', '/e1/share/app', '/e2/share/app'],
      configPaths: [],
    });

    expect(order).toEqual(['/e1/share/app', '/e2/share/app', '/root/share/app']);
  });

  it('should walk only the canonical path when nothing was discovered', () => {
    const order = mergeOrder({
      canonicalDataPath: '/root/share/app',
      dataPaths: ['/root/share/app'],
      configPaths: [],
    });

    expect(order).toEqual(['/root/share/app']);
  });
});
