/**
 * Tests for the file-backed layout cache
 */

import * as fs from 'fs';
import * as path from 'path';
import { FileCacheStorage } from '../src/store/file-store';
import { LayoutCache } from '../src/store/layout-cache';
import { CacheReadError, CacheWriteError } from '../src/core/errors';
import { makeLayout } from './fixtures';

const TEST_CACHE_DIR = path.join(__dirname, '.test-file-store');
const CACHE_FILE = path.join(TEST_CACHE_DIR, 'cache.json');

beforeEach(() => {
  if (fs.existsSync(TEST_CACHE_DIR)) {
    fs.rmSync(TEST_CACHE_DIR, { recursive: true, force: true });
  }
});

afterAll(() => {
  if (fs.existsSync(TEST_CACHE_DIR)) {
    fs.rmSync(TEST_CACHE_DIR, { recursive: true, force: true });
  }
});

function writeCacheFile(contents: string): void {
  fs.mkdirSync(TEST_CACHE_DIR, { recursive: true });
  fs.writeFileSync(CACHE_FILE, contents, 'utf-8');
}

describe('LayoutCache', () => {
  test('get returns null for unknown ids', () => {
    const cache = new LayoutCache();
    expect(cache.get('missing')).toBeNull();
    expect(cache.has('missing')).toBe(false);
  });

  test('put overwrites an existing entry', () => {
    const cache = new LayoutCache();
    cache.put('1', makeLayout({ id: '1', title: 'Old' }));
    cache.put('1', makeLayout({ id: '1', title: 'New' }));

    expect(cache.size).toBe(1);
    expect(cache.get('1')?.title).toBe('New');
  });
});

describe('FileCacheStorage', () => {
  test('missing file loads as an empty cache', async () => {
    const storage = new FileCacheStorage(CACHE_FILE);
    const store = await storage.load();
    expect(store.size).toBe(0);
  });

  test('save then load reproduces every entry', async () => {
    const storage = new FileCacheStorage(CACHE_FILE);
    const cache = new LayoutCache();
    const a = makeLayout({ id: 'a', title: 'A', tags: ['x', 'y'], config: { layers: [[1]] } });
    const b = makeLayout({ id: 'b', title: 'B', notes: 'multi\nline', compilerInput: 'raw' });
    cache.put('a', a);
    cache.put('b', b);

    await storage.save(cache);
    const loaded = await storage.load();

    expect(loaded.size).toBe(2);
    expect(loaded.get('a')).toEqual(a);
    expect(loaded.get('b')).toEqual(b);
  });

  test('creates the parent directory on save', async () => {
    const nested = path.join(TEST_CACHE_DIR, 'deep', 'nested', 'cache.json');
    const storage = new FileCacheStorage(nested);

    await storage.save(new LayoutCache([['a', makeLayout({ id: 'a' })]]));

    expect(fs.existsSync(nested)).toBe(true);
  });

  test('writes the service document format keyed by id', async () => {
    const storage = new FileCacheStorage(CACHE_FILE);
    await storage.save(new LayoutCache([['a', makeLayout({ id: 'a', title: 'A' })]]));

    const raw = JSON.parse(fs.readFileSync(CACHE_FILE, 'utf-8'));
    expect(Object.keys(raw)).toEqual(['a']);
    expect(raw.a.layout_meta.uuid).toBe('a');
    expect(raw.a.layout_meta.title).toBe('A');
    expect(raw.a.compiler_input).toBeNull();
  });

  test('leaves no temporary file behind', async () => {
    const storage = new FileCacheStorage(CACHE_FILE);
    await storage.save(new LayoutCache());
    expect(fs.readdirSync(TEST_CACHE_DIR)).toEqual(['cache.json']);
  });

  test('reads a cache written by hand in the service format', async () => {
    writeCacheFile(
      JSON.stringify({ 'abc-123': { layout_meta: { title: 'Hand written', date: 86400 } } })
    );

    const store = await new FileCacheStorage(CACHE_FILE).load();
    const record = store.get('abc-123');

    expect(record?.id).toBe('abc-123');
    expect(record?.title).toBe('Hand written');
    expect(record?.createdAt).toBe(86400);
  });

  test('invalid JSON is a CacheReadError', async () => {
    writeCacheFile('{ not json');
    await expect(new FileCacheStorage(CACHE_FILE).load()).rejects.toThrow(CacheReadError);
  });

  test('trailing commas are rejected rather than repaired', async () => {
    writeCacheFile('{"a": {"layout_meta": {"title": "T", "notes": "x,]"}},}');
    await expect(new FileCacheStorage(CACHE_FILE).load()).rejects.toThrow(CacheReadError);
  });

  test('a leading BOM is accepted', async () => {
    writeCacheFile('\ufeff{"a": {"layout_meta": {"notes": "x,]"}}}');
    const store = await new FileCacheStorage(CACHE_FILE).load();
    expect(store.get('a')?.notes).toBe('x,]');
  });

  test('payload keys survive a save and load unchanged', async () => {
    const config = JSON.parse('{"__proto__":{"k":1},"x":2}');
    const storage = new FileCacheStorage(CACHE_FILE);
    await storage.save(new LayoutCache([['a', makeLayout({ id: 'a', config })]]));

    const loaded = (await storage.load()).get('a');

    expect(JSON.stringify(loaded?.config)).toBe('{"__proto__":{"k":1},"x":2}');
  });

  test('a wrongly shaped cache is a CacheReadError', async () => {
    writeCacheFile(JSON.stringify({ a: { layout_meta: { title: 7 } } }));
    await expect(new FileCacheStorage(CACHE_FILE).load()).rejects.toThrow(
      /a\.layout_meta\.title/
    );
  });

  test('saving over a directory is a CacheWriteError', async () => {
    fs.mkdirSync(CACHE_FILE, { recursive: true });
    const storage = new FileCacheStorage(CACHE_FILE);
    await expect(storage.save(new LayoutCache())).rejects.toThrow(CacheWriteError);
  });
});
