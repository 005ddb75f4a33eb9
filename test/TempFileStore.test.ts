/**
 * Unit tests for TempFileStore and TempScope
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { TempFileStore } from '../src/services/TempFileStore';

describe('TempFileStore', () => {
  let baseDir: string;
  let store: TempFileStore;

  beforeEach(async () => {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), 'tempstore-test-'));
    baseDir = path.join(root, 'nested', 'dir');
    store = new TempFileStore({ baseDir, prefix: 'convert_' });
  });

  afterEach(async () => {
    await fs.rm(path.dirname(path.dirname(baseDir)), { recursive: true, force: true });
  });

  describe('allocate', () => {
    test('should create the base directory and an empty file', async () => {
      const resource = await store.allocate('.pdf');

      expect(path.dirname(resource.path)).toBe(baseDir);
      expect(path.basename(resource.path)).toMatch(/^convert_[0-9a-f-]{36}\.pdf$/);
      expect((await fs.stat(resource.path)).size).toBe(0);
    });

    test('should generate unique names', async () => {
      const resources = await Promise.all(Array.from({ length: 20 }, () => store.allocate('.html')));
      const names = new Set(resources.map(resource => resource.path));
      expect(names.size).toBe(20);
      expect(await store.count()).toBe(20);
    });

    test('should normalize the suffix hint', async () => {
      expect((await store.allocate('PDF')).suffix).toBe('.pdf');
      expect((await store.allocate('')).suffix).toBe('');
      expect((await store.allocate('../../etc')).suffix).toBe('');
    });

    test('should fall back to the OS temp directory', () => {
      expect(new TempFileStore().baseDir).toBe(os.tmpdir());
    });
  });

  describe('write and release', () => {
    test('should overwrite contents', async () => {
      const resource = await store.allocate('.txt');
      await store.write(resource, Buffer.from('first version'));
      await store.write(resource, Buffer.from('second'));

      expect(await fs.readFile(resource.path, 'utf8')).toBe('second');
    });

    test('should remove the file', async () => {
      const resource = await store.allocate('.txt');
      await store.release(resource);

      await expect(fs.stat(resource.path)).rejects.toThrow();
      expect(await store.count()).toBe(0);
    });

    test('should tolerate a file that no longer exists', async () => {
      const resource = await store.allocate('.txt');
      await fs.rm(resource.path);

      await expect(store.release(resource)).resolves.toBeUndefined();
    });
  });

  describe('count', () => {
    test('should return 0 when the directory does not exist', async () => {
      expect(await store.count()).toBe(0);
    });

    test('should only count files with the store prefix', async () => {
      await store.allocate('.pdf');
      await fs.writeFile(path.join(baseDir, 'other-file.txt'), 'x');

      expect(await store.count()).toBe(1);
    });
  });

  describe('withScope', () => {
    test('should release every resource after success', async () => {
      const result = await store.withScope(async scope => {
        await scope.allocate('.pdf');
        await scope.allocate('.html');
        expect(scope.size).toBe(2);
        expect(await store.count()).toBe(2);
        return 'done';
      });

      expect(result).toBe('done');
      expect(await store.count()).toBe(0);
    });

    test('should release every resource when the callback throws', async () => {
      await expect(
        store.withScope(async scope => {
          const resource = await scope.allocate('.pdf');
          await scope.write(resource, Buffer.from('partial'));
          throw new Error('stage failed');
        })
      ).rejects.toThrow('stage failed');

      expect(await store.count()).toBe(0);
    });

    test('should refuse allocations after the scope is closed', async () => {
      const scope = store.scope();
      await scope.close();

      await expect(scope.allocate('.pdf')).rejects.toThrow('Temp scope already closed');
    });

    test('should release resources only once when closed twice', async () => {
      const scope = store.scope();
      await scope.allocate('.pdf');
      const releaseSpy = jest.spyOn(store, 'release');

      await scope.close();
      await scope.close();

      expect(releaseSpy).toHaveBeenCalledTimes(1);
      expect(scope.size).toBe(0);
    });
  });
});
