import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { writeFileSync, mkdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { FilePathSource } from '../../../src/infrastructure/sources/FilePathSource.js';

const TEST_DIR = join(tmpdir(), 'rowcheck-test-filepathsource');

beforeAll(() => {
  mkdirSync(TEST_DIR, { recursive: true });
});

afterAll(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

function writeTempFile(name: string, content: string): string {
  const filePath = join(TEST_DIR, name);
  writeFileSync(filePath, content, 'utf-8');
  return filePath;
}

describe('FilePathSource', () => {
  describe('read()', () => {
    it('should stream file content as chunks', async () => {
      const filePath = writeTempFile('read-basic.csv', 'id,name\n1,Alice\n');
      const source = new FilePathSource(filePath);

      const chunks: string[] = [];
      for await (const chunk of source.read()) {
        chunks.push(chunk);
      }

      expect(chunks.join('')).toBe('id,name\n1,Alice\n');
    });

    it('should stream large content in multiple chunks', async () => {
      const content = 'id,name,age\n' + '7,Test User,30\n'.repeat(5000);
      const filePath = writeTempFile('read-large.csv', content);

      // Use small highWaterMark to force multiple chunks
      const source = new FilePathSource(filePath, { highWaterMark: 256 });

      const chunks: string[] = [];
      for await (const chunk of source.read()) {
        chunks.push(chunk);
      }

      expect(chunks.length).toBeGreaterThan(1);
      expect(chunks.join('')).toBe(content);
    });

    it('should fail for a missing file', async () => {
      const source = new FilePathSource(join(TEST_DIR, 'missing.csv'));

      await expect(async () => {
        for await (const _ of source.read()) {
          // consume
        }
      }).rejects.toThrow('ENOENT');
    });
  });

  describe('sample()', () => {
    it('should return full content of a small file without maxBytes', async () => {
      const filePath = writeTempFile('sample-full.csv', 'id,name\n1,Alice\n');
      const source = new FilePathSource(filePath);

      expect(await source.sample()).toBe('id,name\n1,Alice\n');
    });

    it('should return the first maxBytes bytes', async () => {
      const filePath = writeTempFile('sample-limited.csv', 'email,name\nalice@example.com,Alice\n');
      const source = new FilePathSource(filePath);

      expect(await source.sample(10)).toBe('email,name');
    });
  });

  describe('metadata()', () => {
    it('should return file name and size', () => {
      const content = 'id,name\n1,Alice\n';
      const filePath = writeTempFile('meta.csv', content);
      const source = new FilePathSource(filePath);

      expect(source.metadata()).toEqual({ fileName: 'meta.csv', fileSize: Buffer.byteLength(content) });
    });
  });
});
