import { describe, it, expect, vi } from 'vitest';
import { CsvParser } from '../../../src/infrastructure/parsers/CsvParser.js';
import type { RecordFields } from '../../../src/domain/model/Record.js';

async function* chunksOf(...chunks: string[]): AsyncIterable<string> {
  for (const chunk of chunks) {
    yield await Promise.resolve(chunk);
  }
}

async function parseAll(parser: CsvParser, ...chunks: string[]): Promise<RecordFields[]> {
  const records: RecordFields[] = [];
  for await (const record of parser.parse(chunksOf(...chunks))) {
    records.push(record);
  }
  return records;
}

describe('CsvParser', () => {
  describe('parse()', () => {
    it('should split records into text fields', async () => {
      const records = await parseAll(new CsvParser({ delimiter: ',' }), 'id,age\n1,34\n');
      expect(records).toEqual([
        ['id', 'age'],
        ['1', '34'],
      ]);
    });

    it('should keep a delimiter inside quotes', async () => {
      const records = await parseAll(new CsvParser({ delimiter: ',' }), '"Smith, Jane",42\n');
      expect(records).toEqual([['Smith, Jane', '42']]);
    });

    it('should honour a custom quote character', async () => {
      const records = await parseAll(new CsvParser({ delimiter: ',', quoteChar: "'" }), "'a,b',c\n");
      expect(records).toEqual([['a,b', 'c']]);
    });

    it('should skip blank lines', async () => {
      const records = await parseAll(new CsvParser({ delimiter: ',' }), 'a,b\n\nc,d\n');
      expect(records).toEqual([
        ['a', 'b'],
        ['c', 'd'],
      ]);
    });

    it('should reassemble records split across chunks', async () => {
      const records = await parseAll(new CsvParser({ delimiter: ',' }), 'a,b\n1,', '2\n3,4');
      expect(records).toEqual([
        ['a', 'b'],
        ['1', '2'],
        ['3', '4'],
      ]);
    });

    it('should use the configured delimiter', async () => {
      const records = await parseAll(new CsvParser({ delimiter: '|' }), 'a|b,c\n');
      expect(records).toEqual([['a', 'b,c']]);
    });

    it('should keep records of uneven length as they are', async () => {
      const records = await parseAll(new CsvParser({ delimiter: ',' }), 'a,b,c\n1,2\n');
      expect(records).toEqual([
        ['a', 'b', 'c'],
        ['1', '2'],
      ]);
    });

    it('should yield nothing for empty input', async () => {
      expect(await parseAll(new CsvParser({ delimiter: ',' }), '')).toEqual([]);
    });

    it('should not type values', async () => {
      const records = await parseAll(new CsvParser({ delimiter: ',' }), '007,true,1e3\n');
      expect(records).toEqual([['007', 'true', '1e3']]);
    });

    it('should release the source when the caller stops early', async () => {
      let released = false;
      async function* lines(): AsyncIterable<string> {
        try {
          for (let i = 0; i < 1000; i++) {
            yield await Promise.resolve(`${String(i)},x\n`);
          }
        } finally {
          released = true;
        }
      }

      for await (const record of new CsvParser({ delimiter: ',' }).parse(lines())) {
        expect(record).toEqual(['0', 'x']);
        break;
      }

      await vi.waitFor(() => expect(released).toBe(true));
    });
  });

  describe('detect()', () => {
    it('should detect semicolons', () => {
      expect(new CsvParser().detect('a;b;c\n1;2;3\n')).toEqual({ delimiter: ';', quoteChar: '"' });
    });

    it('should detect tabs', () => {
      expect(new CsvParser().detect('a\tb\n1\t2\n').delimiter).toBe('\t');
    });

    it('should fall back to a comma for a single column', () => {
      expect(new CsvParser().detect('name\nAlice\n').delimiter).toBe(',');
    });

    it('should accept a Buffer sample', () => {
      expect(new CsvParser().detect(Buffer.from('a|b|c\n')).delimiter).toBe('|');
    });
  });

  it('should expose the configured delimiter', () => {
    expect(new CsvParser({ delimiter: ';' }).delimiter).toBe(';');
    expect(new CsvParser().delimiter).toBeUndefined();
  });
});
