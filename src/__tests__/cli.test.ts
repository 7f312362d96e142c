import path from 'path';
import { parseArgs, parsePort, UsageError } from '../cli/args';
import { formatSummary, runExtract } from '../cli/extract';
import { QueryOutput, runQuery, toJson } from '../cli/query';
import { startViewer } from '../cli/serve';
import { defaultSummary } from '../helpers/aggregateHelper';
import { createTempDir, writeFixture } from './support';

jest.mock('../utils/logger');

class CollectingOutput implements QueryOutput {
  lines: string[] = [];
  tables: unknown[][] = [];

  write(text: string): void {
    this.lines.push(text);
  }

  table(rows: unknown[]): void {
    this.tables.push(rows);
  }
}

describe('CLI', () => {
  describe('parseArgs', () => {
    it('should read flags, switches and positionals', () => {
      expect(
        parseArgs(['--db', 'study.db', '--json', 'SELECT 1', '--port=8080'], ['json'])
      ).toEqual({
        flags: { db: 'study.db', json: 'true', port: '8080' },
        positionals: ['SELECT 1'],
      });
    });

    it('should reject a flag without a value', () => {
      expect(() => parseArgs(['--root'])).toThrow(UsageError);
      expect(() => parseArgs(['--root', '--db', 'x'])).toThrow('--root needs a value');
    });
  });

  describe('parsePort', () => {
    it('should accept ports in range', () => {
      expect(parsePort('5000')).toBe(5000);
      expect(parsePort(undefined)).toBeUndefined();
    });

    it('should reject anything else', () => {
      expect(() => parsePort('0')).toThrow('--port must be between 1 and 65535, got 0');
      expect(() => parsePort('http')).toThrow(UsageError);
    });
  });

  describe('extract, query and serve', () => {
    let dir: string;
    let cleanup: () => void;
    let dbPath: string;
    let root: string;
    let log: jest.SpyInstance;
    let errorLog: jest.SpyInstance;

    beforeEach(() => {
      ({ dir, cleanup } = createTempDir());
      dbPath = path.join(dir, 'catalog.db');
      root = path.join(dir, 'exports');
      writeFixture(root, 'participant_01/wrist_hr.csv', 'timestamp,hr\n1,70\n2,72\n');
      log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
      errorLog = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
      jest.restoreAllMocks();
      cleanup();
    });

    it('should extract a folder given on the command line', async () => {
      const code = await runExtract(['--root', root, '--db', dbPath], {});

      expect(code).toBe(0);
      expect(log).toHaveBeenCalledWith(expect.stringContaining('  rows inserted:    2'));
    });

    it('should take the root and database from the environment', async () => {
      const code = await runExtract([], { DATA_ROOT: root, CATALOG_DB_PATH: dbPath });

      expect(code).toBe(0);
      const output = new CollectingOutput();
      expect(runQuery(['SELECT COUNT(*) AS n FROM wrist_hr', '--json'], { CATALOG_DB_PATH: dbPath }, output)).toBe(0);
      expect(JSON.parse(output.lines[0] ?? '')).toEqual([{ n: 2 }]);
    });

    it('should exit with 1 when no root is given', async () => {
      expect(await runExtract(['--db', dbPath], {})).toBe(1);
      expect(errorLog).toHaveBeenCalledWith(
        expect.stringContaining('--root is required (or set DATA_ROOT)')
      );
    });

    it('should exit with 1 when the root is missing', async () => {
      expect(await runExtract(['--root', path.join(dir, 'missing'), '--db', dbPath], {})).toBe(1);
      expect(errorLog).toHaveBeenCalledWith(
        `Extraction failed: Root folder does not exist: ${path.join(dir, 'missing')}`
      );
    });

    it('should print query rows as a table', async () => {
      await runExtract(['--root', root, '--db', dbPath], {});
      const output = new CollectingOutput();

      const code = runQuery(
        ['--db', dbPath, 'SELECT timestamp, hr FROM wrist_hr ORDER BY id'],
        {},
        output
      );

      expect(code).toBe(0);
      expect(output.tables).toEqual([
        [
          { timestamp: 1, hr: 70 },
          { timestamp: 2, hr: 72 },
        ],
      ]);
    });

    it('should list tables', async () => {
      await runExtract(['--root', root, '--db', dbPath], {});
      const output = new CollectingOutput();

      expect(runQuery(['--db', dbPath, '--tables', '--json'], {}, output)).toBe(0);
      const tables: unknown = JSON.parse(output.lines[0] ?? '');
      expect(tables).toEqual(
        expect.arrayContaining([expect.objectContaining({ name: 'wrist_hr', rowCount: 2 })])
      );
    });

    it('should refuse statements that write', async () => {
      await runExtract(['--root', root, '--db', dbPath], {});

      expect(runQuery(['--db', dbPath, 'DELETE FROM wrist_hr'], {}, new CollectingOutput())).toBe(1);
    });

    it('should require a statement', () => {
      expect(runQuery(['--db', dbPath], {}, new CollectingOutput())).toBe(1);
      expect(errorLog).toHaveBeenCalledWith(
        expect.stringContaining('A statement or --tables is required')
      );
    });

    it('should not start the viewer without a catalog file', async () => {
      await expect(startViewer(['--db', path.join(dir, 'missing.db')], {})).rejects.toMatchObject({
        code: 'SQLITE_CANTOPEN',
      });
    });

    it('should reject a bad port before opening the catalog', async () => {
      await expect(startViewer(['--db', dbPath, '--port', '99999'], {})).rejects.toThrow(
        '--port must be between 1 and 65535, got 99999'
      );
    });
  });

  describe('formatSummary', () => {
    it('should list per-table counts and skipped files', () => {
      const summary = {
        ...defaultSummary('/data'),
        participants: 1,
        filesProcessed: 1,
        rowsInserted: 2,
        tables: { wrist_hr: 2 },
        filesSkipped: [{ path: 'participant_01/wrist_eda.csv', reason: 'File has no records' }],
      };

      const text = formatSummary(summary);

      expect(text.split('\n')).toEqual([
        'Extraction finished for /data',
        '  participants:     1',
        '  files processed:  1',
        '  files skipped:    1',
        '  files unmatched:  0',
        '  files ignored:    0',
        '  rows inserted:    2',
        '  duplicate rows:   0',
        '  duration:         0 ms',
        '',
        'Rows inserted per table:',
        '  wrist_hr: 2',
        '',
        'Skipped files:',
        '  participant_01/wrist_eda.csv: File has no records',
      ]);
    });
  });

  describe('toJson', () => {
    it('should write big integers as strings', () => {
      expect(toJson({ n: BigInt('9007199254740993') })).toBe('{\n  "n": "9007199254740993"\n}');
    });
  });
});
