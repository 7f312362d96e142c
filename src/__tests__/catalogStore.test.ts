import path from 'path';
import { buildDictionaryEntries } from '../helpers/dictionaryHelper';
import { CatalogStore } from '../store/catalogStore';
import { RowContext } from '../types';
import { QueryRejectedError } from '../utils/errors';
import { createTempDir, testCatalog } from './support';

describe('CatalogStore', () => {
  let dir: string;
  let cleanup: () => void;
  let dbPath: string;
  let store: CatalogStore;

  const context: RowContext = {
    participantId: 'participant_01',
    sessionId: null,
    device: 'wristband',
    sourceFile: 'participant_01/wrist_hr.csv',
    annotation: 'Heart rate (bpm, 1 Hz)',
  };

  beforeEach(() => {
    ({ dir, cleanup } = createTempDir());
    dbPath = path.join(dir, 'catalog.db');
    store = new CatalogStore(dbPath);
    store.initializeSchema(buildDictionaryEntries(testCatalog));
    store.ensureParticipant('participant_01', { folder: 'participant_01', annotation: 'folder' });
  });

  afterEach(() => {
    store.close();
    cleanup();
  });

  function loadHeartRate(rows: (string | number | null)[][] = [[1, 70], [2, 72], [3, null]]) {
    store.ensureDeviceTable('wrist_hr', ['timestamp', 'hr']);
    return store.appendRows('wrist_hr', ['timestamp', 'hr'], rows, context);
  }

  describe('initializeSchema', () => {
    it('should create the participants and dictionary tables', () => {
      expect(store.listTables().map((t) => [t.name, t.kind])).toEqual([
        ['data_dictionary', 'dictionary'],
        ['participants', 'participants'],
      ]);
    });

    it('should be safe to run again', () => {
      store.initializeSchema(buildDictionaryEntries(testCatalog));
      expect(store.getSensors()).toHaveLength(4);
    });
  });

  describe('ensureParticipant', () => {
    it('should never modify an existing participant', () => {
      const created = store.ensureParticipant('participant_01', {
        folder: null,
        annotation: 'changed',
      });

      expect(created).toBe(false);
      expect(store.getParticipants()).toEqual([
        expect.objectContaining({
          participant_id: 'participant_01',
          folder: 'participant_01',
          annotation: 'folder',
        }),
      ]);
    });

    it('should store metadata fields in their own columns', () => {
      store.ensureParticipantColumns(['low', 'high']);
      const created = store.ensureParticipant('participant_02', {
        folder: null,
        annotation: 'metadata',
        fields: { low: 1, high: 'three' },
      });

      expect(created).toBe(true);
      expect(store.getParticipantOverview('participant_02')?.participantInfo).toEqual(
        expect.objectContaining({ low: 1, high: 'three', folder: null })
      );
    });
  });

  describe('ensureDeviceTable', () => {
    it('should create the table, then add only missing columns', () => {
      expect(store.ensureDeviceTable('wrist_hr', ['timestamp', 'hr'])).toEqual({
        created: true,
        addedColumns: ['timestamp', 'hr'],
      });
      expect(store.ensureDeviceTable('wrist_hr', ['timestamp', 'hr', 'quality'])).toEqual({
        created: false,
        addedColumns: ['quality'],
      });
      expect(store.getColumns('wrist_hr')).toEqual([
        'id',
        'timestamp',
        'hr',
        'participant_id',
        'session_id',
        'source_file',
        'row_index',
        'row_key',
        'annotation',
        'created_at',
        'quality',
      ]);
    });

    it('should keep arbitrary column names intact', () => {
      store.ensureDeviceTable('ear_custom', ['Time (s)', 'say "x"']);
      expect(store.getColumns('ear_custom').slice(1, 3)).toEqual(['Time (s)', 'say "x"']);
    });
  });

  describe('appendRows', () => {
    it('should insert rows with their values as parsed', () => {
      expect(loadHeartRate()).toEqual({ inserted: 3, duplicates: 0 });

      const result = store.readRows('wrist_hr', { limit: 10, offset: 0 });
      expect(result.rows.map((row) => [row.timestamp, row.hr])).toEqual([
        [1, 70],
        [2, 72],
        [3, null],
      ]);
      expect(result.rows.map((row) => row.row_index)).toEqual([0, 1, 2]);
      expect(result.rows[0]).toEqual(
        expect.objectContaining({
          participant_id: 'participant_01',
          session_id: null,
          source_file: 'participant_01/wrist_hr.csv',
          annotation: 'Heart rate (bpm, 1 Hz)',
        })
      );
    });

    it('should keep text values as text', () => {
      loadHeartRate([['2021-03-04 10:00:00', 'n/a']]);
      const [row] = store.readRows('wrist_hr', { limit: 1, offset: 0 }).rows;
      expect(row?.timestamp).toBe('2021-03-04 10:00:00');
      expect(row?.hr).toBe('n/a');
    });

    it('should count rows already stored as duplicates', () => {
      loadHeartRate();
      expect(loadHeartRate()).toEqual({ inserted: 0, duplicates: 3 });
      expect(store.countRows('wrist_hr')).toBe(3);
    });

    it('should refuse readings of an unknown participant', () => {
      store.ensureDeviceTable('wrist_hr', ['timestamp', 'hr']);
      expect(() =>
        store.appendRows('wrist_hr', ['timestamp', 'hr'], [[1, 70]], {
          ...context,
          participantId: 'participant_99',
        })
      ).toThrow(/FOREIGN KEY/);
    });
  });

  describe('transaction', () => {
    it('should roll back everything when the function throws', () => {
      expect(() =>
        store.transaction(() => {
          loadHeartRate();
          throw new Error('boom');
        })
      ).toThrow('boom');

      expect(store.hasTable('wrist_hr')).toBe(false);
    });
  });

  describe('reading', () => {
    beforeEach(() => {
      store.ensureParticipant('participant_02', { folder: 'participant_02', annotation: 'folder' });
      loadHeartRate();
      store.appendRows('wrist_hr', ['timestamp', 'hr'], [[1, 80], [2, 81]], {
        ...context,
        participantId: 'participant_02',
        sessionId: 'high',
        sourceFile: 'participant_02/high/wrist_hr.csv',
      });
    });

    it('should list tables with kind, device and row count', () => {
      expect(store.listTables().find((t) => t.name === 'wrist_hr')).toEqual({
        name: 'wrist_hr',
        kind: 'device',
        device: 'wristband',
        description: 'Heart rate',
        rowCount: 5,
      });
    });

    it('should not expose SQLite internal tables', () => {
      expect(store.hasTable('sqlite_sequence')).toBe(false);
      expect(store.listTables().map((t) => t.name)).not.toContain('sqlite_sequence');
    });

    it('should filter and page rows', () => {
      expect(store.countRows('wrist_hr', { participantId: 'participant_02' })).toBe(2);
      expect(store.countRows('wrist_hr', { sessionId: 'high' })).toBe(2);

      const page = store.readRows('wrist_hr', { limit: 2, offset: 2 });
      expect(page.rows.map((row) => row.hr)).toEqual([null, 80]);
    });

    it('should ignore filters on tables without those columns', () => {
      expect(store.countRows('data_dictionary', { participantId: 'participant_01' })).toBe(
        store.countRows('data_dictionary')
      );
    });

    it('should summarise a loaded sensor', () => {
      expect(store.getSensorSummary('wrist_hr')).toEqual({
        sensorName: 'wrist_hr',
        totalRecords: 5,
        participantStats: [
          { participantId: 'participant_01', sessionId: null, recordCount: 3 },
          { participantId: 'participant_02', sessionId: 'high', recordCount: 2 },
        ],
      });
      expect(store.getSensorSummary('chest_raw_ecg')).toBeNull();
      expect(store.getSensorSummary('participants')).toBeNull();
    });

    it('should return sensor data with filters', () => {
      const data = store.getSensorData('wrist_hr', { participantId: 'participant_02' }, 10);
      expect(data?.totalRecords).toBe(2);
      expect(data?.data.map((row) => row.hr)).toEqual([80, 81]);
      expect(store.getSensorData('missing', {}, 10)).toBeNull();
    });

    it('should report database stats', () => {
      expect(store.getDatabaseStats()).toEqual({
        totalParticipants: 2,
        totalSensorTypes: 4,
        sensorStats: [{ sensorName: 'wrist_hr', recordCount: 5 }],
      });
    });

    it('should mark which documented sensors are loaded', () => {
      const sensors = store.getSensors();
      expect(sensors.find((s) => s.sensorName === 'wrist_hr')?.loaded).toBe(true);
      expect(sensors.find((s) => s.sensorName === 'ear_acc_left')?.loaded).toBe(false);
    });

    it('should give a participant overview per sensor and session', () => {
      expect(store.getParticipantOverview('participant_02')?.sensorStats).toEqual([
        {
          sensorName: 'wrist_hr',
          description: 'Heart rate',
          sessionStats: [{ sessionId: 'high', recordCount: 2 }],
        },
      ]);
      expect(store.getParticipantOverview('participant_99')).toBeNull();
    });
  });

  describe('runReadOnlyQuery', () => {
    beforeEach(() => {
      loadHeartRate();
    });

    it('should run selects with parameters', () => {
      const result = store.runReadOnlyQuery(
        'SELECT timestamp, hr FROM wrist_hr WHERE hr > ? ORDER BY id',
        [70]
      );
      expect(result).toEqual({ columns: ['timestamp', 'hr'], rows: [{ timestamp: 2, hr: 72 }] });
    });

    it('should stop reading at the row cap', () => {
      const capped = store.runReadOnlyQuery('SELECT timestamp FROM wrist_hr ORDER BY id', [], 2);
      expect(capped).toEqual({
        columns: ['timestamp'],
        rows: [{ timestamp: 1 }, { timestamp: 2 }],
        truncated: true,
      });

      const whole = store.runReadOnlyQuery('SELECT timestamp FROM wrist_hr ORDER BY id', [], 3);
      expect(whole.rows).toHaveLength(3);
      expect(whole.truncated).toBe(false);
    });

    it('should reject statements that write', () => {
      expect(() => store.runReadOnlyQuery('DELETE FROM wrist_hr')).toThrow(QueryRejectedError);
      expect(() => store.runReadOnlyQuery('CREATE TABLE scratch (a)')).toThrow(
        QueryRejectedError
      );
      expect(store.countRows('wrist_hr')).toBe(3);
    });
  });

  describe('read-only mode', () => {
    it('should read what the writer stored and refuse writes', () => {
      loadHeartRate();
      const reader = new CatalogStore(dbPath, { readonly: true });
      try {
        expect(reader.countRows('wrist_hr')).toBe(3);
        expect(() => reader.ensureDeviceTable('wrist_eda', ['timestamp', 'eda'])).toThrow();
      } finally {
        reader.close();
      }
    });

    it('should not create a missing database file', () => {
      expect(() => new CatalogStore(path.join(dir, 'missing.db'), { readonly: true })).toThrow();
    });
  });
});
