import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { TrackedTimeStore } from '../estimation/tracked-time-store.js';
import { ValidationError } from '../models/errors.js';
import type { TrackedTimeEntry } from '../estimation/types.js';
import {
  parseCsv,
  importTrackedTimeCsv,
  importTrackedTimeFile,
  formatTrackedTimeCsv,
  appendTrackedTimeCsv,
} from './csv-importer.js';

describe('parseCsv', () => {
  it('should split simple rows', () => {
    expect(parseCsv('a,b,c\n1,2,3\n')).toEqual([['a', 'b', 'c'], ['1', '2', '3']]);
  });

  it('should handle CRLF line endings', () => {
    expect(parseCsv('a,b\r\n1,2\r\n')).toEqual([['a', 'b'], ['1', '2']]);
  });

  it('should keep commas, quotes and line breaks inside quoted fields', () => {
    expect(parseCsv('name,notes\n"Smith, J","said ""hi""\nthen left"\n')).toEqual([
      ['name', 'notes'],
      ['Smith, J', 'said "hi"\nthen left'],
    ]);
  });

  it('should keep empty trailing fields', () => {
    expect(parseCsv('a,b,c\n1,,\n')).toEqual([['a', 'b', 'c'], ['1', '', '']]);
  });

  it('should skip blank lines and a byte order mark', () => {
    expect(parseCsv('\uFEFFa,b\n\n1,2\n\n')).toEqual([['a', 'b'], ['1', '2']]);
  });

  it('should parse a last row without a trailing newline', () => {
    expect(parseCsv('a\n1')).toEqual([['a'], ['1']]);
  });

  it('should reject an unterminated quoted field', () => {
    expect(() => parseCsv('a\n"open')).toThrow(ValidationError);
  });
});

describe('importTrackedTimeCsv', () => {
  const csv = [
    'team,member_name,feature,tracked_time_hours,process,date',
    'backend,alice,CRUD,3,Data Operations,2026-01-10',
    'Backend,bob,crud,4,,',
    'qa,carol,CRUD,5,,',
    'frontend,dave,Login,-2,,2026-13-45',
  ].join('\n');

  it('should validate rows without a store', () => {
    const result = importTrackedTimeCsv(csv);

    expect(result.totalRows).toBe(4);
    expect(result.accepted.map(e => [e.team, e.memberName, e.feature, e.hours])).toEqual([
      ['backend', 'alice', 'CRUD', 3],
      ['backend', 'bob', 'crud', 4],
    ]);
    expect(result.accepted[0].process).toBe('Data Operations');
    expect(result.accepted[0].date).toEqual(new Date('2026-01-10'));
    expect(result.accepted[1].process).toBeUndefined();
  });

  it('should number rejected rows from the file header', () => {
    const result = importTrackedTimeCsv(csv);

    expect(result.rejected.map(r => r.rowNumber)).toEqual([4, 5]);
    expect(result.rejected[0].errors.map(e => e.field)).toEqual(['team']);
    expect(result.rejected[1].errors.map(e => e.field)).toEqual(['hours', 'date']);
  });

  it('should ingest valid rows into a store', () => {
    const store = new TrackedTimeStore();
    const result = importTrackedTimeCsv(csv, store);

    expect(result.accepted).toHaveLength(2);
    expect(store.size).toBe(2);
    expect(store.version).toBe(1);
  });

  it('should accept the short column names in any order', () => {
    const result = importTrackedTimeCsv('Hours,Feature,Member,Team\n2.5,Search,erin,frontend\n');
    expect(result.accepted[0]).toMatchObject({ team: 'frontend', memberName: 'erin', feature: 'Search', hours: 2.5 });
  });

  it('should reject a blank hours cell', () => {
    const result = importTrackedTimeCsv('team,member,feature,hours\nbackend,alice,CRUD,\n');
    expect(result.rejected[0]).toMatchObject({ rowNumber: 2 });
    expect(result.rejected[0].errors[0].field).toBe('hours');
  });

  it('should throw when required columns are missing', () => {
    expect(() => importTrackedTimeCsv('team,feature\nbackend,CRUD\n')).toThrow(
      'is missing required columns: member, hours'
    );
  });

  it('should throw on an empty file', () => {
    expect(() => importTrackedTimeCsv('')).toThrow('must contain a header row');
  });
});

describe('importTrackedTimeFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'csv-import-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should read and import a file', async () => {
    const file = path.join(dir, 'time.csv');
    await fs.writeFile(file, 'team,member,feature,hours\r\nbackend,alice,CRUD,3\r\n');

    const result = await importTrackedTimeFile(file);
    expect(result.accepted).toHaveLength(1);
  });

  it('should reject a missing file', async () => {
    await expect(importTrackedTimeFile(path.join(dir, 'missing.csv'))).rejects.toThrow('ENOENT');
  });
});

describe('formatTrackedTimeCsv', () => {
  it('should write rows the importer reads back', () => {
    const store = new TrackedTimeStore();
    store.add({ team: 'backend', memberName: 'Smith, J', feature: 'CRUD', hours: 3, date: '2026-01-10' });
    store.add({ team: 'frontend', memberName: 'erin', feature: 'Login "v2"', hours: 1.5, process: 'Auth' });

    const text = formatTrackedTimeCsv(store.list());
    expect(text).toBe(
      'team,member,feature,hours,process,date\n' +
      'backend,"Smith, J",CRUD,3,,2026-01-10T00:00:00.000Z\n' +
      'frontend,erin,"Login ""v2""",1.5,Auth,\n'
    );
    expect(importTrackedTimeCsv(text).accepted.map(e => e.memberName)).toEqual(['Smith, J', 'erin']);
  });

  it('should keep the time of day of a date', () => {
    const store = new TrackedTimeStore();
    store.add({ team: 'backend', memberName: 'erin', feature: 'CRUD', hours: 2, date: '2026-01-10T14:45:00Z' });

    const text = formatTrackedTimeCsv(store.list());
    expect(text.split('\n')[1]).toBe('backend,erin,CRUD,2,,2026-01-10T14:45:00.000Z');
    expect(importTrackedTimeCsv(text).accepted[0].date).toEqual(new Date('2026-01-10T14:45:00Z'));
  });
});

describe('appendTrackedTimeCsv', () => {
  const entry: TrackedTimeEntry = { id: 'tt-1', team: 'frontend', memberName: 'erin', feature: 'Login', hours: 1.5, process: 'Auth' };

  it('should start a new file with the full header', () => {
    expect(appendTrackedTimeCsv('', [entry])).toEqual({
      kind: 'rewrite',
      text: 'team,member,feature,hours,process,date\nfrontend,erin,Login,1.5,Auth,\n',
    });
  });

  it('should append lines when the header has every column needed', () => {
    expect(appendTrackedTimeCsv('team,member,feature,hours,process\r\n', [entry])).toEqual({
      kind: 'append',
      text: 'frontend,erin,Login,1.5,Auth\n',
    });
  });

  it('should leave unknown columns empty', () => {
    expect(appendTrackedTimeCsv('team,member,feature,hours,ticket,process\n', [entry])).toEqual({
      kind: 'append',
      text: 'frontend,erin,Login,1.5,,Auth\n',
    });
  });

  it('should refuse a file without the required columns', () => {
    expect(() => appendTrackedTimeCsv('team,feature\n', [entry])).toThrow('is missing required columns: member, hours');
  });
});
