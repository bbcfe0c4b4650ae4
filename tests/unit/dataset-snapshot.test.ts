import { DatasetSnapshot } from '../../src/models/dataset-snapshot';
import { DEFAULT_RECORDS, RECORD_FIXTURES, T0, TEST_SOURCE, createRecord } from '../fixtures';

describe('DatasetSnapshot', () => {
  it('exposes the records with their fetch metadata', () => {
    const snapshot = new DatasetSnapshot({
      records: DEFAULT_RECORDS,
      fetchedAt: new Date(T0),
      source: TEST_SOURCE,
      skippedRows: 2
    });

    expect(snapshot.records).toEqual(DEFAULT_RECORDS);
    expect(snapshot.rowCount).toBe(3);
    expect(snapshot.source).toBe(TEST_SOURCE);
    expect(snapshot.skippedRows).toBe(2);
    expect(snapshot.fetchedAt).toEqual(new Date(T0));
    expect(snapshot.nameKeys).toEqual(['john doe', 'joanna smith', 'bob jones']);
  });

  it('is not affected by later changes to the input list', () => {
    const input = [RECORD_FIXTURES.john];
    const snapshot = new DatasetSnapshot({ records: input, fetchedAt: new Date(T0), source: TEST_SOURCE });

    input.push(RECORD_FIXTURES.bob);

    expect(snapshot.rowCount).toBe(1);
    expect(snapshot.records).toEqual([RECORD_FIXTURES.john]);
  });

  it('freezes itself, its record list and each record', () => {
    const snapshot = new DatasetSnapshot({
      records: [createRecord()],
      fetchedAt: new Date(T0),
      source: TEST_SOURCE
    });

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.records)).toBe(true);
    expect(Object.isFrozen(snapshot.records[0])).toBe(true);
    expect(Object.isFrozen(snapshot.nameKeys)).toBe(true);
  });

  it('hands out a fresh Date on every read of fetchedAt', () => {
    const snapshot = new DatasetSnapshot({ records: [], fetchedAt: new Date(T0), source: TEST_SOURCE });

    snapshot.fetchedAt.setTime(0);

    expect(snapshot.fetchedAt.getTime()).toBe(T0);
    expect(snapshot.fetchedAtMs).toBe(T0);
  });

  it('computes its age against a clock reading', () => {
    const snapshot = new DatasetSnapshot({ records: [], fetchedAt: new Date(T0), source: TEST_SOURCE });

    expect(snapshot.ageMs(T0 + 1500)).toBe(1500);
    expect(snapshot.skippedRows).toBe(0);
  });
});
