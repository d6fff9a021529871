import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { runMigrations } from '../../db/migrate.js';
import { createFeed } from '../feeds.js';
import { deleteEntry, getEntry, listEntries, recordEntries, recordEntry } from '../entries.js';
import { NotFoundError, ValidationError } from '../../shared/errors.js';

let db: Database.Database;
let feedId: number;

function entryCount(): number {
  return (db.prepare('SELECT COUNT(*) AS n FROM feed_entries').get() as { n: number }).n;
}

beforeEach(() => {
  db = new Database(':memory:');
  db.pragma('foreign_keys = ON');
  runMigrations(db);
  feedId = createFeed(db, { url: 'gemini://a/' });
});

afterEach(() => {
  db.close();
});

describe('recordEntry', () => {
  it('inserts an entry and returns its id', () => {
    const result = recordEntry(db, {
      feedId,
      title: 'Hello',
      publishedAt: '2021-01-01',
      url: 'gemini://a/hello.gmi',
    });
    expect(result).toEqual({ status: 'inserted', id: 1 });
    expect(getEntry(db, 1)).toEqual({
      id: 1,
      feed_id: feedId,
      title: 'Hello',
      published_at: '2021-01-01',
      url: 'gemini://a/hello.gmi',
    });
  });

  it('reports a duplicate for the same feed, date and url', () => {
    const entry = { feedId, title: 'T', publishedAt: '2021-01-01', url: 'gemini://a/1' };
    recordEntry(db, entry);
    expect(recordEntry(db, entry)).toEqual({ status: 'duplicate' });
    expect(entryCount()).toBe(1);
  });

  it('treats a changed title as the same entry', () => {
    recordEntry(db, { feedId, title: 'Old', publishedAt: '2021-01-01', url: 'gemini://a/1' });
    expect(recordEntry(db, { feedId, title: 'New', publishedAt: '2021-01-01', url: 'gemini://a/1' })).toEqual({
      status: 'duplicate',
    });
    expect(getEntry(db, 1)?.title).toBe('Old');
  });

  it('keeps entries that differ in date, url or feed', () => {
    const other = createFeed(db, { url: 'gemini://b/' });
    recordEntry(db, { feedId, title: 'T', publishedAt: '2021-01-01', url: 'gemini://a/1' });
    expect(recordEntry(db, { feedId, title: 'T', publishedAt: '2021-01-02', url: 'gemini://a/1' }).status).toBe(
      'inserted',
    );
    expect(recordEntry(db, { feedId, title: 'T', publishedAt: '2021-01-01', url: 'gemini://a/2' }).status).toBe(
      'inserted',
    );
    expect(
      recordEntry(db, { feedId: other, title: 'T', publishedAt: '2021-01-01', url: 'gemini://a/1' }).status,
    ).toBe('inserted');
    expect(entryCount()).toBe(4);
  });

  it('accepts full ISO date-times', () => {
    const result = recordEntry(db, {
      feedId,
      title: 'T',
      publishedAt: '2021-01-01T10:30:00Z',
      url: 'gemini://a/1',
    });
    expect(result.status).toBe('inserted');
    expect(getEntry(db, 1)?.published_at).toBe('2021-01-01T10:30:00.000Z');
  });

  it('throws NotFoundError for an unknown feed', () => {
    expect(() =>
      recordEntry(db, { feedId: 99, title: 'T', publishedAt: '2021-01-01', url: 'gemini://a/1' }),
    ).toThrow(NotFoundError);
  });

  it('validates its input', () => {
    expect(() => recordEntry(db, { feedId, title: '', publishedAt: '2021-01-01', url: 'gemini://a/1' })).toThrow(
      ValidationError,
    );
    expect(() => recordEntry(db, { feedId, title: 'T', publishedAt: 'yesterday', url: 'gemini://a/1' })).toThrow(
      ValidationError,
    );
    expect(() => recordEntry(db, { feedId: 0, title: 'T', publishedAt: '2021-01-01', url: 'gemini://a/1' })).toThrow(
      ValidationError,
    );
  });
});

describe('recordEntries', () => {
  it('counts inserted and duplicate entries', () => {
    recordEntry(db, { feedId, title: 'One', publishedAt: '2021-01-01', url: 'gemini://a/1' });

    const stats = recordEntries(db, feedId, [
      { title: 'One', publishedAt: '2021-01-01', url: 'gemini://a/1' },
      { title: 'Two', publishedAt: '2021-01-02', url: 'gemini://a/2' },
      { title: 'Two', publishedAt: '2021-01-02', url: 'gemini://a/2' },
    ]);
    expect(stats).toEqual({ inserted: 1, duplicates: 2 });
    expect(entryCount()).toBe(2);
  });

  it('returns zero counts for an empty batch', () => {
    expect(recordEntries(db, feedId, [])).toEqual({ inserted: 0, duplicates: 0 });
  });

  it('rolls back the whole batch on an invalid entry', () => {
    expect(() =>
      recordEntries(db, feedId, [
        { title: 'Good', publishedAt: '2021-01-01', url: 'gemini://a/1' },
        { title: 'Bad', publishedAt: 'not-a-date', url: 'gemini://a/2' },
      ]),
    ).toThrow(ValidationError);
    expect(entryCount()).toBe(0);
  });

  it('rolls back when the feed does not exist', () => {
    expect(() =>
      recordEntries(db, 99, [{ title: 'T', publishedAt: '2021-01-01', url: 'gemini://a/1' }]),
    ).toThrow(NotFoundError);
    expect(entryCount()).toBe(0);
  });
});

describe('listEntries', () => {
  beforeEach(() => {
    recordEntry(db, { feedId, title: 'Third', publishedAt: '2021-03-01', url: 'gemini://a/3' });
    recordEntry(db, { feedId, title: 'First', publishedAt: '2021-01-01', url: 'gemini://a/1' });
    recordEntry(db, { feedId, title: 'Second', publishedAt: '2021-02-01', url: 'gemini://a/2' });
  });

  it('lists entries in publish order', () => {
    expect(listEntries(db, feedId).map((e) => e.title)).toEqual(['First', 'Second', 'Third']);
  });

  it('breaks publish-time ties by id', () => {
    recordEntry(db, { feedId, title: 'Also second', publishedAt: '2021-02-01', url: 'gemini://a/2b' });
    expect(listEntries(db, feedId).map((e) => e.title)).toEqual(['First', 'Second', 'Also second', 'Third']);
  });

  it('returns only entries published after the cursor', () => {
    expect(listEntries(db, feedId, { since: '2021-01-01' }).map((e) => e.title)).toEqual(['Second', 'Third']);
    expect(listEntries(db, feedId, { since: '2021-03-01' })).toEqual([]);
  });

  it('does not include other feeds', () => {
    const other = createFeed(db, { url: 'gemini://b/' });
    recordEntry(db, { feedId: other, title: 'Elsewhere', publishedAt: '2021-01-15', url: 'gemini://b/1' });
    expect(listEntries(db, feedId)).toHaveLength(3);
    expect(listEntries(db, other).map((e) => e.title)).toEqual(['Elsewhere']);
  });

  it('rejects a malformed cursor', () => {
    expect(() => listEntries(db, feedId, { since: 'last week' })).toThrow(ValidationError);
  });
});

describe('date-times with offsets', () => {
  beforeEach(() => {
    recordEntry(db, { feedId, title: 'Later', publishedAt: '2021-01-01T06:00:00Z', url: 'gemini://a/later' });
    recordEntry(db, { feedId, title: 'Earlier', publishedAt: '2021-01-01T10:00:00+05:00', url: 'gemini://a/earlier' });
  });

  it('stores the instant in UTC', () => {
    expect(listEntries(db, feedId).map((e) => e.published_at)).toEqual([
      '2021-01-01T05:00:00.000Z',
      '2021-01-01T06:00:00.000Z',
    ]);
  });

  it('lists by instant rather than by the written text', () => {
    expect(listEntries(db, feedId).map((e) => e.title)).toEqual(['Earlier', 'Later']);
  });

  it('compares the cursor as an instant', () => {
    expect(listEntries(db, feedId, { since: '2021-01-01T05:30:00Z' }).map((e) => e.title)).toEqual(['Later']);
    expect(listEntries(db, feedId, { since: '2021-01-01T07:30:00+02:00' }).map((e) => e.title)).toEqual(['Later']);
  });

  it('treats the same instant under another offset as a duplicate', () => {
    expect(
      recordEntry(db, { feedId, title: 'Earlier', publishedAt: '2021-01-01T05:00:00Z', url: 'gemini://a/earlier' }),
    ).toEqual({ status: 'duplicate' });
    expect(entryCount()).toBe(2);
  });
});

describe('deleteEntry', () => {
  it('removes the entry', () => {
    const result = recordEntry(db, { feedId, title: 'T', publishedAt: '2021-01-01', url: 'gemini://a/1' });
    if (result.status !== 'inserted') throw new Error('expected insert');

    deleteEntry(db, result.id);
    expect(getEntry(db, result.id)).toBeUndefined();
  });

  it('throws NotFoundError for an unknown id', () => {
    expect(() => deleteEntry(db, 5)).toThrow('No feed entry with ID 5 exists');
  });
});
