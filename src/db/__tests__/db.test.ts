import { describe, it, expect } from 'vitest';
import { openDb, closeDb } from '../db.js';

describe('openDb', () => {
  it('enables foreign key enforcement', () => {
    const db = openDb(':memory:');
    try {
      expect(db.pragma('foreign_keys', { simple: true })).toBe(1);
    } finally {
      closeDb(db);
    }
  });

  it('applies the busy timeout', () => {
    const db = openDb(':memory:', { busyTimeoutMs: 1234 });
    try {
      expect(db.pragma('busy_timeout', { simple: true })).toBe(1234);
    } finally {
      closeDb(db);
    }
  });

  it('returns independent handles', () => {
    const a = openDb(':memory:');
    const b = openDb(':memory:');
    a.exec('CREATE TABLE only_in_a (x INTEGER)');
    const inB = b.prepare("SELECT name FROM sqlite_master WHERE name = 'only_in_a'").get();
    expect(inB).toBeUndefined();
    closeDb(a);
    closeDb(b);
  });
});

describe('closeDb', () => {
  it('can be called more than once', () => {
    const db = openDb(':memory:');
    closeDb(db);
    expect(db.open).toBe(false);
    expect(() => closeDb(db)).not.toThrow();
  });
});
