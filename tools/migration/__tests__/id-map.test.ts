import { describe, it, expect } from 'vitest';
import { IdMap } from '../id-map';

describe('IdMap', () => {
  it('assigns keys per table starting at 1', () => {
    const ids = new IdMap();
    expect(ids.assign('account', 'a1')).toBe(1);
    expect(ids.assign('account', 'a2')).toBe(2);
    expect(ids.assign('project', 'a1')).toBe(1);
  });

  it('is idempotent for a known original ID', () => {
    const ids = new IdMap();
    ids.assign('account', 'a1');
    expect(ids.assign('account', 'a1')).toBe(1);
    expect(ids.count('account')).toBe(1);
    expect(ids.assign('account', 'a2')).toBe(2);
  });

  it('returns null for unmapped lookups', () => {
    const ids = new IdMap();
    ids.assign('account', 'a1');
    expect(ids.lookup('account', 'a1')).toBe(1);
    expect(ids.lookup('account', 'missing')).toBeNull();
    expect(ids.lookup('project', 'a1')).toBeNull();
  });

  it('keeps tables apart even when names contain separators', () => {
    const ids = new IdMap();
    ids.assign('a:b', 'c');
    expect(ids.has('a', 'b:c')).toBe(false);
  });

  it('previews the next key without assigning it', () => {
    const ids = new IdMap();
    expect(ids.peekNext('event')).toBe(1);
    ids.assign('event', 'e1');
    expect(ids.peekNext('event')).toBe(2);
    expect(ids.count('event')).toBe(1);
  });

  it('reports statistics by table', () => {
    const ids = new IdMap();
    ids.assign('project', 'p1');
    ids.assign('account', 'a1');
    ids.assign('account', 'a2');
    expect(ids.stats()).toEqual({ totalMappings: 3, byTable: { account: 2, project: 1 } });
  });
});
