import { describe, it, expect } from 'vitest';
import { SyncLock } from '../../src/infra/lock.js';
import { InvariantViolationError } from '../../src/infra/errors.js';

describe('SyncLock', () => {
  it('returns the value of the critical section', () => {
    const lock = new SyncLock('test');
    expect(lock.run(() => 7)).toBe(7);
    expect(lock.locked).toBe(false);
  });

  it('is held only while the section runs', () => {
    const lock = new SyncLock('test');
    let inside = false;
    lock.run(() => { inside = lock.locked; });
    expect(inside).toBe(true);
    expect(lock.locked).toBe(false);
  });

  it('rejects re-entry', () => {
    const lock = new SyncLock('test');
    expect(() => lock.run(() => lock.run(() => 1))).toThrow('Lock re-entered: test');
    expect(lock.locked).toBe(false);
  });

  it('releases after the section throws', () => {
    const lock = new SyncLock('test');
    expect(() => lock.run(() => { throw new Error('fail'); })).toThrow('fail');
    expect(lock.run(() => 'again')).toBe('again');
  });

  it('rejects a section that returns a promise', () => {
    const lock = new SyncLock('test');
    expect(() => lock.run(() => Promise.resolve(1))).toThrow(InvariantViolationError);
    expect(lock.locked).toBe(false);
  });
});
