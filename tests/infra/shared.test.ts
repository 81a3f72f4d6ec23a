import { describe, it, expect } from 'vitest';
import { SharedHandle } from '../../src/infra/shared.js';
import { InvariantViolationError } from '../../src/infra/errors.js';

class Resource {
  disposeCount = 0;
  dispose(): void {
    this.disposeCount++;
  }
}

describe('SharedHandle', () => {
  it('starts with one reference', () => {
    const handle = SharedHandle.create(new Resource());
    expect(handle.refCount).toBe(1);
    expect(handle.isReleased).toBe(false);
  });

  it('disposes when the only handle is released', () => {
    const res = new Resource();
    const handle = SharedHandle.create(res);
    expect(handle.release()).toBe(true);
    expect(res.disposeCount).toBe(1);
  });

  it('keeps the value alive until every clone is released', () => {
    const res = new Resource();
    const a = SharedHandle.create(res);
    const b = a.clone();
    expect(a.refCount).toBe(2);
    expect(b.value).toBe(res);
    expect(a.sameAs(b)).toBe(true);

    expect(a.release()).toBe(false);
    expect(res.disposeCount).toBe(0);
    expect(b.refCount).toBe(1);

    expect(b.release()).toBe(true);
    expect(res.disposeCount).toBe(1);
  });

  it('ignores a second release of the same handle', () => {
    const res = new Resource();
    const a = SharedHandle.create(res);
    const b = a.clone();
    a.release();
    expect(a.release()).toBe(false);
    expect(b.refCount).toBe(1);
    expect(res.disposeCount).toBe(0);
  });

  it('rejects access and cloning after release', () => {
    const a = SharedHandle.create(new Resource());
    a.release();
    expect(() => a.value).toThrow(InvariantViolationError);
    expect(() => a.clone()).toThrow('Cannot clone a released shared handle');
  });

  it('distinguishes handles to different values', () => {
    const a = SharedHandle.create(new Resource());
    const b = SharedHandle.create(new Resource());
    expect(a.sameAs(b)).toBe(false);
  });
});
