import { describe, it, expect } from 'vitest';
import { Container, createToken } from '../../src/di/container.js';
import { NotFoundError } from '../../src/infra/errors.js';

describe('Container', () => {
  it('returns the same instance for singletons', () => {
    const token = createToken<{ id: number }>('obj');
    const c = new Container();
    let count = 0;
    c.register(token, () => ({ id: ++count }));
    expect(c.resolve(token)).toBe(c.resolve(token));
    expect(count).toBe(1);
  });

  it('builds a new instance for transients', () => {
    const token = createToken<{ id: number }>('obj');
    const c = new Container();
    let count = 0;
    c.register(token, () => ({ id: ++count }), 'transient');
    expect(c.resolve(token).id).toBe(1);
    expect(c.resolve(token).id).toBe(2);
  });

  it('registers prebuilt values', () => {
    const token = createToken<string>('name');
    const c = new Container().value(token, 'enum');
    expect(c.resolve(token)).toBe('enum');
  });

  it('throws NotFoundError naming the token', () => {
    const token = createToken<string>('missing');
    const c = new Container();
    expect(() => c.resolve(token)).toThrow(NotFoundError);
    expect(() => c.resolve(token)).toThrow('Registration not found: missing');
  });

  it('resolves dependencies through the container', () => {
    const nameToken = createToken<string>('name');
    const greetToken = createToken<string>('greet');
    const c = new Container()
      .register(nameToken, () => 'World')
      .register(greetToken, (cont) => `Hello, ${cont.resolve(nameToken)}!`);
    expect(c.resolve(greetToken)).toBe('Hello, World!');
  });

  it('falls back to the parent and lets the child override', () => {
    const token = createToken<string>('t');
    const parent = new Container().register(token, () => 'parent');
    const child = parent.createChild();
    expect(child.has(token)).toBe(true);
    expect(child.resolve(token)).toBe('parent');
    child.register(token, () => 'child');
    expect(child.resolve(token)).toBe('child');
    expect(parent.resolve(token)).toBe('parent');
  });

  it('disposes built singletons only', async () => {
    const built = createToken<{ disposed: boolean; dispose(): void }>('built');
    const unbuilt = createToken<{ disposed: boolean; dispose(): void }>('unbuilt');
    let unbuiltCreated = false;
    const c = new Container()
      .register(built, () => ({ disposed: false, dispose() { this.disposed = true; } }))
      .register(unbuilt, () => {
        unbuiltCreated = true;
        return { disposed: false, dispose() { this.disposed = true; } };
      });
    const inst = c.resolve(built);

    expect(await c.dispose()).toEqual([]);
    expect(inst.disposed).toBe(true);
    expect(unbuiltCreated).toBe(false);
    expect(c.has(built)).toBe(false);
  });

  it('keeps disposing after a failure and returns the failures', async () => {
    const bad = createToken<{ dispose(): void }>('bad');
    const good = createToken<{ disposed: boolean; dispose(): Promise<void> }>('good');
    const boom = new Error('boom');
    const c = new Container()
      .register(bad, () => ({ dispose() { throw boom; } }))
      .register(good, () => ({ disposed: false, async dispose() { this.disposed = true; } }));
    c.resolve(bad);
    const inst = c.resolve(good);

    expect(await c.dispose()).toEqual([boom]);
    expect(inst.disposed).toBe(true);
  });
});
