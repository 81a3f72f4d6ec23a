import { NotFoundError } from '../infra/errors.js';

export type Token<T> = symbol & { __type?: T };

export function createToken<T>(name: string): Token<T> {
  return Symbol(name) as Token<T>;
}

type Scope = 'singleton' | 'transient';

interface Registration<T> {
  factory: (container: Container) => T;
  scope: Scope;
  instance?: T;
}

export interface Disposable {
  dispose(): void | Promise<void>;
}

function isDisposable(value: unknown): value is Disposable {
  return (
    typeof value === 'object' &&
    value !== null &&
    'dispose' in value &&
    typeof value.dispose === 'function'
  );
}

export class Container {
  private registrations = new Map<symbol, Registration<unknown>>();
  private parent?: Container;

  register<T>(token: Token<T>, factory: (c: Container) => T, scope: Scope = 'singleton'): this {
    this.registrations.set(token, { factory, scope });
    return this;
  }

  /** Registers an already-built value as a singleton. */
  value<T>(token: Token<T>, instance: T): this {
    this.registrations.set(token, { factory: () => instance, scope: 'singleton', instance });
    return this;
  }

  resolve<T>(token: Token<T>): T {
    const reg = this.registrations.get(token) as Registration<T> | undefined;
    if (reg) {
      if (reg.scope === 'singleton') {
        if (reg.instance === undefined) {
          reg.instance = reg.factory(this);
        }
        return reg.instance;
      }
      return reg.factory(this);
    }
    if (this.parent) {
      return this.parent.resolve(token);
    }
    throw new NotFoundError('Registration', token.description ?? String(token));
  }

  has<T>(token: Token<T>): boolean {
    if (this.registrations.has(token)) return true;
    if (this.parent) return this.parent.has(token);
    return false;
  }

  createChild(): Container {
    const child = new Container();
    child.parent = this;
    return child;
  }

  /**
   * Disposes every singleton that was built, in registration order. A failing
   * dispose does not stop the others; the failures are returned.
   */
  async dispose(): Promise<unknown[]> {
    const failures: unknown[] = [];
    for (const reg of this.registrations.values()) {
      if (reg.instance !== undefined && isDisposable(reg.instance)) {
        try {
          await reg.instance.dispose();
        } catch (e) {
          failures.push(e);
        }
      }
    }
    this.registrations.clear();
    return failures;
  }
}
