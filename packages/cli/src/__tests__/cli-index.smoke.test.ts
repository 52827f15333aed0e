import { describe, it, expect, vi, beforeAll } from 'vitest';
import { ConfigError, ErrorCode } from '@schemock/core';

// Mock commander to avoid real CLI execution side-effects
class FakeCommand {
  name(): this {
    return this;
  }
  description(): this {
    return this;
  }
  version(): this {
    return this;
  }
  command(): this {
    return this;
  }
  option(): this {
    return this;
  }
  action(): this {
    return this;
  }
  parseAsync(): Promise<void> {
    return Promise.resolve();
  }
}

vi.mock('commander', () => ({ Command: FakeCommand }));

// Avoid accidental process.exit when error paths are exercised
beforeAll(() => {
  vi.spyOn(process, 'exit').mockImplementation((code?: string | number | null) => {
    throw new Error(`process.exit(${String(code ?? 0)}) intercepted in tests`);
  });
});

describe('CLI index smoke', () => {
  it('imports the CLI module with mocked commander', async () => {
    const mod = await import('../index.js');
    expect(typeof mod.main).toBe('function');
    await expect(mod.main(['node', 'schemock'])).resolves.toBeUndefined();
  });

  it('keeps SchemockError values as they are', async () => {
    const { toSchemockError } = await import('../index.js');
    const error = new ConfigError({ message: 'bad seed', setting: 'seed' });
    expect(toSchemockError(error)).toBe(error);
  });

  it('maps foreign errors to the internal error code', async () => {
    const { toSchemockError } = await import('../index.js');
    const mapped = toSchemockError(new TypeError('boom'));
    expect(mapped.errorCode).toBe(ErrorCode.INTERNAL_ERROR);
    expect(mapped.message).toBe('boom');
    expect(mapped.getExitCode()).toBe(99);
  });
});
