import { describe, it, expect } from 'vitest';
import { AuthCoreContextValidator } from '../../../src/core/validators.js';
import { createTestAuthCore } from '../../../src/testing/index.js';

describe('AuthCoreContextValidator', () => {
  it('should accept a fully wired context', () => {
    const { context } = createTestAuthCore();

    expect(() => AuthCoreContextValidator.validate(context)).not.toThrow();
    expect(AuthCoreContextValidator.isValid(context)).toBe(true);
  });

  it('should reject non-objects', () => {
    expect(() => AuthCoreContextValidator.validate(null)).toThrow(
      'Configuration error: AuthCoreContext must be an object'
    );
    expect(AuthCoreContextValidator.isValid('context')).toBe(false);
  });

  it('should name the first missing component', () => {
    const { context } = createTestAuthCore();
    const { refreshCoordinator: _omitted, ...partial } = context;

    expect(() => AuthCoreContextValidator.validate(partial)).toThrow(
      'Configuration error: AuthCoreContext missing required component: refreshCoordinator'
    );
    expect(AuthCoreContextValidator.isValid(partial)).toBe(false);
  });

  it('should treat the sweeper as optional', () => {
    const { context } = createTestAuthCore();
    const { sweeper: _omitted, ...partial } = context;

    expect(AuthCoreContextValidator.isValid(partial)).toBe(true);
  });
});
