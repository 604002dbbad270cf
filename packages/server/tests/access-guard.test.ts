import { describe, it, expect } from 'vitest';
import { assertOwner, authorize } from '../src/auth';
import { identityOf, kindOfSync } from './helpers';

describe('authorize', () => {
  it('allows a caller on its own resources', () => {
    expect(authorize(identityOf('user-1'), 'user-1')).toBe('allow');
  });

  it('denies a caller on anyone else', () => {
    expect(authorize(identityOf('user-1'), 'user-2')).toBe('deny');
    expect(authorize(identityOf('user-1'), 'USER-1')).toBe('deny');
    expect(authorize(identityOf('user-1'), '')).toBe('deny');
  });
});

describe('assertOwner', () => {
  it('passes for the owner', () => {
    expect(kindOfSync(() => assertOwner(identityOf('user-1'), 'user-1'))).toBeNull();
  });

  it('throws FORBIDDEN for anyone else', () => {
    expect(kindOfSync(() => assertOwner(identityOf('user-1'), 'user-2'))).toBe('FORBIDDEN');
  });
});
