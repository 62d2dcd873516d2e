import { describe, it, expect } from 'vitest';
import { ComputationError, ConfigurationError, toWarning } from './errors';

describe('toWarning', () => {
  it('should carry the scheme id of a computation error', () => {
    expect(toWarning(new ComputationError('dc (DC): annuity divisor at NRA is 0', 'dc'))).toEqual({
      kind: 'ComputationError',
      message: 'dc (DC): annuity divisor at NRA is 0',
      schemeId: 'dc',
    });
  });

  it('should omit the scheme id when a configuration error has none', () => {
    expect(toWarning(new ConfigurationError('Average wage for TST must be positive, got 0'))).toEqual({
      kind: 'ConfigurationError',
      message: 'Average wage for TST must be positive, got 0',
    });
  });

  it('should name each error class', () => {
    expect(new ConfigurationError('x', 'db').name).toBe('ConfigurationError');
    expect(new ComputationError('x', 'db').name).toBe('ComputationError');
  });
});
