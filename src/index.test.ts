import { describe, it, expect } from 'vitest';
import { createApp, errorStatus } from './index';
import { ApiError } from './api/errors';
import { ConfigurationError, ComputationError } from './utils/calculate-pension/errors';
import { UnknownCountryError } from './utils/panorama/runner';

describe('errorStatus', () => {
  it('should use the status carried by an ApiError', () => {
    expect(errorStatus(new ApiError('sex must be one of: male, female, total', 400))).toBe(400);
    expect(errorStatus(new ApiError('Country XYZ not found', 404))).toBe(404);
  });

  it('should map an unknown country to 404', () => {
    expect(errorStatus(new UnknownCountryError('XYZ'))).toBe(404);
  });

  it('should map invalid configuration to 422', () => {
    expect(errorStatus(new ConfigurationError('Invalid parameters for BAD: taxes is required'))).toBe(422);
  });

  it('should treat anything else as a server error', () => {
    expect(errorStatus(new ComputationError('dc (DC): annuity divisor at NRA is 0', 'dc'))).toBe(500);
    expect(errorStatus(new Error('Disk error'))).toBe(500);
    expect(errorStatus('failure')).toBe(500);
  });
});

describe('createApp', () => {
  it('should build an app without starting a server', () => {
    const app = createApp();

    expect(typeof app.listen).toBe('function');
  });
});
