import { describe, expect, it } from 'vitest';
import { InvalidParameterError, LogoError, SamplingFaultError, isLogoError } from '../errors';

describe('errors', () => {
  it('prefixes parameter errors with the parameter name', () => {
    const err = new InvalidParameterError('diameter', 'must be positive');
    expect(err.message).toBe('diameter: must be positive');
    expect(err.param).toBe('diameter');
    expect(err.code).toBe('INVALID_PARAMETER');
    expect(err.name).toBe('InvalidParameterError');
    expect(err).toBeInstanceOf(LogoError);
    expect(err).toBeInstanceOf(Error);
  });

  it('tags sampling faults', () => {
    const err = new SamplingFaultError('odd crossing count');
    expect(err.code).toBe('SAMPLING_FAULT');
    expect(err.name).toBe('SamplingFaultError');
    expect(isLogoError(err)).toBe(true);
    expect(isLogoError(new Error('other'))).toBe(false);
  });
});
