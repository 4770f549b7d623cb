export type LogoErrorCode = 'INVALID_PARAMETER' | 'SAMPLING_FAULT';

export class LogoError extends Error {
  readonly code: LogoErrorCode;

  constructor(code: LogoErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidParameterError extends LogoError {
  readonly param: string;

  constructor(param: string, message: string) {
    super('INVALID_PARAMETER', `${param}: ${message}`);
    this.param = param;
  }
}

/**
 * Raised when the sampled crossings cannot describe a valid split, e.g. an odd
 * crossing count that survives re-sampling.
 */
export class SamplingFaultError extends LogoError {
  constructor(message: string) {
    super('SAMPLING_FAULT', message);
  }
}

export const isLogoError = (value: unknown): value is LogoError => value instanceof LogoError;
