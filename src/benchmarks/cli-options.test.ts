import { describe, expect, it } from 'vitest';

import { ValidationError } from '../errors/custom-errors.js';
import { parseArguments } from './cli-options.js';

function parseError(args: string[]): ValidationError {
  try {
    parseArguments(args);
  } catch (error) {
    if (error instanceof ValidationError) {
      return error;
    }
    throw error;
  }
  throw new Error(`Expected ${args.join(' ')} to be rejected`);
}

describe('parseArguments', () => {
  it('should default to console output', () => {
    expect(parseArguments([])).toEqual({ format: 'console', help: false });
  });

  it('should read iterations and format', () => {
    expect(parseArguments(['--iterations', '1000', '--format', 'json'])).toEqual({
      format: 'json',
      iterations: 1000,
      help: false,
    });
  });

  it('should accept zero iterations', () => {
    expect(parseArguments(['--iterations', '0']).iterations).toBe(0);
  });

  it('should recognise help flags', () => {
    expect(parseArguments(['--help']).help).toBe(true);
    expect(parseArguments(['-h']).help).toBe(true);
  });

  it('should reject unknown options', () => {
    expect(parseError(['--bogus']).message).toBe('Unknown option: --bogus');
    expect(parseError(['1000']).message).toBe('Unknown option: 1000');
  });

  it('should reject an option without a value', () => {
    expect(parseError(['--format']).message).toBe('Option --format requires a value');
    expect(parseError(['--iterations', '-5']).message).toBe(
      'Option --iterations requires a value',
    );
  });

  it('should reject a fractional iteration count', () => {
    const error = parseError(['--iterations', '1.5']);

    expect(error.message).toBe('Invalid command line options');
    expect(error.fields).toEqual({ iterations: ['Expected a non-negative integer'] });
  });

  it('should reject an unknown format', () => {
    const error = parseError(['--format', 'xml']);

    expect(Object.keys(error.fields ?? {})).toEqual(['format']);
  });
});
