/**
 * Error Classes Tests
 */
import { describe, test, expect } from 'vitest';
import {
  AuthenticationError,
  ConnectionError,
  Errors,
  IsabelleError,
  isEngineError,
  ProtocolError,
  ServerLaunchError,
  ValidationError,
} from '../../src/errors';

describe('IsabelleError', () => {
  test('carries message, code and name', () => {
    const error = new IsabelleError('boom', 'SOME_CODE');
    expect(error.message).toBe('boom');
    expect(error.code).toBe('SOME_CODE');
    expect(error.name).toBe('IsabelleError');
    expect(error).toBeInstanceOf(Error);
  });

  test('keeps the cause', () => {
    const cause = new Error('inner');
    expect(new IsabelleError('outer', 'X', { cause }).cause).toBe(cause);
  });
});

describe('ConnectionError', () => {
  test('defaults to CONNECTION_FAILED', () => {
    const error = new ConnectionError('refused');
    expect(error.code).toBe('CONNECTION_FAILED');
    expect(error.name).toBe('ConnectionError');
    expect(error).toBeInstanceOf(IsabelleError);
    expect(error.cause).toBeUndefined();
  });

  test('takes a specific code and cause', () => {
    const cause = new Error('ECONNRESET');
    const error = new ConnectionError('closed', 'CONNECTION_CLOSED', cause);
    expect(error.code).toBe('CONNECTION_CLOSED');
    expect(error.cause).toBe(cause);
  });
});

describe('AuthenticationError', () => {
  test('has a default message and keeps the reply', () => {
    expect(new AuthenticationError().message).toBe('Authentication failed');
    const error = new AuthenticationError('rejected', 'ERROR "Bad password"');
    expect(error.code).toBe('AUTH_FAILED');
    expect(error.response).toBe('ERROR "Bad password"');
  });
});

describe('ProtocolError', () => {
  test('describes diagnostic and payload', () => {
    const error = new ProtocolError('{oops', 'Unexpected token');
    expect(error.message).toBe('Malformed payload: Unexpected token: {oops');
    expect(error.payload).toBe('{oops');
    expect(error.diagnostic).toBe('Unexpected token');
    expect(error.code).toBe('PROTOCOL_ERROR');
  });
});

describe('ValidationError and ServerLaunchError', () => {
  test('codes and fields', () => {
    const validation = new ValidationError('Invalid port', 'port');
    expect(validation.code).toBe('VALIDATION_ERROR');
    expect(validation.field).toBe('port');

    const launch = new ServerLaunchError('no banner');
    expect(launch.code).toBe('SERVER_LAUNCH_FAILED');
    expect(launch.name).toBe('ServerLaunchError');
  });
});

describe('isEngineError', () => {
  test('is true for protocol breakage only', () => {
    expect(isEngineError(new ConnectionError('x'))).toBe(true);
    expect(isEngineError(new AuthenticationError())).toBe(true);
    expect(isEngineError(new ProtocolError('', 'x'))).toBe(true);
    expect(isEngineError(new ValidationError('x'))).toBe(false);
    expect(isEngineError(new Error('x'))).toBe(false);
  });
});

describe('Errors map', () => {
  test('exposes every class', () => {
    expect(Object.keys(Errors)).toEqual([
      'IsabelleError',
      'ConnectionError',
      'AuthenticationError',
      'ProtocolError',
      'ValidationError',
      'ServerLaunchError',
    ]);
  });
});
