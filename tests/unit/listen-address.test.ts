import { describe, it, expect } from 'vitest';
import { formatHostPort, parseHostPort } from '../../src/config/listen-address.js';

describe('parseHostPort', () => {
  it('treats an empty host as every interface', () => {
    expect(parseHostPort(':8080')._unsafeUnwrap()).toEqual({ host: null, port: 8080 });
  });

  it('parses a host and port', () => {
    expect(parseHostPort('127.0.0.1:0')._unsafeUnwrap()).toEqual({ host: '127.0.0.1', port: 0 });
    expect(parseHostPort('localhost:9090')._unsafeUnwrap()).toEqual({ host: 'localhost', port: 9090 });
  });

  it('unwraps a bracketed IPv6 host', () => {
    expect(parseHostPort('[::1]:8080')._unsafeUnwrap()).toEqual({ host: '::1', port: 8080 });
  });

  it('rejects an unbracketed IPv6 host', () => {
    expect(parseHostPort('::1:8080')._unsafeUnwrapErr()).toBe(
      'IPv6 address "::1:8080" must be bracketed, e.g. [::1]:8080'
    );
  });

  it('rejects a missing port', () => {
    expect(parseHostPort('localhost')._unsafeUnwrapErr()).toBe('missing port in address "localhost"');
  });

  it('rejects a non-numeric port', () => {
    expect(parseHostPort('localhost:http')._unsafeUnwrapErr()).toBe('invalid port "http"');
    expect(parseHostPort('localhost:')._unsafeUnwrapErr()).toBe('invalid port ""');
  });

  it('rejects a port above 65535', () => {
    expect(parseHostPort(':65536')._unsafeUnwrapErr()).toBe('port 65536 out of range (0-65535)');
  });
});

describe('formatHostPort', () => {
  it('renders the forms parseHostPort accepts', () => {
    expect(formatHostPort({ host: null, port: 8080 })).toBe(':8080');
    expect(formatHostPort({ host: '127.0.0.1', port: 80 })).toBe('127.0.0.1:80');
    expect(formatHostPort({ host: '::1', port: 80 })).toBe('[::1]:80');
  });
});
