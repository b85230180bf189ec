import { err, ok, type Result } from 'neverthrow';

export interface HostPort {
  /** null binds every interface */
  readonly host: string | null;
  readonly port: number;
}

/**
 * Parse `host:port`, `:port` or `[ipv6]:port`.
 */
export function parseHostPort(input: string): Result<HostPort, string> {
  const separator = input.lastIndexOf(':');
  if (separator < 0) {
    return err(`missing port in address "${input}"`);
  }

  let host = input.slice(0, separator);
  const portText = input.slice(separator + 1);

  if (host.startsWith('[') && host.endsWith(']')) {
    host = host.slice(1, -1);
  } else if (host.includes(':')) {
    return err(`IPv6 address "${input}" must be bracketed, e.g. [::1]:8080`);
  }

  if (!/^\d+$/.test(portText)) {
    return err(`invalid port "${portText}"`);
  }
  const port = Number(portText);
  if (port > 65535) {
    return err(`port ${port} out of range (0-65535)`);
  }

  return ok({ host: host === '' ? null : host, port });
}

export function formatHostPort(address: HostPort): string {
  if (address.host === null) return `:${address.port}`;
  return address.host.includes(':') ? `[${address.host}]:${address.port}` : `${address.host}:${address.port}`;
}
