/**
 * Address descriptors.
 *
 * A descriptor is a self-describing, slash-separated endpoint string:
 *
 * | Descriptor                 | Network | Host        | Port |
 * |----------------------------|---------|-------------|------|
 * | /ip4/127.0.0.1/tcp/5001    | tcp4    | 127.0.0.1   | 5001 |
 * | /ip6/::1/tcp/0             | tcp6    | ::1         | 0    |
 *
 * Port 0 asks the OS for an ephemeral port; the concrete port is read back
 * from the bound socket and re-emitted in the same notation.
 */

import { isIPv4, isIPv6, type AddressInfo } from "node:net";
import { AddressError } from "../errors/catalog.js";

export type AddressFamily = "ip4" | "ip6";

export interface AddressDescriptor {
  family: AddressFamily;
  host: string;
  transport: "tcp";
  port: number;
}

export interface DialArgs {
  network: "tcp4" | "tcp6";
  host: string;
  port: number;
  /** `host:port`, with IPv6 hosts bracketed. */
  hostPort: string;
}

const MAX_PORT = 65535;

/** Parse a descriptor string. Throws AddressError on anything malformed. */
export function parseAddress(text: string): AddressDescriptor {
  if (!text.startsWith("/")) {
    throw new AddressError(
      `Invalid address "${text}": must begin with "/"`,
      { address: text },
    );
  }

  const parts = text.slice(1).split("/");
  if (parts.length !== 4) {
    throw new AddressError(
      `Invalid address "${text}": expected /<ip4|ip6>/<host>/tcp/<port>`,
      { address: text },
    );
  }

  const [family, host, transport, portText] = parts;

  if (family !== "ip4" && family !== "ip6") {
    throw new AddressError(
      `Invalid address "${text}": unsupported network family "${family}"`,
      { address: text },
    );
  }
  if (transport !== "tcp") {
    throw new AddressError(
      `Invalid address "${text}": unsupported transport "${transport}"`,
      { address: text },
    );
  }

  return validate({ family, host, transport, port: parsePort(portText, text) }, text);
}

/** Re-emit a descriptor in canonical notation. */
export function formatAddress(descriptor: AddressDescriptor): string {
  return `/${descriptor.family}/${descriptor.host}/${descriptor.transport}/${descriptor.port}`;
}

/** Network and host arguments for opening a socket on the descriptor. */
export function dialArgs(descriptor: AddressDescriptor): DialArgs {
  const network = descriptor.family === "ip4" ? "tcp4" : "tcp6";
  const hostPort =
    descriptor.family === "ip6"
      ? `[${descriptor.host}]:${descriptor.port}`
      : `${descriptor.host}:${descriptor.port}`;
  return { network, host: descriptor.host, port: descriptor.port, hostPort };
}

/** Build a descriptor from the address a socket is actually bound to. */
export function fromSocketAddress(info: AddressInfo): AddressDescriptor {
  let family: AddressFamily;
  if (info.family === "IPv4") {
    family = "ip4";
  } else if (info.family === "IPv6") {
    family = "ip6";
  } else {
    throw new AddressError(`Unsupported socket family "${info.family}"`, {
      address: info.address,
    });
  }
  return { family, host: info.address, transport: "tcp", port: info.port };
}

/**
 * Accept either a descriptor or the `host:port` shorthand and return the
 * canonical descriptor string.
 *
 * - ":8080"            -> /ip4/0.0.0.0/tcp/8080
 * - "localhost:8080"   -> /ip4/127.0.0.1/tcp/8080
 * - "[::1]:8080"       -> /ip6/::1/tcp/8080
 */
export function normalizeAddress(text: string): string {
  if (text.startsWith("/")) {
    return formatAddress(parseAddress(text));
  }

  const bracketed = /^\[([^\]]+)\]:([^:]+)$/.exec(text);
  if (bracketed) {
    const [, host, portText] = bracketed;
    return formatAddress(
      validate(
        { family: "ip6", host, transport: "tcp", port: parsePort(portText, text) },
        text,
      ),
    );
  }

  const sep = text.lastIndexOf(":");
  if (sep < 0) {
    throw new AddressError(
      `Invalid address "${text}": expected a descriptor or host:port`,
      { address: text },
    );
  }

  const rawHost = text.slice(0, sep);
  const port = parsePort(text.slice(sep + 1), text);
  let host = rawHost;
  if (rawHost === "") host = "0.0.0.0";
  else if (rawHost === "localhost") host = "127.0.0.1";

  return formatAddress(validate({ family: "ip4", host, transport: "tcp", port }, text));
}

function parsePort(portText: string, address: string): number {
  if (!/^\d{1,5}$/.test(portText)) {
    throw new AddressError(
      `Invalid address "${address}": port "${portText}" is not a number`,
      { address },
    );
  }
  const port = Number(portText);
  if (port > MAX_PORT) {
    throw new AddressError(
      `Invalid address "${address}": port ${port} out of range`,
      { address },
    );
  }
  return port;
}

function validate(
  descriptor: AddressDescriptor,
  address: string,
): AddressDescriptor {
  const ok =
    descriptor.family === "ip4"
      ? isIPv4(descriptor.host)
      : isIPv6(descriptor.host);
  if (!ok) {
    throw new AddressError(
      `Invalid address "${address}": "${descriptor.host}" is not a valid ${descriptor.family} host`,
      { address },
    );
  }
  return descriptor;
}
