/**
 * TCP listener that binds first and serves later.
 *
 * The socket is opened with pauseOnConnect, so connections accepted between
 * bind and serve() wait in a queue instead of reaching a handler. That lets
 * the caller record the bound address before the first request is handled.
 * On serve(), queued and new connections are handed to an http.Server built
 * from the Hono fetch handler via @hono/node-server's getRequestListener.
 */

import {
  createServer as createHttpServer,
  type Server as HttpServer,
} from "node:http";
import {
  createServer as createNetServer,
  type AddressInfo,
  type Server as NetServer,
  type Socket,
} from "node:net";
import { getRequestListener } from "@hono/node-server";
import {
  dialArgs,
  formatAddress,
  type AddressDescriptor,
} from "@gatehouse/core/address";
import { BindError } from "@gatehouse/core/errors";

export type FetchHandler = (request: Request) => Response | Promise<Response>;

export interface BoundListener {
  /** The address the OS actually bound, port 0 resolved. */
  address(): AddressInfo;
  /**
   * Start serving. The returned promise is the serving activity: it settles
   * once, with the error that stopped it or undefined after close(), and
   * never rejects.
   */
  serve(fetch: FetchHandler): Promise<Error | undefined>;
  /** Stop accepting and let in-flight requests finish. Idempotent. */
  close(): void;
}

export type BindListener = (
  descriptor: AddressDescriptor,
) => Promise<BoundListener>;

export const bindTcpListener: BindListener = async (descriptor) => {
  const { network, host, port, hostPort } = dialArgs(descriptor);
  const server = createNetServer({ pauseOnConnect: true });

  await new Promise<void>((resolve, reject) => {
    const onError = (err: Error) => {
      reject(new BindError(formatAddress(descriptor), err, { hostPort }));
    };
    server.once("error", onError);
    server.listen(
      { host, port, ipv6Only: network === "tcp6" },
      () => {
        server.removeListener("error", onError);
        resolve();
      },
    );
  });

  return new TcpListener(server);
};

class TcpListener implements BoundListener {
  private http: HttpServer | null = null;
  private activity: Promise<Error | undefined> | null = null;
  private settle: ((err: Error | undefined) => void) | null = null;
  private failure: Error | undefined;
  private closed = false;
  private readonly pending: Socket[] = [];
  /** Handed-over sockets and their in-flight request count. */
  private readonly sockets = new Map<Socket, number>();

  constructor(private readonly server: NetServer) {
    server.on("connection", (socket) => this.onConnection(socket));
    server.on("error", (err) => {
      this.failure ??= err;
      this.close();
      this.settle?.(err);
    });
    server.once("close", () => this.settle?.(this.failure));
  }

  address(): AddressInfo {
    const addr = this.server.address();
    if (!addr || typeof addr === "string") {
      throw new Error("Listener has no TCP address");
    }
    return addr;
  }

  serve(fetch: FetchHandler): Promise<Error | undefined> {
    if (this.activity) {
      throw new Error("Listener is already serving");
    }

    this.activity = new Promise((resolve) => {
      if (this.closed) {
        resolve(this.failure);
        return;
      }
      this.settle = resolve;
    });

    const requestListener = getRequestListener(fetch);
    const http = createHttpServer((req, res) => {
      const socket = req.socket;
      this.sockets.set(socket, (this.sockets.get(socket) ?? 0) + 1);
      res.once("close", () => this.onResponseClosed(socket));
      if (this.closed) {
        res.setHeader("connection", "close");
      }
      return requestListener(req, res);
    });
    this.http = http;

    for (const socket of this.pending.splice(0)) {
      this.handOver(http, socket);
    }
    return this.activity;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;

    this.server.close();
    for (const socket of this.pending.splice(0)) {
      socket.destroy();
    }
    for (const [socket, inflight] of this.sockets) {
      if (inflight === 0) socket.destroy();
    }
  }

  private onConnection(socket: Socket): void {
    if (this.closed) {
      socket.destroy();
      return;
    }
    if (!this.http) {
      this.pending.push(socket);
      socket.once("error", () => {
        const idx = this.pending.indexOf(socket);
        if (idx >= 0) this.pending.splice(idx, 1);
        socket.destroy();
      });
      return;
    }
    this.handOver(this.http, socket);
  }

  private handOver(http: HttpServer, socket: Socket): void {
    this.sockets.set(socket, 0);
    socket.once("close", () => this.sockets.delete(socket));
    http.emit("connection", socket);
    socket.resume();
  }

  private onResponseClosed(socket: Socket): void {
    const current = this.sockets.get(socket);
    if (current === undefined) return;
    const inflight = Math.max(current - 1, 0);
    this.sockets.set(socket, inflight);
    // Keep-alive sockets that go idle during shutdown are not reused.
    if (this.closed && inflight === 0) {
      socket.end();
    }
  }
}
