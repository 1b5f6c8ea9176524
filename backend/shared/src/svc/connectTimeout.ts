// backend/shared/src/svc/connectTimeout.ts
/**
 * Purpose:
 * - Bound only the connect phase of an outbound request. Once the socket is
 *   connected the server may take as long as it needs to answer (the execute
 *   endpoint runs the MCP agent before it responds).
 * - Plugged into axios through its `transport` option.
 */

import http from "node:http";
import https from "node:https";

export class ConnectTimeoutError extends Error {
  public readonly code = "ETIMEDOUT";

  constructor(public readonly timeoutMs: number) {
    super(`no connection within ${timeoutMs}ms`);
    this.name = "ConnectTimeoutError";
  }
}

export interface ConnectingSocket {
  readonly connecting: boolean;
  once(event: "connect" | "close", listener: () => void): unknown;
}

export interface ConnectingRequest {
  once(event: "socket", listener: (socket: ConnectingSocket) => void): unknown;
  destroy(error: Error): unknown;
}

/** Destroy `req` when its socket has not connected within `timeoutMs`. */
export function watchConnect(req: ConnectingRequest, timeoutMs: number): void {
  req.once("socket", (socket) => {
    // reused keep-alive socket
    if (!socket.connecting) return;
    const timer = setTimeout(() => req.destroy(new ConnectTimeoutError(timeoutMs)), timeoutMs);
    const clear = () => clearTimeout(timer);
    socket.once("connect", clear);
    socket.once("close", clear);
  });
}

export interface Transport {
  request(
    options: http.RequestOptions,
    callback?: (res: http.IncomingMessage) => void
  ): http.ClientRequest;
}

/** http/https transport whose requests carry a connect timeout. */
export function connectTimeoutTransport(timeoutMs: number): Transport {
  return {
    request(options, callback) {
      const req =
        options.protocol === "https:"
          ? https.request(options, callback)
          : http.request(options, callback);
      watchConnect(req, timeoutMs);
      return req;
    },
  };
}
