/**
 * Minimal gRPC server for the BuildKit session.
 *
 * The engine dials back over the hijacked session connection and speaks
 * HTTP/2 gRPC to us. Only unary methods are needed; anything not
 * registered is answered with UNIMPLEMENTED.
 */

import http2 from "node:http2";
import type { Duplex } from "node:stream";

import { GRPC_HEALTH_CHECK } from "../constants.js";
import { SessionError } from "../errors.js";
import { log } from "../logger.js";
import { lookupMessage } from "./proto.js";

/** Unary handler: raw request message in, raw response message out. */
export type UnaryHandler = (request: Buffer) => Promise<Uint8Array> | Uint8Array;

export type GrpcHandlers = ReadonlyMap<string, UnaryHandler>;

const GRPC_STATUS = {
  OK: "0",
  INTERNAL: "13",
  UNIMPLEMENTED: "12",
} as const;

const FRAME_HEADER_SIZE = 5;

/** Wrap a message in the gRPC length-prefixed frame (uncompressed). */
export function frameMessage(payload: Uint8Array): Buffer {
  const frame = Buffer.alloc(FRAME_HEADER_SIZE + payload.length);
  frame.writeUInt8(0, 0);
  frame.writeUInt32BE(payload.length, 1);
  frame.set(payload, FRAME_HEADER_SIZE);
  return frame;
}

/** Split a buffer of gRPC frames into their messages. Trailing partial frames are dropped. */
export function unframeMessages(data: Buffer): Buffer[] {
  const messages: Buffer[] = [];
  let offset = 0;
  while (offset + FRAME_HEADER_SIZE <= data.length) {
    const length = data.readUInt32BE(offset + 1);
    const end = offset + FRAME_HEADER_SIZE + length;
    if (end > data.length) {break;}
    messages.push(data.subarray(offset + FRAME_HEADER_SIZE, end));
    offset = end;
  }
  return messages;
}

/** grpc.health.v1.Health/Check: always SERVING while the session is up. */
export function healthCheckHandler(): UnaryHandler {
  const type = lookupMessage("grpc.health.v1.HealthCheckResponse");
  const reply = type.encode(type.fromObject({ status: 1 })).finish();
  return () => reply;
}

/** Handlers served on every build session. */
export function defaultSessionHandlers(): Map<string, UnaryHandler> {
  return new Map([[GRPC_HEALTH_CHECK, healthCheckHandler()]]);
}

async function answer(
  stream: http2.ServerHttp2Stream,
  handler: UnaryHandler,
  request: Buffer
): Promise<void> {
  let reply: Uint8Array;
  try {
    reply = await handler(request);
  } catch (error: unknown) {
    const msg = error instanceof Error ? error.message : String(error);
    stream.respond(
      { ":status": 200, "content-type": "application/grpc", "grpc-status": GRPC_STATUS.INTERNAL, "grpc-message": encodeURIComponent(msg) },
      { endStream: true }
    );
    return;
  }

  stream.respond({ ":status": 200, "content-type": "application/grpc" }, { waitForTrailers: true });
  stream.once("wantTrailers", () => {
    stream.sendTrailers({ "grpc-status": GRPC_STATUS.OK });
  });
  stream.end(frameMessage(reply));
}

function handleStream(
  stream: http2.ServerHttp2Stream,
  headers: http2.IncomingHttpHeaders,
  handlers: GrpcHandlers
): void {
  const path = headers[":path"];
  const handler = typeof path === "string" ? handlers.get(path) : undefined;

  if (!handler) {
    log.debug(`Session: unimplemented method ${String(path)}`);
    stream.respond(
      { ":status": 200, "content-type": "application/grpc", "grpc-status": GRPC_STATUS.UNIMPLEMENTED },
      { endStream: true }
    );
    return;
  }

  const chunks: Buffer[] = [];
  stream.on("data", (chunk: Buffer) => chunks.push(chunk));
  stream.on("end", () => {
    const [request = Buffer.alloc(0)] = unframeMessages(Buffer.concat(chunks));
    answer(stream, handler, request).catch((error: unknown) => {
      log.debug(`Session: failed to answer ${path}: ${error instanceof Error ? error.message : String(error)}`);
    });
  });
}

/**
 * Serve gRPC over an established session connection.
 *
 * Resolves when the connection closes (either side) or the signal aborts;
 * rejects with SessionError if the connection fails.
 */
export function serveSession(conn: Duplex, handlers: GrpcHandlers, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const server = http2.createServer();
    let settled = false;

    const onAbort = (): void => {
      conn.destroy();
    };

    const finish = (error?: Error): void => {
      if (settled) {return;}
      settled = true;
      signal.removeEventListener("abort", onAbort);
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    };

    server.on("stream", (stream, headers) => handleStream(stream, headers, handlers));
    server.on("session", (session) => {
      session.on("error", (error: Error) => finish(new SessionError(`session protocol error: ${error.message}`)));
    });
    conn.on("error", (error: Error) => finish(new SessionError(`session connection failed: ${error.message}`)));
    conn.on("close", () => finish());

    if (signal.aborted) {
      conn.destroy();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
    server.emit("connection", conn);
  });
}
