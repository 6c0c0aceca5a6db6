/**
 * BuildKit session tunnel.
 *
 * A session is a side channel the engine uses during a build. berth dials
 * the engine's session endpoint, the connection is upgraded to a raw
 * stream, and the engine then talks gRPC to us over it until the build is
 * over.
 *
 * Lifecycle: idle → dialing → ready → closed. close() is the only way to
 * end a session from our side and is safe to call at any point.
 */

import { randomBytes } from "node:crypto";
import type { Duplex } from "node:stream";

import { SESSION_HEADER, SESSION_PROTO } from "../constants.js";
import { SessionError } from "../errors.js";
import { log } from "../logger.js";
import { defaultSessionHandlers, serveSession, type GrpcHandlers } from "./session-grpc.js";

/** Session metadata sent as upgrade headers. */
export type SessionMetadata = Record<string, string[]>;

/**
 * Opens a raw connection to the engine for the given protocol.
 * Supplied by the engine client.
 */
export type SessionDialer = (proto: string, meta: SessionMetadata, signal: AbortSignal) => Promise<Duplex>;

/** Serves the session protocol over an open connection until it closes. */
export type SessionServer = (conn: Duplex, signal: AbortSignal) => Promise<void>;

export type SessionState = "idle" | "dialing" | "ready" | "closed";

export interface SessionOptions {
  /** Human-readable session name (shown by the engine). */
  name?: string;
  /** Key identifying the client's files to the engine's cache. */
  sharedKey?: string;
  /** gRPC methods served; defaults to the health check. */
  handlers?: GrpcHandlers;
  /** Override the protocol server (tests). */
  serve?: SessionServer;
}

/** Random identifier, 25 base-36 characters like the engine's own ids. */
function randomSessionId(): string {
  return BigInt(`0x${randomBytes(16).toString("hex")}`).toString(36).padStart(25, "0").slice(0, 25);
}

export class Session {
  readonly id: string;
  readonly name: string;
  readonly sharedKey: string;

  private state: SessionState = "idle";
  private conn: Duplex | null = null;
  private failure: SessionError | null = null;
  private readonly handlers: GrpcHandlers;
  private readonly serve: SessionServer;
  private readonly listeners = new Set<() => void>();

  constructor(options: SessionOptions = {}) {
    this.id = randomSessionId();
    this.name = options.name ?? "berth";
    this.sharedKey = options.sharedKey ?? "";
    this.handlers = options.handlers ?? defaultSessionHandlers();
    this.serve = options.serve ?? ((conn, signal) => serveSession(conn, this.handlers, signal));
  }

  get currentState(): SessionState {
    return this.state;
  }

  /** Upgrade headers announcing this session to the engine. */
  metadata(): SessionMetadata {
    return {
      [SESSION_HEADER.UUID]: [this.id],
      [SESSION_HEADER.NAME]: [this.name],
      [SESSION_HEADER.SHARED_KEY]: [this.sharedKey],
      [SESSION_HEADER.GRPC_METHOD]: [...this.handlers.keys()],
    };
  }

  /**
   * Dial the engine and serve the session until it ends.
   *
   * Resolves on a graceful end: close(), signal abort, or the engine hanging
   * up. Rejects with SessionError if dialing or serving fails.
   */
  async run(dialer: SessionDialer, signal: AbortSignal): Promise<void> {
    if (this.state === "closed" || signal.aborted) {
      return;
    }
    if (this.state !== "idle") {
      throw new SessionError(`session ${this.id} is already running`);
    }
    this.setState("dialing");

    let conn: Duplex;
    try {
      conn = await dialer(SESSION_PROTO, this.metadata(), signal);
    } catch (error: unknown) {
      if (this.isClosed() || signal.aborted) {
        return;
      }
      const msg = error instanceof Error ? error.message : String(error);
      // Waiters in whenReady() see the same error.
      this.failure = new SessionError(`failed to open build session: ${msg}`);
      this.close();
      throw this.failure;
    }

    if (this.isClosed() || signal.aborted) {
      conn.destroy();
      return;
    }
    this.conn = conn;
    this.setState("ready");
    log.debug(`Session ${this.id} established`);

    try {
      await this.serve(conn, signal);
    } catch (error: unknown) {
      if (this.isClosed()) {
        return;
      }
      this.close();
      if (error instanceof SessionError) {
        throw error;
      }
      const msg = error instanceof Error ? error.message : String(error);
      throw new SessionError(`build session failed: ${msg}`);
    }
    this.close();
  }

  /**
   * Wait until the tunnel is connected.
   *
   * Rejects if the session closes first or the signal aborts.
   */
  whenReady(signal: AbortSignal): Promise<void> {
    if (this.state === "ready") {
      return Promise.resolve();
    }
    if (this.state === "closed") {
      return Promise.reject(this.closedBeforeReady());
    }
    return new Promise((resolve, reject) => {
      const onAbort = (): void => {
        cleanup();
        reject(signal.reason instanceof Error ? signal.reason : new SessionError("build session wait aborted"));
      };
      const onChange = (): void => {
        if (this.state === "ready") {
          cleanup();
          resolve();
        } else if (this.state === "closed") {
          cleanup();
          reject(this.closedBeforeReady());
        }
      };
      const cleanup = (): void => {
        this.listeners.delete(onChange);
        signal.removeEventListener("abort", onAbort);
      };

      if (signal.aborted) {
        onAbort();
        return;
      }
      this.listeners.add(onChange);
      signal.addEventListener("abort", onAbort, { once: true });
    });
  }

  /** End the session. Idempotent. */
  close(): void {
    if (this.state === "closed") {
      return;
    }
    this.setState("closed");
    if (this.conn) {
      this.conn.destroy();
      this.conn = null;
    }
    log.debug(`Session ${this.id} closed`);
  }

  private closedBeforeReady(): SessionError {
    return this.failure ?? new SessionError("build session closed before it was established");
  }

  private isClosed(): boolean {
    return this.state === "closed";
  }

  private setState(state: SessionState): void {
    this.state = state;
    for (const listener of [...this.listeners]) {
      listener();
    }
  }
}
