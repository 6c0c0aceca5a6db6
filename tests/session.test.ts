import http2 from "node:http2";
import { createServer, type AddressInfo, type Server } from "node:net";
import { PassThrough } from "node:stream";

import { afterEach, describe, expect, it } from "vitest";

import { lookupMessage } from "../src/build/proto.js";
import { Session, type SessionDialer } from "../src/build/session.js";
import { defaultSessionHandlers, frameMessage, serveSession, unframeMessages } from "../src/build/session-grpc.js";
import { SessionError } from "../src/errors.js";
import { serveUntilClosed, ticks } from "./mocks/engine-mock.js";

function dialer(pause = 0): SessionDialer & { conns: PassThrough[] } {
  const conns: PassThrough[] = [];
  const dial = async (): Promise<PassThrough> => {
    await ticks(pause);
    const conn = new PassThrough();
    conns.push(conn);
    return conn;
  };
  return Object.assign(dial, { conns });
}

describe("Session", () => {
  it("announces itself in the upgrade headers", () => {
    const session = new Session({ name: "app", sharedKey: "/work/app" });
    expect(session.metadata()).toEqual({
      "X-Docker-Expose-Session-Uuid": [session.id],
      "X-Docker-Expose-Session-Name": ["app"],
      "X-Docker-Expose-Session-Sharedkey": ["/work/app"],
      "X-Docker-Expose-Session-Grpc-Method": ["/grpc.health.v1.Health/Check"],
    });
    expect(session.id).toMatch(/^[0-9a-z]{25}$/);
  });

  it("becomes ready once dialed and ends on close", async () => {
    const session = new Session({ serve: serveUntilClosed });
    const dial = dialer(2);
    const controller = new AbortController();

    const running = session.run(dial, controller.signal);
    expect(session.currentState).toBe("dialing");

    await session.whenReady(controller.signal);
    expect(session.currentState).toBe("ready");

    session.close();
    await running;
    expect(session.currentState).toBe("closed");
    expect(dial.conns[0]?.destroyed).toBe(true);
  });

  it("passes its protocol and metadata to the dialer", async () => {
    const session = new Session({ serve: serveUntilClosed });
    const seen: Array<[string, string[] | undefined]> = [];
    const running = session.run(async (proto, meta) => {
      seen.push([proto, meta["X-Docker-Expose-Session-Uuid"]]);
      return new PassThrough();
    }, new AbortController().signal);

    await session.whenReady(new AbortController().signal);
    session.close();
    await running;
    expect(seen).toEqual([["h2c", [session.id]]]);
  });

  it("shares a dial failure with waiters", async () => {
    const session = new Session({ serve: serveUntilClosed });
    const controller = new AbortController();
    const ready = session.whenReady(controller.signal);
    const running = session.run(async () => {
      throw new Error("connection refused");
    }, controller.signal);

    const failure = await running.then(
      () => null,
      (error: unknown) => error
    );
    expect(failure).toBeInstanceOf(SessionError);
    expect(failure).toEqual(new SessionError("failed to open build session: connection refused"));
    await expect(ready).rejects.toBe(failure);
    expect(session.currentState).toBe("closed");
  });

  it("rejects waiters when closed before the tunnel is up", async () => {
    const session = new Session({ serve: serveUntilClosed });
    const ready = session.whenReady(new AbortController().signal);
    session.close();
    await expect(ready).rejects.toThrow("build session closed before it was established");
    await expect(session.whenReady(new AbortController().signal)).rejects.toBeInstanceOf(SessionError);
  });

  it("rejects waiters with the abort reason", async () => {
    const session = new Session({ serve: serveUntilClosed });
    const controller = new AbortController();
    const reason = new Error("interrupted");
    const ready = session.whenReady(controller.signal);
    controller.abort(reason);
    await expect(ready).rejects.toBe(reason);
  });

  it("drops a connection that arrives after close", async () => {
    const session = new Session({ serve: serveUntilClosed });
    const dial = dialer(3);
    const running = session.run(dial, new AbortController().signal);
    session.close();
    await running;
    expect(dial.conns[0]?.destroyed).toBe(true);
  });

  it("refuses to run twice", async () => {
    const session = new Session({ serve: serveUntilClosed });
    const controller = new AbortController();
    const running = session.run(dialer(1), controller.signal);
    await expect(session.run(dialer(), controller.signal)).rejects.toThrow(/already running/);
    session.close();
    await running;
  });

  it("does nothing under an aborted signal", async () => {
    const session = new Session({ serve: serveUntilClosed });
    const controller = new AbortController();
    controller.abort();
    await session.run(dialer(), controller.signal);
    expect(session.currentState).toBe("idle");
  });

  it("wraps a serving failure", async () => {
    const session = new Session({
      serve: async () => {
        throw new Error("stream reset");
      },
    });
    await expect(session.run(dialer(), new AbortController().signal)).rejects.toThrow(
      new SessionError("build session failed: stream reset")
    );
    expect(session.currentState).toBe("closed");
  });
});

describe("gRPC framing", () => {
  it("frames and unframes messages", () => {
    const data = Buffer.concat([frameMessage(Buffer.from("ab")), frameMessage(Buffer.from("cde"))]);
    expect(data.subarray(0, 5)).toEqual(Buffer.from([0, 0, 0, 0, 2]));
    expect(unframeMessages(data).map((m) => m.toString())).toEqual(["ab", "cde"]);
  });

  it("drops a trailing partial frame", () => {
    const data = Buffer.concat([frameMessage(Buffer.from("ab")), Buffer.from([0, 0, 0, 0, 9, 1])]);
    expect(unframeMessages(data).map((m) => m.toString())).toEqual(["ab"]);
  });
});

describe("serveSession", () => {
  let server: Server | null = null;
  let client: http2.ClientHttp2Session | null = null;
  let controller = new AbortController();
  let serving: Promise<void> | null = null;
  const clientErrors: Error[] = [];

  async function connect(): Promise<http2.ClientHttp2Session> {
    controller = new AbortController();
    server = createServer((socket) => {
      serving = serveSession(socket, defaultSessionHandlers(), controller.signal);
    });
    await new Promise<void>((resolve) => server?.listen(0, "127.0.0.1", resolve));
    const address = server.address();
    if (!address || typeof address === "string") {
      throw new Error("no loopback address");
    }
    const { port }: AddressInfo = address;
    client = http2.connect(`http://127.0.0.1:${port}`);
    client.on("error", (error: Error) => clientErrors.push(error));
    return client;
  }

  afterEach(async () => {
    client?.close();
    controller.abort();
    await serving;
    await new Promise<void>((resolve) => (server ? server.close(() => resolve()) : resolve()));
    server = null;
    client = null;
  });

  function call(
    session: http2.ClientHttp2Session,
    path: string
  ): Promise<{ headers: http2.IncomingHttpHeaders; trailers: http2.IncomingHttpHeaders; body: Buffer }> {
    return new Promise((resolve, reject) => {
      const req = session.request({ ":method": "POST", ":path": path, "content-type": "application/grpc" });
      let headers: http2.IncomingHttpHeaders = {};
      let trailers: http2.IncomingHttpHeaders = {};
      const chunks: Buffer[] = [];
      req.on("response", (h) => {
        headers = h;
      });
      req.on("trailers", (t) => {
        trailers = t;
      });
      req.on("data", (chunk: Buffer) => chunks.push(chunk));
      req.on("close", () => resolve({ headers, trailers, body: Buffer.concat(chunks) }));
      req.on("error", reject);
      req.end(frameMessage(new Uint8Array(0)));
    });
  }

  it("answers the health check", async () => {
    const session = await connect();
    const { trailers, body } = await call(session, "/grpc.health.v1.Health/Check");

    expect(trailers["grpc-status"]).toBe("0");
    const [message] = unframeMessages(body);
    const type = lookupMessage("grpc.health.v1.HealthCheckResponse");
    expect(type.toObject(type.decode(message ?? Buffer.alloc(0)))).toEqual({ status: 1 });
  });

  it("answers unknown methods with UNIMPLEMENTED", async () => {
    const session = await connect();
    const { headers } = await call(session, "/moby.filesync.v1.FileSync/DiffCopy");
    expect(headers["grpc-status"]).toBe("12");
  });

  it("ends when the signal aborts", async () => {
    const session = await connect();
    await call(session, "/grpc.health.v1.Health/Check");
    session.close();
    controller.abort();
    await expect(serving).resolves.toBeUndefined();
  });
});
