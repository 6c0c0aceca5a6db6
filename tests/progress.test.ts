import { Writable } from "node:stream";

import { describe, expect, it } from "vitest";

import { displaySolveStatus, ProgressDisplay } from "../src/build/progress.js";
import type { SolveEvent, Vertex, VertexLog, VertexStatus } from "../src/build/trace.js";
import { Channel } from "../src/utils/channel.js";

function vertex(digest: string, name: string, overrides: Partial<Vertex> = {}): Vertex {
  return { digest, inputs: [], name, error: "", cached: false, ...overrides };
}

function status(vertexDigest: string, overrides: Partial<VertexStatus> = {}): VertexStatus {
  return { id: "s1", vertex: vertexDigest, name: "", total: 0, current: 0, timestamp: new Date(0), ...overrides };
}

function logEntry(vertexDigest: string, text: string): VertexLog {
  return { vertex: vertexDigest, stream: "stdout", data: Buffer.from(text), timestamp: new Date(0) };
}

function event(parts: Partial<SolveEvent>): SolveEvent {
  return { vertexes: [], statuses: [], logs: [], ...parts };
}

const NOW = new Date(10_000);

describe("ProgressDisplay", () => {
  it("renders done, running, cached and pending steps in first-seen order", () => {
    const display = new ProgressDisplay();
    display.update(
      event({
        vertexes: [
          vertex("a", "[1/4] FROM alpine", { started: new Date(1_000), completed: new Date(2_500) }),
          vertex("b", "[2/4] RUN make", { started: new Date(3_000) }),
          vertex("c", "[3/4] COPY . .", { cached: true }),
          vertex("d", "[4/4] RUN test"),
        ],
        statuses: [
          status("b", { name: "fetch", current: 3, total: 10 }),
          status("zz", { name: "orphan" }),
        ],
        logs: [logEntry("b", "line1\nline2\npart")],
      })
    );

    expect(display.renderLines(NOW, 80)).toEqual([
      "[+] Building 9.0s (1/4)",
      "=> [1/4] FROM alpine DONE 1.5s",
      "=> [2/4] RUN make 7.0s",
      "   -> fetch 3/10",
      "   > line1",
      "   > line2",
      "   > part",
      "=> [3/4] COPY . . CACHED",
      "=> [4/4] RUN test",
    ]);
  });

  it("replaces a vertex in place when it updates", () => {
    const display = new ProgressDisplay();
    display.update(event({ vertexes: [vertex("a", "first", { started: new Date(1_000) }), vertex("b", "second")] }));
    display.update(event({ vertexes: [vertex("a", "first", { started: new Date(1_000), completed: new Date(4_000) })] }));

    expect(display.renderLines(NOW, 80)).toEqual(["[+] Building 3.0s (1/2)", "=> first DONE 3.0s", "=> second"]);
  });

  it("shows errors with their logs", () => {
    const display = new ProgressDisplay();
    display.update(
      event({
        vertexes: [vertex("a", "RUN false", { started: new Date(1_000), completed: new Date(2_000), error: "exit code: 1" })],
        logs: [logEntry("a", "boom\n")],
      })
    );

    expect(display.renderLines(NOW, 80)).toEqual([
      "[+] Building 1.0s (1/1)",
      "=> RUN false ERROR",
      "   exit code: 1",
      "   > boom",
    ]);
  });

  it("keeps only the tail of the logs", () => {
    const display = new ProgressDisplay();
    display.update(event({ vertexes: [vertex("a", "RUN build", { started: new Date(9_000) })] }));
    display.update(event({ logs: [logEntry("a", "l1\nl2\nl3\nl4\n"), logEntry("a", "l5\nl6\nl7\nl8\n")] }));

    expect(display.renderLines(NOW, 80).slice(2)).toEqual([
      "   > l3",
      "   > l4",
      "   > l5",
      "   > l6",
      "   > l7",
      "   > l8",
    ]);
  });

  it("joins log lines split across events", () => {
    const display = new ProgressDisplay();
    display.update(event({ vertexes: [vertex("a", "RUN build", { started: new Date(9_000) })] }));
    display.update(event({ logs: [logEntry("a", "hel")] }));
    display.update(event({ logs: [logEntry("a", "lo\r\n")] }));

    expect(display.renderLines(NOW, 80).slice(2)).toEqual(["   > hello"]);
  });

  it("decodes characters cut between log chunks per vertex", () => {
    const display = new ProgressDisplay();
    const check = Buffer.from("✓ok\n");
    display.update(
      event({
        vertexes: [
          vertex("a", "RUN first", { started: new Date(9_000) }),
          vertex("b", "RUN second", { started: new Date(9_000) }),
        ],
      })
    );
    display.update(event({ logs: [{ ...logEntry("a", ""), data: check.subarray(0, 2) }] }));
    display.update(event({ logs: [logEntry("b", "é\n")] }));
    display.update(event({ logs: [{ ...logEntry("a", ""), data: check.subarray(2) }] }));

    const lines = display.renderLines(NOW, 80);
    expect(lines).toContain("   > ✓ok");
    expect(lines).toContain("   > é");
  });

  it("truncates lines to the width", () => {
    const display = new ProgressDisplay();
    display.update(event({ vertexes: [vertex("a", "a very long step name")] }));
    expect(display.renderLines(NOW, 10)).toEqual(["[+] Buildi", "=> a very "]);
  });

  it("counts and tones lines", () => {
    const display = new ProgressDisplay();
    display.update(event({ vertexes: [vertex("a", "x", { cached: true, completed: new Date(1_000) })] }));
    expect(display.total).toBe(1);
    expect(display.done).toBe(1);
    expect(display.render(NOW, 80).map((line) => line.tone)).toEqual(["header", "cached"]);
  });
});

describe("displaySolveStatus", () => {
  function sink(): { out: Writable & { columns: number }; text: () => string } {
    const chunks: string[] = [];
    const out = Object.assign(
      new Writable({
        write(chunk: Buffer | string, _encoding, callback) {
          chunks.push(String(chunk));
          callback();
        },
      }),
      { columns: 80 }
    );
    return { out, text: () => chunks.join("") };
  }

  it("paints the final state once the channel closes", async () => {
    const { out, text } = sink();
    const events = new Channel<SolveEvent>();
    events.send(event({ vertexes: [vertex("a", "RUN make", { started: new Date(1_000), completed: new Date(2_000) })] }));
    events.close();

    await displaySolveStatus(events, out, new AbortController().signal, { interval: 60_000, now: () => NOW });

    expect(text()).toContain("=> RUN make DONE 1.0s");
    expect(text()).toContain("(1/1)");
  });

  it("stops when the signal aborts", async () => {
    const { out, text } = sink();
    const controller = new AbortController();
    const done = displaySolveStatus(new Channel<SolveEvent>(), out, controller.signal, { interval: 60_000, now: () => NOW });
    controller.abort();
    await done;
    expect(text()).toContain("[+] Building 0.0s (0/0)");
  });
});
