/**
 * Terminal progress display for BuildKit builds.
 *
 * Consumes SolveEvents from the build decoder and repaints a compact
 * status block on a terminal, in the style of `docker build`.
 *
 * Dependency direction:
 *   This module imports from: build/trace.ts, utils/channel.ts, constants.ts, logger.ts
 *   It should NOT import from: build/image, docker/, cli
 */

import { clearScreenDown, moveCursor } from "node:readline";
import { TextDecoder } from "node:util";

import { PROGRESS_MAX_LOG_LINES, PROGRESS_REFRESH_INTERVAL } from "../constants.js";
import { style } from "../logger.js";
import type { Channel } from "../utils/channel.js";
import type { SolveEvent, Vertex, VertexStatus } from "./trace.js";

export type ProgressTone = "header" | "done" | "cached" | "error" | "running" | "pending" | "status" | "log";

export interface ProgressLine {
  text: string;
  tone: ProgressTone;
}

interface VertexState {
  vertex: Vertex;
  statuses: Map<string, VertexStatus>;
  logs: string[];
  /** Unterminated tail of the log stream. */
  partial: string;
  /** Holds a UTF-8 sequence cut between log chunks. */
  decoder: TextDecoder;
}

function seconds(ms: number): string {
  return `${(Math.max(0, ms) / 1000).toFixed(1)}s`;
}

function truncate(text: string, width: number): string {
  return width > 0 && text.length > width ? text.slice(0, width) : text;
}

/** Accumulated view of a build's progress. */
export class ProgressDisplay {
  private readonly vertexes = new Map<string, VertexState>();

  /** Merge one event. Vertexes keep the position of their first appearance. */
  update(event: SolveEvent): void {
    for (const vertex of event.vertexes) {
      const state = this.vertexes.get(vertex.digest);
      if (state) {
        state.vertex = vertex;
      } else {
        this.vertexes.set(vertex.digest, { vertex, statuses: new Map(), logs: [], partial: "", decoder: new TextDecoder() });
      }
    }

    for (const status of event.statuses) {
      this.vertexes.get(status.vertex)?.statuses.set(status.id, status);
    }

    for (const entry of event.logs) {
      const state = this.vertexes.get(entry.vertex);
      if (!state) {continue;}
      const text = state.partial + state.decoder.decode(entry.data, { stream: true });
      const lines = text.split("\n");
      state.partial = lines.pop() ?? "";
      state.logs.push(...lines.map((line) => line.replace(/\r$/, "")));
      if (state.logs.length > PROGRESS_MAX_LOG_LINES) {
        state.logs.splice(0, state.logs.length - PROGRESS_MAX_LOG_LINES);
      }
    }
  }

  get total(): number {
    return this.vertexes.size;
  }

  get done(): number {
    let count = 0;
    for (const { vertex } of this.vertexes.values()) {
      if (vertex.completed) {count++;}
    }
    return count;
  }

  private elapsed(now: Date): number {
    let start: number | undefined;
    let end = 0;
    let running = false;
    for (const { vertex } of this.vertexes.values()) {
      if (vertex.started && (start === undefined || vertex.started.getTime() < start)) {
        start = vertex.started.getTime();
      }
      if (vertex.completed) {
        end = Math.max(end, vertex.completed.getTime());
      } else if (vertex.started) {
        running = true;
      }
    }
    if (start === undefined) {return 0;}
    return (running || end === 0 ? now.getTime() : end) - start;
  }

  /** Lines with their display tone. */
  render(now: Date, width: number): ProgressLine[] {
    const lines: ProgressLine[] = [
      { text: `[+] Building ${seconds(this.elapsed(now))} (${this.done}/${this.total})`, tone: "header" },
    ];

    for (const state of this.vertexes.values()) {
      const { vertex } = state;
      const name = `=> ${vertex.name}`;

      if (vertex.cached) {
        lines.push({ text: `${name} CACHED`, tone: "cached" });
        continue;
      }
      if (vertex.error) {
        lines.push({ text: `${name} ERROR`, tone: "error" });
        lines.push({ text: `   ${vertex.error}`, tone: "error" });
        lines.push(...this.logLines(state));
        continue;
      }
      if (vertex.completed) {
        const started = vertex.started ?? vertex.completed;
        lines.push({ text: `${name} DONE ${seconds(vertex.completed.getTime() - started.getTime())}`, tone: "done" });
        continue;
      }
      if (!vertex.started) {
        lines.push({ text: name, tone: "pending" });
        continue;
      }

      lines.push({ text: `${name} ${seconds(now.getTime() - vertex.started.getTime())}`, tone: "running" });
      for (const status of state.statuses.values()) {
        if (status.completed) {continue;}
        const amount = status.total > 0 ? `${status.current}/${status.total}` : `${status.current}`;
        lines.push({ text: `   -> ${status.name || status.id} ${amount}`, tone: "status" });
      }
      lines.push(...this.logLines(state));
    }

    return lines.map((line) => ({ ...line, text: truncate(line.text, width) }));
  }

  /** Plain text lines, as they appear on screen without colour. */
  renderLines(now: Date, width: number): string[] {
    return this.render(now, width).map((line) => line.text);
  }

  private logLines(state: VertexState): ProgressLine[] {
    const logs = state.partial ? [...state.logs, state.partial] : state.logs;
    return logs.slice(-PROGRESS_MAX_LOG_LINES).map((line) => ({ text: `   > ${line}`, tone: "log" }));
  }
}

function paintLine(line: ProgressLine): string {
  switch (line.tone) {
    case "header":
      return style.bold(line.text);
    case "done":
      return style.blue(line.text);
    case "cached":
      return style.cyan(line.text);
    case "error":
      return style.red(line.text);
    case "status":
    case "log":
      return style.dim(line.text);
    default:
      return line.text;
  }
}

export interface ProgressOutput extends NodeJS.WritableStream {
  columns?: number;
}

/** Redraws a block of lines in place. */
class TerminalPainter {
  private painted = 0;

  constructor(private readonly out: ProgressOutput) {}

  paint(lines: ProgressLine[]): void {
    if (this.painted > 0) {
      moveCursor(this.out, 0, -this.painted);
      clearScreenDown(this.out);
    }
    this.out.write(lines.map((line) => `${paintLine(line)}\n`).join(""));
    this.painted = lines.length;
  }
}

export interface DisplayOptions {
  /** Milliseconds between repaints. */
  interval?: number;
  now?: () => Date;
}

/** Render solve events until the channel closes or the signal aborts. */
export async function displaySolveStatus(
  events: Channel<SolveEvent>,
  out: ProgressOutput,
  signal: AbortSignal,
  options: DisplayOptions = {}
): Promise<void> {
  const display = new ProgressDisplay();
  const painter = new TerminalPainter(out);
  const now = options.now ?? (() => new Date());
  const repaint = (): void => painter.paint(display.render(now(), out.columns ?? 80));

  let stop: (result: IteratorResult<SolveEvent, undefined>) => void = () => {};
  const aborted = new Promise<IteratorResult<SolveEvent, undefined>>((resolve) => {
    stop = resolve;
  });
  const onAbort = (): void => stop({ value: undefined, done: true });
  if (signal.aborted) {
    onAbort();
  } else {
    signal.addEventListener("abort", onAbort, { once: true });
  }

  const timer = setInterval(repaint, options.interval ?? PROGRESS_REFRESH_INTERVAL);
  try {
    for (;;) {
      const next = await Promise.race([events.receive(), aborted]);
      if (next.done) {
        break;
      }
      display.update(next.value);
    }
  } finally {
    clearInterval(timer);
    signal.removeEventListener("abort", onAbort);
    repaint();
  }
}
