/**
 * BuildKit trace decoding and translation.
 *
 * Trace payloads carry a protobuf-encoded `StatusResponse` from the BuildKit
 * control API (proto/control.proto).
 *
 * Dependency direction:
 *   This module imports from: build/proto.ts, errors.ts
 *   It should NOT import from: build/image, docker/, cli
 */

import type protobuf from "protobufjs";

import { AuxParseError } from "../errors.js";
import { lookupMessage } from "./proto.js";

// === Normalized solve events (renderer input) ===

export type LogStream = "stdout" | "stderr";

export interface Vertex {
  digest: string;
  inputs: string[];
  name: string;
  started?: Date;
  completed?: Date;
  error: string;
  cached: boolean;
}

export interface VertexStatus {
  id: string;
  vertex: string;
  name: string;
  total: number;
  current: number;
  timestamp: Date;
  started?: Date;
  completed?: Date;
}

export interface VertexLog {
  vertex: string;
  stream: LogStream;
  data: Uint8Array;
  timestamp: Date;
}

/** One self-contained progress snapshot. The renderer accumulates across events. */
export interface SolveEvent {
  vertexes: Vertex[];
  statuses: VertexStatus[];
  logs: VertexLog[];
}

// === Raw decoded payload ===

export interface RawTimestamp {
  seconds: number;
  nanos: number;
}

export interface RawVertex {
  digest: string;
  inputs: string[];
  name: string;
  cached: boolean;
  started?: RawTimestamp;
  completed?: RawTimestamp;
  error: string;
}

export interface RawVertexStatus {
  ID: string;
  vertex: string;
  name: string;
  current: number;
  total: number;
  timestamp?: RawTimestamp;
  started?: RawTimestamp;
  completed?: RawTimestamp;
}

export interface RawVertexLog {
  vertex: string;
  timestamp?: RawTimestamp;
  stream: number;
  msg: Uint8Array;
}

export interface RawStatusResponse {
  vertexes: RawVertex[];
  statuses: RawVertexStatus[];
  logs: RawVertexLog[];
}

/** The `moby.buildkit.v1.StatusResponse` message type. */
export function statusResponseType(): protobuf.Type {
  return lookupMessage("moby.buildkit.v1.StatusResponse");
}

// === Decoding ===

type Fields = Record<string, unknown>;

function isFields(value: unknown): value is Fields {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(fields: Fields, key: string): string {
  const value = fields[key];
  return typeof value === "string" ? value : "";
}

function readNumber(fields: Fields, key: string): number {
  const value = fields[key];
  if (typeof value === "number") {return value;}
  if (typeof value === "string") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

function readList(fields: Fields, key: string): Fields[] {
  const value = fields[key];
  return Array.isArray(value) ? value.filter(isFields) : [];
}

function readTimestamp(fields: Fields, key: string): RawTimestamp | undefined {
  const value = fields[key];
  if (!isFields(value)) {return undefined;}
  return { seconds: readNumber(value, "seconds"), nanos: readNumber(value, "nanos") };
}

/**
 * Decode a protobuf `StatusResponse`.
 *
 * @throws AuxParseError if the bytes are not a valid message.
 */
export function decodeStatusResponse(bytes: Uint8Array): RawStatusResponse {
  const type = statusResponseType();
  let decoded: unknown;
  try {
    const message = type.decode(bytes);
    decoded = type.toObject(message, { longs: Number, arrays: true, defaults: false });
  } catch (error: unknown) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new AuxParseError(`invalid trace payload: ${msg}`);
  }
  if (!isFields(decoded)) {
    throw new AuxParseError("invalid trace payload: not a message");
  }

  return {
    vertexes: readList(decoded, "vertexes").map((v) => ({
      digest: readString(v, "digest"),
      inputs: Array.isArray(v.inputs) ? v.inputs.filter((i): i is string => typeof i === "string") : [],
      name: readString(v, "name"),
      cached: v.cached === true,
      started: readTimestamp(v, "started"),
      completed: readTimestamp(v, "completed"),
      error: readString(v, "error"),
    })),
    statuses: readList(decoded, "statuses").map((s) => ({
      ID: readString(s, "ID"),
      vertex: readString(s, "vertex"),
      name: readString(s, "name"),
      current: readNumber(s, "current"),
      total: readNumber(s, "total"),
      timestamp: readTimestamp(s, "timestamp"),
      started: readTimestamp(s, "started"),
      completed: readTimestamp(s, "completed"),
    })),
    logs: readList(decoded, "logs").map((l) => ({
      vertex: readString(l, "vertex"),
      timestamp: readTimestamp(l, "timestamp"),
      stream: readNumber(l, "stream"),
      msg: l.msg instanceof Uint8Array ? l.msg : new Uint8Array(0),
    })),
  };
}

// === Translation ===

function toDate(timestamp: RawTimestamp): Date {
  return new Date(timestamp.seconds * 1000 + Math.floor(timestamp.nanos / 1_000_000));
}

function toOptionalDate(timestamp: RawTimestamp | undefined): Date | undefined {
  return timestamp ? toDate(timestamp) : undefined;
}

const EPOCH: RawTimestamp = { seconds: 0, nanos: 0 };

/** Map the numeric stream selector (1 = stdout, 2 = stderr). */
export function toLogStream(stream: number): LogStream {
  return stream === 2 ? "stderr" : "stdout";
}

/**
 * Convert a decoded trace payload into a solve event.
 * Field-by-field copy; no filtering or aggregation.
 */
export function translateStatus(raw: RawStatusResponse): SolveEvent {
  return {
    vertexes: raw.vertexes.map((v) => ({
      digest: v.digest,
      inputs: [...v.inputs],
      name: v.name,
      started: toOptionalDate(v.started),
      completed: toOptionalDate(v.completed),
      error: v.error,
      cached: v.cached,
    })),
    statuses: raw.statuses.map((s) => ({
      id: s.ID,
      vertex: s.vertex,
      name: s.name,
      total: s.total,
      current: s.current,
      timestamp: toDate(s.timestamp ?? EPOCH),
      started: toOptionalDate(s.started),
      completed: toOptionalDate(s.completed),
    })),
    logs: raw.logs.map((l) => ({
      vertex: l.vertex,
      stream: toLogStream(l.stream),
      data: l.msg,
      timestamp: toDate(l.timestamp ?? EPOCH),
    })),
  };
}
