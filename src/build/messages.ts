/**
 * Build status stream decoding.
 *
 * The engine answers a build (and a pull) with back-to-back JSON objects
 * and no framing beyond JSON itself. readMessages() splits that byte
 * stream into envelopes; decodeBuildResult() interprets them for a build.
 *
 * Dependency direction:
 *   This module imports from: build/trace.ts, utils/channel.ts, errors.ts, logger.ts, constants.ts
 *   It should NOT import from: build/image, docker/, cli
 */

import { AUX_BUILDKIT_TRACE, AUX_IMAGE_ID } from "../constants.js";
import { AuxParseError, DecodeError, EngineError } from "../errors.js";
import { log } from "../logger.js";
import type { Channel } from "../utils/channel.js";
import { decodeStatusResponse, translateStatus, type SolveEvent } from "./trace.js";

/** One decoded unit of the status stream. */
export interface JSONMessage {
  id?: string;
  stream?: string;
  status?: string;
  progress?: string;
  progressDetail?: { current?: number; total?: number };
  error?: string | { code?: number; message?: string };
  errorDetail?: { code?: number; message?: string };
  aux?: unknown;
}

/** Aux payload with the tag that says how to read it. */
export interface AuxPayload {
  tag: string;
  payload: unknown;
}

// === Stream splitting ===

const OPEN_BRACE = 0x7b;
const CLOSE_BRACE = 0x7d;
const OPEN_BRACKET = 0x5b;
const CLOSE_BRACKET = 0x5d;
const QUOTE = 0x22;
const BACKSLASH = 0x5c;

function isWhitespace(byte: number): boolean {
  return byte === 0x20 || byte === 0x09 || byte === 0x0a || byte === 0x0d;
}

/**
 * Incremental splitter for concatenated JSON objects.
 *
 * Works on bytes: every structural character is ASCII, and UTF-8
 * continuation bytes never collide with ASCII, so a value can be cut
 * anywhere across chunks.
 */
export class MessageSplitter {
  private pending: Buffer[] = [];
  private current: Buffer[] = [];
  private depth = 0;
  private inString = false;
  private escaped = false;
  private failure: DecodeError | null = null;

  /**
   * Feed a chunk; returns every object completed by it, as raw text.
   *
   * Bytes that cannot start an object stop the scan and are recorded in
   * `error`; objects completed before them are still returned.
   */
  push(chunk: Buffer): string[] {
    const values: string[] = [];
    if (this.failure) {
      return values;
    }
    let start = this.depth > 0 ? 0 : -1;

    for (let i = 0; i < chunk.length; i++) {
      const byte = chunk[i] ?? 0;

      if (this.depth === 0) {
        if (isWhitespace(byte)) {continue;}
        if (byte !== OPEN_BRACE) {
          this.failure = new DecodeError(
            `invalid character '${String.fromCharCode(byte)}' looking for beginning of value`
          );
          break;
        }
        start = i;
        this.depth = 1;
        continue;
      }

      if (this.inString) {
        if (this.escaped) {
          this.escaped = false;
        } else if (byte === BACKSLASH) {
          this.escaped = true;
        } else if (byte === QUOTE) {
          this.inString = false;
        }
        continue;
      }

      if (byte === QUOTE) {
        this.inString = true;
      } else if (byte === OPEN_BRACE || byte === OPEN_BRACKET) {
        this.depth++;
      } else if (byte === CLOSE_BRACE || byte === CLOSE_BRACKET) {
        this.depth--;
        if (this.depth === 0) {
          this.current.push(chunk.subarray(start, i + 1));
          values.push(Buffer.concat(this.current).toString("utf8"));
          this.current = [];
          start = -1;
        }
      }
    }

    if (this.depth > 0 && start >= 0) {
      this.current.push(chunk.subarray(start));
    }
    return values;
  }

  /** Malformed input seen after the last returned object, if any. */
  get error(): DecodeError | null {
    return this.failure;
  }

  /** True when the stream stopped in the middle of a value. */
  get incomplete(): boolean {
    return this.depth > 0;
  }
}

function parseEnvelope(text: string): JSONMessage {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error: unknown) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new DecodeError(`invalid status message: ${msg}`);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new DecodeError("invalid status message: not an object");
  }
  const message: JSONMessage = {};
  for (const [key, value] of Object.entries(parsed)) {
    switch (key) {
      case "id":
      case "stream":
      case "status":
      case "progress":
        if (typeof value === "string") {message[key] = value;}
        break;
      case "progressDetail":
        if (isRecord(value)) {
          message.progressDetail = {
            current: typeof value.current === "number" ? value.current : undefined,
            total: typeof value.total === "number" ? value.total : undefined,
          };
        }
        break;
      case "error":
        if (typeof value === "string") {
          message.error = value;
        } else if (isRecord(value)) {
          message.error = readErrorObject(value);
        }
        break;
      case "errorDetail":
        if (isRecord(value)) {message.errorDetail = readErrorObject(value);}
        break;
      case "aux":
        message.aux = value;
        break;
    }
  }
  return message;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readErrorObject(value: Record<string, unknown>): { code?: number; message?: string } {
  return {
    code: typeof value.code === "number" ? value.code : undefined,
    message: typeof value.message === "string" ? value.message : undefined,
  };
}

/**
 * Split a byte stream into status envelopes.
 *
 * @throws DecodeError on malformed JSON or a stream cut inside a value.
 */
export async function* readMessages(
  stream: AsyncIterable<Buffer | string>
): AsyncGenerator<JSONMessage, void, undefined> {
  const splitter = new MessageSplitter();
  for await (const chunk of stream) {
    const bytes = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
    for (const text of splitter.push(bytes)) {
      yield parseEnvelope(text);
    }
    if (splitter.error) {
      throw splitter.error;
    }
  }
  if (splitter.incomplete) {
    throw new DecodeError("unexpected end of status stream");
  }
}

// === Envelope interpretation ===

const UNKNOWN_ENGINE_ERROR = "engine reported an error without a message";

/**
 * Fatal error carried by an envelope, if any.
 *
 * `errorDetail` wins over `error`, matching the engine, which sends both.
 * Any error object is fatal, even an empty one.
 */
export function envelopeError(message: JSONMessage): EngineError | null {
  const detail = message.errorDetail;
  if (detail) {
    const fallback = typeof message.error === "string" && message.error ? message.error : UNKNOWN_ENGINE_ERROR;
    return new EngineError(detail.message || fallback, detail.code);
  }
  const error = message.error;
  if (typeof error === "string" && error) {
    return new EngineError(error);
  }
  if (typeof error === "object") {
    return new EngineError(error.message || UNKNOWN_ENGINE_ERROR, error.code);
  }
  return null;
}

/**
 * Aux payload of an envelope, with its tag.
 *
 * Accepts the engine's `{"id": tag, "aux": payload}` and the tagged form
 * `{"aux": {"ID": tag, "payload": payload}}`.
 */
export function envelopeAux(message: JSONMessage): AuxPayload | null {
  if (message.aux === undefined || message.aux === null) {
    return null;
  }
  if (message.id) {
    return { tag: message.id, payload: message.aux };
  }
  if (isRecord(message.aux) && typeof message.aux.ID === "string" && "payload" in message.aux) {
    return { tag: message.aux.ID, payload: message.aux.payload };
  }
  return null;
}

/**
 * Read a BuildResult payload.
 *
 * @throws AuxParseError if the payload is not a BuildResult.
 */
export function parseBuildResult(payload: unknown): string {
  if (!isRecord(payload)) {
    throw new AuxParseError("image result payload is not an object");
  }
  const id = payload.ID;
  if (id === undefined || id === null) {
    return "";
  }
  if (typeof id !== "string") {
    throw new AuxParseError("image result ID is not a string");
  }
  return id;
}

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Read a trace payload: a base64 string wrapping a protobuf StatusResponse.
 *
 * @throws AuxParseError if either layer fails to parse.
 */
export function parseTrace(payload: unknown): SolveEvent {
  if (typeof payload !== "string" || !BASE64_PATTERN.test(payload)) {
    throw new AuxParseError("trace payload is not base64 data");
  }
  return translateStatus(decodeStatusResponse(Buffer.from(payload, "base64")));
}

export interface DecodeOptions {
  /** Where to forward trace events; trace payloads are ignored without it. */
  trace?: Channel<SolveEvent>;
}

/**
 * Consume a build response stream.
 *
 * @returns The last image id reported, or "" if none was.
 * @throws EngineError when the engine reports a failure; DecodeError on a malformed stream.
 */
export async function decodeBuildResult(
  stream: AsyncIterable<Buffer | string>,
  options: DecodeOptions = {}
): Promise<string> {
  let imageId = "";

  for await (const message of readMessages(stream)) {
    const error = envelopeError(message);
    if (error) {
      throw error;
    }

    const aux = envelopeAux(message);
    if (!aux) {
      continue;
    }

    try {
      if (aux.tag === AUX_IMAGE_ID) {
        imageId = parseBuildResult(aux.payload);
      } else if (aux.tag === AUX_BUILDKIT_TRACE && options.trace) {
        options.trace.send(parseTrace(aux.payload));
      }
    } catch (error: unknown) {
      if (!(error instanceof AuxParseError)) {
        throw error;
      }
      log.debug(`Skipping ${aux.tag} payload: ${error.message}`);
    }
  }

  return imageId;
}
