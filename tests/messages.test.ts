import { describe, expect, it } from "vitest";

import {
  decodeBuildResult,
  envelopeAux,
  envelopeError,
  MessageSplitter,
  readMessages,
  type JSONMessage,
} from "../src/build/messages.js";
import type { SolveEvent } from "../src/build/trace.js";
import { DecodeError, EngineError } from "../src/errors.js";
import { Channel } from "../src/utils/channel.js";
import { traceMessage } from "./mocks/engine-mock.js";

/** Stream the text one byte at a time. */
async function* byteByByte(text: string): AsyncGenerator<Buffer> {
  const bytes = Buffer.from(text, "utf8");
  for (let i = 0; i < bytes.length; i++) {
    yield bytes.subarray(i, i + 1);
  }
}

async function* chunks(...parts: string[]): AsyncGenerator<string> {
  for (const part of parts) {
    yield part;
  }
}

async function collect(stream: AsyncIterable<Buffer | string>): Promise<JSONMessage[]> {
  const messages: JSONMessage[] = [];
  for await (const message of readMessages(stream)) {
    messages.push(message);
  }
  return messages;
}

describe("readMessages", () => {
  it("splits concatenated objects across arbitrary chunk boundaries", async () => {
    const text = '{"stream":"a"}{"stream":"b"}\n  {"status":"c","id":"x"}';
    expect(await collect(byteByByte(text))).toEqual([{ stream: "a" }, { stream: "b" }, { status: "c", id: "x" }]);
  });

  it("reassembles multi-byte characters cut between chunks", async () => {
    expect(await collect(byteByByte('{"stream":"héllo ✓"}'))).toEqual([{ stream: "héllo ✓" }]);
  });

  it("ignores braces and escaped quotes inside strings", async () => {
    const messages = await collect(chunks('{"stream":"}{\\"x', '"}{"stream":"[]"}'));
    expect(messages).toEqual([{ stream: '}{"x' }, { stream: "[]" }]);
  });

  it("keeps nested objects and arrays inside one envelope", async () => {
    const messages = await collect(chunks('{"aux":{"list":[{"a":1}]},', '"id":"tag"}'));
    expect(messages).toEqual([{ aux: { list: [{ a: 1 }] }, id: "tag" }]);
  });

  it("rejects text outside an object", async () => {
    await expect(collect(chunks('{"stream":"a"} x'))).rejects.toThrow(
      new DecodeError("invalid character 'x' looking for beginning of value")
    );
  });

  it("rejects a stream that ends inside a value", async () => {
    await expect(collect(chunks('{"stream":"a"}{"stream":'))).rejects.toThrow("unexpected end of status stream");
  });

  it("rejects malformed JSON", async () => {
    await expect(collect(chunks('{"stream":}'))).rejects.toBeInstanceOf(DecodeError);
  });

  it("yields nothing for an empty stream", async () => {
    expect(await collect(chunks())).toEqual([]);
  });
});

describe("MessageSplitter", () => {
  it("reports an unfinished value", () => {
    const splitter = new MessageSplitter();
    expect(splitter.push(Buffer.from('{"a":1}{"b"'))).toEqual(['{"a":1}']);
    expect(splitter.incomplete).toBe(true);
    expect(splitter.push(Buffer.from(":2}"))).toEqual(['{"b":2}']);
    expect(splitter.incomplete).toBe(false);
  });

  it("returns objects completed before stray bytes and records the failure", () => {
    const splitter = new MessageSplitter();
    expect(splitter.push(Buffer.from('{"a":1} x{"b":2}'))).toEqual(['{"a":1}']);
    expect(splitter.error).toEqual(new DecodeError("invalid character 'x' looking for beginning of value"));
    expect(splitter.push(Buffer.from('{"c":3}'))).toEqual([]);
  });
});

describe("envelopeError", () => {
  it("prefers errorDetail over error", () => {
    const error = envelopeError({ error: "short", errorDetail: { code: 2, message: "detailed" } });
    expect(error).toBeInstanceOf(EngineError);
    expect(error?.message).toBe("detailed");
    expect(error?.code).toBe(2);
  });

  it("accepts a plain string or an object error", () => {
    expect(envelopeError({ error: "plain" })?.message).toBe("plain");
    expect(envelopeError({ error: { message: "object", code: 7 } })?.code).toBe(7);
  });

  it("treats an error object without a message as fatal", () => {
    expect(envelopeError({ errorDetail: {} })?.message).toBe("engine reported an error without a message");
    expect(envelopeError({ errorDetail: {}, error: "short" })?.message).toBe("short");
    expect(envelopeError({ error: { code: 4 } })?.code).toBe(4);
  });

  it("returns null for messages without an error", () => {
    expect(envelopeError({ stream: "Step 1/2" })).toBeNull();
    expect(envelopeError({ error: "" })).toBeNull();
  });
});

describe("envelopeAux", () => {
  it("reads the id-tagged and the self-tagged forms", () => {
    expect(envelopeAux({ id: "moby.image.id", aux: { ID: "sha256:1" } })).toEqual({
      tag: "moby.image.id",
      payload: { ID: "sha256:1" },
    });
    expect(envelopeAux({ aux: { ID: "moby.image.id", payload: { ID: "sha256:2" } } })).toEqual({
      tag: "moby.image.id",
      payload: { ID: "sha256:2" },
    });
  });

  it("returns null without a recognizable tag", () => {
    expect(envelopeAux({ stream: "x" })).toBeNull();
    expect(envelopeAux({ aux: { ID: "sha256:3" } })).toBeNull();
  });
});

describe("decodeBuildResult", () => {
  it("returns the last image id reported", async () => {
    const id = await decodeBuildResult(
      chunks(
        '{"stream":"Step 1/1"}',
        '{"id":"moby.image.id","aux":{"ID":"sha256:first"}}',
        '{"aux":{"ID":"moby.image.id","payload":{"ID":"sha256:second"}}}'
      )
    );
    expect(id).toBe("sha256:second");
  });

  it("returns an empty id when none was reported", async () => {
    expect(await decodeBuildResult(chunks('{"stream":"done"}'))).toBe("");
  });

  it("fails with the engine's error even after an id", async () => {
    const stream = chunks(
      '{"id":"moby.image.id","aux":{"ID":"sha256:first"}}',
      '{"errorDetail":{"code":1,"message":"failed to solve: exit code 2"},"error":"failed to solve: exit code 2"}'
    );
    await expect(decodeBuildResult(stream)).rejects.toThrow(new EngineError("failed to solve: exit code 2", 1));
  });

  it("returns an empty id for an empty stream", async () => {
    expect(await decodeBuildResult(chunks())).toBe("");
  });

  it("fails with the engine's message for an error object", async () => {
    const stream = chunks('{"error":{"message":"no space left on device"}}');
    await expect(decodeBuildResult(stream)).rejects.toThrow(new EngineError("no space left on device"));
  });

  it("reports the error before stray bytes later in the same chunk", async () => {
    const stream = chunks('{"error":{"message":"no space left on device"}}\u0000garbage');
    await expect(decodeBuildResult(stream)).rejects.toBeInstanceOf(EngineError);
  });

  it("does not read envelopes after an error", async () => {
    const valid = chunks('{"errorDetail":{"message":"boom"}}{"id":"moby.image.id","aux":{"ID":"sha256:late"}}');
    await expect(decodeBuildResult(valid)).rejects.toThrow(new EngineError("boom"));

    const malformed = chunks('{"errorDetail":{"message":"boom"}}', '{"stream":}');
    await expect(decodeBuildResult(malformed)).rejects.toThrow(new EngineError("boom"));
  });

  it("fails on an empty errorDetail even when an id follows", async () => {
    const stream = chunks('{"errorDetail":{}}{"id":"moby.image.id","aux":{"ID":"sha256:x"}}');
    await expect(decodeBuildResult(stream)).rejects.toThrow(new EngineError("engine reported an error without a message"));
  });

  it("skips unreadable aux payloads", async () => {
    const id = await decodeBuildResult(
      chunks(
        '{"id":"moby.image.id","aux":{"ID":"sha256:kept"}}',
        '{"id":"moby.image.id","aux":"not an object"}',
        '{"id":"moby.image.id","aux":{"ID":42}}'
      )
    );
    expect(id).toBe("sha256:kept");
  });

  it("forwards trace events in order", async () => {
    const trace = new Channel<SolveEvent>();
    await decodeBuildResult(
      chunks(
        traceMessage("first"),
        JSON.stringify({ id: "moby.buildkit.trace", aux: "%%%" }),
        traceMessage("second")
      ),
      { trace }
    );

    expect(trace.pending).toBe(2);
    const first = await trace.receive();
    const second = await trace.receive();
    expect(first.value?.vertexes[0]?.name).toBe("first");
    expect(second.value?.vertexes[0]?.name).toBe("second");
    expect(second.value?.vertexes[0]?.started).toEqual(new Date(10_000));
  });

  it("ignores trace payloads without a channel", async () => {
    const id = await decodeBuildResult(
      chunks(
        traceMessage("ignored"),
        '{"id":"moby.image.id","aux":{"ID":"sha256:x"}}'
      )
    );
    expect(id).toBe("sha256:x");
  });
});
