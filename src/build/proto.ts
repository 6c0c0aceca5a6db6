/**
 * Protobuf schema loading.
 *
 * The .proto files ship in proto/ at the package root and are parsed at
 * run time with protobufjs; nothing is generated ahead of time.
 */

import { fileURLToPath } from "node:url";

import protobuf from "protobufjs";

const PROTO_FILES = ["control.proto", "health.proto"].map((file) =>
  fileURLToPath(new URL(`../../proto/${file}`, import.meta.url))
);

let protoRoot: protobuf.Root | null = null;

/** Load (once) the protobuf definitions shipped in proto/. */
export function loadProtoRoot(): protobuf.Root {
  if (!protoRoot) {
    protoRoot = new protobuf.Root().loadSync(PROTO_FILES, { keepCase: true });
  }
  return protoRoot;
}

/** Look up a message type by its fully qualified name. */
export function lookupMessage(name: string): protobuf.Type {
  return loadProtoRoot().lookupType(name);
}
