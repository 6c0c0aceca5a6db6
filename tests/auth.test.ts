import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  credentialFor,
  loadCredentials,
  parseAuthEntry,
  parseHelperOutput,
  registryOf,
  type CredentialHelperRunner,
} from "../src/docker/auth.js";

describe("loadCredentials", () => {
  let dir: string;
  let configPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "berth-auth-"));
    configPath = join(dir, "config.json");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("combines inline entries with credential helpers", async () => {
    await writeFile(
      configPath,
      JSON.stringify({
        auths: {
          "registry.example.com": { auth: Buffer.from("user:test-password").toString("base64") },
          "https://index.docker.io/v1/": {},
        },
        credsStore: "desktop",
        credHelpers: { "gcr.io": "gcloud" },
      })
    );
    const calls: Array<[string, string]> = [];
    const runHelper: CredentialHelperRunner = async (helper, registry) => {
      calls.push([helper, registry]);
      if (helper === "desktop") {
        return JSON.stringify({ ServerURL: registry, Username: "hubuser", Secret: "test-secret" });
      }
      return null;
    };

    const credentials = await loadCredentials(configPath, runHelper);

    expect(calls).toEqual([
      ["desktop", "https://index.docker.io/v1/"],
      ["gcloud", "gcr.io"],
    ]);
    expect(credentials).toEqual({
      "registry.example.com": { username: "user", password: "test-password", serveraddress: "registry.example.com" },
      "https://index.docker.io/v1/": {
        username: "hubuser",
        password: "test-secret",
        serveraddress: "https://index.docker.io/v1/",
      },
    });
  });

  it("returns nothing without a config file", async () => {
    expect(await loadCredentials(join(dir, "missing.json"))).toEqual({});
  });

  it("ignores an unreadable config file", async () => {
    await writeFile(configPath, "{not json");
    expect(await loadCredentials(configPath)).toEqual({});
  });
});

describe("parseAuthEntry", () => {
  it("reads username and password fields", () => {
    expect(parseAuthEntry("ghcr.io", { username: "me", password: "test-password" })).toEqual({
      username: "me",
      password: "test-password",
      serveraddress: "ghcr.io",
    });
  });

  it("rejects entries without credentials", () => {
    expect(parseAuthEntry("ghcr.io", {})).toBeNull();
    expect(parseAuthEntry("ghcr.io", { auth: Buffer.from("nocolon").toString("base64") })).toBeNull();
    expect(parseAuthEntry("ghcr.io", "text")).toBeNull();
  });
});

describe("parseHelperOutput", () => {
  it("rejects malformed output", () => {
    expect(parseHelperOutput("gcr.io", "credentials not found")).toBeNull();
    expect(parseHelperOutput("gcr.io", JSON.stringify({ Username: "me" }))).toBeNull();
  });
});

describe("registryOf", () => {
  it("finds the registry host of a reference", () => {
    expect(registryOf("alpine:3")).toBe("docker.io");
    expect(registryOf("library/alpine")).toBe("docker.io");
    expect(registryOf("registry.example.com/team/app:1")).toBe("registry.example.com");
    expect(registryOf("localhost:5000/app")).toBe("localhost:5000");
    expect(registryOf("localhost/app")).toBe("localhost");
  });
});

describe("credentialFor", () => {
  const hub = { username: "hubuser", password: "test-secret", serveraddress: "https://index.docker.io/v1/" };
  const own = { username: "user", password: "test-password", serveraddress: "registry.example.com" };
  const credentials = { "https://index.docker.io/v1/": hub, "registry.example.com": own };

  it("matches Docker Hub aliases", () => {
    expect(credentialFor(credentials, "alpine:3")).toBe(hub);
  });

  it("matches other registries by host", () => {
    expect(credentialFor(credentials, "registry.example.com/team/app:1")).toBe(own);
    expect(credentialFor(credentials, "ghcr.io/team/app")).toBeUndefined();
  });
});
