import { describe, expect, it } from "vitest";

import { formatCommandError, getExitCodeInfo, isUserTermination } from "../src/error-handler.js";
import { ConfigError, DockerNotRunningError, EngineError, SessionError } from "../src/errors.js";

describe("getExitCodeInfo", () => {
  it("describes known and unknown exit codes", () => {
    expect(getExitCodeInfo(127).description).toBe("Command not found");
    expect(getExitCodeInfo(42)).toEqual({ code: 42, description: "Container exited with code 42", severity: "warn" });
  });

  it("treats Ctrl+C and SIGTERM as user termination", () => {
    expect(isUserTermination(130)).toBe(true);
    expect(isUserTermination(143)).toBe(true);
    expect(isUserTermination(137)).toBe(false);
  });
});

describe("formatCommandError", () => {
  it("labels failures by kind", () => {
    expect(formatCommandError(new EngineError("failed to solve"))).toBe("Build failed: failed to solve");
    expect(formatCommandError(new ConfigError("No image named 'web' in configuration"))).toBe(
      "Configuration error: No image named 'web' in configuration"
    );
    expect(formatCommandError(new DockerNotRunningError())).toBe(
      "Docker daemon is not running\nCheck DOCKER_HOST or start Docker."
    );
    expect(formatCommandError(new SessionError("failed to open build session: refused"))).toBe(
      "failed to open build session: refused"
    );
    expect(formatCommandError("plain")).toBe("plain");
  });
});
