import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { loadWorkspaceConfig, type WorkspaceConfig } from "../config/config.js";
import type { RuntimeEnv } from "../runtime.js";
import { authLogin, authLogout, getAuthStatus } from "./auth-cli.js";

const NOW = Date.parse("2026-03-01T12:00:00Z");

function quietRuntime() {
  const log = vi.fn();
  const runtime: RuntimeEnv = {
    log,
    error: vi.fn(),
    exit: (code) => {
      throw new Error(`exit ${code}`);
    },
  };
  return { runtime, log };
}

describe("auth commands", () => {
  let dir: string;
  let config: WorkspaceConfig;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "workspace-mcp-cli-"));
    config = loadWorkspaceConfig({}, dir);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("reports nothing configured in an empty directory", async () => {
    expect(await getAuthStatus(config, NOW)).toEqual({
      inlineServiceAccount: false,
      serviceAccountFile: { path: path.join(dir, "service_account.json"), present: false },
      clientSecrets: { path: path.join(dir, "credentials.json"), present: false },
      token: { path: path.join(dir, "token.json"), state: "missing" },
    });
  });

  it("describes a stored token and the servers it covers", async () => {
    await fs.writeFile(
      config.tokenPath,
      JSON.stringify({
        token: "access-1",
        refresh_token: "refresh-1",
        scopes: [
          "https://www.googleapis.com/auth/documents",
          "https://www.googleapis.com/auth/drive",
        ],
        expiry: "2026-03-01T11:00:00Z",
      }),
    );

    const status = await getAuthStatus(config, NOW);

    expect(status.token).toEqual({
      path: config.tokenPath,
      state: "present",
      expiresAt: "2026-03-01T11:00:00.000Z",
      expired: true,
      refreshable: true,
      scopes: [
        "https://www.googleapis.com/auth/documents",
        "https://www.googleapis.com/auth/drive",
      ],
      covers: ["docs", "drive"],
    });
  });

  it("flags an unreadable token file", async () => {
    await fs.writeFile(config.tokenPath, "{");

    const status = await getAuthStatus(config, NOW);

    expect(status.token).toEqual({
      path: config.tokenPath,
      state: "invalid",
      error: "Token file is not valid JSON",
    });
  });

  it("deletes the stored token on logout", async () => {
    await fs.writeFile(config.tokenPath, "{}");
    const { runtime, log } = quietRuntime();

    await authLogout(config, runtime);
    await authLogout(config, runtime);

    await expect(fs.access(config.tokenPath)).rejects.toThrow();
    expect(log).toHaveBeenCalledTimes(2);
    expect(String(log.mock.calls[1]?.[0])).toContain(`No token stored at ${config.tokenPath}`);
  });

  it("leaves the stored token in place when a forced login resolves elsewhere", async () => {
    const token = JSON.stringify({ token: "access-1", refresh_token: "refresh-1" });
    await fs.writeFile(config.tokenPath, token);
    await fs.writeFile(
      config.serviceAccountPath,
      JSON.stringify({
        type: "service_account",
        client_email: "robot@test-project.iam.gserviceaccount.com",
        private_key: "test-private-key",
      }),
    );
    const { runtime, log } = quietRuntime();

    await authLogin(config, { force: true, open: false }, runtime);

    expect(await fs.readFile(config.tokenPath, "utf8")).toBe(token);
    expect(String(log.mock.calls[0]?.[0])).toContain(
      "Service account robot@test-project.iam.gserviceaccount.com is configured",
    );
  });
});
