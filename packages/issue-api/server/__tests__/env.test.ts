import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { loadServerEnv } from "../env";

const KEYS = ["FAULTLINE_ENV_SHARED", "FAULTLINE_ENV_BASE_ONLY"];

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "issue-api-env-"));
  for (const key of KEYS) delete process.env[key];
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
  for (const key of KEYS) delete process.env[key];
});

describe("loadServerEnv", () => {
  it("reads .env.local before .env and lets it win", () => {
    writeFileSync(join(dir, ".env.local"), "FAULTLINE_ENV_SHARED=local\n");
    writeFileSync(
      join(dir, ".env"),
      "FAULTLINE_ENV_SHARED=base\nFAULTLINE_ENV_BASE_ONLY=base\n"
    );

    expect(loadServerEnv(dir)).toEqual([join(dir, ".env.local"), join(dir, ".env")]);
    expect(process.env.FAULTLINE_ENV_SHARED).toBe("local");
    expect(process.env.FAULTLINE_ENV_BASE_ONLY).toBe("base");
  });

  it("skips files that do not exist", () => {
    writeFileSync(join(dir, ".env"), "FAULTLINE_ENV_BASE_ONLY=base\n");

    expect(loadServerEnv(dir)).toEqual([join(dir, ".env")]);
    expect(process.env.FAULTLINE_ENV_SHARED).toBeUndefined();
  });

  it("keeps variables the process already has", () => {
    process.env.FAULTLINE_ENV_SHARED = "from-shell";
    writeFileSync(join(dir, ".env"), "FAULTLINE_ENV_SHARED=base\n");

    loadServerEnv(dir);

    expect(process.env.FAULTLINE_ENV_SHARED).toBe("from-shell");
  });
});
