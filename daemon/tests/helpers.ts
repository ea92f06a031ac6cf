import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { vi } from "vitest";
import { defaults, type PulseConfig } from "../src/config.js";

/** Fixed clock for every scan in the suite. A whole second, so mtimes round-trip exactly. */
export const NOW = Date.parse("2026-03-01T12:00:00.000Z");

export function makeTmpDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `agent-pulse-${prefix}-`));
}

/**
 * Write a session log under `root/projectDir/fileName` and backdate
 * its mtime so it is `ageSeconds` old relative to NOW.
 */
export function writeSession(
  root: string,
  projectDir: string,
  fileName: string,
  lines: Array<string | object>,
  ageSeconds: number,
): string {
  const dir = path.join(root, projectDir);
  fs.mkdirSync(dir, { recursive: true });
  const filePath = path.join(dir, fileName);
  const body = lines
    .map((l) => (typeof l === "string" ? l : JSON.stringify(l)))
    .join("\n");
  fs.writeFileSync(filePath, lines.length > 0 ? body + "\n" : "");
  const mtime = (NOW - ageSeconds * 1000) / 1000;
  fs.utimesSync(filePath, mtime, mtime);
  return filePath;
}

export function assistant(
  content: object[],
  extra: Record<string, unknown> = {},
): Record<string, unknown> {
  return {
    type: "assistant",
    message: { role: "assistant", model: "claude-sonnet-4-5", content },
    ...extra,
  };
}

export function user(text: string, extra: Record<string, unknown> = {}): Record<string, unknown> {
  return { type: "user", message: { role: "user", content: text }, ...extra };
}

export function fakeLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
    error: vi.fn(),
  };
}

export function testConfig(projectsDir: string, psk = ""): PulseConfig {
  const config = defaults();
  config.scanner.projectsDir = projectsDir;
  config.auth.psk = psk;
  return config;
}
