import { readFileSync, existsSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { parse as parseYaml } from "yaml";

export interface PulseConfig {
  port: number;
  host: string;
  auth: {
    psk: string;
  };
  scanner: {
    projectsDir: string;
    activeThresholdSeconds: number;
    idleThresholdSeconds: number;
    lookbackLines: number;
  };
  stream: {
    debounceMs: number;
    refreshIntervalMs: number;
    heartbeatSeconds: number;
    maxMissedPongs: number;
  };
}

const CONFIG_DIR = join(homedir(), ".config", "agent-pulse");
const CONFIG_PATH = join(CONFIG_DIR, "config.yaml");

export function defaults(): PulseConfig {
  return {
    port: 9347,
    host: "127.0.0.1",
    auth: {
      psk: "",
    },
    scanner: {
      projectsDir: join(homedir(), ".claude", "projects"),
      activeThresholdSeconds: 600,
      idleThresholdSeconds: 300,
      lookbackLines: 10,
    },
    stream: {
      debounceMs: 250,
      refreshIntervalMs: 5000,
      heartbeatSeconds: 30,
      maxMissedPongs: 3,
    },
  };
}

/**
 * Load config from YAML, falling back to defaults for anything missing.
 * A missing file is not an error; a malformed one is.
 */
export function loadConfig(configPath: string = CONFIG_PATH): PulseConfig {
  const config = defaults();
  if (!existsSync(configPath)) return config;

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(configPath, "utf-8"));
  } catch (err) {
    throw new Error(`Failed to parse config at ${configPath}: ${err}`);
  }

  // An empty document parses to null
  if (parsed === null || parsed === undefined) return config;
  if (!isRecord(parsed)) {
    throw new Error(`Failed to parse config at ${configPath}: expected a mapping`);
  }
  return mergeConfig(config, parsed);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(
  overrides: Record<string, unknown>,
  key: string,
): Record<string, unknown> | undefined {
  const value = overrides[key];
  return isRecord(value) ? value : undefined;
}

function positive(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value > 0;
}

export function mergeConfig(
  base: PulseConfig,
  overrides: Record<string, unknown>,
): PulseConfig {
  const result: PulseConfig = {
    ...base,
    auth: { ...base.auth },
    scanner: { ...base.scanner },
    stream: { ...base.stream },
  };

  if (typeof overrides.port === "number") result.port = overrides.port;
  if (typeof overrides.host === "string") result.host = overrides.host;

  const auth = section(overrides, "auth");
  if (auth && typeof auth.psk === "string") {
    result.auth.psk = auth.psk;
  }

  const scanner = section(overrides, "scanner");
  if (scanner) {
    if (typeof scanner.projectsDir === "string")
      result.scanner.projectsDir = expandHome(scanner.projectsDir);
    if (positive(scanner.activeThresholdSeconds))
      result.scanner.activeThresholdSeconds = scanner.activeThresholdSeconds;
    if (positive(scanner.idleThresholdSeconds))
      result.scanner.idleThresholdSeconds = scanner.idleThresholdSeconds;
    if (typeof scanner.lookbackLines === "number" && scanner.lookbackLines >= 0)
      result.scanner.lookbackLines = Math.floor(scanner.lookbackLines);
  }

  const stream = section(overrides, "stream");
  if (stream) {
    if (typeof stream.debounceMs === "number" && stream.debounceMs >= 0)
      result.stream.debounceMs = stream.debounceMs;
    if (positive(stream.refreshIntervalMs))
      result.stream.refreshIntervalMs = stream.refreshIntervalMs;
    if (positive(stream.heartbeatSeconds))
      result.stream.heartbeatSeconds = stream.heartbeatSeconds;
    if (typeof stream.maxMissedPongs === "number" && stream.maxMissedPongs >= 0)
      result.stream.maxMissedPongs = stream.maxMissedPongs;
  }

  if (result.scanner.idleThresholdSeconds > result.scanner.activeThresholdSeconds) {
    throw new Error(
      "scanner.idleThresholdSeconds must not exceed scanner.activeThresholdSeconds",
    );
  }

  return result;
}

function expandHome(p: string): string {
  if (p === "~") return homedir();
  if (p.startsWith("~/")) return join(homedir(), p.slice(2));
  return p;
}

export { CONFIG_PATH };
