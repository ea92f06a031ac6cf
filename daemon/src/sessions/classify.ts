import { readFileSync } from "node:fs";
import { basename } from "node:path";
import type {
  ClassifyResult,
  ContentItem,
  LogEntry,
  PendingApproval,
  ProjectDirectory,
  SessionState,
  ToolInvocation,
} from "./types.js";

/** Tool the assistant calls when it wants the user to pick an answer. */
const QUESTION_TOOL = "AskUserQuestion";

const PREVIEW_MAX = 150;
const DESCRIPTION_MAX = 100;

export interface EntryClassification {
  state: SessionState;
  pendingApproval: PendingApproval | null;
  lastTool: ToolInvocation | null;
  preview: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function toContentItem(raw: unknown): ContentItem {
  if (!isRecord(raw)) return { kind: "other" };

  switch (raw.type) {
    case "tool_use":
      return {
        kind: "tool_use",
        name: typeof raw.name === "string" ? raw.name : "Unknown",
        input: isRecord(raw.input) ? raw.input : {},
      };
    case "text":
      return { kind: "text", text: typeof raw.text === "string" ? raw.text : "" };
    default:
      return { kind: "other" };
  }
}

/**
 * Parse one JSONL line. Returns null for malformed JSON or anything
 * that is not an object; missing fields fall back to defaults.
 */
export function parseLogEntry(line: string): LogEntry | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }
  if (!isRecord(raw)) return null;

  const message: Record<string, unknown> = isRecord(raw.message) ? raw.message : {};
  const content = Array.isArray(message.content)
    ? message.content.map(toContentItem)
    : [];

  return {
    type: typeof raw.type === "string" ? raw.type : "unknown",
    sessionId: typeof raw.sessionId === "string" ? raw.sessionId : null,
    timestamp: typeof raw.timestamp === "string" ? raw.timestamp : null,
    model: typeof message.model === "string" ? message.model : null,
    content,
  };
}

function truncatePreview(text: string): string {
  return text.length > PREVIEW_MAX ? text.slice(0, PREVIEW_MAX) + "..." : text;
}

function describeQuestions(input: Record<string, unknown>): string {
  return JSON.stringify(input.questions ?? []).slice(0, DESCRIPTION_MAX);
}

function describeToolInput(input: Record<string, unknown>): string {
  if (typeof input.description === "string") return input.description;
  if (typeof input.command === "string") {
    return input.command.slice(0, DESCRIPTION_MAX);
  }
  return "";
}

/**
 * Derive the session state from the newest entry alone.
 *
 * Order matters: age beats content, then the entry type decides. Within an
 * assistant message the first tool_use short-circuits; text items before it
 * still feed the preview.
 */
export function classifyEntry(
  entry: LogEntry,
  ageSeconds: number,
  idleThresholdSeconds: number,
): EntryClassification {
  const blank = { pendingApproval: null, lastTool: null, preview: "" };

  if (ageSeconds > idleThresholdSeconds) return { state: "idle", ...blank };
  if (entry.type === "user") return { state: "processing", ...blank };
  if (entry.type !== "assistant") return { state: "unknown", ...blank };

  let preview = "";
  let hasQuestion = false;

  for (const item of entry.content) {
    switch (item.kind) {
      case "tool_use": {
        const lastTool = { name: item.name, timestamp: entry.timestamp };
        if (item.name === QUESTION_TOOL) {
          return {
            state: "waiting_for_question",
            pendingApproval: {
              type: "question",
              toolName: item.name,
              description: describeQuestions(item.input),
            },
            lastTool,
            preview,
          };
        }
        return {
          state: "waiting_for_approval",
          pendingApproval: {
            type: "tool_use",
            toolName: item.name,
            description: describeToolInput(item.input),
          },
          lastTool,
          preview,
        };
      }
      case "text":
        preview = truncatePreview(item.text);
        if (item.text.trim().endsWith("?")) hasQuestion = true;
        break;
      case "other":
        break;
    }
  }

  // No tool call: a trailing question mark reads as a prompt for input
  return {
    state: hasQuestion ? "waiting_for_question" : "task_complete",
    pendingApproval: null,
    lastTool: null,
    preview,
  };
}

/**
 * Walk the last `lookback` lines newest-first and return the first
 * tool_use found in an assistant entry. Unparseable lines are skipped.
 */
export function findRecentToolUse(
  lines: readonly string[],
  lookback: number,
): ToolInvocation | null {
  if (lookback <= 0) return null;

  const recent = lines.slice(-lookback).reverse();
  for (const line of recent) {
    const entry = parseLogEntry(line);
    if (!entry || entry.type !== "assistant") continue;

    for (const item of entry.content) {
      if (item.kind === "tool_use") {
        return { name: item.name, timestamp: entry.timestamp };
      }
    }
  }
  return null;
}

function readLogLines(filePath: string): string[] {
  return readFileSync(filePath, "utf-8")
    .split("\n")
    .filter((l) => l.trim().length > 0);
}

/**
 * Read one session log and build its snapshot from the last line.
 * Never throws: unreadable, empty and malformed files come back as
 * `{ ok: false }` for the caller to log and drop.
 */
export function classifySessionFile(
  filePath: string,
  project: ProjectDirectory,
  ageSeconds: number,
  options: { idleThresholdSeconds: number; lookbackLines: number },
): ClassifyResult {
  let lines: string[];
  try {
    lines = readLogLines(filePath);
  } catch (err) {
    return { ok: false, error: toError(err) };
  }

  if (lines.length === 0) {
    return { ok: false, error: new Error("Session log is empty") };
  }

  const entry = parseLogEntry(lines[lines.length - 1]);
  if (!entry) {
    return { ok: false, error: new Error("Last line is not a JSON object") };
  }

  const { state, pendingApproval, lastTool, preview } = classifyEntry(
    entry,
    ageSeconds,
    options.idleThresholdSeconds,
  );

  return {
    ok: true,
    snapshot: {
      sessionId: entry.sessionId ?? basename(filePath, ".jsonl"),
      projectName: project.projectName,
      projectPath: project.projectPath,
      state,
      lastActivity: entry.timestamp,
      idleSeconds: Math.trunc(ageSeconds),
      model: entry.model ?? "unknown",
      lastTool: lastTool ?? findRecentToolUse(lines, options.lookbackLines),
      lastMessagePreview: preview,
      pendingApproval,
    },
  };
}
