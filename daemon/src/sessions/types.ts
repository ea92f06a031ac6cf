export type SessionState =
  | "idle"
  | "processing"
  | "waiting_for_question"
  | "waiting_for_approval"
  | "task_complete"
  | "unknown";

/** States that mean the assistant is paused on a human. */
export const WAITING_STATES: ReadonlySet<SessionState> = new Set([
  "waiting_for_question",
  "waiting_for_approval",
]);

export interface ProjectDirectory {
  /** Raw directory name, e.g. "-Users-alice-proj" */
  dirName: string;
  /** Last path segment, e.g. "proj" */
  projectName: string;
  /** Best-effort reconstruction, e.g. "/Users/alice/proj" */
  projectPath: string;
}

export type ContentItem =
  | { kind: "tool_use"; name: string; input: Record<string, unknown> }
  | { kind: "text"; text: string }
  | { kind: "other" };

/** One parsed JSONL line. Only the fields the classifier reads are lifted out. */
export interface LogEntry {
  type: string;
  sessionId: string | null;
  timestamp: string | null;
  model: string | null;
  content: ContentItem[];
}

export interface ToolInvocation {
  name: string;
  timestamp: string | null;
}

export interface PendingApproval {
  type: "question" | "tool_use";
  toolName: string;
  description: string;
}

export interface SessionSnapshot {
  readonly sessionId: string;
  readonly projectName: string;
  readonly projectPath: string;
  readonly state: SessionState;
  readonly lastActivity: string | null;
  readonly idleSeconds: number;
  readonly model: string;
  readonly lastTool: ToolInvocation | null;
  readonly lastMessagePreview: string;
  readonly pendingApproval: PendingApproval | null;
}

export interface ScanReport {
  readonly timestamp: string;
  readonly activeSessions: readonly SessionSnapshot[];
  readonly waitingCount: number;
  readonly processingCount: number;
  readonly projectsWithWaiting: readonly string[];
}

export type ClassifyResult =
  | { ok: true; snapshot: SessionSnapshot }
  | { ok: false; error: Error };

export interface ScannerOptions {
  /** Root holding one encoded directory per project */
  projectsDir: string;
  /** Files older than this are not reported at all */
  activeThresholdSeconds: number;
  /** Files older than this are reported as idle */
  idleThresholdSeconds: number;
  /** How many trailing lines to search for the last tool call */
  lookbackLines: number;
  /** Milliseconds since epoch */
  now?: () => number;
}

// Wire shapes served over HTTP and the realtime stream

export interface SessionSnapshotJson {
  session_id: string;
  project_path: string;
  project_name: string;
  state: SessionState;
  last_activity: string | null;
  idle_seconds: number;
  model: string;
  last_tool: { name: string; timestamp: string | null } | null;
  last_message_preview: string;
  pending_approval: {
    type: PendingApproval["type"];
    tool_name: string;
    description: string;
  } | null;
}

export interface ScanReportJson {
  timestamp: string;
  active_sessions: SessionSnapshotJson[];
  waiting_count: number;
  processing_count: number;
  projects_with_waiting: string[];
}
