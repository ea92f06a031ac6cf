import { existsSync, readdirSync, statSync } from "node:fs";
import { join } from "node:path";
import type { FastifyBaseLogger } from "fastify";
import { classifySessionFile } from "./classify.js";
import { decodeProjectDir } from "./project-dir.js";
import { WAITING_STATES } from "./types.js";
import type {
  ProjectDirectory,
  ScanReport,
  ScannerOptions,
  SessionSnapshot,
  SessionSnapshotJson,
  ScanReportJson,
} from "./types.js";

/** Sub-agent transcripts live beside their parent session and are not reported. */
const SUBAGENT_PREFIX = "agent-";
const LOG_EXT = ".jsonl";

export type ScanLogger = Pick<FastifyBaseLogger, "warn" | "debug">;

interface LogFile {
  path: string;
  ageSeconds: number;
}

/**
 * Stateless scanner over the projects directory. Every `scan()` re-reads
 * the filesystem; nothing is cached between calls.
 */
export class SessionScanner {
  private log: ScanLogger;
  private options: Required<ScannerOptions>;

  constructor(options: ScannerOptions, log: ScanLogger) {
    this.log = log;
    this.options = { ...options, now: options.now ?? Date.now };
  }

  scan(): ScanReport {
    const nowMs = this.options.now();
    const timestamp = new Date(nowMs).toISOString();

    if (!existsSync(this.options.projectsDir)) {
      return {
        timestamp,
        activeSessions: [],
        waitingCount: 0,
        processingCount: 0,
        projectsWithWaiting: [],
      };
    }

    const sessions: SessionSnapshot[] = [];
    const projectsWithWaiting: string[] = [];
    let waitingCount = 0;
    let processingCount = 0;

    for (const project of this.listProjectDirs()) {
      const projectDir = join(this.options.projectsDir, project.dirName);

      for (const file of this.listRecentLogs(projectDir, nowMs)) {
        const result = classifySessionFile(file.path, project, file.ageSeconds, {
          idleThresholdSeconds: this.options.idleThresholdSeconds,
          lookbackLines: this.options.lookbackLines,
        });
        if (!result.ok) {
          this.log.warn(
            { err: result.error, filePath: file.path },
            "Failed to parse session file",
          );
          continue;
        }

        const snapshot = result.snapshot;
        sessions.push(snapshot);

        if (WAITING_STATES.has(snapshot.state)) {
          waitingCount++;
          if (!projectsWithWaiting.includes(snapshot.projectName)) {
            projectsWithWaiting.push(snapshot.projectName);
          }
        } else if (snapshot.state === "processing") {
          processingCount++;
        }
        // task_complete and idle raise no alert
      }
    }

    // ISO timestamps compare lexicographically; missing ones sort last
    sessions.sort((a, b) => {
      const ka = a.lastActivity ?? "";
      const kb = b.lastActivity ?? "";
      if (ka === kb) return 0;
      return ka < kb ? 1 : -1;
    });

    return {
      timestamp,
      activeSessions: sessions,
      waitingCount,
      processingCount,
      projectsWithWaiting,
    };
  }

  private listProjectDirs(): ProjectDirectory[] {
    try {
      return readdirSync(this.options.projectsDir, { withFileTypes: true })
        .filter((e) => e.isDirectory())
        .map((e) => e.name)
        .sort()
        .map(decodeProjectDir);
    } catch (err) {
      this.log.warn(
        { err, projectsDir: this.options.projectsDir },
        "Failed to list project directories",
      );
      return [];
    }
  }

  /** Session logs in `dir` modified within the active threshold. */
  private listRecentLogs(dir: string, nowMs: number): LogFile[] {
    let names: string[];
    try {
      names = readdirSync(dir);
    } catch (err) {
      this.log.debug({ err, dir }, "Skipping unreadable project directory");
      return [];
    }

    const files: LogFile[] = [];
    for (const name of names.sort()) {
      if (!name.endsWith(LOG_EXT) || name.startsWith(SUBAGENT_PREFIX)) continue;

      const path = join(dir, name);
      let mtimeMs: number;
      try {
        const stat = statSync(path);
        if (!stat.isFile()) continue;
        mtimeMs = stat.mtimeMs;
      } catch (err) {
        // Removed between readdir and stat
        this.log.debug({ err, path }, "Session file vanished during scan");
        continue;
      }

      const ageSeconds = (nowMs - mtimeMs) / 1000;
      if (ageSeconds > this.options.activeThresholdSeconds) continue;
      files.push({ path, ageSeconds });
    }
    return files;
  }
}

/** Convert a report to the snake_case shape served to clients. */
export function toReportJson(report: ScanReport): ScanReportJson {
  return {
    timestamp: report.timestamp,
    active_sessions: report.activeSessions.map(toSnapshotJson),
    waiting_count: report.waitingCount,
    processing_count: report.processingCount,
    projects_with_waiting: [...report.projectsWithWaiting],
  };
}

function toSnapshotJson(s: SessionSnapshot): SessionSnapshotJson {
  return {
    session_id: s.sessionId,
    project_path: s.projectPath,
    project_name: s.projectName,
    state: s.state,
    last_activity: s.lastActivity,
    idle_seconds: s.idleSeconds,
    model: s.model,
    last_tool: s.lastTool
      ? { name: s.lastTool.name, timestamp: s.lastTool.timestamp }
      : null,
    last_message_preview: s.lastMessagePreview,
    pending_approval: s.pendingApproval
      ? {
          type: s.pendingApproval.type,
          tool_name: s.pendingApproval.toolName,
          description: s.pendingApproval.description,
        }
      : null,
  };
}
