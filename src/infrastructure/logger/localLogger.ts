import { promises as fs } from "fs";
import path from "path";
import type { LoggerPort } from "../../interfaces/ports";

type LogLevel = "info" | "warn" | "error";

export type LogEntry = {
  timestamp: string;
  level: LogLevel;
  jobId: string;
  message: string;
  pid: number;
};

export class LocalLogger implements LoggerPort {
  constructor(
    private baseDir: string,
    private echo = false
  ) {}

  async info(jobId: string, message: string) {
    await this.append(jobId, "info", message);
  }

  async warn(jobId: string, message: string) {
    await this.append(jobId, "warn", message);
  }

  async error(jobId: string, message: string) {
    await this.append(jobId, "error", message);
  }

  logPath(jobId: string) {
    return path.join(this.baseDir, `${safeFileName(jobId)}.log`);
  }

  private async append(jobId: string, level: LogLevel, message: string) {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      jobId,
      message,
      pid: process.pid
    };
    if (this.echo) {
      console[level](`[${entry.timestamp}] [${level.toUpperCase()}] [${jobId}] ${message}`);
    }

    try {
      await fs.mkdir(this.baseDir, { recursive: true });
      await fs.appendFile(this.logPath(jobId), `${JSON.stringify(entry)}\n`);
    } catch (failure) {
      console.error("Logger write failed", failure);
    }
  }
}

export function safeFileName(jobId: string) {
  return jobId.replaceAll(/[^A-Za-z0-9._-]/g, "_");
}
