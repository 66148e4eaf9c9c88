import crypto from "node:crypto";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type { Logger } from "../config/logger.js";
import type { AuditEntryInput, AuditRecord, AuditSink } from "./types.js";

export const AUDIT_FORMAT_VERSION = "1.0";

const pad = (n: number, width = 2) => String(n).padStart(width, "0");

/** Build an audit id like `20250131_142501_123_9f86d081` (local time, ms precision). */
export function formatAuditId(date: Date, suffix: string = crypto.randomBytes(4).toString("hex")): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}_${pad(date.getMilliseconds(), 3)}_${suffix}`;
}

export interface FileAuditWriterOptions {
  dir: string;
  logger: Logger;
  serverVersion: string;
  now?: () => Date;
}

/** Writes each entry to `<dir>/audit_<id>.json`. Write failures are logged, never thrown. */
export class FileAuditWriter implements AuditSink {
  private readonly now: () => Date;

  constructor(private readonly opts: FileAuditWriterOptions) {
    this.now = opts.now ?? (() => new Date());
  }

  async record(input: AuditEntryInput): Promise<string | null> {
    const date = this.now();
    const auditId = formatAuditId(date);
    const record: AuditRecord = {
      audit_id: auditId,
      timestamp: date.toISOString(),
      request_type: input.requestType,
      request: input.request,
      response: input.response,
      metadata: {
        server_version: this.opts.serverVersion,
        audit_format_version: AUDIT_FORMAT_VERSION,
        environment: {
          node_version: process.versions.node,
          platform: process.platform,
          working_directory: process.cwd(),
        },
      },
    };

    const file = path.join(this.opts.dir, `audit_${auditId}.json`);
    try {
      await mkdir(this.opts.dir, { recursive: true });
      await writeFile(file, JSON.stringify(record, null, 2), "utf-8");
    } catch (err) {
      this.opts.logger.error("Failed to save audit data", {
        file,
        error: err instanceof Error ? err.message : String(err),
      });
      return null;
    }

    this.opts.logger.info(`Audit data saved to: ${file}`);
    return auditId;
  }
}

/** Sink used when auditing is switched off. */
export class NoopAuditSink implements AuditSink {
  async record(_input: AuditEntryInput): Promise<string | null> {
    return null;
  }
}
