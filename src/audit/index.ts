export type { AuditEntryInput, AuditRecord, AuditRequestType, AuditSink } from "./types.js";
export { AUDIT_FORMAT_VERSION, FileAuditWriter, type FileAuditWriterOptions, formatAuditId, NoopAuditSink } from "./writer.js";
