/** Kinds of chat completion exchanges recorded in the audit trail. */
export type AuditRequestType =
  | "chat_completion_non_streaming"
  | "chat_completion_streaming"
  | "chat_completion_streaming_error"
  | "chat_completion_error";

export interface AuditEntryInput {
  requestType: AuditRequestType;
  request: unknown;
  response: unknown;
}

/** On-disk shape of one audit file. */
export interface AuditRecord {
  audit_id: string;
  timestamp: string;
  request_type: AuditRequestType;
  request: unknown;
  response: unknown;
  metadata: {
    server_version: string;
    audit_format_version: string;
    environment: {
      node_version: string;
      platform: string;
      working_directory: string;
    };
  };
}

/** Destination for audit entries. Returns the audit id, or null when nothing was written. */
export interface AuditSink {
  record(input: AuditEntryInput): Promise<string | null>;
}
