import type { ErrorCode } from "./errors.js";

/**
 * Resolved IMAP connection settings. `secure` selects implicit TLS; when false
 * the client upgrades with STARTTLS if the server offers it.
 */
export type ConnectionProfile = Readonly<{
  host: string;
  port: number;
  secure: boolean;
  user: string;
  password: string;
  name?: string;
}>;

export type NasProfile = Readonly<{
  host: string;
  share: string;
  username: string;
  password: string;
  domain: string;
  basePath: string;
  port?: number;
}>;

export interface FolderSummary {
  name: string;
  delimiter: string;
  total: number;
  unseen?: number;
}

/**
 * A message as listed by one mail session. UIDs and sequence numbers are only
 * meaningful while that session stays open.
 */
export interface RemoteMessageHandle {
  uid: number;
  seq: number;
  internalDate: Date;
  size: number;
}

export interface PlannedFile {
  name: string;
  content: Buffer;
}

export interface MaterializationPlan {
  uid: number;
  folderDir: string;
  directoryName: string;
  directory: string;
  subject: string;
  timestamp: string;
  disambiguator: number;
  /** An identical earlier copy already sits at `directory` */
  reuse: boolean;
  /** Raw message first, then attachments in part order */
  files: PlannedFile[];
}

export interface MaterializedMessage {
  uid: number;
  directory: string;
  directoryName: string;
  rawFile: string;
  attachments: string[];
  subject: string;
  timestamp: string;
  /** An identical directory from an earlier run was kept as is */
  reused: boolean;
}

export type RetentionUnit = "day" | "week" | "month" | "year";

export interface RetentionExpression {
  quantity: number;
  unit: RetentionUnit;
  source: string;
}

/**
 * Which listed messages a clean step may delete. `all` removes every eligible
 * message and has to be chosen explicitly.
 */
export type RetentionRule =
  | { mode: "none" }
  | { mode: "olderThan"; expression: RetentionExpression }
  | { mode: "all" };

export type WriteResult = "written" | "skipped";

export type RunState =
  | "Listing"
  | "Downloading"
  | "Mirroring"
  | "LocalCleanup"
  | "RetentionDeleting"
  | "Done"
  | "Failed";

export type ErrorKind =
  | "connection"
  | "folder"
  | "fetch"
  | "parse"
  | "write"
  | "delete"
  | "cleanup";

export interface ErrorRecord {
  folder: string;
  /** Message UID, or a local/remote path for file-level failures */
  item: string;
  kind: ErrorKind;
  code: ErrorCode;
  reason: string;
  retryable: boolean;
}

export type DeletionStatus =
  | "not-requested"
  | "not-confirmed"
  | "skipped-empty"
  | "previewed"
  | "performed"
  | "failed";

/** UIDs for message-level decisions, remote paths for file-level ones */
export interface RunActions {
  readonly download: readonly number[];
  readonly upload: readonly string[];
  readonly skipExisting: readonly string[];
  readonly deleteLocal: readonly number[];
  readonly deleteRemote: readonly number[];
}

export type UidAction = "download" | "deleteLocal" | "deleteRemote";
export type PathAction = "upload" | "skipExisting";

export interface RunCounters {
  listed: number;
  downloaded: number;
  reusedLocal: number;
  attachments: number;
  uploaded: number;
  skippedExisting: number;
  deletedLocal: number;
  deletedRemote: number;
  failed: number;
}

export interface RunOutcome extends RunCounters {
  folder: string;
  dryRun: boolean;
  state: RunState;
  deletion: DeletionStatus;
  cutoff?: Date;
  actions: RunActions;
  errors: readonly ErrorRecord[];
  startedAt: Date;
  finishedAt: Date;
}

export interface RunOptions {
  outputDir: string;
  /** False selects the clean-only path: list and delete, no bodies fetched */
  download: boolean;
  mirror: boolean;
  overwrite: boolean;
  deleteLocal: boolean;
  dryRun: boolean;
  retention: RetentionRule;
  deletionConfirmed: boolean;
  /** Remote directory under the NAS base path, usually the mailbox local part */
  accountId: string;
  now?: Date;
}
