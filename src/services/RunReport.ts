import dayjs from "dayjs";
import utc from "dayjs/plugin/utc.js";
import type {
  DeletionStatus,
  ErrorKind,
  ErrorRecord,
  FolderSummary,
  PathAction,
  RunActions,
  RunCounters,
  RunOutcome,
  RunState,
  UidAction,
} from "../types/archive.types.js";
import { errorMessage, getErrorCode, isRetryableError } from "../types/errors.js";

dayjs.extend(utc);

type NumericCounter = keyof RunCounters;

function emptyCounters(): RunCounters {
  return {
    listed: 0,
    downloaded: 0,
    reusedLocal: 0,
    attachments: 0,
    uploaded: 0,
    skippedExisting: 0,
    deletedLocal: 0,
    deletedRemote: 0,
    failed: 0,
  };
}

/**
 * Mutable accumulator for one folder run. `build()` hands out a frozen
 * RunOutcome; the builder is not used afterwards.
 */
export class RunOutcomeBuilder {
  private state: RunState = "Listing";
  private readonly counters = emptyCounters();
  private readonly actions: { [K in UidAction]: number[] } & { [K in PathAction]: string[] } = {
    download: [],
    upload: [],
    skipExisting: [],
    deleteLocal: [],
    deleteRemote: [],
  };
  private readonly errors: ErrorRecord[] = [];
  private deletion: DeletionStatus = "not-requested";
  private cutoff?: Date;

  constructor(
    private readonly folder: string,
    private readonly dryRun: boolean,
    private readonly startedAt: Date = new Date(),
  ) {}

  enter(state: RunState): void {
    if (this.state !== "Failed") {
      this.state = state;
    }
  }

  increment(counter: NumericCounter, by = 1): void {
    this.counters[counter] += by;
  }

  planMessage(action: UidAction, uid: number): void {
    this.actions[action].push(uid);
  }

  planFile(action: PathAction, path: string): void {
    this.actions[action].push(path);
  }

  setDeletion(status: DeletionStatus): void {
    this.deletion = status;
  }

  setCutoff(cutoff: Date | undefined): void {
    this.cutoff = cutoff;
  }

  recordError(kind: ErrorKind, item: string | number, error: unknown): ErrorRecord {
    const record: ErrorRecord = {
      folder: this.folder,
      item: String(item),
      kind,
      code: getErrorCode(error),
      reason: errorMessage(error),
      retryable: isRetryableError(error),
    };
    this.errors.push(record);
    this.counters.failed++;
    return record;
  }

  /**
   * Folder-level failure: record it and stop the state machine.
   */
  fail(kind: ErrorKind, item: string | number, error: unknown): void {
    this.recordError(kind, item, error);
    this.state = "Failed";
  }

  build(finishedAt: Date = new Date()): RunOutcome {
    const actions: RunActions = Object.freeze({
      download: Object.freeze([...this.actions.download]),
      upload: Object.freeze([...this.actions.upload]),
      skipExisting: Object.freeze([...this.actions.skipExisting]),
      deleteLocal: Object.freeze([...this.actions.deleteLocal]),
      deleteRemote: Object.freeze([...this.actions.deleteRemote]),
    });

    const outcome: RunOutcome = {
      ...this.counters,
      folder: this.folder,
      dryRun: this.dryRun,
      state: this.state === "Failed" ? "Failed" : "Done",
      deletion: this.deletion,
      cutoff: this.cutoff,
      actions,
      errors: Object.freeze(this.errors.map((record) => Object.freeze({ ...record }))),
      startedAt: this.startedAt,
      finishedAt,
    };
    return Object.freeze(outcome);
  }
}

export function hasFailures(outcome: RunOutcome): boolean {
  return outcome.state === "Failed" || outcome.failed > 0;
}

const DELETION_LABELS: Record<DeletionStatus, string> = {
  "not-requested": "not requested",
  "not-confirmed": "skipped (not confirmed)",
  "skipped-empty": "nothing to delete",
  previewed: "preview only",
  performed: "performed",
  failed: "failed",
};

function row(label: string, value: string | number): string {
  return `  ${label.padEnd(20)}${value}`;
}

/**
 * Plain-text summary for stdout.
 */
export function formatOutcome(outcome: RunOutcome): string {
  const header = `Folder ${outcome.folder}${outcome.dryRun ? " (dry run)" : ""}: ${outcome.state}`;
  const lines = [header, row("Listed", outcome.listed)];

  if (outcome.dryRun) {
    lines.push(
      row("Would download", outcome.actions.download.length),
      row("Would upload", outcome.actions.upload.length),
      row("Would skip", outcome.actions.skipExisting.length),
      row("Would delete local", outcome.actions.deleteLocal.length),
      row("Would delete remote", outcome.actions.deleteRemote.length),
    );
  } else {
    lines.push(
      row("Downloaded", outcome.downloaded),
      row("Reused local", outcome.reusedLocal),
      row("Attachments", outcome.attachments),
      row("Uploaded", outcome.uploaded),
      row("Skipped existing", outcome.skippedExisting),
      row("Deleted local", outcome.deletedLocal),
      row("Deleted remote", outcome.deletedRemote),
    );
  }

  lines.push(row("Failed", outcome.failed));

  const cutoff = outcome.cutoff
    ? ` (older than ${dayjs.utc(outcome.cutoff).format("YYYY-MM-DD")})`
    : "";
  lines.push(row("Server deletion", `${DELETION_LABELS[outcome.deletion]}${cutoff}`));

  for (const error of outcome.errors) {
    lines.push(`  ! [${error.kind}] ${error.item}: ${error.reason}`);
  }

  return lines.join("\n");
}

export function formatFolderTable(folders: readonly FolderSummary[]): string {
  if (folders.length === 0) {
    return "No folders found.";
  }

  const indexWidth = String(folders.length).length;
  const nameWidth = Math.max(6, ...folders.map((folder) => folder.name.length));
  const lines = [
    `${"#".padStart(indexWidth)}  ${"Folder".padEnd(nameWidth)}  ${"Messages".padStart(8)}  ${"Unseen".padStart(6)}`,
  ];

  folders.forEach((folder, index) => {
    const unseen = folder.unseen === undefined ? "?" : String(folder.unseen);
    lines.push(
      `${String(index + 1).padStart(indexWidth)}  ${folder.name.padEnd(nameWidth)}  ${String(folder.total).padStart(8)}  ${unseen.padStart(6)}`,
    );
  });

  return lines.join("\n");
}
