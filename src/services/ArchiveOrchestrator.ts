import { join } from "node:path";
import type {
  ConnectionProfile,
  FolderSummary,
  MaterializationPlan,
  MaterializedMessage,
  NasProfile,
  RemoteMessageHandle,
  RunOptions,
  RunOutcome,
} from "../types/archive.types.js";
import {
  ConfigurationError,
  ConnectionError,
  DeleteError,
  ErrorCode,
  errorMessage,
  FetchError,
  FolderNotFoundError,
  ParseError,
  ValidationError,
  WriteError,
} from "../types/errors.js";
import { sanitizeFolderName } from "../utils/sanitize.js";
import type { MailProbeResult, MailSession, MailTransport } from "./ImapTransport.js";
import { createLogger } from "./Logger.js";
import { MessageMaterializer, NamingRegistry } from "./MessageMaterializer.js";
import { cutoffFor, describeRule, searchBeforeDate, selectForDeletion } from "./Retention.js";
import { RetryPolicy } from "./RetryPolicy.js";
import { RunOutcomeBuilder } from "./RunReport.js";
import {
  joinRemotePath,
  type RemoteStorage,
  type StorageProbeResult,
  type StorageSession,
} from "./SmbStorage.js";

export interface ArchiveProfiles {
  mail?: ConnectionProfile;
  nas?: NasProfile;
}

export interface ArchiveOrchestratorDeps {
  transport: MailTransport;
  storage?: RemoteStorage;
  materializer?: MessageMaterializer;
  retryPolicy?: RetryPolicy;
}

/**
 * One listed message as it moves through a run. `message` is only set once
 * the directory exists on disk; previews stop at `plan`.
 */
interface MessageEntry {
  handle: RemoteMessageHandle;
  plan: MaterializationPlan;
  message?: MaterializedMessage;
  mirrored: boolean;
}

interface FolderRun {
  folder: string;
  folderDir: string;
  remoteFolder: string;
  options: RunOptions;
  now: Date;
  mail: MailSession;
  store?: StorageSession;
  outcome: RunOutcomeBuilder;
}

export class ArchiveOrchestrator {
  private readonly logger = createLogger("ArchiveOrchestrator");
  private readonly transport: MailTransport;
  private readonly storage?: RemoteStorage;
  private readonly materializer: MessageMaterializer;
  private readonly retryPolicy: RetryPolicy;

  constructor(
    private readonly profiles: ArchiveProfiles,
    deps: ArchiveOrchestratorDeps,
  ) {
    this.transport = deps.transport;
    this.storage = deps.storage;
    this.materializer = deps.materializer ?? new MessageMaterializer(new NamingRegistry());
    this.retryPolicy =
      deps.retryPolicy ??
      new RetryPolicy({
        maxAttempts: 2,
        isRetryable: (error) => error instanceof FetchError && error.isRetryable,
      });
  }

  async listFolders(): Promise<FolderSummary[]> {
    const session = await this.transport.connect(this.requireMail());
    try {
      return await session.listFolders();
    } finally {
      await session.close();
    }
  }

  async testMailConnection(): Promise<MailProbeResult> {
    const session = await this.transport.connect(this.requireMail());
    try {
      return await session.probe();
    } finally {
      await session.close();
    }
  }

  async testStorageConnection(): Promise<StorageProbeResult> {
    const { storage, nasProfile } = this.requireStorage();
    const session = await storage.connect(nasProfile);
    try {
      return await session.probe();
    } finally {
      await session.close();
    }
  }

  /**
   * Archive one folder: list, download, mirror, clean up locally and apply
   * the retention rule on the server. Item failures are recorded in the
   * outcome; connection failures are thrown once both sessions are closed.
   */
  async archiveFolder(folder: string, options: RunOptions): Promise<RunOutcome> {
    this.validateOptions(options);

    const now = options.now ?? new Date();
    const outcome = new RunOutcomeBuilder(folder, options.dryRun, new Date());
    outcome.setCutoff(cutoffFor(options.retention, now));

    const folderName = sanitizeFolderName(folder);
    this.materializer.startRun();
    const timer = this.logger.startTimer("archive_folder", { folder });

    let mail: MailSession | undefined;
    let store: StorageSession | undefined;

    try {
      mail = await this.transport.connect(this.requireMail());
      if (options.download && options.mirror) {
        const { storage, nasProfile } = this.requireStorage();
        store = await storage.connect(nasProfile);
      }

      await this.runFolder({
        folder,
        folderDir: join(options.outputDir, folderName),
        remoteFolder: joinRemotePath(store?.basePath ?? "", options.accountId, folderName),
        options,
        now,
        mail,
        store,
        outcome,
      });
    } catch (error) {
      timer.end(false, error instanceof Error ? error.name : "UnknownError");
      throw error;
    } finally {
      await store?.close();
      await mail?.close();
    }

    const result = outcome.build();
    timer.end(result.state === "Done");
    this.logger.info(
      `Finished ${folder}`,
      { operation: "archiveFolder", service: "ArchiveOrchestrator", folder },
      {
        state: result.state,
        dryRun: result.dryRun,
        listed: result.listed,
        downloaded: result.downloaded,
        uploaded: result.uploaded,
        deletedRemote: result.deletedRemote,
        failed: result.failed,
      },
    );
    return result;
  }

  private async runFolder(run: FolderRun): Promise<void> {
    const handles = await this.listStep(run);
    if (handles === undefined) {
      return;
    }

    let entries: MessageEntry[] = [];
    if (run.options.download) {
      run.outcome.enter("Downloading");
      entries = await this.downloadStep(run, handles);

      if (run.options.mirror && run.store) {
        run.outcome.enter("Mirroring");
        await this.mirrorStep(run, run.store, entries);
      }

      if (run.options.deleteLocal) {
        run.outcome.enter("LocalCleanup");
        await this.localCleanupStep(run, entries);
      }
    }

    run.outcome.enter("RetentionDeleting");
    const candidates = run.options.download
      ? entries
          .filter((entry) => (run.options.mirror ? entry.mirrored : true))
          .map((entry) => entry.handle)
      : handles;
    await this.retentionStep(run, candidates);

    run.outcome.enter("Done");
  }

  private async listStep(run: FolderRun): Promise<RemoteMessageHandle[] | undefined> {
    const { folder, options, outcome } = run;
    const cutoff = cutoffFor(options.retention, run.now);

    try {
      // Clean-only runs only need candidates; let the server narrow them down
      const filter =
        !options.download && cutoff ? { before: searchBeforeDate(cutoff) } : {};
      const handles = await run.mail.listMessages(folder, filter);
      outcome.increment("listed", handles.length);
      this.logger.info(
        `Listed ${handles.length} messages in ${folder}`,
        { operation: "list", service: "ArchiveOrchestrator", folder },
      );
      return handles;
    } catch (error) {
      if (error instanceof FolderNotFoundError) {
        outcome.fail("folder", folder, error);
        this.logger.error(
          error.message,
          { operation: "list", service: "ArchiveOrchestrator", folder },
        );
        return undefined;
      }
      throw error;
    }
  }

  private async downloadStep(
    run: FolderRun,
    handles: readonly RemoteMessageHandle[],
  ): Promise<MessageEntry[]> {
    const { folder, folderDir, options, outcome } = run;
    const entries: MessageEntry[] = [];

    for (const handle of handles) {
      let raw: Buffer;
      try {
        raw = await this.retryPolicy.execute(
          () => run.mail.fetchRaw(folder, handle),
          (error, attempt) => {
            this.logger.warning(
              `Fetch attempt ${attempt} failed, retrying`,
              { operation: "fetch", service: "ArchiveOrchestrator", folder, uid: handle.uid },
              { error: errorMessage(error) },
            );
          },
        );
      } catch (error) {
        if (error instanceof ConnectionError) throw error;
        outcome.recordError("fetch", handle.uid, error);
        continue;
      }

      let plan: MaterializationPlan;
      try {
        plan = await this.materializer.plan(raw, handle, folderDir);
      } catch (error) {
        if (error instanceof ParseError) {
          outcome.recordError("parse", handle.uid, error);
          continue;
        }
        if (error instanceof WriteError) {
          outcome.recordError("write", error.path, error);
          continue;
        }
        throw error;
      }

      outcome.planMessage("download", handle.uid);

      if (options.dryRun) {
        entries.push({ handle, plan, mirrored: false });
        continue;
      }

      try {
        const message = await this.materializer.commit(plan);
        if (message.reused) {
          outcome.increment("reusedLocal");
        } else {
          outcome.increment("downloaded");
          outcome.increment("attachments", message.attachments.length);
        }
        entries.push({ handle, plan, message, mirrored: false });
      } catch (error) {
        outcome.recordError("write", plan.directory, error);
      }
    }

    return entries;
  }

  private async mirrorStep(
    run: FolderRun,
    store: StorageSession,
    entries: MessageEntry[],
  ): Promise<void> {
    const { options, outcome, folder } = run;

    for (const entry of entries) {
      const directoryName = entry.message?.directoryName ?? entry.plan.directoryName;
      const remoteDir = joinRemotePath(run.remoteFolder, directoryName);
      let complete = true;

      try {
        if (!options.dryRun) {
          await store.ensureDir(remoteDir);
        }
      } catch (error) {
        outcome.recordError("write", remoteDir, error);
        continue;
      }

      for (const file of entry.plan.files) {
        const remotePath = joinRemotePath(remoteDir, file.name);
        try {
          if (options.dryRun) {
            const present = !options.overwrite && (await store.exists(remotePath));
            outcome.planFile(present ? "skipExisting" : "upload", remotePath);
            continue;
          }

          const result = await store.writeFile(remotePath, file.content, options.overwrite);
          if (result === "written") {
            outcome.increment("uploaded");
            outcome.planFile("upload", remotePath);
          } else {
            outcome.increment("skippedExisting");
            outcome.planFile("skipExisting", remotePath);
          }
        } catch (error) {
          if (error instanceof ConnectionError) throw error;
          complete = false;
          outcome.recordError("write", remotePath, error);
        }
      }

      entry.mirrored = complete;
      if (!complete) {
        this.logger.warning(
          `Message ${entry.handle.uid} only partly mirrored`,
          { operation: "mirror", service: "ArchiveOrchestrator", folder, uid: entry.handle.uid },
        );
      }
    }
  }

  private async localCleanupStep(run: FolderRun, entries: MessageEntry[]): Promise<void> {
    const { options, outcome, folderDir, folder } = run;

    for (const entry of entries) {
      // Only what is known to be on the NAS may leave the local disk
      if (!entry.mirrored) {
        continue;
      }

      outcome.planMessage("deleteLocal", entry.handle.uid);
      if (options.dryRun || !entry.message) {
        continue;
      }

      try {
        const removedFolder = await this.materializer.discard(entry.message, folderDir);
        outcome.increment("deletedLocal");
        if (removedFolder) {
          this.logger.debug(
            `Removed empty folder directory ${folderDir}`,
            { operation: "localCleanup", service: "ArchiveOrchestrator", folder },
          );
        }
      } catch (error) {
        outcome.recordError("cleanup", entry.message.directory, error);
      }
    }
  }

  private async retentionStep(
    run: FolderRun,
    candidates: readonly RemoteMessageHandle[],
  ): Promise<void> {
    const { folder, options, outcome, now } = run;

    if (options.retention.mode === "none") {
      outcome.setDeletion("not-requested");
      return;
    }

    const selected = selectForDeletion(candidates, now, options.retention);
    if (selected.length === 0) {
      outcome.setDeletion("skipped-empty");
      return;
    }

    if (!options.dryRun && !options.deletionConfirmed) {
      outcome.setDeletion("not-confirmed");
      this.logger.notice(
        `Deletion of ${selected.length} messages not confirmed, skipping`,
        { operation: "retention", service: "ArchiveOrchestrator", folder },
      );
      return;
    }

    for (const handle of selected) {
      outcome.planMessage("deleteRemote", handle.uid);
    }

    if (options.dryRun) {
      outcome.setDeletion("previewed");
      return;
    }

    try {
      const deleted = await run.mail.deleteMessages(folder, selected);
      outcome.increment("deletedRemote", deleted);
      outcome.setDeletion("performed");
      this.logger.info(
        `Deleted ${deleted} messages (${describeRule(options.retention, now)})`,
        { operation: "retention", service: "ArchiveOrchestrator", folder },
      );
    } catch (error) {
      if (!(error instanceof DeleteError)) throw error;
      outcome.setDeletion("failed");
      outcome.recordError("delete", error.uids.join(","), error);
    }
  }

  private validateOptions(options: RunOptions): void {
    if (options.deleteLocal && !options.mirror) {
      throw new ValidationError(
        "Local copies can only be deleted after mirroring to the NAS",
        "deleteLocal",
        options.deleteLocal,
      );
    }
    if (!options.download && options.mirror) {
      throw new ValidationError(
        "A clean-only run does not download, so there is nothing to mirror",
        "mirror",
        options.mirror,
      );
    }
    if (options.mirror) {
      this.requireStorage();
    }
  }

  private requireMail(): ConnectionProfile {
    if (!this.profiles.mail) {
      throw new ConfigurationError(
        "Mail credentials missing. Set MAIL_EMAIL and MAIL_PASSWORD",
        "MAIL_EMAIL",
        ErrorCode.CONFIG_MISSING,
      );
    }
    return this.profiles.mail;
  }

  private requireStorage(): { storage: RemoteStorage; nasProfile: NasProfile } {
    if (!this.storage || !this.profiles.nas) {
      throw new ConfigurationError(
        "NAS is not configured. Set NAS_HOST, NAS_SHARE, NAS_USERNAME and NAS_PASSWORD",
        "NAS_HOST",
        ErrorCode.CONFIG_MISSING,
      );
    }
    return { storage: this.storage, nasProfile: this.profiles.nas };
  }
}
