import { mkdir, readdir, rename, rm, rmdir, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import dayjs from "dayjs";
import utc from "dayjs/plugin/utc.js";
import { type ParsedMail, simpleParser } from "mailparser";
import type {
  MaterializationPlan,
  MaterializedMessage,
  PlannedFile,
  RemoteMessageHandle,
} from "../types/archive.types.js";
import { ErrorCode, errorMessage, ParseError, WriteError } from "../types/errors.js";
import { errorCodeOf } from "../utils/imapError.js";
import { NAME_MAX_BYTES, sanitizeFilename, splitExtension } from "../utils/sanitize.js";
import { createLogger } from "./Logger.js";

dayjs.extend(utc);

export const RAW_FILE_NAME = "email.raw";
export const SUBJECT_MAX_LENGTH = 50;
export const EMPTY_SUBJECT = "NoSubject";

// Room for a `_n` suffix on duplicate attachment names
const SUFFIX_RESERVE_BYTES = 8;

const TIMESTAMP_FORMAT = "YYYYMMDD_HHmmss";

const EXTENSIONS: Record<string, string> = {
  "application/pdf": ".pdf",
  "application/zip": ".zip",
  "application/msword": ".doc",
  "application/vnd.openxmlformats-officedocument.wordprocessingml.document": ".docx",
  "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet": ".xlsx",
  "application/octet-stream": ".bin",
  "image/jpeg": ".jpg",
  "image/png": ".png",
  "image/gif": ".gif",
  "text/plain": ".txt",
  "text/html": ".html",
  "text/calendar": ".ics",
  "message/rfc822": ".eml",
};

// An RFC 5322 field name followed by a colon
const HEADER_LINE = /^[\x21-\x39\x3B-\x7E]+:/;

export function extensionFor(contentType: string): string {
  return EXTENSIONS[contentType.toLowerCase()] ?? ".bin";
}

/**
 * Hands out the three-digit disambiguator for messages that share a folder and
 * a second. Lives for one run, so names stay unique without relying on UIDs.
 */
export class NamingRegistry {
  private readonly counters = new Map<string, number>();

  next(folderDir: string, timestamp: string): number {
    const key = `${folderDir}\u0000${timestamp}`;
    const value = this.counters.get(key) ?? 0;
    this.counters.set(key, value + 1);
    return value;
  }

  clear(): void {
    this.counters.clear();
  }
}

export function formatDirectoryName(
  timestamp: string,
  disambiguator: number,
  subject: string,
): string {
  return `${timestamp}_${String(disambiguator).padStart(3, "0")}_${subject}`;
}

export function subjectForPath(subject: string | undefined): string {
  return sanitizeFilename(subject ?? "", SUBJECT_MAX_LENGTH) || EMPTY_SUBJECT;
}

/**
 * Pick file names for attachments in part order. Matching is case-insensitive
 * so names stay distinct on SMB shares too.
 */
export function attachmentNames(
  attachments: ReadonlyArray<{ filename?: string; contentType: string }>,
): string[] {
  const used = new Set<string>([RAW_FILE_NAME]);

  return attachments.map((attachment, index) => {
    const cleaned = sanitizeFilename(
      attachment.filename ?? "",
      undefined,
      NAME_MAX_BYTES - SUFFIX_RESERVE_BYTES,
    );
    const base = cleaned || `attachment_${index + 1}${extensionFor(attachment.contentType)}`;

    let candidate = base;
    const { stem, ext } = splitExtension(base);
    for (let n = 1; used.has(candidate.toLowerCase()); n++) {
      candidate = `${stem}_${n}${ext}`;
    }

    used.add(candidate.toLowerCase());
    return candidate;
  });
}

function hasHeaderBlock(raw: Buffer): boolean {
  const firstLine = raw.subarray(0, 1000).toString("latin1").split(/\r?\n/, 1)[0];
  return HEADER_LINE.test(firstLine);
}

export class MessageMaterializer {
  private readonly logger = createLogger("MessageMaterializer");
  private tempCounter = 0;

  constructor(
    private readonly registry: NamingRegistry = new NamingRegistry(),
    private readonly clock: () => Date = () => new Date(),
  ) {}

  /**
   * Forget disambiguators handed out so far. Called at the start of each run
   * so a preview and the real run name messages the same way.
   */
  startRun(): void {
    this.registry.clear();
  }

  /**
   * Parse a fetched message and decide every name, including the way around
   * directories left by earlier runs. Reads the archive but writes nothing.
   */
  async plan(
    raw: Buffer,
    handle: RemoteMessageHandle,
    folderDir: string,
  ): Promise<MaterializationPlan> {
    const parsed = await this.parse(raw, handle.uid);

    const timestamp = this.timestampFor(handle, parsed);
    const subject = subjectForPath(parsed.subject);

    let disambiguator = this.registry.next(folderDir, timestamp);
    let directoryName = formatDirectoryName(timestamp, disambiguator, subject);
    let reuse = false;
    for (;;) {
      const existing = await this.existingRawSize(join(folderDir, directoryName));
      if (existing === undefined) break;
      if (existing === raw.length) {
        reuse = true;
        break;
      }
      // Same name, different message from an earlier run
      disambiguator = this.registry.next(folderDir, timestamp);
      directoryName = formatDirectoryName(timestamp, disambiguator, subject);
    }

    const names = attachmentNames(parsed.attachments);
    const files: PlannedFile[] = [
      { name: RAW_FILE_NAME, content: raw },
      ...parsed.attachments.map((attachment, index) => ({
        name: names[index],
        content: attachment.content,
      })),
    ];

    return {
      uid: handle.uid,
      folderDir,
      directoryName,
      directory: join(folderDir, directoryName),
      subject,
      timestamp,
      disambiguator,
      reuse,
      files,
    };
  }

  /**
   * Write a plan as one directory. Files land in a hidden sibling first and
   * the directory is renamed into place once all of them are on disk.
   */
  async commit(plan: MaterializationPlan): Promise<MaterializedMessage> {
    if (plan.reuse) {
      this.logger.debug(`Keeping existing ${plan.directoryName}`, {
        operation: "commit",
        service: "MessageMaterializer",
        uid: plan.uid,
      });
      return this.describe(plan, true);
    }

    const tempDir = join(
      plan.folderDir,
      `.${plan.directoryName}.tmp-${process.pid}-${this.tempCounter++}`,
    );

    try {
      await mkdir(plan.folderDir, { recursive: true });
      await mkdir(tempDir);
      for (const file of plan.files) {
        await writeFile(join(tempDir, file.name), file.content);
      }
      await rename(tempDir, plan.directory);
    } catch (error) {
      await rm(tempDir, { recursive: true, force: true });
      throw this.writeError(plan.directory, error);
    }

    return this.describe(plan, false);
  }

  /**
   * Remove one message directory, then the folder directory if that left it
   * empty. Returns whether the folder directory went too.
   */
  async discard(message: MaterializedMessage, folderDir: string): Promise<boolean> {
    try {
      await rm(message.directory, { recursive: true, force: true });

      const remaining = await readdir(folderDir).catch((error: unknown) => {
        if (errorCodeOf(error) === "ENOENT") return undefined;
        throw error;
      });
      if (remaining === undefined || remaining.length > 0) {
        return false;
      }
      await rmdir(folderDir);
      return true;
    } catch (error) {
      throw new WriteError(
        `Failed to remove ${message.directory}: ${errorMessage(error)}`,
        message.directory,
        { operation: "discard", service: "MessageMaterializer" },
        { cause: error },
        ErrorCode.CLEANUP_FAILED,
      );
    }
  }

  private async parse(raw: Buffer, uid: number): Promise<ParsedMail> {
    if (!hasHeaderBlock(raw)) {
      throw new ParseError(`Message ${uid} has no header block`, uid, {
        operation: "plan",
        service: "MessageMaterializer",
      });
    }

    try {
      return await simpleParser(raw, {
        skipHtmlToText: true,
        skipTextToHtml: true,
        skipImageLinks: true,
        skipTextLinks: true,
      });
    } catch (error) {
      throw new ParseError(
        `Message ${uid} could not be parsed: ${errorMessage(error)}`,
        uid,
        { operation: "plan", service: "MessageMaterializer" },
        { cause: error },
      );
    }
  }

  private timestampFor(handle: RemoteMessageHandle, parsed: ParsedMail): string {
    const candidates = [handle.internalDate, parsed.date, this.clock()];
    const date =
      candidates.find(
        (value): value is Date =>
          value instanceof Date && !Number.isNaN(value.getTime()) && value.getTime() > 0,
      ) ?? this.clock();
    return dayjs.utc(date).format(TIMESTAMP_FORMAT);
  }

  private async existingRawSize(directory: string): Promise<number | undefined> {
    try {
      await stat(directory);
    } catch (error) {
      if (errorCodeOf(error) === "ENOENT") return undefined;
      throw this.writeError(directory, error);
    }

    try {
      return (await stat(join(directory, RAW_FILE_NAME))).size;
    } catch (error) {
      // A directory without a raw file never matches
      if (errorCodeOf(error) === "ENOENT") return -1;
      throw this.writeError(directory, error);
    }
  }

  private writeError(directory: string, cause: unknown): WriteError {
    return new WriteError(
      `Failed to write ${directory}: ${errorMessage(cause)}`,
      directory,
      { operation: "commit", service: "MessageMaterializer" },
      { cause },
    );
  }

  private describe(plan: MaterializationPlan, reused: boolean): MaterializedMessage {
    const [raw, ...attachments] = plan.files;
    return {
      uid: plan.uid,
      directory: plan.directory,
      directoryName: plan.directoryName,
      rawFile: join(plan.directory, raw.name),
      attachments: attachments.map((file) => join(plan.directory, file.name)),
      subject: plan.subject,
      timestamp: plan.timestamp,
      reused,
    };
  }
}

