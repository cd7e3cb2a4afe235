import type {
  ListMessagesFilter,
  MailProbeResult,
  MailSession,
  MailTransport,
} from "../src/services/ImapTransport.js";
import {
  normalizeRemotePath,
  type RemoteStorage,
  type StorageProbeResult,
  type StorageSession,
} from "../src/services/SmbStorage.js";
import type {
  ConnectionProfile,
  FolderSummary,
  NasProfile,
  RemoteMessageHandle,
  WriteResult,
} from "../src/types/archive.types.js";
import {
  DeleteError,
  FetchError,
  FolderNotFoundError,
  WriteError,
} from "../src/types/errors.js";

export interface StoredMessage {
  uid: number;
  internalDate: Date;
  raw: Buffer;
}

/**
 * Build a small RFC 822 message. Attachments are base64 parts of a
 * multipart/mixed body.
 */
export function rfc822(
  subject: string,
  options: { body?: string; attachments?: Array<{ filename: string; content: string }> } = {},
): Buffer {
  const headers = [
    "From: sender@example.com",
    "To: archive@example.com",
    `Subject: ${subject}`,
    "MIME-Version: 1.0",
  ];
  const body = options.body ?? `Body of ${subject}`;

  if (!options.attachments?.length) {
    return Buffer.from([...headers, "Content-Type: text/plain", "", body, ""].join("\r\n"));
  }

  const boundary = "fake-boundary";
  const lines = [...headers, `Content-Type: multipart/mixed; boundary="${boundary}"`, ""];
  lines.push(`--${boundary}`, "Content-Type: text/plain", "", body);
  for (const attachment of options.attachments) {
    lines.push(
      `--${boundary}`,
      "Content-Type: application/octet-stream",
      "Content-Transfer-Encoding: base64",
      `Content-Disposition: attachment; filename="${attachment.filename}"`,
      "",
      Buffer.from(attachment.content).toString("base64"),
    );
  }
  lines.push(`--${boundary}--`, "");
  return Buffer.from(lines.join("\r\n"));
}

export class FakeMailbox {
  readonly folders = new Map<string, StoredMessage[]>();

  add(folder: string, uid: number, isoDate: string, raw: Buffer): this {
    const messages = this.folders.get(folder) ?? [];
    messages.push({ uid, internalDate: new Date(isoDate), raw });
    this.folders.set(folder, messages);
    return this;
  }

  uids(folder: string): number[] {
    return (this.folders.get(folder) ?? []).map((message) => message.uid);
  }
}

/**
 * In-process mail server. Failures are queued per UID and consumed in order.
 */
export class FakeMailTransport implements MailTransport {
  readonly sessions: FakeMailSession[] = [];
  connectError?: Error;
  deleteError?: Error;
  readonly fetchFailures = new Map<number, Error[]>();
  readonly listFilters: ListMessagesFilter[] = [];
  readonly deleted: number[] = [];
  fetchCount = 0;

  constructor(readonly mailbox: FakeMailbox) {}

  failFetch(uid: number, ...errors: Error[]): void {
    this.fetchFailures.set(uid, errors);
  }

  async connect(_profile: ConnectionProfile): Promise<MailSession> {
    if (this.connectError) {
      throw this.connectError;
    }
    const session = new FakeMailSession(this);
    this.sessions.push(session);
    return session;
  }

  get allClosed(): boolean {
    return this.sessions.every((session) => session.closed);
  }
}

class FakeMailSession implements MailSession {
  closed = false;
  private readonly issued = new WeakSet<RemoteMessageHandle>();

  constructor(private readonly server: FakeMailTransport) {}

  async listFolders(): Promise<FolderSummary[]> {
    return [...this.server.mailbox.folders.entries()].map(([name, messages]) => ({
      name,
      delimiter: "/",
      total: messages.length,
      unseen: 0,
    }));
  }

  async listMessages(
    folder: string,
    filter: ListMessagesFilter = {},
  ): Promise<RemoteMessageHandle[]> {
    const messages = this.server.mailbox.folders.get(folder);
    if (!messages) {
      throw new FolderNotFoundError(`Cannot open folder '${folder}'`, folder);
    }
    this.server.listFilters.push(filter);

    const { before } = filter;
    return messages
      .filter((message) => !before || message.internalDate.getTime() < before.getTime())
      .map((message, index) => {
        const handle = Object.freeze({
          uid: message.uid,
          seq: index + 1,
          internalDate: message.internalDate,
          size: message.raw.length,
        });
        this.issued.add(handle);
        return handle;
      });
  }

  async fetchRaw(folder: string, handle: RemoteMessageHandle): Promise<Buffer> {
    this.server.fetchCount++;
    if (!this.issued.has(handle)) {
      throw new FetchError(`Message ${handle.uid} was not listed by this session`, handle.uid, false);
    }
    const failure = this.server.fetchFailures.get(handle.uid)?.shift();
    if (failure) {
      throw failure;
    }
    const message = this.server.mailbox.folders.get(folder)?.find((m) => m.uid === handle.uid);
    if (!message) {
      throw new FetchError(`Message ${handle.uid} vanished`, handle.uid, false);
    }
    return message.raw;
  }

  async deleteMessages(
    folder: string,
    handles: readonly RemoteMessageHandle[],
  ): Promise<number> {
    const uids = handles.map((handle) => handle.uid);
    if (this.server.deleteError) {
      throw new DeleteError(this.server.deleteError.message, uids);
    }
    const messages = this.server.mailbox.folders.get(folder) ?? [];
    this.server.mailbox.folders.set(
      folder,
      messages.filter((message) => !uids.includes(message.uid)),
    );
    this.server.deleted.push(...uids);
    return uids.length;
  }

  async probe(): Promise<MailProbeResult> {
    return {
      capabilities: 2,
      folders: this.server.mailbox.folders.size,
      inboxMessages: this.server.mailbox.uids("INBOX").length,
    };
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/**
 * In-process NAS share with POSIX-style paths.
 */
export class FakeStorage implements RemoteStorage {
  readonly files = new Map<string, Buffer>();
  readonly dirs = new Set<string>();
  readonly failingPaths = new Set<string>();
  readonly sessions: FakeStorageSession[] = [];
  connectError?: Error;
  writes = 0;

  async connect(profile: NasProfile): Promise<StorageSession> {
    if (this.connectError) {
      throw this.connectError;
    }
    const session = new FakeStorageSession(this, normalizeRemotePath(profile.basePath));
    this.sessions.push(session);
    return session;
  }

  get allClosed(): boolean {
    return this.sessions.every((session) => session.closed);
  }
}

class FakeStorageSession implements StorageSession {
  closed = false;

  constructor(
    private readonly share: FakeStorage,
    readonly basePath: string,
  ) {}

  async exists(path: string): Promise<boolean> {
    const normalized = normalizeRemotePath(path);
    return this.share.files.has(normalized) || this.share.dirs.has(normalized);
  }

  async ensureDir(path: string): Promise<void> {
    this.share.dirs.add(normalizeRemotePath(path));
  }

  async writeFile(path: string, content: Buffer, overwrite: boolean): Promise<WriteResult> {
    const normalized = normalizeRemotePath(path);
    if (this.share.failingPaths.has(normalized)) {
      throw new WriteError(`Upload of ${normalized} failed: access denied`, normalized);
    }
    if (!overwrite && this.share.files.has(normalized)) {
      return "skipped";
    }
    this.share.files.set(normalized, content);
    this.share.writes++;
    return "written";
  }

  async probe(): Promise<StorageProbeResult> {
    return {
      share: "\\\\nas.local\\backup",
      rootEntries: this.share.dirs.size,
      basePath: this.basePath,
      basePathExists: this.share.dirs.has(this.basePath),
    };
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
