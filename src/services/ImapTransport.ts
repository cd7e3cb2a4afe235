import { ImapFlow } from "imapflow";
import type {
  ConnectionProfile,
  FolderSummary,
  RemoteMessageHandle,
} from "../types/archive.types.js";
import {
  ConnectionError,
  DeleteError,
  ErrorCode,
  errorMessage,
  FetchError,
  FolderNotFoundError,
} from "../types/errors.js";
import {
  classifyConnectionError,
  isTransientNetworkError,
  toFetchError,
} from "../utils/imapError.js";
import { createLogger } from "./Logger.js";

export interface ListMessagesFilter {
  /** Server-side BEFORE search; whole days only */
  before?: Date;
}

export interface MailProbeResult {
  capabilities: number;
  folders: number;
  inboxMessages: number;
}

/**
 * An authenticated mail connection. Handles returned by `listMessages` are
 * only accepted by the same session.
 */
export interface MailSession {
  listFolders(): Promise<FolderSummary[]>;
  listMessages(
    folder: string,
    filter?: ListMessagesFilter,
  ): Promise<RemoteMessageHandle[]>;
  fetchRaw(folder: string, handle: RemoteMessageHandle): Promise<Buffer>;
  deleteMessages(
    folder: string,
    handles: readonly RemoteMessageHandle[],
  ): Promise<number>;
  probe(): Promise<MailProbeResult>;
  close(): Promise<void>;
}

export interface MailTransport {
  connect(profile: ConnectionProfile): Promise<MailSession>;
}

function toDate(value: Date | string | undefined): Date {
  if (value instanceof Date) return value;
  if (typeof value === "string") {
    const parsed = new Date(value);
    if (!Number.isNaN(parsed.getTime())) return parsed;
  }
  return new Date(0);
}

class ImapSession implements MailSession {
  private readonly logger = createLogger("ImapSession");
  private readonly issued = new WeakSet<RemoteMessageHandle>();
  private closed = false;

  constructor(
    private readonly client: ImapFlow,
    private readonly profile: ConnectionProfile,
  ) {}

  async listFolders(): Promise<FolderSummary[]> {
    const entries = await this.client.list({
      statusQuery: { messages: true, unseen: true },
    });

    return entries.map((entry) => ({
      name: entry.path,
      delimiter: entry.delimiter,
      total: entry.status?.messages ?? 0,
      unseen: entry.status?.unseen,
    }));
  }

  async listMessages(
    folder: string,
    filter: ListMessagesFilter = {},
  ): Promise<RemoteMessageHandle[]> {
    const lock = await this.openFolder(folder, true);

    try {
      const query = filter.before ? { before: filter.before } : { all: true };
      const result = await this.client.search(query, { uid: true });
      const uids = Array.isArray(result) ? result : [];
      if (uids.length === 0) {
        return [];
      }

      const handles: RemoteMessageHandle[] = [];
      for await (const message of this.client.fetch(
        uids,
        { uid: true, internalDate: true, size: true },
        { uid: true },
      )) {
        const handle: RemoteMessageHandle = Object.freeze({
          uid: message.uid,
          seq: message.seq,
          internalDate: toDate(message.internalDate),
          size: message.size ?? 0,
        });
        this.issued.add(handle);
        handles.push(handle);
      }

      this.logger.debug(
        `Listed ${handles.length} messages`,
        { operation: "listMessages", service: "ImapTransport", folder },
        { before: filter.before },
      );

      return handles.sort((a, b) => a.seq - b.seq);
    } finally {
      lock.release();
    }
  }

  async fetchRaw(folder: string, handle: RemoteMessageHandle): Promise<Buffer> {
    if (!this.issued.has(handle)) {
      throw new FetchError(
        `Message ${handle.uid} was not listed by this session`,
        handle.uid,
        false,
        { operation: "fetchRaw", service: "ImapTransport", folder },
      );
    }

    const lock = await this.openFolder(folder, true);

    try {
      const message = await this.client.fetchOne(
        String(handle.uid),
        { uid: true, source: true },
        { uid: true },
      );

      if (!message || !message.source || message.source.length === 0) {
        throw new FetchError(
          `Server returned no body for message ${handle.uid}`,
          handle.uid,
          false,
          { operation: "fetchRaw", service: "ImapTransport", folder },
        );
      }

      return message.source;
    } catch (error) {
      throw toFetchError(error, handle.uid, {
        operation: "fetchRaw",
        service: "ImapTransport",
        folder,
      });
    } finally {
      lock.release();
    }
  }

  async deleteMessages(
    folder: string,
    handles: readonly RemoteMessageHandle[],
  ): Promise<number> {
    if (handles.length === 0) {
      return 0;
    }

    const uids = handles.map((handle) => handle.uid);
    const context = { operation: "deleteMessages", service: "ImapTransport", folder };

    const foreign = handles.filter((handle) => !this.issued.has(handle));
    if (foreign.length > 0) {
      throw new DeleteError(
        `${foreign.length} message(s) were not listed by this session`,
        foreign.map((handle) => handle.uid),
        context,
      );
    }

    const lock = await this.openFolder(folder, false);

    try {
      // messageDelete flags \Deleted and expunges (UID EXPUNGE where supported)
      const deleted = await this.client.messageDelete(uids.join(","), { uid: true });
      if (!deleted) {
        throw new DeleteError(
          `Server refused to delete ${uids.length} message(s)`,
          uids,
          context,
        );
      }

      this.logger.info(
        `Deleted ${uids.length} messages`,
        { operation: "deleteMessages", service: "ImapTransport", folder },
      );
      return uids.length;
    } catch (error) {
      if (error instanceof DeleteError) {
        throw error;
      }
      throw new DeleteError(
        `Failed to delete messages: ${errorMessage(error)}`,
        uids,
        context,
        { cause: error },
      );
    } finally {
      lock.release();
    }
  }

  async probe(): Promise<MailProbeResult> {
    const folders = await this.client.list();
    const inbox = await this.client.status("INBOX", { messages: true });

    return {
      capabilities: this.client.capabilities.size,
      folders: folders.length,
      inboxMessages: inbox.messages ?? 0,
    };
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    try {
      if (this.client.usable) {
        await this.client.logout();
      }
    } catch (error) {
      this.logger.warning(
        "Error during IMAP logout",
        { operation: "close", service: "ImapTransport" },
        { host: this.profile.host, error: errorMessage(error) },
      );
    }
  }

  private async openFolder(folder: string, readOnly: boolean) {
    try {
      return await this.client.getMailboxLock(folder, { readOnly });
    } catch (error) {
      if (isTransientNetworkError(error)) {
        throw new ConnectionError(
          `Lost connection while opening '${folder}': ${errorMessage(error)}`,
          ErrorCode.CONNECTION_FAILED,
          "mail",
          { operation: "openFolder", service: "ImapTransport", folder },
          { cause: error },
        );
      }
      throw new FolderNotFoundError(
        `Cannot open folder '${folder}': ${errorMessage(error)}`,
        folder,
        { operation: "openFolder", service: "ImapTransport", folder },
        { cause: error },
      );
    }
  }
}

export class ImapTransport implements MailTransport {
  private readonly logger = createLogger("ImapTransport");

  async connect(profile: ConnectionProfile): Promise<MailSession> {
    const timer = this.logger.startTimer("imap_connect", { host: profile.host });

    const client = new ImapFlow({
      host: profile.host,
      port: profile.port,
      secure: profile.secure,
      auth: {
        user: profile.user,
        pass: profile.password,
      },
      logger: false,
    });

    client.on("error", (error: Error) => {
      this.logger.error(
        "IMAP connection error",
        { operation: "connect", service: "ImapTransport" },
        { host: profile.host, error: error.message },
      );
    });

    try {
      await client.connect();
    } catch (error) {
      const classified = classifyConnectionError(error, "mail", {
        operation: "connect",
        service: "ImapTransport",
        details: { host: profile.host, port: profile.port },
      });
      timer.end(false, classified.code);
      throw classified;
    }

    timer.end(true);
    this.logger.info(
      `Connected to ${profile.name ?? profile.host}`,
      { operation: "connect", service: "ImapTransport" },
      { host: profile.host, port: profile.port, secure: profile.secure },
    );

    return new ImapSession(client, profile);
  }
}
