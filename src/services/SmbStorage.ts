import SMB2 from "@marsaud/smb2";
import type { NasProfile, WriteResult } from "../types/archive.types.js";
import { errorMessage, WriteError } from "../types/errors.js";
import { classifyConnectionError, errorCodeOf } from "../utils/imapError.js";
import { createLogger } from "./Logger.js";

export interface StorageProbeResult {
  share: string;
  rootEntries: number;
  basePath: string;
  basePathExists: boolean;
}

/**
 * An open connection to remote storage. Paths are POSIX-style and relative to
 * the share root.
 */
export interface StorageSession {
  /** Base path from the profile, without leading or trailing slashes */
  readonly basePath: string;
  exists(path: string): Promise<boolean>;
  ensureDir(path: string): Promise<void>;
  writeFile(path: string, content: Buffer, overwrite: boolean): Promise<WriteResult>;
  probe(): Promise<StorageProbeResult>;
  close(): Promise<void>;
}

export interface RemoteStorage {
  connect(profile: NasProfile): Promise<StorageSession>;
}

const PARTIAL_SUFFIX = ".partial";

export function normalizeRemotePath(path: string): string {
  return path
    .split(/[/\\]+/)
    .filter((segment) => segment.length > 0)
    .join("/");
}

export function joinRemotePath(...segments: string[]): string {
  return normalizeRemotePath(segments.join("/"));
}

export function toSmbPath(path: string): string {
  return normalizeRemotePath(path).replace(/\//g, "\\");
}

function parentOf(path: string): string {
  const normalized = normalizeRemotePath(path);
  const last = normalized.lastIndexOf("/");
  return last > 0 ? normalized.slice(0, last) : "";
}

class SmbSession implements StorageSession {
  private readonly logger = createLogger("SmbSession");
  private readonly createdDirs = new Set<string>();
  private closed = false;
  readonly basePath: string;

  constructor(
    private readonly client: SMB2,
    private readonly profile: NasProfile,
  ) {
    this.basePath = normalizeRemotePath(profile.basePath);
  }

  async exists(path: string): Promise<boolean> {
    return this.client.exists(toSmbPath(path));
  }

  async ensureDir(path: string): Promise<void> {
    const segments = normalizeRemotePath(path).split("/").filter(Boolean);
    let current = "";

    for (const segment of segments) {
      current = current ? `${current}/${segment}` : segment;
      if (this.createdDirs.has(current)) {
        continue;
      }

      const smbPath = toSmbPath(current);
      try {
        if (!(await this.client.exists(smbPath))) {
          await this.client.mkdir(smbPath);
        }
      } catch (error) {
        // A concurrent writer may have created it between exists and mkdir
        if (errorCodeOf(error) !== "STATUS_OBJECT_NAME_COLLISION") {
          throw new WriteError(
            `Cannot create remote directory ${current}: ${errorMessage(error)}`,
            current,
            { operation: "ensureDir", service: "SmbStorage" },
            { cause: error },
          );
        }
      }
      this.createdDirs.add(current);
    }
  }

  async writeFile(
    path: string,
    content: Buffer,
    overwrite: boolean,
  ): Promise<WriteResult> {
    const target = toSmbPath(path);
    const partial = `${target}${PARTIAL_SUFFIX}`;
    const context = { operation: "writeFile", service: "SmbStorage" };

    try {
      if (!overwrite && (await this.client.exists(target))) {
        return "skipped";
      }

      await this.ensureDir(parentOf(path));

      if (await this.client.exists(partial)) {
        await this.client.unlink(partial);
      }
      await this.client.writeFile(partial, content);

      const stats = await this.client.stat(partial);
      if (stats.size !== content.length) {
        throw new Error(
          `short write: ${stats.size} of ${content.length} bytes`,
        );
      }

      if (await this.client.exists(target)) {
        await this.client.unlink(target);
      }
      await this.client.rename(partial, target);
      return "written";
    } catch (error) {
      await this.discardPartial(partial);
      if (error instanceof WriteError) {
        throw error;
      }
      throw new WriteError(
        `Upload of ${normalizeRemotePath(path)} failed: ${errorMessage(error)}`,
        normalizeRemotePath(path),
        context,
        { cause: error },
      );
    }
  }

  async probe(): Promise<StorageProbeResult> {
    const entries = await this.client.readdir("");
    const basePathExists = this.basePath
      ? await this.client.exists(toSmbPath(this.basePath))
      : true;

    return {
      share: `\\\\${this.profile.host}\\${this.profile.share}`,
      rootEntries: entries.length,
      basePath: this.basePath,
      basePathExists,
    };
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    try {
      this.client.disconnect();
    } catch (error) {
      this.logger.warning(
        "Error during SMB disconnect",
        { operation: "close", service: "SmbStorage" },
        { host: this.profile.host, error: errorMessage(error) },
      );
    }
  }

  private async discardPartial(partial: string): Promise<void> {
    try {
      if (await this.client.exists(partial)) {
        await this.client.unlink(partial);
      }
    } catch (error) {
      this.logger.warning(
        "Could not remove partial upload",
        { operation: "writeFile", service: "SmbStorage" },
        { path: partial, error: errorMessage(error) },
      );
    }
  }
}

export class SmbStorage implements RemoteStorage {
  private readonly logger = createLogger("SmbStorage");

  async connect(profile: NasProfile): Promise<StorageSession> {
    const timer = this.logger.startTimer("smb_connect", { host: profile.host });
    const client = new SMB2({
      share: `\\\\${profile.host}\\${profile.share}`,
      domain: profile.domain,
      username: profile.username,
      password: profile.password,
      port: profile.port,
    });

    try {
      // The client connects lazily; listing the share root authenticates
      await client.readdir("");
    } catch (error) {
      try {
        client.disconnect();
      } catch (disconnectError) {
        this.logger.debug(
          "Disconnect after failed connect raised",
          { operation: "connect", service: "SmbStorage" },
          { error: errorMessage(disconnectError) },
        );
      }
      const classified = classifyConnectionError(error, "storage", {
        operation: "connect",
        service: "SmbStorage",
        details: { host: profile.host, share: profile.share },
      });
      timer.end(false, classified.code);
      throw classified;
    }

    timer.end(true);
    this.logger.info(
      `Connected to \\\\${profile.host}\\${profile.share}`,
      { operation: "connect", service: "SmbStorage" },
      { basePath: profile.basePath },
    );

    return new SmbSession(client, profile);
  }
}
