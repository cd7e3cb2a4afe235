import { createInterface, type Interface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import type { FolderSummary } from "../types/archive.types.js";

export interface PromptIO {
  input: Readable;
  output: Writable;
}

const defaultIO = (): PromptIO => ({ input: process.stdin, output: process.stdout });

/**
 * Line-buffered questions over one readline interface. End of input reads
 * as undefined.
 */
class PromptSession {
  private readonly rl: Interface;
  private readonly lines: AsyncIterableIterator<string>;

  constructor(private readonly io: PromptIO) {
    this.rl = createInterface({ input: io.input, terminal: false });
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  write(text: string): void {
    this.io.output.write(text);
  }

  async ask(question: string): Promise<string | undefined> {
    this.write(question);
    const next = await this.lines.next();
    return next.done ? undefined : String(next.value).trim();
  }

  close(): void {
    this.rl.close();
  }
}

async function withSession<T>(io: PromptIO, run: (session: PromptSession) => Promise<T>): Promise<T> {
  const session = new PromptSession(io);
  try {
    return await run(session);
  } finally {
    session.close();
  }
}

export interface DeletionSummary {
  folder: string;
  filter: string;
}

/**
 * Two questions, the second asking for the literal word "yes".
 */
export function confirmDeletion(
  summary: DeletionSummary,
  io: PromptIO = defaultIO(),
): Promise<boolean> {
  return withSession(io, async (session) => {
    session.write(
      "\nWARNING: messages will be permanently deleted from the server.\n" +
        `Folder: ${summary.folder}\nFilter: ${summary.filter}\n`,
    );

    const first = (await session.ask("Are you sure you want to delete these messages? [y/N] ")) ?? "";
    if (!["y", "yes"].includes(first.toLowerCase())) {
      session.write("Deletion cancelled\n");
      return false;
    }

    const second =
      (await session.ask("This action cannot be undone. Type 'yes' to confirm deletion: ")) ?? "";
    if (second.toLowerCase() !== "yes") {
      session.write("Deletion cancelled\n");
      return false;
    }
    return true;
  });
}

/**
 * Ask for a folder by number. Returns undefined when the user quits or
 * input ends.
 */
export function selectFolder(
  folders: readonly FolderSummary[],
  io: PromptIO = defaultIO(),
): Promise<string | undefined> {
  if (folders.length === 0) {
    return Promise.resolve(undefined);
  }

  return withSession(io, async (session) => {
    for (;;) {
      const answer = await session.ask("\nEnter folder number (or 'q' to quit) [1]: ");
      if (answer === undefined || answer.toLowerCase() === "q") {
        return undefined;
      }

      const choice = answer === "" ? "1" : answer;
      if (!/^\d+$/.test(choice)) {
        session.write("Please enter a number or 'q' to quit.\n");
        continue;
      }

      const index = Number(choice) - 1;
      if (index >= 0 && index < folders.length) {
        return folders[index].name;
      }
      session.write("Invalid selection. Please try again.\n");
    }
  });
}
