import { existsSync } from "node:fs";
import { mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  attachmentNames,
  EMPTY_SUBJECT,
  extensionFor,
  formatDirectoryName,
  MessageMaterializer,
  NamingRegistry,
  RAW_FILE_NAME,
  subjectForPath,
} from "../src/services/MessageMaterializer.js";
import type { MaterializedMessage, RemoteMessageHandle } from "../src/types/archive.types.js";
import { ErrorCode, ParseError, WriteError } from "../src/types/errors.js";

interface FixtureAttachment {
  filename: string;
  contentType: string;
  content: string;
  /** Send the name RFC 2231 encoded */
  encoded?: boolean;
}

function rawMessage(options: {
  subject?: string;
  date?: string;
  body?: string;
  attachments?: FixtureAttachment[];
}): Buffer {
  const headers = ["From: sender@example.com", "To: archive@example.com"];
  if (options.subject !== undefined) headers.push(`Subject: ${options.subject}`);
  if (options.date !== undefined) headers.push(`Date: ${options.date}`);
  headers.push("MIME-Version: 1.0");

  const body = options.body ?? "Hello";
  if (!options.attachments?.length) {
    return Buffer.from(
      [...headers, "Content-Type: text/plain; charset=utf-8", "", body, ""].join("\r\n"),
    );
  }

  const boundary = "----test-boundary";
  const lines = [
    ...headers,
    `Content-Type: multipart/mixed; boundary="${boundary}"`,
    "",
    `--${boundary}`,
    "Content-Type: text/plain; charset=utf-8",
    "",
    body,
  ];
  for (const attachment of options.attachments) {
    const filenameParam = attachment.encoded
      ? `filename*=UTF-8''${encodeURIComponent(attachment.filename)}`
      : `filename="${attachment.filename}"`;
    lines.push(
      `--${boundary}`,
      attachment.encoded
        ? `Content-Type: ${attachment.contentType}`
        : `Content-Type: ${attachment.contentType}; name="${attachment.filename}"`,
      "Content-Transfer-Encoding: base64",
      `Content-Disposition: attachment; ${filenameParam}`,
      "",
      Buffer.from(attachment.content).toString("base64"),
    );
  }
  lines.push(`--${boundary}--`, "");
  return Buffer.from(lines.join("\r\n"));
}

const handle = (uid: number, iso = "2024-05-01T10:20:30Z"): RemoteMessageHandle => ({
  uid,
  seq: uid,
  internalDate: new Date(iso),
  size: 0,
});

async function store(
  materializer: MessageMaterializer,
  raw: Buffer,
  target: RemoteMessageHandle,
  folderDir: string,
): Promise<MaterializedMessage> {
  return materializer.commit(await materializer.plan(raw, target, folderDir));
}

describe("naming helpers", () => {
  it("should format directory names with a three-digit disambiguator", () => {
    expect(formatDirectoryName("20240501_102030", 7, "Hello")).toBe("20240501_102030_007_Hello");
  });

  it("should sanitize and truncate subjects", () => {
    expect(subjectForPath("Re: invoice/2024")).toBe("Re invoice2024");
    expect(subjectForPath("A".repeat(60))).toBe("A".repeat(50));
    expect(subjectForPath(undefined)).toBe(EMPTY_SUBJECT);
    expect(subjectForPath("???")).toBe(EMPTY_SUBJECT);
  });

  it("should map content types to extensions", () => {
    expect(extensionFor("application/PDF")).toBe(".pdf");
    expect(extensionFor("application/x-unknown")).toBe(".bin");
  });

  it("should hand out increasing disambiguators per folder and second", () => {
    const registry = new NamingRegistry();
    expect(registry.next("a", "t1")).toBe(0);
    expect(registry.next("a", "t1")).toBe(1);
    expect(registry.next("a", "t2")).toBe(0);
    expect(registry.next("b", "t1")).toBe(0);

    registry.clear();
    expect(registry.next("a", "t1")).toBe(0);
  });
});

describe("attachmentNames", () => {
  it("should keep distinct names in part order", () => {
    expect(
      attachmentNames([
        { filename: "a.pdf", contentType: "application/pdf" },
        { filename: "b.txt", contentType: "text/plain" },
      ]),
    ).toEqual(["a.pdf", "b.txt"]);
  });

  it("should suffix case-insensitive duplicates", () => {
    expect(
      attachmentNames([
        { filename: "scan.pdf", contentType: "application/pdf" },
        { filename: "SCAN.pdf", contentType: "application/pdf" },
        { filename: "scan.pdf", contentType: "application/pdf" },
      ]),
    ).toEqual(["scan.pdf", "SCAN_1.pdf", "scan_2.pdf"]);
  });

  it("should never reuse the raw file name", () => {
    expect(attachmentNames([{ filename: "Email.RAW", contentType: "text/plain" }])).toEqual([
      "Email_1.RAW",
    ]);
  });

  it("should name unnamed parts by position and type", () => {
    expect(
      attachmentNames([
        { filename: "x.txt", contentType: "text/plain" },
        { contentType: "image/png" },
        { filename: "///", contentType: "application/x-thing" },
      ]),
    ).toEqual(["x.txt", "attachment_2.png", "attachment_3.bin"]);
  });
});

describe("MessageMaterializer", () => {
  let root: string;
  let folderDir: string;
  const clock = () => new Date("2030-01-02T03:04:05Z");

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "materializer-"));
    folderDir = join(root, "INBOX");
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  describe("plan", () => {
    it("should decide every name without touching the disk", async () => {
      const materializer = new MessageMaterializer(new NamingRegistry(), clock);
      const raw = rawMessage({
        subject: "Quarterly report",
        attachments: [{ filename: "report.pdf", contentType: "application/pdf", content: "PDF-DATA" }],
      });

      const plan = await materializer.plan(raw, handle(1), folderDir);

      expect(plan.directoryName).toBe("20240501_102030_000_Quarterly report");
      expect(plan.directory).toBe(join(folderDir, "20240501_102030_000_Quarterly report"));
      expect(plan.files.map((file) => file.name)).toEqual([RAW_FILE_NAME, "report.pdf"]);
      expect(plan.files[0].content.equals(raw)).toBe(true);
      expect(plan.files[1].content.toString()).toBe("PDF-DATA");
      expect(existsSync(folderDir)).toBe(false);
    });

    it("should disambiguate messages from the same second", async () => {
      const materializer = new MessageMaterializer(new NamingRegistry(), clock);

      const first = await materializer.plan(rawMessage({ subject: "Same" }), handle(1), folderDir);
      const second = await materializer.plan(rawMessage({ subject: "Same" }), handle(2), folderDir);

      expect(first.directoryName).toBe("20240501_102030_000_Same");
      expect(second.directoryName).toBe("20240501_102030_001_Same");
    });

    it("should restart numbering for a new run", async () => {
      const materializer = new MessageMaterializer(new NamingRegistry(), clock);
      await materializer.plan(rawMessage({ subject: "Same" }), handle(1), folderDir);

      materializer.startRun();
      const again = await materializer.plan(rawMessage({ subject: "Same" }), handle(1), folderDir);

      expect(again.disambiguator).toBe(0);
    });

    it("should fall back to the Date header, then the clock", async () => {
      const materializer = new MessageMaterializer(new NamingRegistry(), clock);
      const undated = handle(1, "invalid");

      const fromHeader = await materializer.plan(
        rawMessage({ subject: "Dated", date: "Mon, 01 Jan 2024 08:00:00 +0000" }),
        undated,
        folderDir,
      );
      const fromClock = await materializer.plan(rawMessage({}), undated, folderDir);

      expect(fromHeader.timestamp).toBe("20240101_080000");
      expect(fromClock.timestamp).toBe("20300102_030405");
      expect(fromClock.subject).toBe(EMPTY_SUBJECT);
    });

    it("should settle a name taken by an earlier run before writing", async () => {
      await store(
        new MessageMaterializer(new NamingRegistry(), clock),
        rawMessage({ subject: "Clash", body: "first message" }),
        handle(1),
        folderDir,
      );
      const later = rawMessage({ subject: "Clash", body: "a rather longer second message" });

      const preview = await new MessageMaterializer(new NamingRegistry(), clock).plan(later, handle(2), folderDir);
      const real = await new MessageMaterializer(new NamingRegistry(), clock).plan(later, handle(2), folderDir);

      expect(preview.directoryName).toBe("20240501_102030_001_Clash");
      expect(preview.reuse).toBe(false);
      expect(real.directoryName).toBe(preview.directoryName);
      expect(await readdir(folderDir)).toEqual(["20240501_102030_000_Clash"]);
    });

    it("should reject data without a header block", async () => {
      const materializer = new MessageMaterializer(new NamingRegistry(), clock);

      await expect(
        materializer.plan(Buffer.from("just some text\r\n"), handle(9), folderDir),
      ).rejects.toBeInstanceOf(ParseError);
    });
  });

  describe("commit", () => {
    it("should write the raw message and attachments into one directory", async () => {
      const materializer = new MessageMaterializer(new NamingRegistry(), clock);
      const raw = rawMessage({
        subject: "Invoice",
        attachments: [
          { filename: "invoice.pdf", contentType: "application/pdf", content: "PDF-DATA" },
          { filename: "notes.txt", contentType: "text/plain", content: "notes" },
        ],
      });

      const message = await store(materializer, raw, handle(3), folderDir);

      expect(message.reused).toBe(false);
      expect(message.directoryName).toBe("20240501_102030_000_Invoice");
      expect(message.rawFile).toBe(join(message.directory, RAW_FILE_NAME));
      expect(message.attachments).toEqual([
        join(message.directory, "invoice.pdf"),
        join(message.directory, "notes.txt"),
      ]);
      expect((await readFile(message.rawFile)).equals(raw)).toBe(true);
      expect(await readFile(join(message.directory, "invoice.pdf"), "utf8")).toBe("PDF-DATA");
      expect((await readdir(message.directory)).sort()).toEqual([
        RAW_FILE_NAME,
        "invoice.pdf",
        "notes.txt",
      ]);
    });

    it("should leave no temporary directories behind", async () => {
      const materializer = new MessageMaterializer(new NamingRegistry(), clock);
      await store(materializer, rawMessage({ subject: "One" }), handle(1), folderDir);
      await store(materializer, rawMessage({ subject: "Two" }), handle(2), folderDir);

      expect((await readdir(folderDir)).sort()).toEqual([
        "20240501_102030_000_One",
        "20240501_102030_001_Two",
      ]);
    });

    it("should keep an identical directory from an earlier run", async () => {
      const raw = rawMessage({ subject: "Kept" });
      const first = await store(new MessageMaterializer(new NamingRegistry(), clock), raw, handle(1), folderDir);

      const later = new MessageMaterializer(new NamingRegistry(), clock);
      const plan = await later.plan(raw, handle(1), folderDir);
      const second = await later.commit(plan);

      expect(plan.reuse).toBe(true);
      expect(second.reused).toBe(true);
      expect(second.directory).toBe(first.directory);
      expect(await readdir(folderDir)).toEqual(["20240501_102030_000_Kept"]);
    });

    it("should not overwrite a different message that took the name earlier", async () => {
      const earlier = rawMessage({ subject: "Clash", body: "first message" });
      const later = rawMessage({ subject: "Clash", body: "a rather longer second message" });
      await store(new MessageMaterializer(new NamingRegistry(), clock), earlier, handle(1), folderDir);

      const message = await store(new MessageMaterializer(new NamingRegistry(), clock), later, handle(2), folderDir);

      expect(message.reused).toBe(false);
      expect(message.directoryName).toBe("20240501_102030_001_Clash");
      expect(
        (await readFile(join(folderDir, "20240501_102030_000_Clash", RAW_FILE_NAME))).equals(
          earlier,
        ),
      ).toBe(true);
    });

    it("should store attachments with long multibyte names", async () => {
      const materializer = new MessageMaterializer(new NamingRegistry(), clock);
      const raw = rawMessage({
        subject: "Long name",
        attachments: [
          {
            filename: `${"報告書".repeat(40)}.pdf`,
            contentType: "application/pdf",
            content: "PDF-DATA",
            encoded: true,
          },
        ],
      });

      const message = await store(materializer, raw, handle(4), folderDir);

      const expected = `${"報告書".repeat(27)}.pdf`;
      expect(message.attachments).toEqual([join(message.directory, expected)]);
      expect(Buffer.byteLength(expected)).toBe(247);
      expect(await readFile(join(message.directory, expected), "utf8")).toBe("PDF-DATA");
    });

    it("should report a WriteError when the folder cannot be created", async () => {
      const blocker = join(root, "blocker");
      await writeFile(blocker, "not a directory");
      const materializer = new MessageMaterializer(new NamingRegistry(), clock);

      await expect(
        store(materializer, rawMessage({ subject: "Blocked" }), handle(1), join(blocker, "INBOX")),
      ).rejects.toBeInstanceOf(WriteError);
    });
  });

  describe("discard", () => {
    it("should remove the message and then the empty folder directory", async () => {
      const materializer = new MessageMaterializer(new NamingRegistry(), clock);
      const message = await store(materializer, rawMessage({ subject: "Gone" }), handle(1), folderDir);

      await expect(materializer.discard(message, folderDir)).resolves.toBe(true);
      expect(existsSync(folderDir)).toBe(false);
    });

    it("should keep the folder directory while other messages remain", async () => {
      const materializer = new MessageMaterializer(new NamingRegistry(), clock);
      const first = await store(materializer, rawMessage({ subject: "A" }), handle(1), folderDir);
      const second = await store(materializer, rawMessage({ subject: "B" }), handle(2), folderDir);

      await expect(materializer.discard(first, folderDir)).resolves.toBe(false);
      expect(existsSync(first.directory)).toBe(false);
      expect(existsSync(second.directory)).toBe(true);
    });

    it("should report a cleanup failure with its own code", async () => {
      const materializer = new MessageMaterializer(new NamingRegistry(), clock);
      const message = await store(materializer, rawMessage({ subject: "Stuck" }), handle(1), folderDir);
      const notADirectory = join(root, "plain-file");
      await writeFile(notADirectory, "x");

      const error = await materializer.discard(message, notADirectory).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(WriteError);
      expect(error).toMatchObject({
        code: ErrorCode.CLEANUP_FAILED,
        path: message.directory,
      });
      expect(existsSync(message.directory)).toBe(false);
    });
  });
});
