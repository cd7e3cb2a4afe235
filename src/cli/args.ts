import { parseArgs } from "node:util";
import { parseRetentionExpression } from "../services/Retention.js";
import type { RetentionRule, RunOptions } from "../types/archive.types.js";
import { errorMessage, ValidationError } from "../types/errors.js";

export interface CliArgs {
  list: boolean;
  folder?: string;
  output: string;
  nas: boolean;
  overwrite: boolean;
  dryRun: boolean;
  clean: boolean;
  since?: string;
  interactive: boolean;
  provider?: string;
  config?: string;
  testMail: boolean;
  testNas: boolean;
  deleteLocal: boolean;
  yes: boolean;
  verbose: boolean;
  help: boolean;
}

export type CliMode =
  | "help"
  | "test"
  | "list"
  | "interactive"
  | "clean-only"
  | "archive";

export const DEFAULT_OUTPUT = "./downloads";

export const HELP_TEXT = `Usage: mail-archiver [options]

Archive IMAP mail folders locally and to a NAS over SMB.

Options:
  -l, --list             List all mail folders and their message counts
  -f, --folder <name>    Folder to archive (see --list)
  -o, --output <dir>     Local output directory (default: ${DEFAULT_OUTPUT})
      --nas              Mirror the archive to the NAS
      --overwrite        Overwrite files that already exist on the NAS
  -n, --dry-run          Show what would be done without changing anything
  -c, --clean            Delete archived messages from the server
      --since <range>    With --clean: only messages older than e.g. 30D, 2W, 6M, 1Y
                         (--clean --since without --nas deletes without downloading)
  -i, --interactive      Pick the folder from a numbered list
  -p, --provider <name>  Mail provider (gmx, gmail, outlook, yahoo, icloud, custom)
      --config <file>    Providers config file
      --test-mail        Test the IMAP connection and exit
      --test-nas         Test the NAS connection and exit
      --delete-local     Delete local copies once they are on the NAS
  -y, --yes              Do not ask before deleting from the server
  -v, --verbose          Debug logging
  -h, --help             Show this help

Examples:
  mail-archiver --list
  mail-archiver --folder INBOX --nas
  mail-archiver --folder INBOX --nas --clean --since 1Y --dry-run
  mail-archiver --folder Spam --clean --since 30D`;

function readArgv(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        list: { type: "boolean", short: "l" },
        folder: { type: "string", short: "f" },
        output: { type: "string", short: "o" },
        nas: { type: "boolean" },
        overwrite: { type: "boolean" },
        "dry-run": { type: "boolean", short: "n" },
        clean: { type: "boolean", short: "c" },
        since: { type: "string" },
        interactive: { type: "boolean", short: "i" },
        provider: { type: "string", short: "p" },
        config: { type: "string" },
        "test-mail": { type: "boolean" },
        "test-nas": { type: "boolean" },
        "delete-local": { type: "boolean" },
        yes: { type: "boolean", short: "y" },
        verbose: { type: "boolean", short: "v" },
        help: { type: "boolean", short: "h" },
      },
    });
  } catch (error) {
    throw new ValidationError(errorMessage(error), "argv", argv.join(" "));
  }
}

export function parseCliArgs(argv: string[]): CliArgs {
  const { values } = readArgv(argv);

  return {
    list: values.list ?? false,
    folder: values.folder,
    output: values.output ?? DEFAULT_OUTPUT,
    nas: values.nas ?? false,
    overwrite: values.overwrite ?? false,
    dryRun: values["dry-run"] ?? false,
    clean: values.clean ?? false,
    since: values.since,
    interactive: values.interactive ?? false,
    provider: values.provider?.toLowerCase(),
    config: values.config,
    testMail: values["test-mail"] ?? false,
    testNas: values["test-nas"] ?? false,
    deleteLocal: values["delete-local"] ?? false,
    yes: values.yes ?? false,
    verbose: values.verbose ?? false,
    help: values.help ?? false,
  };
}

/**
 * What a command line asks for, before any folder is chosen.
 */
export function resolveMode(args: CliArgs): CliMode {
  if (args.help) return "help";
  if (args.testMail || args.testNas) return "test";
  if (args.list || (!args.folder && !args.interactive)) return "list";
  if (!args.folder) return "interactive";
  return isCleanOnly(args) ? "clean-only" : "archive";
}

export function isCleanOnly(args: CliArgs): boolean {
  return args.clean && args.since !== undefined && !args.nas;
}

export interface ResolvedRetention {
  rule: RetentionRule;
  warning?: string;
}

export function resolveRetention(args: CliArgs): ResolvedRetention {
  if (args.since !== undefined && !args.clean) {
    throw new ValidationError("--since only applies together with --clean", "since", args.since);
  }
  if (!args.clean) {
    return { rule: { mode: "none" } };
  }
  if (args.since === undefined) {
    return {
      rule: { mode: "all" },
      warning: "--clean without --since deletes every archived message in the folder",
    };
  }
  return {
    rule: { mode: "olderThan", expression: parseRetentionExpression(args.since) },
  };
}

export function validateArgs(args: CliArgs): void {
  if (args.deleteLocal && !args.nas) {
    throw new ValidationError("--delete-local needs --nas", "delete-local", true);
  }
  if (args.overwrite && !args.nas) {
    throw new ValidationError("--overwrite only affects --nas uploads", "overwrite", true);
  }
}

export function buildRunOptions(
  args: CliArgs,
  rule: RetentionRule,
  accountId: string,
  deletionConfirmed: boolean,
  now?: Date,
): RunOptions {
  const cleanOnly = isCleanOnly(args);
  return {
    outputDir: args.output,
    download: !cleanOnly,
    mirror: !cleanOnly && args.nas,
    overwrite: args.overwrite,
    deleteLocal: !cleanOnly && args.deleteLocal,
    dryRun: args.dryRun,
    retention: rule,
    deletionConfirmed,
    accountId,
    now,
  };
}
