#!/usr/bin/env node
import dotenv from "dotenv";
import {
  buildRunOptions,
  type CliArgs,
  HELP_TEXT,
  isCleanOnly,
  parseCliArgs,
  resolveMode,
  resolveRetention,
  validateArgs,
} from "./cli/args.js";
import { confirmDeletion, selectFolder } from "./cli/prompt.js";
import { type AppConfig, loadConfig, requireMail } from "./config/config.js";
import {
  buildConnectionProfile,
  getDefaultProvider,
  loadProviderConfig,
} from "./config/providers.js";
import { ArchiveOrchestrator } from "./services/ArchiveOrchestrator.js";
import { ImapTransport } from "./services/ImapTransport.js";
import { createLogger, LogLevel, logger } from "./services/Logger.js";
import { describeRule } from "./services/Retention.js";
import { formatFolderTable, formatOutcome, hasFailures } from "./services/RunReport.js";
import { SmbStorage } from "./services/SmbStorage.js";
import type { ConnectionProfile, RetentionRule } from "./types/archive.types.js";
import {
  ArchiveError,
  ConfigurationError,
  ConnectionError,
  ErrorCode,
  errorMessage,
  getUserMessage,
  toArchiveError,
} from "./types/errors.js";

const log = createLogger("mail-archiver");

function print(text: string): void {
  process.stdout.write(`${text}\n`);
}

function mailProfileFor(args: CliArgs, config: AppConfig): ConnectionProfile | undefined {
  if (!config.mail) {
    return undefined;
  }
  const provider = loadProviderConfig(
    args.provider ?? config.provider ?? getDefaultProvider(args.config),
    args.config,
    config.imap,
  );
  log.info(`Using ${provider.name} (${provider.imapHost}:${provider.imapPort})`, {
    operation: "setup",
    service: "cli",
  });
  return buildConnectionProfile(provider, config.mail);
}

function createOrchestrator(args: CliArgs, config: AppConfig): ArchiveOrchestrator {
  return new ArchiveOrchestrator(
    { mail: mailProfileFor(args, config), nas: config.nas },
    {
      transport: new ImapTransport(),
      storage: config.nas ? new SmbStorage() : undefined,
    },
  );
}

async function runTests(args: CliArgs, config: AppConfig): Promise<number> {
  const orchestrator = createOrchestrator(args, config);
  let exitCode = 0;

  if (args.testMail) {
    try {
      const probe = await orchestrator.testMailConnection();
      print(
        `Mail connection OK: ${probe.capabilities} capabilities, ${probe.folders} folders, ` +
          `${probe.inboxMessages} messages in INBOX`,
      );
    } catch (error) {
      if (error instanceof ConfigurationError) throw error;
      print(`Mail connection failed: ${getUserMessage(error)}`);
      exitCode = 1;
    }
  }

  if (args.testNas) {
    try {
      const probe = await orchestrator.testStorageConnection();
      print(
        `NAS connection OK: ${probe.share} (${probe.rootEntries} entries), ` +
          `${probe.basePath} ${probe.basePathExists ? "exists" : "will be created"}`,
      );
    } catch (error) {
      if (error instanceof ConfigurationError) throw error;
      print(`NAS connection failed: ${getUserMessage(error)}`);
      exitCode = 1;
    }
  }

  return exitCode;
}

async function confirmIfNeeded(
  args: CliArgs,
  folder: string,
  rule: RetentionRule,
  now: Date,
): Promise<boolean> {
  if (rule.mode === "none" || args.dryRun) {
    return false;
  }
  if (args.yes) {
    return true;
  }
  return confirmDeletion({ folder, filter: describeRule(rule, now) });
}

async function archive(
  orchestrator: ArchiveOrchestrator,
  args: CliArgs,
  config: AppConfig,
  folder: string,
): Promise<number> {
  const { rule, warning } = resolveRetention(args);
  if (warning) {
    log.warning(warning, { operation: "archive", service: "cli", folder });
  }

  if (args.nas && !config.nas) {
    throw new ConfigurationError(
      "--nas needs NAS_HOST, NAS_SHARE, NAS_USERNAME and NAS_PASSWORD",
      "NAS_HOST",
      ErrorCode.CONFIG_MISSING,
    );
  }

  const now = new Date();
  const confirmed = await confirmIfNeeded(args, folder, rule, now);
  const options = buildRunOptions(args, rule, requireMail(config).accountId, confirmed, now);

  log.info(
    isCleanOnly(args) ? `Cleaning ${folder}` : `Archiving ${folder} to ${options.outputDir}`,
    { operation: "archive", service: "cli", folder },
    { mirror: options.mirror, dryRun: options.dryRun, retention: describeRule(rule, now) },
  );

  const outcome = await orchestrator.archiveFolder(folder, options);
  print(formatOutcome(outcome));
  return hasFailures(outcome) ? 1 : 0;
}

export async function runCli(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const args = parseCliArgs(argv);
  const mode = resolveMode(args);

  if (mode === "help") {
    print(HELP_TEXT);
    return 0;
  }

  const config = loadConfig(env);
  if (config.debug || args.verbose) {
    logger.setMinLevel(LogLevel.DEBUG);
  }

  if (mode === "test") {
    return runTests(args, config);
  }

  validateArgs(args);
  requireMail(config);
  // Surfaces a bad --since before anything connects
  resolveRetention(args);

  const orchestrator = createOrchestrator(args, config);

  if (mode === "list") {
    print(formatFolderTable(await orchestrator.listFolders()));
    return 0;
  }

  const folders = await orchestrator.listFolders();
  let folder = args.folder;

  if (mode === "interactive") {
    print(formatFolderTable(folders));
    folder = await selectFolder(folders);
    if (folder === undefined) {
      print("No folder selected");
      return 0;
    }
  }

  if (folder === undefined || !folders.some((entry) => entry.name === folder)) {
    print(`Folder '${folder ?? ""}' not found. Use --list to see the available folders.`);
    return 1;
  }

  return archive(orchestrator, args, config, folder);
}

function reportFatal(error: unknown): void {
  const archiveError = toArchiveError(error, { operation: "main", service: "cli" });
  if (error instanceof ArchiveError) {
    log.debug("Run aborted", { operation: "main", service: "cli" }, archiveError.toJSON());
  } else {
    log.critical(
      "Unexpected failure",
      { operation: "main", service: "cli" },
      { error: errorMessage(error), stack: error instanceof Error ? error.stack : undefined },
    );
  }
  const prefix = error instanceof ConnectionError ? "Connection failed" : "Error";
  print(`${prefix}: ${archiveError.getUserMessage()}`);
}

async function main(): Promise<void> {
  dotenv.config({ path: "secrets.env" });
  dotenv.config();

  const handleSignal = (signal: string) => {
    log.info(`Received ${signal}, stopping`, { operation: "shutdown", service: "process" });
    process.exit(130);
  };
  process.on("SIGINT", () => handleSignal("SIGINT"));
  process.on("SIGTERM", () => handleSignal("SIGTERM"));

  try {
    process.exitCode = await runCli(process.argv.slice(2));
  } catch (error) {
    reportFatal(error);
    process.exitCode = 1;
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error: unknown) => {
    console.error("Fatal error:", errorMessage(error));
    process.exit(1);
  });
}
