import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import * as v from "valibot";
import { createLogger } from "../services/Logger.js";
import type { ConnectionProfile } from "../types/archive.types.js";
import { ConfigurationError, ErrorCode, errorMessage } from "../types/errors.js";
import type { ImapOverrides, MailCredentials } from "./config.js";

const logger = createLogger("providers");

export const DEFAULT_PROVIDER = "gmx";
export const CUSTOM_PROVIDER = "custom";

const ProviderSchema = v.object({
  name: v.pipe(v.string(), v.minLength(1)),
  imapHost: v.string(),
  imapPort: v.pipe(v.number(), v.integer(), v.minValue(1), v.maxValue(65535)),
  ssl: v.boolean(),
  description: v.optional(v.string()),
});

const ProvidersFileSchema = v.object({
  default: v.optional(v.pipe(v.string(), v.minLength(1))),
  providers: v.record(v.string(), ProviderSchema),
});

export type ProviderConfig = v.InferOutput<typeof ProviderSchema>;
export type ProvidersFile = v.InferOutput<typeof ProvidersFileSchema>;

const BUILTIN_PROVIDERS: Record<string, ProviderConfig> = {
  gmx: { name: "GMX Mail", imapHost: "imap.gmx.net", imapPort: 993, ssl: true },
  gmail: { name: "Gmail", imapHost: "imap.gmail.com", imapPort: 993, ssl: true },
  outlook: { name: "Outlook", imapHost: "outlook.office365.com", imapPort: 993, ssl: true },
};

/**
 * Where providers.json is looked for, first match wins.
 */
export function providerSearchPaths(): string[] {
  return [
    fileURLToPath(new URL("../../config/providers.json", import.meta.url)),
    join(homedir(), ".config", "mail-archive", "providers.json"),
    "/etc/mail-archive/providers.json",
  ];
}

export function findProvidersFile(configPath?: string): string | undefined {
  if (configPath) {
    if (!existsSync(configPath)) {
      throw new ConfigurationError(
        `Provider config file not found: ${configPath}`,
        "config",
        ErrorCode.CONFIG_MISSING,
      );
    }
    return configPath;
  }
  return providerSearchPaths().find((path) => existsSync(path));
}

export function readProvidersFile(path: string): ProvidersFile {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read ${path}: ${errorMessage(error)}`,
      "config",
      ErrorCode.CONFIG_INVALID,
    );
  }

  const result = v.safeParse(ProvidersFileSchema, raw);
  if (!result.success) {
    const issues = result.issues
      .map((issue) => `${v.getDotPath(issue) ?? "root"}: ${issue.message}`)
      .join(", ");
    throw new ConfigurationError(
      `Invalid provider config ${path}: ${issues}`,
      "config",
      ErrorCode.CONFIG_INVALID,
    );
  }
  return result.output;
}

function applyCustomOverrides(
  provider: ProviderConfig,
  overrides: ImapOverrides,
): ProviderConfig {
  return {
    ...provider,
    imapHost: overrides.host ?? provider.imapHost,
    imapPort: overrides.port ?? provider.imapPort,
    ssl: overrides.ssl ?? provider.ssl,
  };
}

/**
 * Resolve IMAP settings for a provider name. Without any providers file the
 * built-in gmx, gmail and outlook entries apply.
 */
export function loadProviderConfig(
  provider: string,
  configPath?: string,
  overrides: ImapOverrides = {},
): ProviderConfig {
  const file = findProvidersFile(configPath);
  let resolved: ProviderConfig | undefined;

  if (file) {
    const providers = readProvidersFile(file).providers;
    resolved = providers[provider];
    if (!resolved && provider !== CUSTOM_PROVIDER) {
      throw new ConfigurationError(
        `Unknown provider '${provider}'. Available: ${Object.keys(providers).join(", ")}`,
        "provider",
      );
    }
    logger.debug(
      `Loaded provider config: ${resolved?.name ?? provider}`,
      { operation: "loadProviderConfig", service: "providers" },
      { file },
    );
  } else {
    resolved = BUILTIN_PROVIDERS[provider];
    if (!resolved && provider !== CUSTOM_PROVIDER) {
      throw new ConfigurationError(
        `Unknown provider '${provider}' and no config file found`,
        "provider",
      );
    }
    logger.debug(`Using built-in defaults for ${provider}`, {
      operation: "loadProviderConfig",
      service: "providers",
    });
  }

  if (provider === CUSTOM_PROVIDER) {
    const custom = applyCustomOverrides(
      resolved ?? { name: "Custom IMAP server", imapHost: "", imapPort: 993, ssl: true },
      overrides,
    );
    if (!custom.imapHost) {
      throw new ConfigurationError(
        "The custom provider needs IMAP_HOST",
        "IMAP_HOST",
        ErrorCode.CONFIG_MISSING,
      );
    }
    return custom;
  }

  if (!resolved) {
    throw new ConfigurationError(`Unknown provider '${provider}'`, "provider");
  }
  return resolved;
}

export function getDefaultProvider(configPath?: string): string {
  const file = findProvidersFile(configPath);
  if (!file) {
    return DEFAULT_PROVIDER;
  }
  return readProvidersFile(file).default ?? DEFAULT_PROVIDER;
}

export function buildConnectionProfile(
  provider: ProviderConfig,
  mail: MailCredentials,
): ConnectionProfile {
  return {
    host: provider.imapHost,
    port: provider.imapPort,
    secure: provider.ssl,
    user: mail.email,
    password: mail.password,
    name: provider.name,
  };
}
