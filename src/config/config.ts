import * as v from "valibot";
import { createLogger } from "../services/Logger.js";
import type { NasProfile } from "../types/archive.types.js";
import { ConfigurationError, ErrorCode } from "../types/errors.js";

export interface MailCredentials {
  email: string;
  password: string;
  /** Local part of the address; names the account directory on the NAS */
  accountId: string;
}

export interface ImapOverrides {
  host?: string;
  port?: number;
  ssl?: boolean;
}

export interface AppConfig {
  /** Undefined unless both MAIL_EMAIL and MAIL_PASSWORD are set */
  mail?: MailCredentials;
  provider?: string;
  imap: ImapOverrides;
  /** Undefined unless host, share, username and password are all set */
  nas?: NasProfile;
  debug: boolean;
}

export const DEFAULT_NAS_PATH = "/mail-archive";
export const DEFAULT_NAS_DOMAIN = "WORKGROUP";

const logger = createLogger("config");

const portSchema = v.pipe(
  v.string(),
  v.regex(/^\d+$/, "Port must be a number"),
  v.transform(Number),
  v.number(),
  v.minValue(1),
  v.maxValue(65535),
);

const booleanSchema = v.pipe(
  v.string(),
  v.transform((value) => value.trim().toLowerCase()),
  v.picklist(["true", "false", "1", "0", "yes", "no"], "Expected true or false"),
  v.transform((value) => value === "true" || value === "1" || value === "yes"),
);

const nonEmpty = v.pipe(v.string(), v.trim(), v.minLength(1));

// Environment variables validation schema
const EnvSchema = v.object({
  MAIL_EMAIL: v.optional(
    v.pipe(v.string(), v.trim(), v.email("Invalid email format"), v.maxLength(254)),
  ),
  MAIL_PASSWORD: v.optional(v.pipe(v.string(), v.minLength(1, "Password is required"))),
  MAIL_PROVIDER: v.optional(v.pipe(nonEmpty, v.toLowerCase())),

  // Only read for the custom provider
  IMAP_HOST: v.optional(nonEmpty),
  IMAP_PORT: v.optional(portSchema),
  IMAP_SSL: v.optional(booleanSchema),

  NAS_HOST: v.optional(nonEmpty),
  NAS_SHARE: v.optional(nonEmpty),
  NAS_USERNAME: v.optional(nonEmpty),
  NAS_PASSWORD: v.optional(v.string()),
  NAS_DOMAIN: v.optional(nonEmpty),
  NAS_PORT: v.optional(portSchema),
  NAS_PATH: v.optional(nonEmpty),

  DEBUG: v.optional(booleanSchema),
});

type Env = v.InferOutput<typeof EnvSchema>;

function formatValidationError(
  error: v.ValiError<
    | v.BaseSchema<unknown, unknown, v.BaseIssue<unknown>>
    | v.BaseSchemaAsync<unknown, unknown, v.BaseIssue<unknown>>
  >,
): string {
  const issues = v.flatten(error.issues);
  const messages: string[] = [];

  for (const [path, issue] of Object.entries(issues.nested || {})) {
    if (Array.isArray(issue)) {
      for (const i of issue) {
        messages.push(`${path}: ${i}`);
      }
    }
  }

  if (issues.root) {
    for (const issue of issues.root) {
      messages.push(`Configuration: ${issue}`);
    }
  }

  return messages.join(", ");
}

/**
 * Empty variables count as unset, the way a blank line in a .env file reads.
 */
function presentOnly(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== "") {
      result[key] = value;
    }
  }
  return result;
}

export function accountIdFor(email: string): string {
  return email.split("@")[0];
}

function mailFrom(env: Env): MailCredentials | undefined {
  if (!env.MAIL_EMAIL || !env.MAIL_PASSWORD) {
    return undefined;
  }
  return {
    email: env.MAIL_EMAIL,
    password: env.MAIL_PASSWORD,
    accountId: accountIdFor(env.MAIL_EMAIL),
  };
}

function nasFrom(env: Env): NasProfile | undefined {
  if (env.NAS_HOST && env.NAS_SHARE && env.NAS_USERNAME && env.NAS_PASSWORD !== undefined) {
    return {
      host: env.NAS_HOST,
      share: env.NAS_SHARE,
      username: env.NAS_USERNAME,
      password: env.NAS_PASSWORD,
      domain: env.NAS_DOMAIN ?? DEFAULT_NAS_DOMAIN,
      basePath: env.NAS_PATH ?? DEFAULT_NAS_PATH,
      port: env.NAS_PORT,
    };
  }

  const missing = Object.entries({
    NAS_HOST: env.NAS_HOST,
    NAS_SHARE: env.NAS_SHARE,
    NAS_USERNAME: env.NAS_USERNAME,
    NAS_PASSWORD: env.NAS_PASSWORD,
  })
    .filter(([, value]) => value === undefined)
    .map(([key]) => key);

  if (missing.length < 4) {
    logger.warning(
      "NAS settings incomplete, NAS features disabled",
      { operation: "loadConfig", service: "config" },
      { missing },
    );
  }
  return undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  try {
    const validatedEnv = v.parse(EnvSchema, presentOnly(env));

    return {
      mail: mailFrom(validatedEnv),
      provider: validatedEnv.MAIL_PROVIDER,
      imap: {
        host: validatedEnv.IMAP_HOST,
        port: validatedEnv.IMAP_PORT,
        ssl: validatedEnv.IMAP_SSL,
      },
      nas: nasFrom(validatedEnv),
      debug: validatedEnv.DEBUG ?? false,
    };
  } catch (error) {
    if (v.isValiError(error)) {
      throw new ConfigurationError(
        `Configuration validation failed: ${formatValidationError(error)}`,
        undefined,
        ErrorCode.CONFIG_INVALID,
        { operation: "loadConfig", service: "config" },
      );
    }
    throw error;
  }
}

export function requireMail(config: AppConfig): MailCredentials {
  if (!config.mail) {
    throw new ConfigurationError(
      "Mail credentials missing. Set MAIL_EMAIL and MAIL_PASSWORD (e.g. in secrets.env)",
      "MAIL_EMAIL",
      ErrorCode.CONFIG_MISSING,
    );
  }
  return config.mail;
}
