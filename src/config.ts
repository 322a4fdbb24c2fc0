// Configuration for the check-in core, read from CHECKIN_* environment variables
import { readFile } from "node:fs/promises";
import { parse as parseDotenv } from "dotenv";
import { z } from "zod";
import { InvalidFormatError } from "./errors.js";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const trimmedUrl = z
  .string()
  .url()
  .transform((value) => value.replace(/\/$/, "")); // Remove trailing slash

const configSchema = z.object({
  CHECKIN_PDS_URL: trimmedUrl.default("https://bsky.social"),
  CHECKIN_AUTH_BASE_URL: trimmedUrl.optional(),
  CHECKIN_PUBLIC_API_URL: trimmedUrl.default("https://public.api.bsky.app"),
  CHECKIN_PLC_DIRECTORY_URL: trimmedUrl.default("https://plc.directory"),
  CHECKIN_DEFAULT_MESSAGE: z.string().min(1).default("Checked in here!"),
  CHECKIN_REFRESH_THRESHOLD_SECONDS: z.coerce.number().int().nonnegative()
    .default(300),
  CHECKIN_RESUME_VALIDATION_INTERVAL_SECONDS: z.coerce.number().int()
    .nonnegative().default(300),
  CHECKIN_TOKEN_LIFETIME_SECONDS: z.coerce.number().int().positive().default(
    4 * 60 * 60,
  ),
  CHECKIN_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(
    15_000,
  ),
  CHECKIN_USER_AGENT: z.string().min(1).default("CheckinCore/1.0"),
  CHECKIN_VERIFY_CONTENT_HASH_LOCALLY: booleanFlag.default("true"),
  CHECKIN_CROSS_POST_BY_DEFAULT: booleanFlag.default("false"),
});

export interface CheckinCoreConfig {
  /** PDS that hosts the author's repository. */
  pdsUrl: string;
  /** Backend serving the mobile session validate/refresh endpoints. */
  authBaseUrl?: string;
  /** Public AppView used for handle resolution. */
  publicApiUrl: string;
  /** did:plc directory used to find the PDS of other repositories. */
  plcDirectoryUrl: string;
  defaultCheckinMessage: string;
  refreshThresholdSeconds: number;
  resumeValidationIntervalSeconds: number;
  /** Fallback lifetime when an access token carries no readable `exp`. */
  tokenLifetimeSeconds: number;
  requestTimeoutMs: number;
  userAgent: string;
  verifyContentHashLocally: boolean;
  crossPostByDefault: boolean;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): CheckinCoreConfig {
  // Empty strings count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
  );

  const parsed = configSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new InvalidFormatError(`Invalid configuration: ${issues}`);
  }

  const values = parsed.data;
  return {
    pdsUrl: values.CHECKIN_PDS_URL,
    authBaseUrl: values.CHECKIN_AUTH_BASE_URL,
    publicApiUrl: values.CHECKIN_PUBLIC_API_URL,
    plcDirectoryUrl: values.CHECKIN_PLC_DIRECTORY_URL,
    defaultCheckinMessage: values.CHECKIN_DEFAULT_MESSAGE,
    refreshThresholdSeconds: values.CHECKIN_REFRESH_THRESHOLD_SECONDS,
    resumeValidationIntervalSeconds:
      values.CHECKIN_RESUME_VALIDATION_INTERVAL_SECONDS,
    tokenLifetimeSeconds: values.CHECKIN_TOKEN_LIFETIME_SECONDS,
    requestTimeoutMs: values.CHECKIN_REQUEST_TIMEOUT_MS,
    userAgent: values.CHECKIN_USER_AGENT,
    verifyContentHashLocally: values.CHECKIN_VERIFY_CONTENT_HASH_LOCALLY,
    crossPostByDefault: values.CHECKIN_CROSS_POST_BY_DEFAULT,
  };
}

/**
 * Loads a dotenv file and layers the process environment on top of it,
 * so exported variables win over file entries.
 */
export async function loadConfigFile(
  path: string,
  env: Record<string, string | undefined> = process.env,
): Promise<CheckinCoreConfig> {
  const fileValues = parseDotenv(await readFile(path));
  return loadConfig({ ...fileValues, ...env });
}

export const DEFAULT_CONFIG: CheckinCoreConfig = loadConfig({});
