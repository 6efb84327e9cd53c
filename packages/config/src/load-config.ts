import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { parse as parseYaml } from "yaml";

import { authCoreConfigSchema, type AuthCoreConfig } from "./schema.js";

export const ENV_PREFIX = "CREDENTIAL_CORE_";

const ENV_KEYS = {
  scheme: "SCHEME",
  storePath: "STORE_PATH",
  minUsernameLength: "MIN_USERNAME_LENGTH",
  minPasswordLength: "MIN_PASSWORD_LENGTH",
  salt: "SALT",
  signingKey: "SIGNING_KEY",
  tokenTtlSeconds: "TOKEN_TTL_SECONDS",
  issuer: "ISSUER",
  roleAware: "ROLE_AWARE",
  logRegistrations: "LOG_REGISTRATIONS",
  readFailurePolicy: "READ_FAILURE_POLICY",
  logLevel: "LOG_LEVEL",
} as const;

export class ConfigError extends Error {
  readonly issues: ReadonlyArray<string>;

  constructor(issues: ReadonlyArray<string>) {
    super(`Invalid credential-core configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export type EnvironmentLike = Readonly<Record<string, string | undefined>>;

export interface LoadAuthCoreConfigOptions {
  readonly env?: EnvironmentLike;
  readonly file?: string;
}

export const parseAuthCoreConfig = (input: unknown): AuthCoreConfig => {
  const parsed = authCoreConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
      ),
    );
  }
  return parsed.data;
};

export const readEnvironmentOverrides = (env: EnvironmentLike): Record<string, unknown> => {
  const overrides: Record<string, unknown> = {};
  for (const [key, suffix] of Object.entries(ENV_KEYS)) {
    const value = env[`${ENV_PREFIX}${suffix}`];
    if (value !== undefined && value !== "") {
      overrides[key] = value;
    }
  }

  const adminUsername = env[`${ENV_PREFIX}DEFAULT_ADMIN_USERNAME`];
  const adminPassword = env[`${ENV_PREFIX}DEFAULT_ADMIN_PASSWORD`];
  if (adminUsername && adminPassword) {
    overrides.defaultAdmin = { username: adminUsername, password: adminPassword };
  }

  return overrides;
};

const parseConfigFile = (contents: string, format: "json" | "yaml"): unknown =>
  format === "json" ? JSON.parse(contents) : parseYaml(contents);

export const readConfigFile = async (filePath: string): Promise<Record<string, unknown>> => {
  const contents = await readFile(filePath, "utf8");
  const extension = extname(filePath).toLowerCase();
  const data =
    extension === ".json"
      ? parseConfigFile(contents, "json")
      : extension === ".yaml" || extension === ".yml"
        ? parseConfigFile(contents, "yaml")
        : parseUnknownFormat(contents);

  if (data === null || data === undefined) {
    return {};
  }
  if (typeof data !== "object" || Array.isArray(data)) {
    throw new ConfigError([`${filePath}: configuration file must contain a mapping`]);
  }
  return { ...data };
};

const parseUnknownFormat = (contents: string): unknown => {
  try {
    return parseConfigFile(contents, "json");
  } catch {
    return parseConfigFile(contents, "yaml");
  }
};

/**
 * Resolves configuration from an optional YAML/JSON file, then `CREDENTIAL_CORE_*` variables on top.
 */
export const loadAuthCoreConfig = async (options: LoadAuthCoreConfigOptions = {}): Promise<AuthCoreConfig> => {
  const fromFile = options.file ? await readConfigFile(options.file) : {};
  const fromEnv = readEnvironmentOverrides(options.env ?? process.env);
  return parseAuthCoreConfig({ ...fromFile, ...fromEnv });
};
