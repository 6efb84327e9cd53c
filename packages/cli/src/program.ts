import { Command, InvalidArgumentError } from "commander";
import { stringify as stringifyYaml } from "yaml";

import { loadAuthCoreConfig, type AuthCoreConfig, type EnvironmentLike } from "@credential-core/config";
import { isRole, toPublicCredential, type Role } from "@credential-core/contracts";
import { createAuthCore, createAuthHandler, describeFailure, type AuthCore } from "@credential-core/http";
import { createFileCredentialStore } from "@credential-core/store-file";
import { createCoreLogger, type CoreLogger } from "@credential-core/telemetry";

import { closeServer, createNodeServer, listen } from "./node-server.js";

const OUTPUT_FORMATS = ["json", "yaml"] as const;
type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface CliIo {
  readonly env: EnvironmentLike;
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
  readonly logger?: CoreLogger;
  /** Registers shutdown hooks for `serve`; defaults to SIGINT and SIGTERM on the process. */
  readonly onShutdown?: (listener: () => void) => void;
  /** Throw commander errors instead of exiting the process. */
  readonly throwOnExit?: boolean;
}

export class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliError";
  }
}

const defaultIo: CliIo = {
  env: process.env,
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
  onShutdown: (listener) => {
    process.once("SIGINT", listener);
    process.once("SIGTERM", listener);
  },
};

const ensureFormat = (value: string): OutputFormat => {
  const format = OUTPUT_FORMATS.find((candidate) => candidate === value);
  if (!format) {
    throw new InvalidArgumentError(`Expected one of: ${OUTPUT_FORMATS.join(", ")}`);
  }
  return format;
};

const ensureRole = (value: string): Role => {
  if (!isRole(value)) {
    throw new InvalidArgumentError("Expected admin or customer");
  }
  return value;
};

const ensurePort = (value: string): number => {
  const port = Number.parseInt(value, 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535 || String(port) !== value.trim()) {
    throw new InvalidArgumentError("Expected a port between 0 and 65535");
  }
  return port;
};

const format = (value: unknown, outputFormat: OutputFormat): string =>
  outputFormat === "json" ? JSON.stringify(value, null, 2) : stringifyYaml(value).trimEnd();

interface GlobalOptions {
  readonly config?: string;
}

interface ServeOptions {
  readonly port: number;
  readonly host: string;
}

interface RegisterOptions {
  readonly password: string;
  readonly role?: Role;
  readonly email?: string;
  readonly fullName?: string;
}

interface UsersOptions {
  readonly format: OutputFormat;
}

export const createProgram = (io: CliIo = defaultIo): Command => {
  const program = new Command();
  if (io.throwOnExit) {
    program.exitOverride();
  }
  program.configureOutput({
    writeOut: (text) => io.stdout(text.trimEnd()),
    writeErr: (text) => io.stderr(text.trimEnd()),
  });

  const loadConfig = async (): Promise<AuthCoreConfig> =>
    loadAuthCoreConfig({ env: io.env, file: program.opts<GlobalOptions>().config });

  const openCore = async (config: AuthCoreConfig): Promise<AuthCore> => {
    const logger = io.logger ?? createCoreLogger({ level: config.logLevel });
    const store = createFileCredentialStore({
      path: config.storePath,
      readFailurePolicy: config.readFailurePolicy,
      logger,
    });
    const core = createAuthCore({ config, store, logger });
    const started = await core.start();
    if (!started.ok) {
      await core.stop();
      throw new CliError(describeFailure(started.error, config.scheme).body.detail);
    }
    return core;
  };

  program
    .name("credential-core")
    .description("Manage and serve a credential store")
    .option("--config <file>", "YAML or JSON configuration file");

  program
    .command("serve")
    .description("Serve register, login and identity endpoints over HTTP")
    .option("--port <port>", "Port to listen on", ensurePort, 8000)
    .option("--host <host>", "Interface to bind", "127.0.0.1")
    .action(async (options: ServeOptions) => {
      const config = await loadConfig();
      const core = await openCore(config);
      const server = createNodeServer({ handler: createAuthHandler({ core }), logger: core.logger });
      await listen(server, options.port, options.host);
      core.logger.info("server.listening", { host: options.host, port: options.port, scheme: config.scheme });

      const onShutdown = io.onShutdown ?? defaultIo.onShutdown;
      onShutdown?.(() => {
        core.logger.info("server.shutting_down");
        void closeServer(server)
          .then(() => core.stop())
          .catch((error: unknown) => {
            core.logger.error("server.shutdown_failed", {
              error: error instanceof Error ? error.message : String(error),
            });
          });
      });
    });

  program
    .command("register")
    .description("Register a credential directly in the store")
    .argument("<username>", "Username to register")
    .requiredOption("--password <password>", "Plaintext password")
    .option("--role <role>", "admin or customer (role-aware stores only)", ensureRole)
    .option("--email <email>", "Email address kept in the profile")
    .option("--full-name <name>", "Full name kept in the profile")
    .action(async (username: string, options: RegisterOptions) => {
      const config = await loadConfig();
      const core = await openCore(config);
      try {
        const profile: Record<string, unknown> = {};
        if (options.email !== undefined) {
          profile.email = options.email;
        }
        if (options.fullName !== undefined) {
          profile.full_name = options.fullName;
        }
        const registered = await core.register({
          username,
          password: options.password,
          role: options.role,
          profile,
        });
        if (!registered.ok) {
          throw new CliError(describeFailure(registered.error, config.scheme).body.detail);
        }
        io.stdout(JSON.stringify({ message: "User registered successfully", ...registered.value }));
      } finally {
        await core.stop();
      }
    });

  program
    .command("users")
    .description("List registered users without their digests")
    .option("--format <format>", "Output format (json|yaml)", ensureFormat, "yaml")
    .action(async (options: UsersOptions) => {
      const config = await loadConfig();
      const core = await openCore(config);
      try {
        const loaded = await core.store.load();
        if (!loaded.ok) {
          throw new CliError(describeFailure(loaded.error, config.scheme).body.detail);
        }
        const users = [...loaded.value.values()]
          .map(toPublicCredential)
          .sort((left, right) => left.username.localeCompare(right.username));
        io.stdout(format(users, options.format));
      } finally {
        await core.stop();
      }
    });

  return program;
};
