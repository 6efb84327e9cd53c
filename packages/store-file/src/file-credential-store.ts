import * as fsPromises from "node:fs/promises";
import { dirname } from "node:path";

import {
  createWriterLock,
  err,
  ok,
  persistenceError,
  type CoreError,
  type CredentialMutator,
  type CredentialRecord,
  type CredentialSnapshot,
  type CredentialStorePort,
  type Err,
  type PersistenceError,
  type Result,
  type WriterLock,
} from "@credential-core/contracts";
import {
  createSilentLogger,
  getCoreTracer,
  runWithSpan,
  type CoreLogger,
  type CoreTracer,
} from "@credential-core/telemetry";

import { decodeDocument, encodeDocument, type DecodedDocument } from "./document.js";

export type ReadFailurePolicy = "empty" | "fail";

/** The file operations the store needs; injectable so tests can simulate disk faults. */
export interface CredentialFileSystem {
  readFile(path: string, encoding: "utf8"): Promise<string>;
  writeFile(path: string, data: string, encoding: "utf8"): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  rm(path: string, options: { readonly force: boolean }): Promise<void>;
  mkdir(path: string, options: { readonly recursive: boolean }): Promise<unknown>;
}

export interface FileCredentialStoreOptions {
  readonly path: string;
  readonly readFailurePolicy?: ReadFailurePolicy;
  readonly logger?: CoreLogger;
  readonly tracer?: CoreTracer;
  readonly fileSystem?: CredentialFileSystem;
}

type StoreState = "created" | "open" | "closed";

const nodeFileSystem: CredentialFileSystem = {
  readFile: (path, encoding) => fsPromises.readFile(path, encoding),
  writeFile: (path, data, encoding) => fsPromises.writeFile(path, data, encoding),
  rename: (from, to) => fsPromises.rename(from, to),
  rm: (path, options) => fsPromises.rm(path, options),
  mkdir: (path, options) => fsPromises.mkdir(path, options),
};

const isMissingFile = (error: unknown): boolean =>
  typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Whole-document JSON credential store. Every write replaces the file through a temp file and a
 * rename, so readers only ever observe a complete document. Writes are serialized behind one lock;
 * reads go straight to disk and never wait for it.
 */
export class FileCredentialStore implements CredentialStorePort {
  readonly path: string;
  private readonly readFailurePolicy: ReadFailurePolicy;
  private readonly logger: CoreLogger;
  private readonly tracer: CoreTracer;
  private readonly fs: CredentialFileSystem;
  private readonly lock: WriterLock = createWriterLock();
  private state: StoreState = "created";
  private tempCounter = 0;

  constructor(options: FileCredentialStoreOptions) {
    if (!options.path || options.path.trim().length === 0) {
      throw new Error("FileCredentialStore requires a non-empty path");
    }
    this.path = options.path;
    this.readFailurePolicy = options.readFailurePolicy ?? "empty";
    this.logger = (options.logger ?? createSilentLogger()).child({ component: "credential_store", path: this.path });
    this.tracer = options.tracer ?? getCoreTracer({ name: "credential-core.store" });
    this.fs = options.fileSystem ?? nodeFileSystem;
  }

  async open(): Promise<void> {
    if (this.state === "closed") {
      throw new Error("FileCredentialStore cannot be reopened after close");
    }
    await this.fs.mkdir(dirname(this.path), { recursive: true });
    this.state = "open";
    this.logger.debug("credential_store.opened");
  }

  async close(): Promise<void> {
    this.state = "closed";
    await this.lock.idle();
    this.logger.debug("credential_store.closed");
  }

  /**
   * Snapshot for readers. Under the default `empty` policy an unreadable document reads as no
   * users, so callers must never treat this result as proof that the store is empty.
   */
  async load(): Promise<Result<CredentialSnapshot, PersistenceError>> {
    const read = await this.readDocument();
    if (read.ok) {
      return ok(read.value.records);
    }
    if (this.readFailurePolicy === "fail") {
      return read;
    }
    return ok(new Map<string, CredentialRecord>());
  }

  /** Replaces every credential record. Entries that are not credential records are kept. */
  async save(snapshot: CredentialSnapshot): Promise<Result<void, PersistenceError>> {
    return this.update(() => ok({ next: snapshot, value: undefined }));
  }

  async update<TValue, TError extends CoreError>(
    mutator: CredentialMutator<TValue, TError>,
  ): Promise<Result<TValue, TError | PersistenceError>> {
    return this.lock.run(async (): Promise<Result<TValue, TError | PersistenceError>> => {
      const closed = this.rejectUnlessOpen();
      if (closed) {
        return closed;
      }

      // Writers never fall back to an empty snapshot.
      const read = await this.readDocument();
      if (!read.ok) {
        return read;
      }

      const mutation = await mutator(read.value.records);
      if (!mutation.ok) {
        return mutation;
      }

      const saved = await this.write(mutation.value.next, read.value.retained);
      if (!saved.ok) {
        return saved;
      }
      return ok(mutation.value.value);
    });
  }

  private async readDocument(): Promise<Result<DecodedDocument, PersistenceError>> {
    let contents: string;
    try {
      contents = await this.fs.readFile(this.path, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        return ok({ records: new Map<string, CredentialRecord>(), retained: {} });
      }
      return this.readFailed(error);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(contents);
    } catch (error) {
      return this.readFailed(error);
    }

    const decoded = decodeDocument(raw, this.logger);
    if (!decoded) {
      return this.readFailed("document is not a mapping of usernames");
    }
    return ok(decoded);
  }

  private rejectUnlessOpen(): Err<PersistenceError> | undefined {
    if (this.state === "open") {
      return undefined;
    }
    const reason = this.state === "closed" ? "Credential store is closed" : "Credential store has not been opened";
    this.logger.error("credential_store.write_rejected", { state: this.state });
    return err(persistenceError("persistence.write_failed", "Failed to save user data", reason, { path: this.path }));
  }

  private readFailed(error: unknown): Err<PersistenceError> {
    this.logger.error("credential_store.read_failed", {
      error: describeError(error),
      policy: this.readFailurePolicy,
    });
    return err(persistenceError("persistence.read_failed", "Failed to load user data", error, { path: this.path }));
  }

  private async write(
    snapshot: CredentialSnapshot,
    retained: Readonly<Record<string, unknown>>,
  ): Promise<Result<void, PersistenceError>> {
    const shadowed = [...snapshot.keys()].filter((username) => Object.hasOwn(retained, username));
    if (shadowed.length > 0) {
      this.logger.error("credential_store.write_rejected", { shadowed });
      return err(
        persistenceError(
          "persistence.write_failed",
          "Failed to save user data",
          "a credential record would replace an entry the store cannot read",
          { path: this.path, usernames: shadowed },
        ),
      );
    }

    return runWithSpan(
      this.tracer,
      "credential_store.write",
      async (span) => {
        span.setAttribute("credential_store.records", snapshot.size);
        this.tempCounter += 1;
        const tempPath = `${this.path}.${process.pid}.${this.tempCounter}.tmp`;
        const body = `${JSON.stringify(encodeDocument(snapshot, retained), null, 2)}\n`;

        try {
          await this.fs.writeFile(tempPath, body, "utf8");
          await this.fs.rename(tempPath, this.path);
        } catch (error) {
          this.logger.error("credential_store.write_failed", { error: describeError(error) });
          await this.fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
            this.logger.warn("credential_store.temp_cleanup_failed", {
              tempPath,
              error: describeError(cleanupError),
            });
          });
          return err(persistenceError("persistence.write_failed", "Failed to save user data", error, { path: this.path }));
        }

        this.logger.debug("credential_store.written", { records: snapshot.size });
        return ok(undefined);
      },
    );
  }
}

export const createFileCredentialStore = (options: FileCredentialStoreOptions): FileCredentialStore =>
  new FileCredentialStore(options);
