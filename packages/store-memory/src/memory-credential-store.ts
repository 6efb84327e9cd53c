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
  type PersistenceError,
  type Result,
  type WriterLock,
} from "@credential-core/contracts";

export interface InMemoryCredentialStoreOptions {
  readonly initialRecords?: ReadonlyArray<CredentialRecord>;
}

const clone = <T>(value: T): T => structuredClone(value);

const copySnapshot = (snapshot: CredentialSnapshot): Map<string, CredentialRecord> => {
  const copy = new Map<string, CredentialRecord>();
  for (const [username, record] of snapshot) {
    copy.set(username, clone(record));
  }
  return copy;
};

export class InMemoryCredentialStore implements CredentialStorePort {
  private document: Map<string, CredentialRecord>;
  private readonly lock: WriterLock = createWriterLock();
  private state: "created" | "open" | "closed" = "created";

  constructor(options: InMemoryCredentialStoreOptions = {}) {
    this.document = new Map((options.initialRecords ?? []).map((record) => [record.username, clone(record)]));
  }

  async open(): Promise<void> {
    if (this.state === "closed") {
      throw new Error("InMemoryCredentialStore cannot be reopened after close");
    }
    this.state = "open";
  }

  async close(): Promise<void> {
    this.state = "closed";
    await this.lock.idle();
  }

  async load(): Promise<Result<CredentialSnapshot, PersistenceError>> {
    return ok(copySnapshot(this.document));
  }

  async save(snapshot: CredentialSnapshot): Promise<Result<void, PersistenceError>> {
    return this.lock.run(async () => this.replace(snapshot));
  }

  async update<TValue, TError extends CoreError>(
    mutator: CredentialMutator<TValue, TError>,
  ): Promise<Result<TValue, TError | PersistenceError>> {
    return this.lock.run(async (): Promise<Result<TValue, TError | PersistenceError>> => {
      const mutation = await mutator(copySnapshot(this.document));
      if (!mutation.ok) {
        return mutation;
      }
      const saved = this.replace(mutation.value.next);
      if (!saved.ok) {
        return saved;
      }
      return ok(mutation.value.value);
    });
  }

  private replace(snapshot: CredentialSnapshot): Result<void, PersistenceError> {
    if (this.state !== "open") {
      const reason = this.state === "closed" ? "Credential store is closed" : "Credential store has not been opened";
      return err(persistenceError("persistence.write_failed", "Failed to save user data", reason));
    }
    this.document = copySnapshot(snapshot);
    return ok(undefined);
  }
}

export const createInMemoryCredentialStore = (
  options: InMemoryCredentialStoreOptions = {},
): InMemoryCredentialStore => new InMemoryCredentialStore(options);
