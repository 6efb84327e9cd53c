import { z } from "zod";

import {
  isRole,
  type CredentialRecord,
  type CredentialSnapshot,
} from "@credential-core/contracts";
import type { CoreLogger } from "@credential-core/telemetry";

const entrySchema = z
  .object({
    password_hash: z.string().min(1),
  })
  .passthrough();

export type StoredCredentialEntry = z.infer<typeof entrySchema>;

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export interface DecodedDocument {
  readonly records: Map<string, CredentialRecord>;
  /** Entries that are not credential records, kept verbatim so the next write carries them over. */
  readonly retained: Readonly<Record<string, unknown>>;
}

/**
 * Turns the persisted JSON document into a snapshot. Entries without a usable `password_hash`
 * cannot authenticate anyone; they stay out of the snapshot and are returned in `retained`.
 * Returns undefined when the document is not a mapping at all.
 */
export const decodeDocument = (raw: unknown, logger: CoreLogger): DecodedDocument | undefined => {
  if (!isPlainObject(raw)) {
    logger.warn("credential_store.document_not_mapping", { type: Array.isArray(raw) ? "array" : typeof raw });
    return undefined;
  }

  const records = new Map<string, CredentialRecord>();
  const retained: Record<string, unknown> = {};
  for (const [username, value] of Object.entries(raw)) {
    const parsed = entrySchema.safeParse(value);
    if (!parsed.success) {
      logger.warn("credential_store.entry_not_authenticatable", { username });
      retained[username] = value;
      continue;
    }
    records.set(username, toRecord(username, parsed.data));
  }
  return { records, retained };
};

const toRecord = (username: string, entry: StoredCredentialEntry): CredentialRecord => {
  const { password_hash: secretDigest, role, ...rest } = entry;
  // An unrecognised role stays in the profile so it is written back untouched.
  const profile: Record<string, unknown> = isRole(role) ? rest : { ...rest, ...(role === undefined ? {} : { role }) };
  return {
    username,
    secretDigest,
    ...(isRole(role) ? { role } : {}),
    profile,
  };
};

export const encodeDocument = (
  snapshot: CredentialSnapshot,
  retained: Readonly<Record<string, unknown>> = {},
): Record<string, unknown> => {
  const document: Record<string, unknown> = { ...retained };
  for (const [username, record] of snapshot) {
    const entry: StoredCredentialEntry = {
      password_hash: record.secretDigest,
      ...record.profile,
      ...(record.role ? { role: record.role } : {}),
    };
    entry.password_hash = record.secretDigest;
    document[username] = entry;
  }
  return document;
};
