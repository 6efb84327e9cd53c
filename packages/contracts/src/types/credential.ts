export const ROLES = ["admin", "customer"] as const;

export type Role = (typeof ROLES)[number];

/** Role given to role-aware registrations that do not ask for one. */
export const LOWEST_PRIVILEGE_ROLE: Role = "customer";

export type CredentialProfile = Readonly<Record<string, unknown>>;

/**
 * Stored identity unit. `secretDigest` never leaves the core: every value handed to callers
 * goes through {@link toPublicCredential} first.
 */
export interface CredentialRecord {
  readonly username: string;
  readonly secretDigest: string;
  readonly role?: Role;
  readonly profile: CredentialProfile;
}

export type PublicCredential = Omit<CredentialRecord, "secretDigest">;

/**
 * Per-request identity produced by a successful verification. The only identity shape that
 * business handlers and the authorization gate accept.
 */
export interface AuthContext {
  readonly username: string;
  readonly role?: Role;
  readonly profile: CredentialProfile;
}

export type CredentialSnapshot = ReadonlyMap<string, CredentialRecord>;

export interface RegistrationInput {
  readonly username: string;
  readonly password: string;
  readonly role?: Role;
  readonly profile?: CredentialProfile;
}

export const isRole = (value: unknown): value is Role =>
  typeof value === "string" && (ROLES as ReadonlyArray<string>).includes(value);

export const toPublicCredential = (record: CredentialRecord): PublicCredential => ({
  username: record.username,
  ...(record.role ? { role: record.role } : {}),
  profile: { ...record.profile },
});

export const toAuthContext = (record: CredentialRecord): AuthContext => toPublicCredential(record);
