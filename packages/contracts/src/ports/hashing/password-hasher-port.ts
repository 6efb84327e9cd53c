export interface PasswordHasherPort {
  hash(plaintext: string): string;
  /** Compares a presented plaintext with a stored digest without leaking timing. */
  matches(plaintext: string, digest: string): boolean;
}
