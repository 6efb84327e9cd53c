export { InMemoryCredentialStore, createInMemoryCredentialStore } from "./memory-credential-store.js";
export type { InMemoryCredentialStoreOptions } from "./memory-credential-store.js";
