export { FileCredentialStore, createFileCredentialStore } from "./file-credential-store.js";
export type { CredentialFileSystem, FileCredentialStoreOptions, ReadFailurePolicy } from "./file-credential-store.js";
export { decodeDocument, encodeDocument } from "./document.js";
export type { DecodedDocument, StoredCredentialEntry } from "./document.js";
