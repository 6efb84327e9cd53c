export { CliError, createProgram } from "./program.js";
export type { CliIo } from "./program.js";
export { closeServer, createNodeServer, listen, toFetchRequest, writeFetchResponse } from "./node-server.js";
export type { FetchHandler, IncomingRequestLike, NodeServerOptions, ServerResponseLike } from "./node-server.js";
