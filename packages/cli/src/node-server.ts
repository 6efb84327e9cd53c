import { createServer, type IncomingHttpHeaders, type Server } from "node:http";

import type { CoreLogger } from "@credential-core/telemetry";

export type FetchHandler = (request: Request) => Promise<Response>;

export interface IncomingRequestLike extends AsyncIterable<Uint8Array | string> {
  readonly method?: string;
  readonly url?: string;
  readonly headers: IncomingHttpHeaders;
}

export interface ServerResponseLike {
  statusCode: number;
  setHeader(name: string, value: string): unknown;
  end(body?: string): unknown;
}

const BODYLESS_METHODS = new Set(["GET", "HEAD"]);

export const toFetchRequest = async (message: IncomingRequestLike, origin: string): Promise<Request> => {
  const method = (message.method ?? "GET").toUpperCase();
  const headers = new Headers();
  for (const [name, value] of Object.entries(message.headers)) {
    if (typeof value === "string") {
      headers.append(name, value);
    } else if (Array.isArray(value)) {
      for (const entry of value) {
        headers.append(name, entry);
      }
    }
  }

  const chunks: Buffer[] = [];
  for await (const chunk of message) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : Buffer.from(chunk));
  }

  return new Request(new URL(message.url ?? "/", origin), {
    method,
    headers,
    body: BODYLESS_METHODS.has(method) ? undefined : Buffer.concat(chunks).toString("utf8"),
  });
};

export const writeFetchResponse = async (response: Response, res: ServerResponseLike): Promise<void> => {
  res.statusCode = response.status;
  response.headers.forEach((value, name) => {
    res.setHeader(name, value);
  });
  res.end(await response.text());
};

export interface NodeServerOptions {
  readonly handler: FetchHandler;
  readonly logger: CoreLogger;
  readonly origin?: string;
}

/** Serves a fetch-style handler from `node:http`. */
export const createNodeServer = (options: NodeServerOptions): Server => {
  const origin = options.origin ?? "http://localhost";
  return createServer((message, res) => {
    void toFetchRequest(message, origin)
      .then(options.handler)
      .then((response) => writeFetchResponse(response, res))
      .catch((error: unknown) => {
        options.logger.error("server.bridge_failed", {
          error: error instanceof Error ? error.message : String(error),
        });
        res.statusCode = 500;
        res.setHeader("content-type", "application/json");
        res.end(JSON.stringify({ error: "internal_error" }));
      });
  });
};

export const listen = (server: Server, port: number, host: string): Promise<void> =>
  new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      resolve();
    });
  });

export const closeServer = (server: Server): Promise<void> =>
  new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
