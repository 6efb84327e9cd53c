import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Readable } from "node:stream";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createSilentLogger } from "@credential-core/telemetry";

import { createProgram, toFetchRequest, writeFetchResponse, type CliIo } from "../src/index.js";

describe("credential-core cli", () => {
  let directory: string;
  let output: string[];

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), "credential-core-cli-"));
    output = [];
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  const run = async (args: ReadonlyArray<string>, env: Record<string, string> = {}): Promise<void> => {
    const io: CliIo = {
      env: {
        CREDENTIAL_CORE_SALT: "test-salt",
        CREDENTIAL_CORE_SCHEME: "basic",
        CREDENTIAL_CORE_ROLE_AWARE: "true",
        CREDENTIAL_CORE_STORE_PATH: join(directory, "data", "users.json"),
        ...env,
      },
      stdout: (text) => output.push(text),
      stderr: () => undefined,
      logger: createSilentLogger(),
      throwOnExit: true,
    };
    await createProgram(io).parseAsync([...args], { from: "user" });
  };

  it("registers a user and lists it without the digest", async () => {
    await run(["register", "alice", "--password", "secret1", "--email", "alice@example.com"]);
    await run(["users", "--format", "json"]);

    expect(JSON.parse(output[0] ?? "")).toEqual({
      message: "User registered successfully",
      username: "alice",
      role: "customer",
      profile: { email: "alice@example.com" },
    });
    expect(JSON.parse(output[1] ?? "")).toEqual([
      { username: "alice", role: "customer", profile: { email: "alice@example.com" } },
    ]);
    expect(output[1]).not.toContain("password_hash");

    const stored = JSON.parse(await readFile(join(directory, "data", "users.json"), "utf8"));
    expect(stored).toEqual({
      alice: {
        password_hash: "e12f76e2839ba695e7a8e46b0ce6fec0b6e5460bb1ca5ddfdbb4477de804e1af",
        email: "alice@example.com",
        role: "customer",
      },
    });
  });

  it("prints yaml by default", async () => {
    await run(["register", "bob", "--password", "secret1", "--role", "admin"]);
    output = [];

    await run(["users"]);

    expect(output).toEqual(["- username: bob\n  role: admin\n  profile: {}"]);
  });

  it("fails with the registration message for a duplicate", async () => {
    await run(["register", "alice", "--password", "secret1"]);

    await expect(run(["register", "alice", "--password", "another1"])).rejects.toThrow("Username already exists");
  });

  it("reads settings from a configuration file", async () => {
    const configPath = join(directory, "credential-core.yaml");
    await writeFile(configPath, "minUsernameLength: 5\n", "utf8");

    await expect(run(["--config", configPath, "register", "carl", "--password", "secret1"])).rejects.toThrow(
      "Username must be at least 5 characters long",
    );
  });

  it("rejects an unknown output format", async () => {
    await expect(run(["users", "--format", "xml"])).rejects.toMatchObject({
      code: "commander.invalidArgument",
    });
  });
});

describe("node http bridge", () => {
  it("turns an incoming message into a fetch request", async () => {
    const message = Object.assign(Readable.from([Buffer.from('{"username":'), Buffer.from('"alice"}')]), {
      method: "post",
      url: "/register?source=cli",
      headers: { "content-type": "application/json", "x-forwarded-for": ["10.0.0.1", "10.0.0.2"] },
    });

    const request = await toFetchRequest(message, "http://localhost:8000");

    expect(request.method).toBe("POST");
    expect(request.url).toBe("http://localhost:8000/register?source=cli");
    expect(request.headers.get("x-forwarded-for")).toBe("10.0.0.1, 10.0.0.2");
    expect(await request.json()).toEqual({ username: "alice" });
  });

  it("copies status, headers and body onto the node response", async () => {
    const written: { statusCode: number; headers: Record<string, string>; body?: string } = {
      statusCode: 200,
      headers: {},
    };

    await writeFetchResponse(
      new Response(JSON.stringify({ detail: "Invalid credentials" }), {
        status: 401,
        headers: { "content-type": "application/json", "www-authenticate": "Basic" },
      }),
      {
        get statusCode() {
          return written.statusCode;
        },
        set statusCode(value: number) {
          written.statusCode = value;
        },
        setHeader: (name, value) => {
          written.headers[name] = value;
        },
        end: (body) => {
          written.body = body;
        },
      },
    );

    expect(written).toEqual({
      statusCode: 401,
      headers: { "content-type": "application/json", "www-authenticate": "Basic" },
      body: '{"detail":"Invalid credentials"}',
    });
  });
});
