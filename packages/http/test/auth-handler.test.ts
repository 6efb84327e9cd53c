import { describe, expect, it } from "vitest";
import { z } from "zod";

import { encodeBasicCredentials, jsonResponse } from "../src/index.js";
import { createTestApp, get, postJson } from "./support.js";

describe("auth handler with bearer sessions", () => {
  it("registers, logs in and expires a session", async () => {
    const { handler, clock } = await createTestApp();

    const registered = await handler(postJson("/register", { username: "alice", password: "secret1" }));
    expect(registered.status).toBe(201);
    expect(await registered.json()).toEqual({ message: "User registered successfully", username: "alice" });

    const login = await handler(postJson("/login", { username: "alice", password: "secret1" }));
    expect(login.status).toBe(200);
    const session = z
      .object({ token: z.string(), tokenType: z.string(), username: z.string(), expiresInSeconds: z.number() })
      .strict()
      .parse(await login.json());
    expect(session).toMatchObject({ tokenType: "bearer", username: "alice", expiresInSeconds: 1800 });

    const rejected = await handler(postJson("/login", { username: "alice", password: "wrong" }));
    expect(rejected.status).toBe(401);
    expect(rejected.headers.get("www-authenticate")).toBe("Bearer");
    expect(await rejected.json()).toEqual({ detail: "Invalid credentials" });

    const me = await handler(get("/me", `Bearer ${session.token}`));
    expect(me.status).toBe(200);
    expect(await me.json()).toEqual({ username: "alice", profile: {} });

    clock.current = new Date("2024-01-01T00:30:00.000Z");
    const expired = await handler(get("/me", `Bearer ${session.token}`));
    expect(expired.status).toBe(401);
    expect(await expired.json()).toEqual({ detail: "Could not validate credentials" });
  });

  it("answers an unknown user exactly like a wrong password", async () => {
    const { handler } = await createTestApp();
    await handler(postJson("/register", { username: "alice", password: "secret1" }));

    const wrongPassword = await handler(postJson("/login", { username: "alice", password: "wrong" }));
    const unknownUser = await handler(postJson("/login", { username: "nobody", password: "secret1" }));

    expect(unknownUser.status).toBe(wrongPassword.status);
    expect(unknownUser.headers.get("www-authenticate")).toBe(wrongPassword.headers.get("www-authenticate"));
    expect(await unknownUser.json()).toEqual(await wrongPassword.json());
  });

  it("refuses missing, foreign-scheme and garbled credentials", async () => {
    const { handler } = await createTestApp();
    await handler(postJson("/register", { username: "alice", password: "secret1" }));

    for (const authorization of [undefined, encodeBasicCredentials("alice", "secret1"), "Bearer not.a.token"]) {
      const response = await handler(get("/me", authorization));
      expect(response.status).toBe(401);
      expect(response.headers.get("www-authenticate")).toBe("Bearer");
      expect(await response.json()).toEqual({ detail: "Could not validate credentials" });
    }
  });
});

describe("auth handler with basic credentials", () => {
  it("verifies the password on every request", async () => {
    const { handler } = await createTestApp({ config: { scheme: "basic" } });
    await handler(
      postJson("/register", { username: "alice", password: "secret1", email: "alice@example.com" }),
    );

    const login = await handler(postJson("/login", { username: "alice", password: "secret1" }));
    expect(await login.json()).toEqual({
      message: "Login successful",
      username: "alice",
      profile: { email: "alice@example.com" },
    });

    const me = await handler(get("/me", encodeBasicCredentials("alice", "secret1")));
    expect(await me.json()).toEqual({ username: "alice", profile: { email: "alice@example.com" } });

    const wrong = await handler(get("/me", encodeBasicCredentials("alice", "wrong")));
    expect(wrong.status).toBe(401);
    expect(wrong.headers.get("www-authenticate")).toBe("Basic");
    expect(await wrong.json()).toEqual({ detail: "Invalid credentials" });
  });
});

describe("registration responses", () => {
  it("maps each rule to a 400 with its own message", async () => {
    const { handler } = await createTestApp();
    await handler(postJson("/register", { username: "alice", password: "secret1" }));

    const cases: Array<[unknown, string]> = [
      [{ username: "alice", password: "another1" }, "Username already exists"],
      [{ username: " ab ", password: "secret1" }, "Username must be at least 3 characters long"],
      [{ username: "bobby", password: "123" }, "Password must be at least 6 characters long"],
      [{ username: "bobby" }, "Invalid request body"],
    ];
    for (const [body, detail] of cases) {
      const response = await handler(postJson("/register", body));
      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({ detail });
    }
  });

  it("rejects a body that is not JSON", async () => {
    const { handler } = await createTestApp();

    const response = await handler(
      new Request("http://localhost/register", { method: "POST", body: "username=alice" }),
    );

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ detail: "Invalid request body" });
  });

  it("reports a failed write as a server error", async () => {
    const { handler, store } = await createTestApp();
    await store.close();

    const response = await handler(postJson("/register", { username: "alice", password: "secret1" }));

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ detail: "Failed to save user data" });
  });
});

describe("protected routes", () => {
  const adminAuth = encodeBasicCredentials("admin", "admin-pass");
  const customerAuth = encodeBasicCredentials("bob", "secret1");

  const createShop = () =>
    createTestApp({
      config: { scheme: "basic", roleAware: true, defaultAdmin: { username: "admin", password: "admin-pass" } },
      rules: [{ action: "admin.*", role: "admin" }],
      protectedRoutes: [
        {
          method: "POST",
          path: "/admin/products",
          requiredRole: "admin",
          handler: (context) => jsonResponse(201, { createdBy: context.username }),
        },
        {
          method: "GET",
          path: "/admin/stats",
          action: "admin.stats",
          handler: () => jsonResponse(200, { users: 2 }),
        },
        {
          method: "GET",
          path: "/cart",
          handler: (context) => jsonResponse(200, { owner: context.username, role: context.role }),
        },
        {
          method: "GET",
          path: "/broken",
          handler: () => {
            throw new Error("handler exploded");
          },
        },
      ],
    });

  it("lets the seeded admin through and stops customers", async () => {
    const { handler } = await createShop();
    await handler(postJson("/register", { username: "bob", password: "secret1" }));

    const asAdmin = await handler(
      new Request("http://localhost/admin/products", { method: "POST", headers: { authorization: adminAuth } }),
    );
    expect(asAdmin.status).toBe(201);
    expect(await asAdmin.json()).toEqual({ createdBy: "admin" });

    const asCustomer = await handler(
      new Request("http://localhost/admin/products", { method: "POST", headers: { authorization: customerAuth } }),
    );
    expect(asCustomer.status).toBe(403);
    expect(asCustomer.headers.get("www-authenticate")).toBeNull();
    expect(await asCustomer.json()).toEqual({ detail: "Insufficient permissions" });

    const statsAsCustomer = await handler(get("/admin/stats", customerAuth));
    expect(statsAsCustomer.status).toBe(403);
    const statsAsAdmin = await handler(get("/admin/stats", adminAuth));
    expect(statsAsAdmin.status).toBe(200);
  });

  it("only needs authentication when no role is required", async () => {
    const { handler } = await createShop();
    await handler(postJson("/register", { username: "bob", password: "secret1" }));

    const cart = await handler(get("/cart/", customerAuth));
    expect(await cart.json()).toEqual({ owner: "bob", role: "customer" });

    const anonymous = await handler(get("/cart"));
    expect(anonymous.status).toBe(401);
    expect(anonymous.headers.get("www-authenticate")).toBe("Basic");
  });

  it("turns a throwing handler into an internal error", async () => {
    const { handler } = await createShop();

    const response = await handler(get("/broken", adminAuth));

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ error: "internal_error" });
  });
});

describe("service routes", () => {
  it("serves health, the endpoint index and 404s", async () => {
    const { handler } = await createTestApp();

    expect(await (await handler(get("/healthz"))).json()).toEqual({ ok: true });
    expect(await (await handler(get("/"))).json()).toEqual({
      message: "Credential core",
      scheme: "bearer",
      endpoints: ["POST /register", "POST /login", "GET /me"],
    });

    const missing = await handler(get("/nowhere"));
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ detail: "Not found" });
  });
});
