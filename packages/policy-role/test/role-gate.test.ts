import { describe, expect, it } from "vitest";

import type { AuthContext } from "@credential-core/contracts";

import { createRoleGate } from "../src/index.js";

const admin: AuthContext = { username: "root", role: "admin", profile: {} };
const customer: AuthContext = { username: "bob", role: "customer", profile: {} };
const roleless: AuthContext = { username: "carol", profile: {} };

describe("RoleGate", () => {
  it("allows any authenticated caller when no role is required", () => {
    const gate = createRoleGate();

    expect(gate.authorize(roleless)).toEqual({ ok: true, value: roleless });
    expect(gate.authorize(customer)).toEqual({ ok: true, value: customer });
  });

  it("requires an exact role match", () => {
    const gate = createRoleGate();

    expect(gate.authorize(admin, "admin").ok).toBe(true);
    expect(gate.authorize(customer, "customer").ok).toBe(true);

    const denied = gate.authorize(customer, "admin");
    expect(denied).toEqual({
      ok: false,
      error: {
        code: "auth.forbidden",
        message: "Identity lacks the role required for this action",
        details: { requiredRole: "admin" },
      },
    });
    expect(gate.authorize(roleless, "customer").ok).toBe(false);
  });

  it("resolves actions through the first matching rule", () => {
    const gate = createRoleGate({
      rules: [
        { action: "products.create", role: "admin" },
        { action: "admin.*", role: "admin" },
        { action: "orders.*", role: "customer" },
      ],
    });

    expect(gate.authorizeAction(admin, "products.create").ok).toBe(true);
    expect(gate.authorizeAction(customer, "products.create").ok).toBe(false);
    expect(gate.authorizeAction(customer, "admin.users.list").ok).toBe(false);
    expect(gate.authorizeAction(customer, "orders.place").ok).toBe(true);
    expect(gate.authorizeAction(admin, "orders.place").ok).toBe(false);
    expect(gate.authorizeAction(roleless, "products.list").ok).toBe(true);
    expect(gate.requiredRoleFor("admin.stats")).toBe("admin");
    expect(gate.requiredRoleFor("products.list")).toBeUndefined();
  });

  it("does not treat dots in a pattern as wildcards", () => {
    const gate = createRoleGate({ rules: [{ action: "products.create", role: "admin" }] });

    expect(gate.requiredRoleFor("productsXcreate")).toBeUndefined();
  });
});
