export { RoleGate, createRoleGate } from "./role-gate.js";
export type { RoleGateOptions, RoleRule } from "./types.js";
