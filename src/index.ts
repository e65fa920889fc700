export * from "./contracts/machine.js";
export * from "./core/machine/index.js";
export * from "./core/runs/index.js";
export { AuditLogger, type AuditEvent, type AuditLevel } from "./core/audit/index.js";
export { loadSettings, type Settings } from "./core/config/index.js";
export { MooreApp } from "./cli/app.js";
