export * from "./entry.types";
export * from "./result.types";
export * from "./vault.types";
