export * as Config from "./engine_config";
export * as Engine from "./engine";
export * as Errors from "./errors";
export * as Factories from "./factories";
export * as Hierarchy from "./hierarchy";
export * as Logger from "./logger";
export * as Schemas from "./schemas";
export * as Store from "./record_store";
export * as Utils from "./utils";
// Type system exports
export * as Validation from "./validation";
export * as Records from "./record_types";

// adapters
export * as TriageAdapter from "./adapters/triage_adapter";
