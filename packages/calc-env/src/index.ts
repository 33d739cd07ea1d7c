export * from "./action-schema.ts";
export * from "./observation.ts";
export * from "./environment.ts";
export * from "./facade.ts";
export * from "./dispatcher/command-dispatcher.ts";
export * from "./client/http-client.ts";

export * from "./bridge/api.ts";
export * from "./bridge/errors.ts";
export * from "./bridge/http-bridge.ts";
export * from "./bridge/in-memory-bridge.ts";

export * from "./spreadsheet/a1.ts";
export * from "./spreadsheet/types.ts";
