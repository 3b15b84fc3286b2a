export * from "./entities/file-record";
export * from "./entities/snapshot";
export * from "./entities/change-set";
export * from "./entities/operation-set";
export * from "./value-objects/relative-path";
