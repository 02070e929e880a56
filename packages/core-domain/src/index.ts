export * from "./entities/fingerprint";
export * from "./entities/authority-record";
export * from "./entities/status";
export * from "./entities/conflict";
export * from "./value-objects/remote-path";
