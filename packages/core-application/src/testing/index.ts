// In-process stand-ins for the ports, for tests only.
export * from "./fixed-clock";
export * from "./in-memory-authority-record-store";
export * from "./in-memory-backup-store";
export * from "./in-memory-remote-file-store";
export * from "./in-memory-version-control";
export * from "./in-memory-working-copy";
export * from "./memory-logger";
export * from "./scripted-operator";
