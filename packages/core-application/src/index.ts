// Public API of the core-application package: ports, value objects,
// services and the Node adapters an application wires together.

// Ports (interfaces)
export * from "./ports/authority-record-store";
export * from "./ports/backup-store";
export * from "./ports/clock";
export * from "./ports/conflict-resolver";
export * from "./ports/deploy-confirmer";
export * from "./ports/logger";
export * from "./ports/remote-file-store";
export * from "./ports/retry-policy";
export * from "./ports/version-control-provider";
export * from "./ports/working-copy";

// Errors and retry
export * from "./application/errors";
export * from "./application/with-retry";
export * from "./infra/sleep";

// Value objects
export * from "./value-objects/classification";
export * from "./value-objects/deploy-outcome";
export * from "./value-objects/deploy-plan";

// Services
export * from "./services/authority-scanner";
export * from "./services/content-fingerprinter";
export * from "./services/deploy-executor";
export * from "./services/deploy-gatekeeper";
export * from "./services/normalized-diff";
export * from "./services/provenance-writer";
export * from "./services/reconcile-service";
export * from "./services/report-formatter";
export * from "./services/state-classifier";

// Configuration
export * from "./config/ftp-config";

// Node adapters
export * from "./adapters/basic-ftp-remote-file-store";
export * from "./adapters/console-logger";
export * from "./adapters/git-version-control-provider";
export * from "./adapters/node-authority-record-store";
export * from "./adapters/node-backup-store";
export * from "./adapters/node-working-copy";
export * from "./adapters/readline-operator-prompt";
export * from "./adapters/run-lock";
export * from "./adapters/system-clock";
