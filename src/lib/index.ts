/**
 * Core library exports for fops
 */

export * from "./AuditLogger";
export * from "./BatchOrchestrator";
export * from "./ChecksumManager";
export * from "./CommandLine";
export * from "./ConfigLoader";
export * from "./ConsoleReporter";
export * from "./createEngine";
export * from "./ErrorHandler";
export * from "./FilesystemInspector";
export * from "./MessageProvider";
export * from "./OverwriteResolver";
export * from "./PathValidator";
export * from "./RequestSchema";
export * from "./ScriptedPrompt";
export * from "./TerminalPrompt";
export * from "./TransferExecutor";
export * from "./TransferStrategySelector";
export * from "./TrashStore";
