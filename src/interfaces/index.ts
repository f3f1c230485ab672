/**
 * Core interfaces for the fops engine
 */

export * from "./IOperationRequest";
export * from "./IPathValidator";
export * from "./IOverwriteResolver";
export * from "./ITransferStrategySelector";
export * from "./ITransferExecutor";
export * from "./IBatchOrchestrator";
export * from "./IFilesystemInspector";
export * from "./IChecksumManager";
export * from "./IRecoverableDeleteStore";
export * from "./IMessageProvider";
