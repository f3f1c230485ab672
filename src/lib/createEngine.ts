/**
 * Wires the engine components for one configuration
 */

import { IFilesystemInspector } from "../interfaces/IFilesystemInspector";
import { IMessageProvider } from "../interfaces/IMessageProvider";
import { InteractivePrompt } from "../interfaces/IOverwriteResolver";
import { IRecoverableDeleteStore } from "../interfaces/IRecoverableDeleteStore";
import { ProgressSink } from "../interfaces/ITransferExecutor";
import { AuditLogger, silentLogger } from "./AuditLogger";
import { BatchOrchestrator } from "./BatchOrchestrator";
import { ChecksumManager } from "./ChecksumManager";
import { EngineConfig } from "./ConfigLoader";
import { FilesystemInspector } from "./FilesystemInspector";
import { MessageProvider } from "./MessageProvider";
import { PathValidator } from "./PathValidator";
import { TransferExecutor } from "./TransferExecutor";
import { TransferStrategySelector } from "./TransferStrategySelector";
import { TrashStore } from "./TrashStore";

export interface EngineCollaborators {
  prompt: InteractivePrompt;
  sink?: ProgressSink;
  messages?: IMessageProvider;
  logger?: AuditLogger;
  /** Replaces the real device and disk-space queries */
  inspector?: IFilesystemInspector;
  trash?: IRecoverableDeleteStore;
}

/**
 * Create a batch orchestrator
 *
 * @example
 * ```typescript
 * const config = await ConfigLoader.loadConfig();
 * const engine = createEngine(config, { prompt: new ScriptedPrompt(["a"]) });
 * const summary = await engine.run(request);
 * ```
 */
export function createEngine(
  config: EngineConfig,
  collaborators: EngineCollaborators
): BatchOrchestrator {
  const logger = collaborators.logger ?? silentLogger;
  const messages = collaborators.messages ?? new MessageProvider();
  const inspector = collaborators.inspector ?? new FilesystemInspector();
  const trash = collaborators.trash ?? new TrashStore(config.trashDir, logger);
  const selector = new TransferStrategySelector(inspector, trash, config);

  const executor = new TransferExecutor(
    {
      selector,
      inspector,
      trash,
      checksums: new ChecksumManager(),
      messages,
      logger,
    },
    config
  );

  return new BatchOrchestrator(
    {
      validator: new PathValidator(),
      selector,
      executor,
      trash,
      prompt: collaborators.prompt,
      messages,
      logger,
      sink: collaborators.sink ?? {},
    },
    config
  );
}
