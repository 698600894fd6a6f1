import { config, hasGoogleConfig, hasSheetConfig } from "./config.js";
import { logger } from "./lib/logger.js";
import { TrackerStore } from "./lib/store.js";
import {
  GmailMailboxSource,
  UnconfiguredMailboxSource,
  createGmailClient,
  credentialsFromConfig,
} from "./services/gmailService.js";
import { createOllamaProvider } from "./services/ollamaService.js";
import { GoogleSheetsSink, NullSink, createSheetsClient } from "./services/sheetSink.js";
import { SyncCoordinator, type PipelineDeps } from "./services/syncService.js";

export interface Runtime extends PipelineDeps {
  coordinator: SyncCoordinator;
  close: () => Promise<void>;
}

/** Wires the store, mailbox, classifier and sink from the environment. */
export const createRuntime = (): Runtime => {
  const store = new TrackerStore(config.DATABASE_PATH);
  const credentials = hasGoogleConfig ? credentialsFromConfig() : null;

  const mailbox = credentials ? new GmailMailboxSource(createGmailClient(credentials)) : new UnconfiguredMailboxSource();
  const provider = createOllamaProvider();
  const sink =
    credentials && hasSheetConfig
      ? new GoogleSheetsSink(createSheetsClient(credentials), config.SPREADSHEET_ID)
      : new NullSink();

  if (!credentials) {
    logger.warn("Google credentials missing; sync runs will fail until they are configured");
  }
  logger.info("Runtime ready", {
    database: config.DATABASE_PATH,
    classifier: provider.name,
    sink: sink.name,
  });

  const deps: PipelineDeps = { store, mailbox, provider, sink };
  const coordinator = new SyncCoordinator(deps);

  return {
    ...deps,
    coordinator,
    close: async () => {
      await coordinator.close();
      store.close();
    },
  };
};
