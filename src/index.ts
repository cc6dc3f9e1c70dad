/**
 * Main module for the codebase Q&A bot
 */

import "dotenv/config";
import { createBot } from "./bot.js";
import { SystemError, SystemErrorSubType, toError } from "./errors/index.js";
import {
  CodebaseSession,
  FileIndex,
  NodeFileSource,
  SessionRegistry,
  createReasoningEngine,
} from "./codebase/index.js";
import { createProviderChain, PROVIDER_MODELS } from "./llm/index.js";
import type { LLMCompletionProvider } from "./llm/types.js";
import type { Config } from "./types.js";
import { formatDuration, loadConfig, logger } from "./utils.js";
import { SimpleLimiter } from "./validation.js";

function createProviders(config: Config): {
  helper: LLMCompletionProvider;
  chat: LLMCompletionProvider;
} {
  const { llm } = config;
  const defaults = PROVIDER_MODELS[llm.provider];
  const shared = {
    openaiApiKey: llm.openaiApiKey,
    anthropicApiKey: llm.anthropicApiKey,
    ollamaUrl: llm.ollamaUrl,
    timeoutMs: llm.timeoutMs,
  };

  return {
    helper: createProviderChain(llm.provider, {
      ...shared,
      chatModel: llm.helperModel ?? defaults.helper,
    }),
    chat: createProviderChain(llm.provider, {
      ...shared,
      chatModel: llm.chatModel ?? defaults.chat,
    }),
  };
}

function loadStartupConfig(): Config {
  try {
    return loadConfig();
  } catch (error) {
    const cause = toError(error);
    throw new SystemError(
      `Invalid configuration: ${cause.message}`,
      SystemErrorSubType.CONFIG,
      undefined,
      cause
    );
  }
}

async function main(): Promise<void> {
  logger.info("Starting codebase Q&A bot...");

  try {
    const config = loadStartupConfig();
    const source = await NodeFileSource.open(config.projectPath);

    const indexStart = Date.now();
    const fileIndex = await FileIndex.build(config.projectPath, {
      previewChars: config.agent.previewChars,
      maxFileBytes: config.agent.maxFileBytes,
      maxDepth: config.agent.maxDepth,
      source,
    });
    logger.info(
      `Indexed ${fileIndex.size} files in ${formatDuration(Date.now() - indexStart)}`
    );

    const { helper, chat } = createProviders(config);
    const reasoning = createReasoningEngine(config, { helper, chat });
    logger.info(`Reasoning with ${helper.name} (answers: ${chat.name})`);

    const availability = await chat.checkAvailability();
    if (!availability.available) {
      logger.warn(
        `Language model is not reachable yet: ${availability.error ?? "unknown error"}`
      );
    }

    const sessions = new SessionRegistry(
      () =>
        new CodebaseSession({
          fileIndex,
          reader: source,
          reasoning,
          agent: config.agent,
        })
    );
    const rateLimiter = new SimpleLimiter(config.rateLimiter);

    const bot = createBot({ config, fileIndex, reader: source, sessions, rateLimiter });

    const shutdown = (signal: string): void => {
      logger.info(`Received ${signal}, stopping...`);
      rateLimiter.destroy();
      bot.stop().catch((error: unknown) => {
        logger.error("Error while stopping bot:", error);
      });
    };
    process.once("SIGINT", () => shutdown("SIGINT"));
    process.once("SIGTERM", () => shutdown("SIGTERM"));

    logger.info("Codebase Q&A bot is ready!");
    await bot.start().catch((error: unknown) => {
      const cause = toError(error);
      throw new SystemError(
        `Polling stopped: ${cause.message}`,
        SystemErrorSubType.STARTUP,
        undefined,
        cause
      );
    });
  } catch (error) {
    logger.error("Startup error:", error);
    process.exit(1);
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error) => {
    logger.error("Fatal error:", error);
    process.exit(1);
  });
}

export { main, createProviders, loadStartupConfig };
