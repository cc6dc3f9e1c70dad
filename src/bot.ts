/**
 * Telegram bot for codebase questions
 */

import { Bot, Context, InputFile } from "grammy";
import { authMiddleware, createAuthService } from "./auth.js";
import {
  searchFiles,
  type FileIndex,
  type FileReader,
  type QueryOutcome,
  type SessionRegistry,
} from "./codebase/index.js";
import { createDefaultErrorHandler, toError } from "./errors/index.js";
import { CONSTANTS, type Config } from "./types.js";
import {
  analysisFileName,
  createSummary,
  formatAnalysisDocument,
  formatDuration,
  logger,
  splitMessage,
} from "./utils.js";
import {
  SimpleLimiter,
  isSpamMessage,
  sanitizeMessage,
  validatePathArgument,
  validateSearchTerm,
  validateUserMessage,
} from "./validation.js";

const BOT_START_TIME = Math.floor(Date.now() / 1000);

const TREE_MAX_DIRECTORIES = 20;
const TREE_MAX_FILES_PER_DIRECTORY = 5;
const HISTORY_PREVIEW_LENGTH = 120;

export interface BotDependencies {
  readonly config: Config;
  readonly fileIndex: FileIndex;
  readonly reader: FileReader;
  readonly sessions: SessionRegistry;
  /** Created from config.rateLimiter when omitted */
  readonly rateLimiter?: SimpleLimiter | undefined;
}

export const HELP_TEXT = [
  "📖 Commands",
  "",
  "/ls [path] - list indexed files, optionally under a directory",
  "/tree - show the directory layout",
  "/search <term> - find files containing a term",
  "/read <file> - show a file",
  "/memory - list files cached for this chat",
  "/clear - clear the file cache",
  "/history - show recent questions",
  "/forget - clear the cache and the conversation",
  "/help - show this help",
  "",
  '💬 Any other message is a question, e.g. "How is the config loaded?"',
].join("\n");

async function replyLong(ctx: Context, text: string): Promise<void> {
  for (const chunk of splitMessage(text)) {
    await ctx.reply(chunk);
  }
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

function baseName(path: string): string {
  return path.substring(path.lastIndexOf("/") + 1);
}

export function formatFileList(
  title: string,
  paths: readonly string[],
  limit: number
): string {
  const lines = [title, ...paths.slice(0, limit).map((path) => `  ${path}`)];
  if (paths.length > limit) {
    lines.push(`  ... and ${paths.length - limit} more files`);
  }
  return lines.join("\n");
}

export function formatTree(fileIndex: FileIndex): string {
  const view = fileIndex.tree(TREE_MAX_DIRECTORIES, TREE_MAX_FILES_PER_DIRECTORY);
  const lines = ["🌳 Directory structure:"];

  for (const group of view.groups) {
    lines.push(group.directory ? `  ${group.directory}/` : "  /");
    for (const file of group.files) {
      lines.push(`    ${file}`);
    }
    if (group.hiddenFiles > 0) {
      lines.push(`    ... and ${group.hiddenFiles} more files`);
    }
  }
  if (view.hiddenDirectories > 0) {
    lines.push(`  ... and ${view.hiddenDirectories} more directories`);
  }
  return lines.join("\n");
}

/** Text reply for a query outcome, without the attachment */
export function formatOutcome(outcome: QueryOutcome, durationMs: number): string {
  if (outcome.status === "failed") {
    const partial =
      outcome.analyzedFiles.length > 0
        ? `\n\n📁 Analyzed before stopping: ${outcome.analyzedFiles.join(", ")}`
        : "";
    return `⚠️ Could not complete analysis: ${outcome.reason}${partial}`;
  }

  const { result } = outcome;
  const source =
    result.action === "DIRECT"
      ? "💡 Answered from general knowledge"
      : result.analyzedFiles.length > 0
        ? `📁 ${result.action === "USE_MEMORY" ? "From memory" : "Analyzed"}: ${result.analyzedFiles.join(", ")}`
        : "📁 No relevant files were found";

  return `${result.answer}\n\n${source}\n⏱️ Time: ${formatDuration(durationMs)}`;
}

async function deleteStatusMessage(ctx: Context, messageId: number): Promise<void> {
  const chatId = ctx.chat?.id;
  if (chatId === undefined) return;
  await ctx.api.deleteMessage(chatId, messageId).catch((error: unknown) => {
    logger.debug(`Could not delete status message: ${toError(error).message}`);
  });
}

export function createBot(deps: BotDependencies): Bot {
  const { config, fileIndex, reader, sessions } = deps;
  const rateLimiter = deps.rateLimiter ?? new SimpleLimiter(config.rateLimiter);
  const errorHandler = createDefaultErrorHandler();

  const bot = new Bot(config.telegramToken);

  bot.catch(async (err) => {
    logger.error("Bot error:", err.error);
    const { userMessage } = errorHandler.handle(err.error);
    await err.ctx.reply(userMessage).catch((replyError: unknown) => {
      logger.error("Failed to send error reply:", replyError);
    });
  });

  bot.use(authMiddleware(createAuthService(config.authorizedUsers)));

  bot.command("start", async (ctx) => {
    const username = sanitizeMessage(ctx.from?.first_name || "user").substring(0, 50);
    await ctx.reply(
      `👋 Hello, ${username}!\n\n` +
        `🤖 I answer questions about a codebase of ${plural(fileIndex.size, "file")}.\n\n` +
        "📝 Send your question as a text message, or /help for commands."
    );
  });

  bot.command("help", async (ctx) => {
    await ctx.reply(HELP_TEXT);
  });

  bot.command("ls", async (ctx) => {
    const path = validatePathArgument(ctx.match);
    if (!path.success) {
      await ctx.reply(`❌ ${path.error}`);
      return;
    }

    const records = fileIndex.listDirectory(path.data);
    const label = path.data || "/";
    if (records.length === 0) {
      await ctx.reply(`No files found in '${label}'`);
      return;
    }

    await replyLong(
      ctx,
      formatFileList(
        `📂 Files in '${label}' (${records.length}):`,
        records.map((record) => `${record.path} (${plural(record.lineCount, "line")})`),
        CONSTANTS.LIST_LIMIT
      )
    );
  });

  bot.command("tree", async (ctx) => {
    await replyLong(ctx, formatTree(fileIndex));
  });

  bot.command("search", async (ctx) => {
    const term = validateSearchTerm(ctx.match);
    if (!term.success) {
      await ctx.reply(term.error === "Search term cannot be empty" ? "Usage: /search <term>" : `❌ ${term.error}`);
      return;
    }

    const matches = await searchFiles(fileIndex, reader, term.data);
    if (matches.length === 0) {
      await ctx.reply(`No files found containing '${term.data}'`);
      return;
    }

    await replyLong(
      ctx,
      formatFileList(
        `🔎 Found '${term.data}' in ${plural(matches.length, "file")}:`,
        matches,
        CONSTANTS.SEARCH_RESULT_LIMIT
      )
    );
  });

  bot.command("read", async (ctx) => {
    if (!ctx.match.trim()) {
      await ctx.reply("Usage: /read <file>");
      return;
    }

    const path = validatePathArgument(ctx.match);
    if (!path.success) {
      await ctx.reply(`❌ ${path.error}`);
      return;
    }

    const record = fileIndex.lookup(path.data);
    if (!record) {
      await ctx.reply(`File not found: ${path.data}`);
      return;
    }

    const content = await reader.readFull(record.path);
    if (content.length <= CONSTANTS.ATTACHMENT_THRESHOLD) {
      await ctx.reply(`--- ${record.path} ---\n${content}\n--- End of ${record.path} ---`);
      return;
    }

    await ctx.replyWithDocument(
      new InputFile(Buffer.from(content, "utf8"), baseName(record.path)),
      { caption: `📄 ${record.path} (${plural(record.lineCount, "line")})` }
    );
  });

  bot.command("memory", async (ctx) => {
    const paths = sessions.get(ctx.chat.id).cachedPaths();
    if (paths.length === 0) {
      await ctx.reply("No files in memory cache.");
      return;
    }
    await replyLong(
      ctx,
      formatFileList(`🧠 Cached files (${paths.length}):`, paths, CONSTANTS.LIST_LIMIT)
    );
  });

  bot.command("clear", async (ctx) => {
    const removed = await sessions.get(ctx.chat.id).wipeCache();
    logger.info(`Chat ${ctx.chat.id} cleared its file cache`);
    await ctx.reply(`🧹 Memory cache cleared (${plural(removed, "file")} removed).`);
  });

  bot.command("history", async (ctx) => {
    const entries = sessions.get(ctx.chat.id).historyEntries();
    if (entries.length === 0) {
      await ctx.reply("No questions yet.");
      return;
    }
    const lines = entries.map(
      (entry, i) =>
        `${i + 1}. ${createSummary(entry.query, HISTORY_PREVIEW_LENGTH)}\n   → ${createSummary(entry.answer, HISTORY_PREVIEW_LENGTH)}`
    );
    await replyLong(ctx, `🕘 Recent questions:\n${lines.join("\n")}`);
  });

  bot.command("forget", async (ctx) => {
    await sessions.get(ctx.chat.id).reset();
    logger.info(`Chat ${ctx.chat.id} reset its session`);
    await ctx.reply("🧹 Conversation and file cache cleared.");
  });

  bot.on("message:text", async (ctx) => {
    const userId = ctx.from.id;

    if (ctx.message.date < BOT_START_TIME) {
      return;
    }

    if (ctx.message.text.startsWith("/")) {
      await ctx.reply("Unknown command. Type /help for available commands.");
      return;
    }

    if (isSpamMessage(userId, rateLimiter)) {
      const waitMs = rateLimiter.getTimeUntilReset(userId);
      await ctx.reply(`⏳ Too many requests. Try again in ${formatDuration(waitMs)}.`);
      return;
    }

    const messageValidation = validateUserMessage(ctx.message.text);
    if (!messageValidation.success) {
      await ctx.reply(`❌ ${messageValidation.error}`);
      return;
    }

    const question = sanitizeMessage(messageValidation.data);
    logger.info(
      `Request from ${userId} in chat ${ctx.chat.id}: "${createSummary(question, 100)}"`
    );

    const status = await ctx.reply("⏳ Analyzing...");
    const startTime = Date.now();

    let outcome: QueryOutcome;
    try {
      outcome = await sessions.get(ctx.chat.id).ask(question);
    } finally {
      await deleteStatusMessage(ctx, status.message_id);
    }

    const duration = Date.now() - startTime;
    const text = formatOutcome(outcome, duration);

    if (outcome.status === "failed" || text.length <= CONSTANTS.ATTACHMENT_THRESHOLD) {
      await replyLong(ctx, text);
      return;
    }

    const { result } = outcome;
    await ctx.reply(
      `✅ Analysis completed\n\n${createSummary(result.answer)}\n\n` +
        `📄 Full answer attached.\n⏱️ Time: ${formatDuration(duration)}`
    );
    const document = formatAnalysisDocument(question, result.answer, result.analyzedFiles);
    await ctx.replyWithDocument(
      new InputFile(Buffer.from(document, "utf8"), analysisFileName(question))
    );
  });

  bot.on("message", async (ctx) => {
    await ctx.reply("❌ Only text messages supported.");
  });

  logger.debug("Bot created");
  return bot;
}
