import {
  API_CONSTANTS,
  Api,
  Bot,
  BotConfig,
  Context,
  GrammyError,
  HttpError,
  InlineKeyboard,
  InputFile,
  StorageAdapter,
  session,
} from 'grammy';
import { autoRetry } from '@grammyjs/auto-retry';
import { hydrate, HydrateFlavor } from '@grammyjs/hydrate';
import { parseMode } from '@grammyjs/parse-mode';
import { run, RunnerHandle, sequentialize } from '@grammyjs/runner';
import { MongoDBAdapter } from '@grammyjs/storage-mongodb';
import { apiThrottler } from '@grammyjs/transformer-throttler';
import { Chat, User, UserFromGetMe, WebhookInfo } from 'grammy/types';
import { config, isAdmin } from '../common/config.js';
import { BotError, FileTooLargeError, UnsupportedFileError } from '../common/errors.js';
import logger from '../common/logger.js';
import {
  ANSWER_LETTERS,
  FILE_TYPE,
  INTENT,
  MESSAGE_TYPE,
  MessageType,
  isAnswerLetter,
} from '../common/message-types.js';
import { databaseConnection } from '../database/connection.js';
import { database } from '../database/index.js';
import { TurnContextData } from '../database/models/Conversation.js';
import { StoredFile } from '../database/models/StoredFile.js';
import { escapeHtml, truncate } from '../utils/html.js';
import { markdownToTelegramHtml } from '../utils/markdown-to-telegram-html.js';
import { splitMessage } from '../utils/split-message.js';
import { AiService } from './ai.service.js';
import {
  GENERIC_ERROR,
  HELP_MESSAGE,
  MEMORY_TURNS,
  formatAttemptResult,
  formatFileList,
  formatFileMatches,
  formatMemory,
  formatQuizCreated,
  formatQuizList,
  formatUserStats,
  getGroupWelcome,
  getStartMessage,
} from './bot-messages.js';
import { ContextService } from './context.service.js';
import { FileService } from './file.service.js';
import {
  GroupChatGateway,
  GroupService,
  InlineButton,
  formatLeaderboard,
  formatSettings,
} from './group.service.js';
import { ImageSolverService } from './image-solver.service.js';
import { OcrService } from './ocr.service.js';
import { PersonalQuizState, QuizService, formatQuestion, formatQuiz } from './quiz.service.js';

export interface SessionData {
  personalQuiz?: PersonalQuizState;
}

export type BotContext = HydrateFlavor<Context & { session: SessionData }>;

export type TelegramBotOptions = Pick<BotConfig<BotContext>, 'botInfo' | 'client'> & {
  // MongoDB-backed when omitted
  sessionStorage?: StorageAdapter<SessionData>;
};

const SOLVABLE_IMAGE_TYPES = new Set(['image/jpeg', 'image/png', 'image/webp', 'image/gif', 'image/tiff']);
// leaves room for the caption heading within Telegram's 1024 characters
const MAX_CAPTION_ANSWER = 900;
const DOWNLOAD_TIMEOUT_MS = 60_000;
const MAX_SENT_FILES = 5;
const MAX_LISTED_FILES = 10;
const MAX_QUIZ_BUTTONS = 5;

const displayName = (user: User): string => user.first_name || user.username || 'Student';

const isGroupChat = (chat: Chat | undefined): chat is Chat.GroupChat | Chat.SupergroupChat =>
  chat?.type === 'group' || chat?.type === 'supergroup';

/**
 * Each member of a chat gets their own session, so a personal quiz
 * started in a group only takes its owner's answers.
 */
export const sessionKey = (ctx: Context): string | undefined =>
  ctx.chat && ctx.from ? `${ctx.chat.id}:${ctx.from.id}` : undefined;

const toInlineKeyboard = (rows: InlineButton[][]): InlineKeyboard =>
  InlineKeyboard.from(rows.map((row) => row.map((b) => InlineKeyboard.text(b.text, b.data))));

const personalAnswerKeyboard = (state: PersonalQuizState): InlineKeyboard =>
  InlineKeyboard.from([
    ANSWER_LETTERS.map((letter) =>
      InlineKeyboard.text(letter, `quiz:ans:${state.quizId}:${state.index}:${letter}`),
    ),
  ]);

const fileKeyboard = (files: StoredFile[]): InlineKeyboard =>
  InlineKeyboard.from(
    files.flatMap((file) => {
      if (!file._id) return [];
      const id = file._id.toHexString();
      const row = [InlineKeyboard.text(`🗑 ${truncate(file.fileName, 30)}`, `file:del:${id}`)];
      if (file.fileType === FILE_TYPE.PDF) {
        row.push(InlineKeyboard.text('🧠 Quiz', `file:quiz:${id}`));
      }
      return [row];
    }),
  );

/**
 * Group quiz messages go out through the bot API so the throttler and
 * HTML parse mode apply to them too.
 */
class TelegramGroupGateway implements GroupChatGateway {
  constructor(private readonly api: Api) {}

  async send(chatId: number, html: string, keyboard?: InlineButton[][]): Promise<number> {
    const sent = await this.api.sendMessage(
      chatId,
      html,
      keyboard ? { reply_markup: toInlineKeyboard(keyboard) } : {},
    );
    return sent.message_id;
  }

  async clearKeyboard(chatId: number, messageId: number): Promise<void> {
    try {
      await this.api.editMessageReplyMarkup(chatId, messageId, {
        reply_markup: new InlineKeyboard(),
      });
    } catch (error) {
      logger.warn({ error, chatId, messageId }, 'Failed to clear quiz keyboard');
    }
  }
}

export class TelegramBotService {
  private readonly bot: Bot<BotContext>;
  private readonly aiService: AiService;
  private readonly contextService: ContextService;
  private readonly fileService: FileService;
  private readonly quizService: QuizService;
  private readonly imageSolver: ImageSolverService;
  private readonly groupService: GroupService;
  private botUsername: string = '';
  private runner: RunnerHandle | null = null;
  private polling: Promise<void> | null = null;

  constructor(private readonly options: TelegramBotOptions = {}) {
    this.bot = new Bot<BotContext>(config.telegram.botToken, {
      botInfo: options.botInfo,
      client: options.client,
    });
    this.aiService = new AiService();
    this.contextService = new ContextService();
    this.fileService = new FileService();
    this.quizService = new QuizService(this.aiService);
    this.imageSolver = new ImageSolverService(this.aiService, new OcrService(this.aiService));
    this.groupService = new GroupService(new TelegramGroupGateway(this.bot.api));
    this.botUsername = options.botInfo?.username ?? '';
    this.setupMiddleware();
    this.setupHandlers();
  }

  private setupMiddleware(): void {
    this.bot.api.config.use(autoRetry());

    this.bot.api.config.use(apiThrottler());

    this.bot.use(hydrate());

    this.bot.api.config.use(parseMode('HTML'));

    const storage =
      this.options.sessionStorage ??
      new MongoDBAdapter<SessionData>({
        collection: databaseConnection.getDb().collection('sessions'),
      });

    // the runner handles updates concurrently; one session key at a time
    this.bot.use(sequentialize(sessionKey));

    this.bot.use(
      session({
        initial: (): SessionData => ({}),
        storage,
        getSessionKey: sessionKey,
      }),
    );

    this.bot.catch((err) => {
      const ctx = err.ctx;
      logger.error(
        {
          error: err.error,
          chatId: ctx.chat?.id,
          userId: ctx.from?.id,
          updateId: ctx.update.update_id,
        },
        'Bot error occurred',
      );

      if (err.error instanceof GrammyError) {
        logger.error(err.error.description, 'Error in request');
      } else if (err.error instanceof HttpError) {
        logger.error(err.error, 'Could not contact Telegram');
      } else {
        logger.error(err.error, 'Unknown error');
      }
    });

    this.bot.use(async (ctx, next) => {
      const start = Date.now();

      logger.info(
        {
          updateType: ctx.message ? 'message' : ctx.callbackQuery ? 'callback_query' : 'other',
          chatId: ctx.chat?.id,
          userId: ctx.from?.id,
          username: ctx.from?.username,
          chatType: ctx.chat?.type,
        },
        'Processing update',
      );

      await next();

      const duration = Date.now() - start;
      logger.info({ duration }, 'Update processed');
    });

    // every human sender is registered and counted
    this.bot.on('message', async (ctx, next) => {
      const from = ctx.from;
      if (from && !from.is_bot) {
        await this.trackUser(from);
        if (isGroupChat(ctx.chat)) {
          await this.groupService.addMember(ctx.chat.id, from.id, displayName(from));
        }
      }
      await next();
    });
  }

  private setupHandlers(): void {
    this.bot.command('start', (ctx) =>
      this.guard(ctx, 'start', async () => {
        if (!ctx.from) return;
        await database.getUserContextModel().ensureContext(ctx.from.id);
        await this.recordCommand(ctx);
        await this.replyAndRecord(ctx, getStartMessage(displayName(ctx.from)));
      }),
    );

    this.bot.command('help', (ctx) =>
      this.guard(ctx, 'help', async () => {
        await this.recordCommand(ctx);
        await this.replyAndRecord(ctx, HELP_MESSAGE);
      }),
    );

    this.bot.command('memory', (ctx) =>
      this.guard(ctx, 'memory', async () => {
        if (!ctx.from) return;
        const history = await database.getConversationModel().getHistory(ctx.from.id, MEMORY_TURNS);
        await ctx.reply(formatMemory(history));
      }),
    );

    this.bot.command('notes', (ctx) =>
      this.guard(ctx, 'notes', async () => {
        if (!ctx.from) return;
        await this.recordCommand(ctx);
        const matches = await this.fileService.findRelevantFiles(ctx.from.id, ctx.match.trim());
        await this.replyAndRecord(ctx, formatFileMatches(matches));
        await this.sendStoredFiles(ctx, matches.map((m) => m.file));
      }),
    );

    this.bot.command('files', (ctx) =>
      this.guard(ctx, 'files', async () => {
        if (!ctx.from) return;
        const files = (await this.fileService.listFiles(ctx.from.id)).slice(0, MAX_LISTED_FILES);
        await ctx.reply(formatFileList(files), files.length > 0 ? { reply_markup: fileKeyboard(files) } : {});
      }),
    );

    this.bot.command('tag', (ctx) =>
      this.guard(ctx, 'tag', async () => {
        if (!ctx.from) return;
        const [fileId, ...tags] = ctx.match.trim().split(/[\s,]+/).filter((t) => t.length > 0);
        if (!fileId || tags.length === 0) {
          await ctx.reply('Usage: /tag &lt;fileId&gt; &lt;tag1&gt; &lt;tag2&gt;');
          return;
        }
        const applied = await this.fileService.tagFile(ctx.from.id, fileId, tags);
        await ctx.reply(
          applied
            ? `🏷 Tags saved: ${applied.map((t) => `#${escapeHtml(t)}`).join(' ')}`
            : '❌ File nahi mili. /files se sahi id copy karo.',
        );
      }),
    );

    this.bot.command('quiz', (ctx) =>
      this.guard(ctx, 'quiz', async () => {
        if (!ctx.from || !ctx.chat) return;
        if (isGroupChat(ctx.chat)) {
          await this.groupService.start(ctx.chat.id, { id: ctx.from.id, name: displayName(ctx.from) });
          return;
        }

        const quiz = await database.getQuizModel().latestByOwner(ctx.from.id);
        if (!quiz?._id) {
          await ctx.reply('📝 <b>Abhi koi quiz nahi hai!</b>\n\nPDF bhejo, main quiz bana dungi.');
          return;
        }
        await this.startPersonalQuiz(ctx, quiz._id.toHexString());
      }),
    );

    this.bot.command('myquizzes', (ctx) =>
      this.guard(ctx, 'myquizzes', async () => {
        if (!ctx.from) return;
        const quizzes = await database.getQuizModel().listByOwner(ctx.from.id);
        const keyboard = InlineKeyboard.from(
          quizzes
            .slice(0, MAX_QUIZ_BUTTONS)
            .flatMap((quiz) =>
              quiz._id
                ? [[InlineKeyboard.text(`▶️ ${truncate(quiz.title, 30)}`, `quiz:start:${quiz._id.toHexString()}`)]]
                : [],
            ),
        );
        await ctx.reply(formatQuizList(quizzes), quizzes.length > 0 ? { reply_markup: keyboard } : {});
      }),
    );

    this.bot.command('stats', (ctx) =>
      this.guard(ctx, 'stats', async () => {
        if (!ctx.from) return;
        const [stats, quizStats, files, summary] = await Promise.all([
          database.getUserStats(ctx.from.id),
          this.quizService.getUserQuizStats(ctx.from.id),
          this.fileService.getFileStats(ctx.from.id),
          this.contextService.summarizeConversation(ctx.from.id),
        ]);
        await ctx.reply(formatUserStats(stats, quizStats, files, summary));
      }),
    );

    this.bot.command('leaderboard', (ctx) =>
      this.guard(ctx, 'leaderboard', async () => {
        if (!ctx.chat) return;
        if (!isGroupChat(ctx.chat)) {
          await ctx.reply('🏆 Leaderboard sirf groups me hai. Mujhe kisi group me add karo!');
          return;
        }
        const [entries, members] = await Promise.all([
          this.groupService.getLeaderboard(ctx.chat.id),
          this.groupService.countMembers(ctx.chat.id),
        ]);
        await ctx.reply(`${formatLeaderboard(entries)}\n\n👥 Group members: ${members}`);
      }),
    );

    this.bot.command('quizsettings', (ctx) =>
      this.guard(ctx, 'quizsettings', async () => {
        if (!ctx.chat || !isGroupChat(ctx.chat)) return;
        const args = ctx.match.trim().split(/\s+/).filter((a) => a.length > 0);
        if (args.length === 0) {
          await ctx.reply(formatSettings(await this.groupService.getSettings(ctx.chat.id)));
          return;
        }
        if (!(await this.isGroupAdmin(ctx))) {
          await ctx.reply('⛔ Sirf group admins settings badal sakte hai.');
          return;
        }
        if (this.groupService.isActive(ctx.chat.id)) {
          await ctx.reply('⏳ Quiz chal raha hai. Khatam hone ke baad settings badlo.');
          return;
        }
        const chat = ctx.chat;
        const update = await this.groupService.updateSettings({ id: chat.id, title: chat.title, type: chat.type }, args);
        const errors = update.errors.map((e) => `⚠️ ${escapeHtml(e)}`).join('\n');
        await ctx.reply(`${formatSettings(update.settings)}${errors ? `\n\n${errors}` : ''}`);
      }),
    );

    this.bot.command('stopquiz', (ctx) =>
      this.guard(ctx, 'stopquiz', async () => {
        if (!ctx.chat || !isGroupChat(ctx.chat)) return;
        if (!(await this.isGroupAdmin(ctx))) {
          await ctx.reply('⛔ Sirf group admins quiz band kar sakte hai.');
          return;
        }
        if (!(await this.groupService.stop(ctx.chat.id))) {
          await ctx.reply('🤷 Koi active quiz nahi hai.');
        }
      }),
    );

    // --- Admin-only commands (private chats only) ---
    this.bot.command('cleanup', (ctx) =>
      this.guard(ctx, 'cleanup', async () => {
        if (ctx.chat?.type !== 'private' || !isAdmin(ctx.from?.id)) return;
        const requested = parseInt(ctx.match.trim(), 10);
        const days = Number.isFinite(requested) && requested > 0 ? requested : config.memory.retentionDays;
        const cutoff = new Date(Date.now() - days * 24 * 60 * 60 * 1000);
        const deleted = await database.getConversationModel().deleteOlderThan(cutoff);
        logger.info({ days, deleted }, 'Conversation cleanup finished');
        await ctx.reply(`🧹 ${deleted} messages deleted (older than ${days} days).`);
      }),
    );

    this.bot.command('botstats', (ctx) =>
      this.guard(ctx, 'botstats', async () => {
        if (ctx.chat?.type !== 'private' || !isAdmin(ctx.from?.id)) return;
        const stats = await database.getBotStats();
        await ctx.reply(
          [
            '<b>Bot Stats</b>',
            `• <b>Users:</b> ${stats.users}`,
            `• <b>Conversation turns:</b> ${stats.turns}`,
            `• <b>Files:</b> ${stats.files}`,
            `• <b>Quizzes:</b> ${stats.quizzes}`,
            `• <b>Active groups:</b> ${stats.groups}`,
          ].join('\n'),
        );
      }),
    );

    this.bot.callbackQuery(/^quiz:start:([0-9a-f]{24})$/, (ctx) =>
      this.guard(ctx, 'quiz start', async () => {
        await ctx.answerCallbackQuery();
        await this.startPersonalQuiz(ctx, ctx.match[1] ?? '');
      }),
    );

    this.bot.callbackQuery(/^quiz:ans:([0-9a-f]{24}):(\d+):([A-D])$/, (ctx) =>
      this.guard(ctx, 'quiz answer', () =>
        this.handlePersonalAnswer(ctx, ctx.match[1] ?? '', Number(ctx.match[2]), ctx.match[3] ?? ''),
      ),
    );

    this.bot.callbackQuery(/^quiz:key:([0-9a-f]{24})$/, (ctx) =>
      this.guard(ctx, 'quiz answer key', async () => {
        await ctx.answerCallbackQuery();
        const attempt = await database
          .getQuizAttemptModel()
          .findById(ctx.match[1] ?? '', ctx.callbackQuery.from.id);
        if (!attempt) {
          await ctx.reply('❌ Quiz nahi mila.');
          return;
        }
        for (const piece of splitMessage(formatQuiz({ title: attempt.quizTitle, questions: attempt.questions }, true))) {
          await ctx.reply(piece);
        }
      }),
    );

    this.bot.callbackQuery('gq:join', (ctx) =>
      this.guard(ctx, 'group quiz join', async () => {
        const from = ctx.callbackQuery.from;
        if (!ctx.chat) return;
        const result = this.groupService.join(ctx.chat.id, { id: from.id, name: displayName(from) });
        const texts = {
          joined: '✅ Joined! Best of luck 🍀',
          already_joined: '👍 Tum already joined ho',
          no_quiz: '⌛ Ye quiz khatam ho chuka hai',
        };
        await ctx.answerCallbackQuery({ text: texts[result] });
      }),
    );

    this.bot.callbackQuery(/^gq:ans:(\d+):([A-D])$/, (ctx) =>
      this.guard(ctx, 'group quiz answer', async () => {
        const letter = ctx.match[2] ?? '';
        if (!ctx.chat || !isAnswerLetter(letter)) return;
        const result = this.groupService.answer(
          ctx.chat.id,
          ctx.callbackQuery.from.id,
          Number(ctx.match[1]),
          letter,
        );
        const texts = {
          accepted: `📝 Answer ${letter} lock ho gaya!`,
          already_answered: '✋ Ek question ka ek hi answer',
          not_joined: '🙋 Pehle quiz join karo',
          stale: '⌛ Ye question band ho chuka hai',
          no_quiz: '⌛ Koi active quiz nahi hai',
        };
        await ctx.answerCallbackQuery({ text: texts[result] });
      }),
    );

    this.bot.callbackQuery(/^file:del:([0-9a-f]{24})$/, (ctx) =>
      this.guard(ctx, 'file delete', async () => {
        const userId = ctx.callbackQuery.from.id;
        const deleted = await this.fileService.deleteFile(userId, ctx.match[1] ?? '');
        await ctx.answerCallbackQuery({ text: deleted ? '🗑 File deleted' : '❌ File nahi mili' });
        if (deleted) {
          const files = (await this.fileService.listFiles(userId)).slice(0, MAX_LISTED_FILES);
          await ctx.editMessageText(formatFileList(files), { reply_markup: fileKeyboard(files) });
        }
      }),
    );

    this.bot.callbackQuery(/^file:quiz:([0-9a-f]{24})$/, (ctx) =>
      this.guard(ctx, 'file quiz', async () => {
        await ctx.answerCallbackQuery();
        const userId = ctx.callbackQuery.from.id;
        const file = await this.fileService.getFile(userId, ctx.match[1] ?? '');
        if (!file || file.fileType !== FILE_TYPE.PDF) {
          await ctx.reply('❌ PDF nahi mili. /files se dobara try karo.');
          return;
        }
        await this.quizFromPdf(ctx, userId, await this.fileService.readFile(file), file);
      }),
    );

    this.bot.on('my_chat_member', (ctx) =>
      this.guard(ctx, 'chat member update', async () => {
        const update = ctx.myChatMember;
        const joined = ['member', 'administrator'].includes(update.new_chat_member.status);
        const wasOut = ['left', 'kicked'].includes(update.old_chat_member.status);
        if (update.chat.type !== 'group' && update.chat.type !== 'supergroup') return;
        if (!joined || !wasOut) return;

        await this.groupService.registerGroup(
          { id: update.chat.id, title: update.chat.title, type: update.chat.type },
          update.from.id,
        );
        await ctx.api.sendMessage(update.chat.id, getGroupWelcome(update.chat.title));
      }),
    );

    this.bot.on('message:text', (ctx) => this.guard(ctx, 'text message', () => this.handleText(ctx)));

    this.bot.on('message:photo', (ctx) =>
      this.guard(ctx, 'photo', async () => {
        const photo = ctx.message.photo[ctx.message.photo.length - 1];
        if (!photo) return;
        await this.solvePhoto(ctx, photo.file_id, 'image/jpeg', `photo_${photo.file_unique_id}.jpg`, photo.file_size);
      }),
    );

    this.bot.on('message:document', (ctx) =>
      this.guard(ctx, 'document', () => this.handleDocument(ctx)),
    );
  }

  /**
   * Runs a handler, answering domain errors with their own message and
   * anything else with a generic one.
   */
  private async guard(ctx: BotContext, label: string, handler: () => Promise<void>): Promise<void> {
    try {
      await handler();
    } catch (error) {
      const reply = error instanceof BotError ? error.userMessage : GENERIC_ERROR;
      if (error instanceof BotError) {
        logger.warn({ error: error.message, chatId: ctx.chat?.id, userId: ctx.from?.id }, `Rejected ${label}`);
      } else {
        logger.error({ error, chatId: ctx.chat?.id, userId: ctx.from?.id }, `Failed to handle ${label}`);
      }

      try {
        if (ctx.callbackQuery) {
          await ctx.answerCallbackQuery();
        }
        await this.replyAndRecord(ctx, reply);
      } catch (sendError) {
        logger.error(sendError, 'Failed to send error message');
      }
    }
  }

  private async trackUser(user: User): Promise<void> {
    const users = database.getTelegramUserModel();
    await users.upsertUser({
      telegramId: user.id,
      username: user.username,
      firstName: user.first_name,
      lastName: user.last_name,
      isBot: user.is_bot,
      isPremium: user.is_premium,
      languageCode: user.language_code,
    });
    await users.recordActivity(user.id);
  }

  private async recordTurn(
    ctx: BotContext,
    sender: 'user' | 'bot',
    text: string,
    messageType: MessageType,
    contextData?: TurnContextData,
  ): Promise<void> {
    if (!ctx.from || !ctx.chat) return;
    await database.getConversationModel().addTurn({
      userTelegramId: ctx.from.id,
      chatTelegramId: ctx.chat.id,
      sender,
      text,
      messageType,
      contextData,
    });
  }

  private async recordCommand(ctx: BotContext): Promise<void> {
    const text = ctx.message?.text;
    if (text) {
      await this.recordTurn(ctx, 'user', text, MESSAGE_TYPE.COMMAND);
    }
  }

  private async replyAndRecord(
    ctx: BotContext,
    html: string,
    extra: Parameters<BotContext['reply']>[1] = {},
    recordedText: string = html,
  ): Promise<void> {
    await ctx.reply(html, extra);
    await this.recordTurn(ctx, 'bot', recordedText, MESSAGE_TYPE.TEXT);
  }

  /**
   * AI answers can run past one message; each piece is converted on its own
   * so no tag spans two messages.
   */
  private async replyMarkdownAndRecord(ctx: BotContext, markdown: string): Promise<void> {
    for (const piece of splitMessage(markdown, markdownToTelegramHtml)) {
      await ctx.reply(markdownToTelegramHtml(piece));
    }
    await this.recordTurn(ctx, 'bot', markdown, MESSAGE_TYPE.TEXT);
  }

  private shouldRespond(ctx: BotContext, text: string): boolean {
    if (!isGroupChat(ctx.chat)) {
      return true;
    }
    if (this.botUsername && text.includes(`@${this.botUsername}`)) {
      return true;
    }
    return ctx.message?.reply_to_message?.from?.id === this.bot.botInfo.id;
  }

  private async handleText(ctx: BotContext): Promise<void> {
    const text = ctx.message?.text;
    if (!ctx.from || !text || text.startsWith('/') || !this.shouldRespond(ctx, text)) {
      return;
    }

    const userId = ctx.from.id;
    const name = displayName(ctx.from);
    const question = this.botUsername ? text.replaceAll(`@${this.botUsername}`, '').trim() : text;

    const history = await database.getConversationModel().getHistory(userId, config.memory.contextWindowSize);
    const analysis = await this.contextService.analyze(userId, question);
    await this.recordTurn(ctx, 'user', question, MESSAGE_TYPE.TEXT, {
      intent: analysis.intent,
      subject: analysis.subject,
    });

    switch (analysis.intent) {
      case INTENT.FILE_REQUEST: {
        const matches = await this.fileService.findRelevantFiles(userId, question);
        const intro = this.contextService.buildContextualReply(analysis, name, {
          fileCount: matches.length,
        });
        await this.replyAndRecord(ctx, matches.length > 0 ? `${intro}\n\n${formatFileMatches(matches)}` : intro);
        await this.sendStoredFiles(ctx, matches.map((m) => m.file));
        return;
      }
      case INTENT.QUIZ_REQUEST: {
        const quizzes = database.getQuizModel();
        const [quizCount, latest] = await Promise.all([
          quizzes.countByOwner(userId),
          quizzes.latestByOwner(userId),
        ]);
        const reply = this.contextService.buildContextualReply(analysis, name, { quizCount });
        await this.replyAndRecord(
          ctx,
          reply,
          latest?._id
            ? { reply_markup: new InlineKeyboard().text('▶️ Latest quiz start karo', `quiz:start:${latest._id.toHexString()}`) }
            : {},
        );
        return;
      }
      case INTENT.DOUBT_SOLVING: {
        await ctx.replyWithChatAction('typing');
        const answer = await this.aiService.answerDoubt(question, analysis.subject, history);
        await this.replyMarkdownAndRecord(ctx, answer);
        return;
      }
      case INTENT.THANKS:
      case INTENT.BEST_WISHES:
      case INTENT.GREETING:
        await this.replyAndRecord(ctx, this.contextService.buildContextualReply(analysis, name));
        return;
      case INTENT.GENERAL: {
        await ctx.replyWithChatAction('typing');
        const reply = await this.aiService.generateChatReply(history, question, name);
        await this.replyMarkdownAndRecord(ctx, reply);
        return;
      }
    }
  }

  private async handleDocument(ctx: BotContext): Promise<void> {
    const document = ctx.message?.document;
    if (!ctx.from || !document) return;

    const mimeType = document.mime_type;
    const fileName = document.file_name ?? `document_${document.file_unique_id}`;

    if (mimeType?.startsWith('image/')) {
      if (!SOLVABLE_IMAGE_TYPES.has(mimeType)) {
        throw new UnsupportedFileError(mimeType);
      }
      await this.solvePhoto(ctx, document.file_id, mimeType, fileName, document.file_size);
      return;
    }

    this.checkSize(document.file_size);
    await this.recordTurn(ctx, 'user', ctx.message?.caption ?? `[document] ${fileName}`, MESSAGE_TYPE.DOCUMENT);

    const data = await this.downloadFile(document.file_id);
    const { file, duplicate } = await this.fileService.storeFile({
      userId: ctx.from.id,
      fileName,
      data,
      mimeType,
      telegramFileId: document.file_id,
      description: ctx.message?.caption,
    });

    await this.replyAndRecord(
      ctx,
      duplicate
        ? `📁 <b>${escapeHtml(file.fileName)}</b> pehle se saved hai!`
        : `✅ <b>${escapeHtml(file.fileName)}</b> save ho gayi!\n📚 Subject: ${file.subject}`,
    );

    if (file.fileType === FILE_TYPE.PDF) {
      await this.quizFromPdf(ctx, ctx.from.id, data, file);
    }
  }

  private async quizFromPdf(ctx: BotContext, userId: number, data: Buffer, file: StoredFile): Promise<void> {
    const status = await ctx.reply('🧠 PDF se quiz bana rahi hun, thoda wait karo...');
    try {
      const quiz = await this.quizService.generateFromPdf(userId, data, file.fileName, file._id?.toHexString());
      await status.delete();
      await this.replyAndRecord(
        ctx,
        formatQuizCreated(quiz),
        quiz._id
          ? { reply_markup: new InlineKeyboard().text('▶️ Quiz start karo', `quiz:start:${quiz._id.toHexString()}`) }
          : {},
      );
    } catch (error) {
      await status.delete();
      throw error;
    }
  }

  private async solvePhoto(
    ctx: BotContext,
    fileId: string,
    mimeType: string,
    fileName: string,
    fileSize: number | undefined,
  ): Promise<void> {
    if (!ctx.from) return;
    this.checkSize(fileSize);
    await this.recordTurn(ctx, 'user', ctx.message?.caption ?? '[photo]', MESSAGE_TYPE.PHOTO);

    const status = await ctx.reply('🔍 Problem padh rahi hun, solve karke bhejti hun...');
    try {
      const data = await this.downloadFile(fileId);
      await this.fileService.storeFile({
        userId: ctx.from.id,
        fileName,
        data,
        mimeType,
        telegramFileId: fileId,
        description: ctx.message?.caption,
      });

      const result = await this.imageSolver.solve(data);
      const { finalAnswer } = result.solution;
      const answer = finalAnswer
        ? `\n\n<b>Answer:</b> ${escapeHtml(truncate(finalAnswer, MAX_CAPTION_ANSWER))}`
        : '';
      await ctx.replyWithPhoto(new InputFile(result.image, 'solution.jpg'), {
        caption: `✅ <b>Solution ready!</b>${answer}`,
      });
      await this.recordTurn(
        ctx,
        'bot',
        [...result.solution.steps, result.solution.finalAnswer].filter((s) => s.length > 0).join('\n'),
        MESSAGE_TYPE.PHOTO,
      );
    } finally {
      await status.delete();
    }
  }

  private async startPersonalQuiz(ctx: BotContext, quizId: string): Promise<void> {
    const quiz = await database.getQuizModel().findById(quizId);
    if (!quiz) {
      await ctx.reply('❌ Quiz nahi mila.');
      return;
    }

    const state = this.quizService.startAttempt(quiz);
    ctx.session.personalQuiz = state;
    logger.info({ userId: ctx.from?.id, quizId, questions: state.questions.length }, 'Personal quiz started');

    await this.replyAndRecord(ctx, `🧠 <b>${escapeHtml(quiz.title)}</b> shuru!`);
    await this.sendPersonalQuestion(ctx, state);
  }

  private async sendPersonalQuestion(ctx: BotContext, state: PersonalQuizState): Promise<void> {
    const question = state.questions[state.index];
    if (!question) return;
    await ctx.reply(formatQuestion(question, state.index, state.questions.length), {
      reply_markup: personalAnswerKeyboard(state),
    });
  }

  private async handlePersonalAnswer(
    ctx: BotContext,
    quizId: string,
    questionIndex: number,
    letter: string,
  ): Promise<void> {
    const state = ctx.session.personalQuiz;
    if (!ctx.from || !ctx.chat || !state || state.quizId !== quizId || !isAnswerLetter(letter)) {
      await ctx.answerCallbackQuery({ text: '⌛ Ye quiz ab active nahi hai' });
      return;
    }

    const outcome = this.quizService.answerQuestion(state, questionIndex, letter);
    if (!outcome) {
      await ctx.answerCallbackQuery({ text: '✋ Is question ka answer ho chuka hai' });
      return;
    }

    await ctx.answerCallbackQuery();
    await this.recordTurn(ctx, 'user', letter, MESSAGE_TYPE.QUIZ);

    const { question } = outcome;
    const correctText = question.options[ANSWER_LETTERS.indexOf(question.answer)] ?? '';
    const verdict = outcome.correct
      ? '✅ <b>Sahi jawab!</b>'
      : `❌ <b>Galat!</b> Sahi jawab: <b>${question.answer}) ${escapeHtml(correctText)}</b>`;
    const explanation = question.explanation ? `\n💡 ${escapeHtml(question.explanation)}` : '';

    await ctx.editMessageText(
      `${formatQuestion(question, questionIndex, state.questions.length)}\n\n` +
        `Tumhara answer: <b>${letter}</b>\n${verdict}${explanation}`,
    );

    if (!outcome.finished) {
      ctx.session.personalQuiz = outcome.state;
      await this.sendPersonalQuestion(ctx, outcome.state);
      return;
    }

    ctx.session.personalQuiz = undefined;
    const result = await this.quizService.finishAttempt(ctx.from.id, ctx.chat.id, outcome.state);
    logger.info({ userId: ctx.from.id, quizId, ...result }, 'Personal quiz finished');
    await this.replyAndRecord(
      ctx,
      formatAttemptResult(result),
      result.attemptId
        ? { reply_markup: new InlineKeyboard().text('📋 Answer key', `quiz:key:${result.attemptId}`) }
        : {},
    );
  }

  private async sendStoredFiles(ctx: BotContext, files: StoredFile[]): Promise<void> {
    for (const file of files.slice(0, MAX_SENT_FILES)) {
      try {
        await ctx.replyWithDocument(file.telegramFileId ?? new InputFile(file.filePath, file.fileName));
      } catch (error) {
        logger.error({ error, fileName: file.fileName }, 'Failed to send stored file');
      }
    }
  }

  private async isGroupAdmin(ctx: BotContext): Promise<boolean> {
    if (!ctx.from) return false;
    if (isAdmin(ctx.from.id)) return true;
    const member = await ctx.getChatMember(ctx.from.id);
    return member.status === 'creator' || member.status === 'administrator';
  }

  private checkSize(fileSize: number | undefined): void {
    const limit = config.files.maxFileSizeBytes;
    if (fileSize !== undefined && fileSize > limit) {
      throw new FileTooLargeError(fileSize, limit);
    }
  }

  private async downloadFile(fileId: string): Promise<Buffer> {
    const file = await this.bot.api.getFile(fileId);
    if (!file.file_path) {
      throw new Error(`Telegram returned no file path for ${fileId}`);
    }

    const url = `https://api.telegram.org/file/bot${config.telegram.botToken}/${file.file_path}`;
    logger.info({ filePath: file.file_path, fileSize: file.file_size }, 'Downloading Telegram file');

    const response = await fetch(url, { signal: AbortSignal.timeout(DOWNLOAD_TIMEOUT_MS) });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status}`);
    }
    return Buffer.from(await response.arrayBuffer());
  }

  async start(): Promise<void> {
    await this.bot.init();
    const botInfo = this.bot.botInfo;
    this.botUsername = botInfo.username;

    logger.info(
      {
        botId: botInfo.id,
        botUsername: this.botUsername,
        botName: botInfo.first_name,
      },
      'Bot info retrieved',
    );

    await this.saveBotUserProfile(botInfo);

    if (config.telegram.mode === 'webhook') {
      logger.info('Starting bot in webhook mode');

      const webhookUrl = config.telegram.webhookUrl;
      if (!webhookUrl) {
        logger.warn('WEBHOOK_URL is not set, register the webhook with POST /set_webhook');
        return;
      }

      try {
        await this.setWebhook(webhookUrl);
      } catch (error) {
        logger.error(error, 'Failed to configure webhook');
      }
      return;
    }

    logger.info('Starting bot in polling mode');
    // getUpdates conflicts with a leftover webhook
    await this.bot.api.deleteWebhook();

    this.runner = run(this.bot, {
      runner: { fetch: { allowed_updates: API_CONSTANTS.DEFAULT_UPDATE_TYPES } },
    });
    logger.info('Polling started');

    // settles only when the runner stops
    this.polling =
      this.runner.task()?.catch((error: unknown) => logger.error(error, 'Polling stopped with an error')) ?? null;
  }

  async stop(): Promise<void> {
    this.groupService.stopAll();

    if (config.telegram.mode === 'webhook') {
      try {
        await this.deleteWebhook();
      } catch (error) {
        logger.error(error, 'Failed to remove webhook');
      }
      return;
    }

    const runner = this.runner;
    if (runner?.isRunning()) {
      await runner.stop();
      await this.polling;
      logger.info('Polling stopped');
    }
    this.runner = null;
    this.polling = null;
  }

  async setWebhook(url: string): Promise<void> {
    await this.bot.api.setWebhook(url, {
      allowed_updates: API_CONSTANTS.DEFAULT_UPDATE_TYPES,
      secret_token: config.telegram.webhookSecret,
    });
    logger.info({ url }, 'Webhook set');
  }

  async getWebhookInfo(): Promise<WebhookInfo> {
    return this.bot.api.getWebhookInfo();
  }

  async deleteWebhook(): Promise<void> {
    await this.bot.api.deleteWebhook();
    logger.info('Webhook removed');
  }

  getBot(): Bot<BotContext> {
    return this.bot;
  }

  getBotUsername(): string {
    return this.botUsername;
  }

  private async saveBotUserProfile(botInfo: UserFromGetMe): Promise<void> {
    try {
      const userModel = database.getTelegramUserModel();
      await userModel.upsertUser({
        telegramId: botInfo.id,
        username: botInfo.username,
        firstName: botInfo.first_name,
        lastName: botInfo.last_name,
        isBot: true,
        isPremium: false,
        languageCode: botInfo.language_code || null,
      });

      logger.info(
        { botId: botInfo.id, botUsername: botInfo.username },
        'Bot user profile saved to database',
      );
    } catch (error) {
      logger.error(error, 'Failed to save bot user profile to database');
    }
  }
}
