import { z } from 'zod';
import { config } from '../common/config.js';
import { loadDataFile } from '../common/data.js';
import { QuizAlreadyActiveError } from '../common/errors.js';
import logger from '../common/logger.js';
import { ANSWER_LETTERS, AnswerLetter } from '../common/message-types.js';
import { database } from '../database/index.js';
import { Group, GroupSettings } from '../database/models/Group.js';
import { GroupQuizResult, LeaderboardEntry } from '../database/models/GroupQuizSession.js';
import { Quiz } from '../database/models/Quiz.js';
import { escapeHtml } from '../utils/html.js';
import { createVariation, formatQuestion, percentage } from './quiz.service.js';

export interface InlineButton {
  text: string;
  data: string;
}

/**
 * The slice of the Telegram API a group quiz needs. Kept apart from grammY
 * so the quiz flow runs without a bot.
 */
export interface GroupChatGateway {
  send(chatId: number, html: string, keyboard?: InlineButton[][]): Promise<number>;
  clearKeyboard(chatId: number, messageId: number): Promise<void>;
}

export interface GroupChat {
  id: number;
  title: string;
  type: string;
}

export interface QuizPlayer {
  id: number;
  name: string;
}

export type JoinResult = 'joined' | 'already_joined' | 'no_quiz';
export type AnswerResult = 'accepted' | 'already_answered' | 'not_joined' | 'stale' | 'no_quiz';

export interface SettingsUpdate {
  settings: GroupSettings;
  errors: string[];
}

type Phase = 'joining' | 'question' | 'reveal' | 'finished';

interface Participant {
  userId: number;
  name: string;
  joinOrder: number;
  score: number;
  answered: Set<number>;
}

interface GroupQuizState {
  chatId: number;
  quiz: Quiz;
  settings: GroupSettings;
  phase: Phase;
  index: number;
  participants: Map<number, Participant>;
  startedAt: Date;
  timer?: NodeJS.Timeout;
  keyboardMessageId?: number;
}

export const JOIN_CALLBACK = 'gq:join';
export const REVEAL_PAUSE_MS = 3000;

const STOPPED_BEFORE_START = '🛑 <b>Quiz cancelled!</b>\n\nPehla question aane se pehle hi quiz band kar diya gaya.';
const LEADERBOARD_SIZE = 10;
const RESULTS_SHOWN = 10;
const MEDALS = ['🥇', '🥈', '🥉'];

export const DEFAULT_GROUP_SETTINGS: GroupSettings = {
  questionTimeSec: config.quiz.questionTimeSec,
  questionsPerQuiz: 5,
  joinWindowSec: config.quiz.joinWindowSec,
};

const SETTING_RULES: Record<string, { field: keyof GroupSettings; min: number; max: number }> = {
  time: { field: 'questionTimeSec', min: 10, max: 600 },
  questions: { field: 'questionsPerQuiz', min: 1, max: 20 },
  join: { field: 'joinWindowSec', min: 5, max: 120 },
};

const defaultQuizSchema = z.object({
  title: z.string().min(1),
  questions: z
    .array(
      z.object({
        question: z.string().min(1),
        options: z.tuple([z.string(), z.string(), z.string(), z.string()]),
        answer: z.enum(ANSWER_LETTERS),
        explanation: z.string().default(''),
        difficulty: z.enum(['easy', 'medium', 'hard']).default('easy'),
        type: z.string().default('multiple_choice'),
      }),
    )
    .min(1),
});

const defaultQuizData = loadDataFile('default-quiz.json', defaultQuizSchema);

export const DEFAULT_QUIZ: Quiz = {
  ownerTelegramId: 0,
  title: defaultQuizData.title,
  questions: defaultQuizData.questions,
  subject: 'general',
  difficulty: 'easy',
  createdAt: new Date(0),
};

/**
 * Applies `key=value` arguments (`time`, `questions`, `join`) to the current
 * settings. Unknown keys and out-of-range values are reported and skipped.
 */
export const parseSettingsArgs = (args: string[], current: GroupSettings): SettingsUpdate => {
  const settings = { ...current };
  const errors: string[] = [];

  for (const arg of args) {
    const [key = '', value = ''] = arg.split('=', 2);
    const rule = SETTING_RULES[key.trim().toLowerCase()];
    if (!rule) {
      errors.push(`Unknown setting: ${arg}`);
      continue;
    }
    const parsed = Number(value.trim());
    if (!Number.isInteger(parsed) || parsed < rule.min || parsed > rule.max) {
      errors.push(`${key} must be between ${rule.min} and ${rule.max}`);
      continue;
    }
    settings[rule.field] = parsed;
  }

  return { settings, errors };
};

export const formatSettings = (settings: GroupSettings): string =>
  '⚙️ <b>Quiz Settings</b>\n\n' +
  `⏱ Time per question: <b>${settings.questionTimeSec}s</b>\n` +
  `❓ Questions per quiz: <b>${settings.questionsPerQuiz}</b>\n` +
  `🙋 Join window: <b>${settings.joinWindowSec}s</b>\n\n` +
  'Change: <code>/quizsettings time=30 questions=10 join=20</code>';

const rankLabel = (rank: number): string => MEDALS[rank] ?? `${rank + 1}.`;

export const formatLeaderboard = (entries: LeaderboardEntry[]): string => {
  if (entries.length === 0) {
    return '📊 <b>Leaderboard abhi khali hai!</b>\n\n/quiz se pehla group quiz start karo.';
  }
  const lines = entries.map(
    (entry, i) =>
      `${rankLabel(i)} <b>${escapeHtml(entry.name)}</b> - ${entry.averagePercentage}% avg ` +
      `(${entry.quizzes} ${entry.quizzes === 1 ? 'quiz' : 'quizzes'})`,
  );
  return `🏆 <b>Group Leaderboard</b>\n\n${lines.join('\n')}`;
};

export const formatResults = (title: string, results: GroupQuizResult[]): string => {
  if (results.length === 0) {
    return `🏁 <b>${escapeHtml(title)} khatam!</b>\n\nKisi ne participate nahi kiya.`;
  }
  const lines = results
    .slice(0, RESULTS_SHOWN)
    .map(
      (r, i) =>
        `${rankLabel(i)} <b>${escapeHtml(r.name)}</b>: ${r.score}/${r.total} (${r.percentage}%)`,
    );
  return `🏁 <b>${escapeHtml(title)} - Results</b>\n\n${lines.join('\n')}\n\n👥 Participants: ${results.length}`;
};

export const answerKeyboard = (index: number): InlineButton[][] => [
  ANSWER_LETTERS.map((letter) => ({ text: letter, data: `gq:ans:${index}:${letter}` })),
];

export class GroupService {
  private sessions = new Map<number, GroupQuizState>();

  constructor(
    private readonly gateway: GroupChatGateway,
    private readonly rng: () => number = Math.random,
  ) {}

  async registerGroup(chat: GroupChat, addedBy?: number): Promise<Group> {
    const group = await database
      .getGroupModel()
      .upsertGroup(
        { chatTelegramId: chat.id, title: chat.title, type: chat.type, addedByTelegramId: addedBy },
        DEFAULT_GROUP_SETTINGS,
      );
    logger.info({ chatId: chat.id, title: chat.title }, 'Group registered');
    return group;
  }

  async addMember(chatId: number, userId: number, firstName: string): Promise<void> {
    await database.getGroupMemberModel().addMember(chatId, userId, firstName);
  }

  async getSettings(chatId: number): Promise<GroupSettings> {
    const group = await database.getGroupModel().findGroup(chatId);
    return group?.settings ?? DEFAULT_GROUP_SETTINGS;
  }

  /**
   * Also registers the group when the bot joined it before it kept records.
   */
  async updateSettings(chat: GroupChat, args: string[]): Promise<SettingsUpdate> {
    const update = parseSettingsArgs(args, await this.getSettings(chat.id));
    await database
      .getGroupModel()
      .updateSettings({ chatTelegramId: chat.id, title: chat.title, type: chat.type }, update.settings);
    logger.info({ chatId: chat.id, settings: update.settings, errors: update.errors }, 'Group settings updated');
    return update;
  }

  async countMembers(chatId: number): Promise<number> {
    return database.getGroupMemberModel().countMembers(chatId);
  }

  isActive(chatId: number): boolean {
    return this.sessions.has(chatId);
  }

  async getLeaderboard(chatId: number, limit = LEADERBOARD_SIZE): Promise<LeaderboardEntry[]> {
    return database.getGroupQuizSessionModel().getLeaderboard(chatId, limit);
  }

  /**
   * Announces a quiz and opens the join window. Uses a variation of the
   * starter's latest quiz, or the built-in quiz when they have none.
   */
  async start(chatId: number, starter: QuizPlayer): Promise<void> {
    if (this.sessions.has(chatId)) {
      throw new QuizAlreadyActiveError(chatId);
    }

    const settings = await this.getSettings(chatId);
    const latest = await database.getQuizModel().latestByOwner(starter.id);
    const variation = createVariation(latest ?? DEFAULT_QUIZ, this.rng);
    const quiz: Quiz = { ...variation, questions: variation.questions.slice(0, settings.questionsPerQuiz) };

    // re-checked after the awaits above
    if (this.sessions.has(chatId)) {
      throw new QuizAlreadyActiveError(chatId);
    }

    const state: GroupQuizState = {
      chatId,
      quiz,
      settings,
      phase: 'joining',
      index: 0,
      participants: new Map(),
      startedAt: new Date(),
    };
    this.sessions.set(chatId, state);

    try {
      state.keyboardMessageId = await this.gateway.send(
        chatId,
        `🧠 <b>Group Quiz: ${escapeHtml(quiz.title)}</b>\n\n` +
          `❓ Questions: ${quiz.questions.length}\n` +
          `⏱ Time per question: ${settings.questionTimeSec}s\n\n` +
          `${settings.joinWindowSec} seconds me join karo! 👇`,
        [[{ text: '🙋 Join Quiz', data: JOIN_CALLBACK }]],
      );
    } catch (error) {
      // an unannounced quiz must not keep the chat locked
      this.sessions.delete(chatId);
      throw error;
    }

    logger.info(
      { chatId, starterId: starter.id, quizTitle: quiz.title, questions: quiz.questions.length },
      'Group quiz started',
    );
    this.schedule(state, settings.joinWindowSec * 1000, () => this.beginQuestions(state));
  }

  join(chatId: number, player: QuizPlayer): JoinResult {
    const state = this.sessions.get(chatId);
    if (!state || state.phase === 'finished') {
      return 'no_quiz';
    }
    if (state.participants.has(player.id)) {
      return 'already_joined';
    }

    state.participants.set(player.id, {
      userId: player.id,
      name: player.name,
      joinOrder: state.participants.size,
      score: 0,
      answered: new Set(),
    });
    logger.info({ chatId, userId: player.id, participants: state.participants.size }, 'Player joined group quiz');
    return 'joined';
  }

  /**
   * One answer per participant, for the question currently open.
   */
  answer(chatId: number, userId: number, questionIndex: number, letter: AnswerLetter): AnswerResult {
    const state = this.sessions.get(chatId);
    if (!state || state.phase === 'finished') {
      return 'no_quiz';
    }
    const participant = state.participants.get(userId);
    if (!participant) {
      return 'not_joined';
    }
    const question = state.quiz.questions[questionIndex];
    if (state.phase !== 'question' || questionIndex !== state.index || !question) {
      return 'stale';
    }
    if (participant.answered.has(questionIndex)) {
      return 'already_answered';
    }

    participant.answered.add(questionIndex);
    if (question.answer === letter) {
      participant.score += 1;
    }
    return 'accepted';
  }

  async stop(chatId: number): Promise<boolean> {
    const state = this.sessions.get(chatId);
    if (!state) {
      return false;
    }
    logger.info({ chatId, phase: state.phase, index: state.index }, 'Group quiz stopped');
    await this.finish(state);
    return true;
  }

  /** Clears every pending timer, used on shutdown. */
  stopAll(): void {
    for (const state of this.sessions.values()) {
      clearTimeout(state.timer);
    }
    this.sessions.clear();
  }

  private schedule(state: GroupQuizState, delayMs: number, step: () => Promise<void>): void {
    clearTimeout(state.timer);
    state.timer = setTimeout(() => {
      if (this.sessions.get(state.chatId) !== state) {
        return;
      }
      step().catch((error: unknown) => {
        logger.error({ error, chatId: state.chatId, phase: state.phase }, 'Group quiz step failed');
        this.sessions.delete(state.chatId);
      });
    }, delayMs);
  }

  private async clearKeyboard(state: GroupQuizState): Promise<void> {
    const messageId = state.keyboardMessageId;
    state.keyboardMessageId = undefined;
    if (messageId !== undefined) {
      await this.gateway.clearKeyboard(state.chatId, messageId);
    }
  }

  private async beginQuestions(state: GroupQuizState): Promise<void> {
    await this.clearKeyboard(state);

    if (state.participants.size === 0) {
      this.sessions.delete(state.chatId);
      state.phase = 'finished';
      logger.info({ chatId: state.chatId }, 'Group quiz cancelled, nobody joined');
      await this.gateway.send(
        state.chatId,
        '😔 <b>Quiz cancelled!</b>\n\nKisi ne join nahi kiya. /quiz se dobara try karo.',
      );
      return;
    }

    await this.askQuestion(state, 0);
  }

  private async askQuestion(state: GroupQuizState, index: number): Promise<void> {
    const question = state.quiz.questions[index];
    if (!question) {
      await this.finish(state);
      return;
    }

    state.phase = 'question';
    state.index = index;
    state.keyboardMessageId = await this.gateway.send(
      state.chatId,
      `${formatQuestion(question, index, state.quiz.questions.length)}\n\n⏱ ${state.settings.questionTimeSec}s`,
      answerKeyboard(index),
    );
    this.schedule(state, state.settings.questionTimeSec * 1000, () => this.reveal(state));
  }

  private async reveal(state: GroupQuizState): Promise<void> {
    const question = state.quiz.questions[state.index];
    if (!question) {
      await this.finish(state);
      return;
    }

    state.phase = 'reveal';
    await this.clearKeyboard(state);

    const correctText = question.options[ANSWER_LETTERS.indexOf(question.answer)] ?? '';
    const answered = [...state.participants.values()].filter((p) => p.answered.has(state.index)).length;
    const explanation = question.explanation ? `\n💡 ${escapeHtml(question.explanation)}` : '';

    await this.gateway.send(
      state.chatId,
      `⏰ <b>Time up!</b>\n\n✅ Sahi jawab: <b>${question.answer}) ${escapeHtml(correctText)}</b>` +
        `${explanation}\n\n👥 ${answered}/${state.participants.size} ne answer kiya`,
    );

    const next = state.index + 1;
    this.schedule(state, REVEAL_PAUSE_MS, () => this.askQuestion(state, next));
  }

  private async finish(state: GroupQuizState): Promise<void> {
    clearTimeout(state.timer);
    this.sessions.delete(state.chatId);
    const wasJoining = state.phase === 'joining';
    state.phase = 'finished';
    await this.clearKeyboard(state);

    if (wasJoining) {
      logger.info({ chatId: state.chatId }, 'Group quiz stopped before the first question');
      await this.gateway.send(state.chatId, STOPPED_BEFORE_START);
      return;
    }

    const total = Math.min(state.index + 1, state.quiz.questions.length);
    const results: GroupQuizResult[] = [...state.participants.values()]
      .sort((a, b) => b.score - a.score || a.joinOrder - b.joinOrder)
      .map((p) => ({
        userTelegramId: p.userId,
        name: p.name,
        score: p.score,
        total,
        percentage: percentage(p.score, total),
      }));

    await this.gateway.send(state.chatId, formatResults(state.quiz.title, results));

    if (results.length > 0) {
      await database.getGroupQuizSessionModel().saveSession({
        chatTelegramId: state.chatId,
        quizTitle: state.quiz.title,
        quizId: state.quiz._id?.toHexString(),
        startedAt: state.startedAt,
        endedAt: new Date(),
        totalParticipants: results.length,
        results,
      });
    }

    logger.info({ chatId: state.chatId, participants: results.length, total }, 'Group quiz finished');
  }
}
