import pdf from 'pdf-parse/lib/pdf-parse.js';
import { z } from 'zod';
import { config } from '../common/config.js';
import { InsufficientTextError, QuizGenerationError, describeError } from '../common/errors.js';
import logger from '../common/logger.js';
import { ANSWER_LETTERS, AnswerLetter, isAnswerLetter } from '../common/message-types.js';
import { database } from '../database/index.js';
import { Difficulty, Quiz, QuizQuestion } from '../database/models/Quiz.js';
import { AttemptAnswer } from '../database/models/QuizAttempt.js';
import { escapeHtml } from '../utils/html.js';
import { parseJsonLoose } from '../utils/json.js';
import { AiService } from './ai.service.js';
import { extractSubject } from './context.service.js';

export const MIN_TEXT_LENGTH = 100;
export const CHUNK_SIZE = 3000;
export const MAX_CHUNKS = 3;
const CHARS_PER_QUESTION = 500;
const MIN_QUESTIONS = 3;

/**
 * Personal quiz progress. Lives in the chat session, so it must stay
 * plain JSON.
 */
export interface PersonalQuizState {
  quizId: string;
  title: string;
  questions: QuizQuestion[];
  index: number;
  answers: AttemptAnswer[];
  startedAt: number;
}

export interface AnswerOutcome {
  state: PersonalQuizState;
  correct: boolean;
  question: QuizQuestion;
  finished: boolean;
}

export interface AttemptResult {
  attemptId: string;
  score: number;
  total: number;
  percentage: number;
  timeTakenSec: number;
}

export interface UserQuizStats {
  quizzesCreated: number;
  attempts: number;
  averagePercentage: number;
  bestPercentage: number;
}

const DIFFICULTIES: readonly Difficulty[] = ['easy', 'medium', 'hard'];

const answerValueSchema = z.union([z.string(), z.number()]);

const rawQuestionSchema = z.object({
  question: z.string().trim().min(1),
  options: z.tuple([
    z.coerce.string().trim().min(1),
    z.coerce.string().trim().min(1),
    z.coerce.string().trim().min(1),
    z.coerce.string().trim().min(1),
  ]),
  correct_answer: answerValueSchema.optional(),
  answer: answerValueSchema.optional(),
  explanation: z.string().optional(),
  difficulty: z.string().optional(),
  type: z.string().optional(),
});

const responseSchema = z.union([
  z.array(z.unknown()),
  z.object({ questions: z.array(z.unknown()) }).transform((value) => value.questions),
]);

export const toAnswerLetter = (value: string | number | undefined): AnswerLetter | null => {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? (ANSWER_LETTERS[value] ?? null) : null;
  }
  const trimmed = (value ?? '').trim().toUpperCase();
  const letter = /^\(?([A-D])\b/.exec(trimmed)?.[1];
  if (letter && isAnswerLetter(letter)) {
    return letter;
  }
  return /^[0-3]$/.test(trimmed) ? (ANSWER_LETTERS[Number(trimmed)] ?? null) : null;
};

const toDifficulty = (value: string | undefined): Difficulty =>
  DIFFICULTIES.find((d) => d === value?.trim().toLowerCase()) ?? 'medium';

export const cleanText = (text: string): string =>
  text
    .replace(/\r\n?/g, '\n')
    .replace(/[ \t\f\v\u00a0]+/g, ' ')
    .replace(/ *\n */g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();

export const extractPdfText = async (buffer: Buffer): Promise<string> => {
  const result = await pdf(buffer);
  return cleanText(result.text);
};

export const questionTarget = (textLength: number, max: number = config.quiz.maxQuestions): number =>
  Math.min(max, Math.max(MIN_QUESTIONS, Math.floor(textLength / CHARS_PER_QUESTION)));

/**
 * Groups whole sentences into chunks of at most `size` characters.
 * A sentence longer than `size` is cut into `size`-long pieces.
 */
export const splitIntoChunks = (text: string, size: number = CHUNK_SIZE): string[] => {
  const sentences = text.split(/(?<=[.!?।])\s+/).filter((s) => s.length > 0);
  const chunks: string[] = [];
  let current = '';

  for (const sentence of sentences) {
    if (sentence.length > size) {
      if (current) chunks.push(current);
      current = '';
      for (let i = 0; i < sentence.length; i += size) {
        chunks.push(sentence.slice(i, i + size));
      }
      continue;
    }

    const candidate = current ? `${current} ${sentence}` : sentence;
    if (candidate.length > size) {
      chunks.push(current);
      current = sentence;
    } else {
      current = candidate;
    }
  }

  if (current) chunks.push(current);
  return chunks;
};

const toQuizQuestion = (item: unknown): QuizQuestion | null => {
  const parsed = rawQuestionSchema.safeParse(item);
  if (!parsed.success) {
    return null;
  }
  const answer = toAnswerLetter(parsed.data.correct_answer ?? parsed.data.answer);
  if (!answer) {
    return null;
  }
  return {
    question: parsed.data.question,
    options: parsed.data.options,
    answer,
    explanation: parsed.data.explanation?.trim() ?? '',
    difficulty: toDifficulty(parsed.data.difficulty),
    type: parsed.data.type ?? 'multiple_choice',
  };
};

const QUESTION_LINE = /^(?:Q(?:uestion)?\s*\d*\s*[.:)]|\d+[.)])\s*(.+)$/i;
const OPTION_LINE = /^\(?([A-D])[.)]\s*(.+)$/i;
const ANSWER_LINE = /^(?:correct\s+answer|answer|correct)\s*[:\-]?\s*\(?([A-D])\b/i;
const EXPLANATION_LINE = /^explanation\s*[:\-]\s*(.+)$/i;

interface DraftQuestion {
  question: string;
  options: Partial<Record<AnswerLetter, string>>;
  answer?: AnswerLetter;
  explanation: string;
}

const finishDraft = (draft: DraftQuestion): QuizQuestion | null => {
  if (!draft.answer) return null;
  const { A, B, C, D } = draft.options;
  if (!A || !B || !C || !D) return null;
  return {
    question: draft.question,
    options: [A, B, C, D],
    answer: draft.answer,
    explanation: draft.explanation,
    difficulty: 'medium',
    type: 'multiple_choice',
  };
};

/**
 * Reads "Q1. ... / A) ... / Answer: B" style text for replies that are not JSON.
 */
export const parseQuestionsFromText = (raw: string): QuizQuestion[] => {
  const drafts: DraftQuestion[] = [];

  for (const line of raw.split('\n').map((l) => l.trim().replace(/^\*+|\*+$/g, ''))) {
    const draft = drafts[drafts.length - 1];

    const question = QUESTION_LINE.exec(line)?.[1];
    if (question) {
      drafts.push({ question: question.trim(), options: {}, explanation: '' });
      continue;
    }
    if (!draft) {
      continue;
    }

    const answer = ANSWER_LINE.exec(line)?.[1]?.toUpperCase();
    const explanation = EXPLANATION_LINE.exec(line)?.[1];
    const option = OPTION_LINE.exec(line);
    const letter = option?.[1]?.toUpperCase();

    if (answer && isAnswerLetter(answer)) {
      draft.answer = answer;
    } else if (explanation) {
      draft.explanation = explanation.trim();
    } else if (option?.[2] && letter && isAnswerLetter(letter)) {
      draft.options[letter] = option[2].trim();
    }
  }

  return drafts.map(finishDraft).filter((q): q is QuizQuestion => q !== null);
};

/**
 * Accepts a JSON array, `{ questions: [...] }`, either of them fenced or
 * wrapped in prose. Invalid items are dropped. Falls back to the text
 * format when no JSON payload can be read.
 */
export const parseQuizResponse = (raw: string): QuizQuestion[] => {
  const payload = responseSchema.safeParse(parseJsonLoose(raw));
  if (!payload.success) {
    return parseQuestionsFromText(raw);
  }
  return payload.data.map(toQuizQuestion).filter((q): q is QuizQuestion => q !== null);
};

export const shuffle = <T>(items: readonly T[], rng: () => number): T[] => {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    const current = result[i];
    const other = result[j];
    if (current !== undefined && other !== undefined) {
      result[i] = other;
      result[j] = current;
    }
  }
  return result;
};

const letterIndex = (letter: AnswerLetter): number => ANSWER_LETTERS.indexOf(letter);

export const shuffleQuestionOptions = (question: QuizQuestion, rng: () => number): QuizQuestion => {
  const order = shuffle([0, 1, 2, 3], rng);
  const options = order.map((i) => question.options[i] ?? '');
  const answer = ANSWER_LETTERS[order.indexOf(letterIndex(question.answer))] ?? question.answer;
  const [a = '', b = '', c = '', d = ''] = options;
  return { ...question, options: [a, b, c, d], answer };
};

/**
 * Same questions in a new order with shuffled options. The quiz id is kept
 * so attempts still point at the stored quiz.
 */
export const createVariation = (quiz: Quiz, rng: () => number): Quiz => ({
  ...quiz,
  questions: shuffle(quiz.questions, rng).map((q) => shuffleQuestionOptions(q, rng)),
});

export const scoreAnswers = (questions: QuizQuestion[], answers: AttemptAnswer[]): number =>
  answers.filter((a) => questions[a.questionIndex]?.answer === a.answer).length;

export const percentage = (score: number, total: number): number =>
  total > 0 ? Math.round((score / total) * 1000) / 10 : 0;

export const formatQuestion = (question: QuizQuestion, index: number, total: number): string => {
  const options = question.options
    .map((option, i) => `<b>${ANSWER_LETTERS[i]})</b> ${escapeHtml(option)}`)
    .join('\n');
  return `❓ <b>Question ${index + 1}/${total}</b>\n\n${escapeHtml(question.question)}\n\n${options}`;
};

export const formatQuiz = (quiz: Pick<Quiz, 'title' | 'questions'>, withAnswers = false): string => {
  const body = quiz.questions
    .map((q, i) => {
      const options = q.options.map((o, j) => `   ${ANSWER_LETTERS[j]}) ${escapeHtml(o)}`).join('\n');
      const answer = withAnswers ? `\n   ✅ <b>${q.answer}</b>` : '';
      return `<b>${i + 1}.</b> ${escapeHtml(q.question)}\n${options}${answer}`;
    })
    .join('\n\n');
  return `📝 <b>${escapeHtml(quiz.title)}</b>\n\n${body}`;
};

const sentenceWords = (sentence: string): string[] =>
  sentence
    .split(/\s+/)
    .map((w) => w.replace(/^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu, ''))
    .filter((w) => w.length > 3);

/**
 * Fill-in-the-blank questions made straight from the text, used when the
 * model returns nothing usable.
 */
export const generateSimpleQuestions = (
  text: string,
  count: number,
  rng: () => number,
): QuizQuestion[] => {
  const sentences = text
    .split(/(?<=[.!?।])\s+/)
    .map((s) => s.trim())
    .filter((s) => s.length > 20 && sentenceWords(s).length > 0);
  const vocabulary = [...new Set(sentenceWords(text).map((w) => w.toLowerCase()))];

  return shuffle(sentences, rng)
    .slice(0, count)
    .map((sentence): QuizQuestion => {
      const words = sentenceWords(sentence);
      const target = words[Math.floor(rng() * words.length)] ?? words[0] ?? '';
      const distractors = shuffle(
        vocabulary.filter((w) => w !== target.toLowerCase()),
        rng,
      ).slice(0, 3);
      while (distractors.length < 3) {
        distractors.push(`Option ${distractors.length + 2}`);
      }
      const options = shuffle([target, ...distractors], rng);
      const [a = '', b = '', c = '', d = ''] = options;

      return {
        question: `Fill in the blank: ${sentence.replace(target, '______')}`,
        options: [a, b, c, d],
        answer: ANSWER_LETTERS[options.indexOf(target)] ?? 'A',
        explanation: `Sahi word hai '${target}'.`,
        difficulty: 'easy',
        type: 'fill_blank',
      };
    });
};

const dominantDifficulty = (questions: QuizQuestion[]): Difficulty => {
  const counts = DIFFICULTIES.map((d) => questions.filter((q) => q.difficulty === d).length);
  const best = Math.max(...counts);
  return best > 0 ? (DIFFICULTIES[counts.indexOf(best)] ?? 'medium') : 'medium';
};

export class QuizService {
  constructor(
    private readonly ai: Pick<AiService, 'generateQuizQuestions'>,
    private readonly rng: () => number = Math.random,
  ) {}

  async generateFromPdf(
    userId: number,
    buffer: Buffer,
    fileName: string,
    sourceFileId?: string,
  ): Promise<Quiz> {
    const text = await extractPdfText(buffer);
    return this.generateFromText(userId, text, fileName, sourceFileId);
  }

  async generateFromText(
    userId: number,
    text: string,
    fileName: string,
    sourceFileId?: string,
  ): Promise<Quiz> {
    if (text.length < MIN_TEXT_LENGTH) {
      throw new InsufficientTextError(text.length);
    }

    const target = questionTarget(text.length);
    const chunks = splitIntoChunks(text).slice(0, MAX_CHUNKS);
    const perChunk = Math.floor(target / chunks.length) + 1;

    logger.info(
      { userId, fileName, textLength: text.length, target, chunks: chunks.length, perChunk },
      'Generating quiz from text',
    );

    const pool: QuizQuestion[] = [];
    for (const [index, chunk] of chunks.entries()) {
      try {
        const raw = await this.ai.generateQuizQuestions(chunk, perChunk);
        pool.push(...parseQuizResponse(raw));
      } catch (error) {
        logger.error({ error, chunkIndex: index }, 'Quiz chunk generation failed');
      }
    }

    if (pool.length === 0) {
      logger.warn({ userId, fileName }, 'AI returned no usable questions, using fill-in-the-blank');
      pool.push(...generateSimpleQuestions(text, target, this.rng));
    }
    if (pool.length === 0) {
      throw new QuizGenerationError('no questions could be produced');
    }

    const questions = pool.length > target ? shuffle(pool, this.rng).slice(0, target) : pool;
    const title = `Quiz: ${fileName.replace(/\.[^.]+$/, '')}`;

    try {
      return await database.getQuizModel().addQuiz({
        ownerTelegramId: userId,
        title,
        questions,
        sourceFileId,
        subject: extractSubject(`${fileName} ${text.slice(0, 2000)}`, []),
        difficulty: dominantDifficulty(questions),
      });
    } catch (error) {
      throw new QuizGenerationError(`saving quiz failed: ${describeError(error)}`);
    }
  }

  startAttempt(quiz: Quiz, now: number = Date.now()): PersonalQuizState {
    const variation = createVariation(quiz, this.rng);
    return {
      quizId: quiz._id?.toHexString() ?? '',
      title: quiz.title,
      questions: variation.questions,
      index: 0,
      answers: [],
      startedAt: now,
    };
  }

  /**
   * Records an answer for the current question. Answers for any other
   * index (stale buttons, double taps) return null.
   */
  answerQuestion(state: PersonalQuizState, questionIndex: number, answer: AnswerLetter): AnswerOutcome | null {
    const question = state.questions[questionIndex];
    if (questionIndex !== state.index || !question) {
      return null;
    }

    const correct = question.answer === answer;
    const next: PersonalQuizState = {
      ...state,
      index: state.index + 1,
      answers: [...state.answers, { questionIndex, answer, correct }],
    };
    return { state: next, correct, question, finished: next.index >= state.questions.length };
  }

  async finishAttempt(
    userId: number,
    chatId: number,
    state: PersonalQuizState,
    now: number = Date.now(),
  ): Promise<AttemptResult> {
    const score = scoreAnswers(state.questions, state.answers);
    const total = state.questions.length;
    const timeTakenSec = Math.max(0, Math.round((now - state.startedAt) / 1000));

    const attempt = await database.getQuizAttemptModel().addAttempt({
      quizId: state.quizId,
      userTelegramId: userId,
      chatTelegramId: chatId,
      quizTitle: state.title,
      questions: state.questions,
      answers: state.answers,
      score,
      totalQuestions: total,
      startedAt: new Date(state.startedAt),
      completedAt: new Date(now),
      timeTakenSec,
    });

    return {
      attemptId: attempt._id?.toHexString() ?? '',
      score,
      total,
      percentage: percentage(score, total),
      timeTakenSec,
    };
  }

  async getUserQuizStats(userId: number): Promise<UserQuizStats> {
    const [quizzesCreated, attempts] = await Promise.all([
      database.getQuizModel().countByOwner(userId),
      database.getQuizAttemptModel().getAttemptStats(userId),
    ]);
    return { quizzesCreated, ...attempts };
  }
}
