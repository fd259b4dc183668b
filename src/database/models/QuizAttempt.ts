import { Collection, ObjectId } from 'mongodb';
import { AnswerLetter } from '../../common/message-types.js';
import { ensureIndexes } from './indexes.js';
import { QuizQuestion } from './Quiz.js';
import { toObjectId } from './StoredFile.js';

export interface AttemptAnswer {
  questionIndex: number;
  answer: AnswerLetter;
  correct: boolean;
}

export interface QuizAttempt {
  _id?: ObjectId;
  quizId: string; // Reference to Quiz._id
  userTelegramId: number; // Reference to TelegramUser.telegramId
  chatTelegramId: number;
  quizTitle: string;
  questions: QuizQuestion[]; // in the order they were asked
  answers: AttemptAnswer[];
  score: number;
  totalQuestions: number;
  startedAt: Date;
  completedAt: Date;
  timeTakenSec: number;
}

export interface AttemptStats {
  attempts: number;
  averagePercentage: number;
  bestPercentage: number;
}

interface AttemptStatsRow {
  attempts: number;
  averagePercentage: number | null;
  bestPercentage: number | null;
}

export class QuizAttemptModel {
  constructor(private collection: Collection<QuizAttempt>) {}

  async addAttempt(attempt: Omit<QuizAttempt, '_id'>): Promise<QuizAttempt> {
    const result = await this.collection.insertOne({ ...attempt });
    return { ...attempt, _id: result.insertedId };
  }

  async findById(id: string, userTelegramId: number): Promise<QuizAttempt | null> {
    const _id = toObjectId(id);
    return _id ? await this.collection.findOne({ _id, userTelegramId }) : null;
  }

  async getAttemptStats(userTelegramId: number): Promise<AttemptStats> {
    const [row] = await this.collection
      .aggregate<AttemptStatsRow>([
        { $match: { userTelegramId, totalQuestions: { $gt: 0 } } },
        {
          $project: {
            percentage: {
              $multiply: [{ $divide: ['$score', '$totalQuestions'] }, 100],
            },
          },
        },
        {
          $group: {
            _id: null,
            attempts: { $sum: 1 },
            averagePercentage: { $avg: '$percentage' },
            bestPercentage: { $max: '$percentage' },
          },
        },
      ])
      .toArray();

    if (!row) {
      return { attempts: 0, averagePercentage: 0, bestPercentage: 0 };
    }

    return {
      attempts: row.attempts,
      averagePercentage: Math.round(row.averagePercentage ?? 0),
      bestPercentage: Math.round(row.bestPercentage ?? 0),
    };
  }

  async createIndexes(): Promise<void> {
    await ensureIndexes(this.collection, 'QuizAttempt', [
      {
        keys: { userTelegramId: 1, completedAt: -1 },
        description: 'User attempts index',
      },
      {
        keys: { quizId: 1 },
        description: 'Attempts per quiz',
      },
    ]);
  }
}
