import { Collection, ObjectId } from 'mongodb';
import { ensureIndexes } from './indexes.js';

export interface GroupQuizResult {
  userTelegramId: number;
  name: string;
  score: number;
  total: number;
  percentage: number;
}

export interface GroupQuizSession {
  _id?: ObjectId;
  chatTelegramId: number;
  quizTitle: string;
  quizId?: string;
  startedAt: Date;
  endedAt: Date;
  totalParticipants: number;
  results: GroupQuizResult[];
}

export interface LeaderboardEntry {
  userTelegramId: number;
  name: string;
  averagePercentage: number;
  quizzes: number;
  totalScore: number;
}

export class GroupQuizSessionModel {
  constructor(private collection: Collection<GroupQuizSession>) {}

  async saveSession(session: Omit<GroupQuizSession, '_id'>): Promise<void> {
    await this.collection.insertOne({ ...session });
  }

  /**
   * Average percentage per user across every finished session in the chat,
   * ties broken by number of quizzes played.
   */
  async getLeaderboard(chatTelegramId: number, limit: number): Promise<LeaderboardEntry[]> {
    const rows = await this.collection
      .aggregate<LeaderboardEntry>([
        { $match: { chatTelegramId } },
        { $unwind: '$results' },
        { $sort: { endedAt: 1 } },
        {
          $group: {
            _id: '$results.userTelegramId',
            name: { $last: '$results.name' },
            averagePercentage: { $avg: '$results.percentage' },
            quizzes: { $sum: 1 },
            totalScore: { $sum: '$results.score' },
          },
        },
        { $sort: { averagePercentage: -1, quizzes: -1 } },
        { $limit: limit },
        {
          $project: {
            _id: 0,
            userTelegramId: '$_id',
            name: 1,
            averagePercentage: 1,
            quizzes: 1,
            totalScore: 1,
          },
        },
      ])
      .toArray();

    return rows.map((row) => ({
      ...row,
      averagePercentage: Math.round(row.averagePercentage * 10) / 10,
    }));
  }

  async createIndexes(): Promise<void> {
    await ensureIndexes(this.collection, 'GroupQuizSession', [
      {
        keys: { chatTelegramId: 1, endedAt: -1 },
        description: 'Per-group session history',
      },
    ]);
  }
}
