import { Collection, ObjectId } from 'mongodb';
import { AnswerLetter, Subject } from '../../common/message-types.js';
import { ensureIndexes } from './indexes.js';
import { toObjectId } from './StoredFile.js';

export type Difficulty = 'easy' | 'medium' | 'hard';

export interface QuizQuestion {
  question: string;
  options: [string, string, string, string];
  answer: AnswerLetter;
  explanation: string;
  difficulty: Difficulty;
  type: string;
}

export interface Quiz {
  _id?: ObjectId;
  ownerTelegramId: number; // Reference to TelegramUser.telegramId
  title: string;
  questions: QuizQuestion[];
  sourceFileId?: string; // Reference to StoredFile._id
  subject: Subject;
  difficulty: Difficulty;
  createdAt: Date;
}

export class QuizModel {
  constructor(private collection: Collection<Quiz>) {}

  async addQuiz(quiz: Omit<Quiz, '_id' | 'createdAt'>): Promise<Quiz> {
    const doc: Quiz = { ...quiz, createdAt: new Date() };
    const result = await this.collection.insertOne({ ...doc });
    return { ...doc, _id: result.insertedId };
  }

  async findById(id: string): Promise<Quiz | null> {
    const _id = toObjectId(id);
    return _id ? await this.collection.findOne({ _id }) : null;
  }

  async listByOwner(ownerTelegramId: number, limit = 10): Promise<Quiz[]> {
    return await this.collection
      .find({ ownerTelegramId })
      .sort({ createdAt: -1 })
      .limit(limit)
      .toArray();
  }

  async latestByOwner(ownerTelegramId: number): Promise<Quiz | null> {
    const [latest] = await this.listByOwner(ownerTelegramId, 1);
    return latest ?? null;
  }

  async countByOwner(ownerTelegramId: number): Promise<number> {
    return this.collection.countDocuments({ ownerTelegramId });
  }

  async countAll(): Promise<number> {
    return this.collection.countDocuments({});
  }

  async createIndexes(): Promise<void> {
    await ensureIndexes(this.collection, 'Quiz', [
      {
        keys: { ownerTelegramId: 1, createdAt: -1 },
        description: 'Owner quiz listing index',
      },
    ]);
  }
}
