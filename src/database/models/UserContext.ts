import { Collection } from 'mongodb';
import { Intent, Subject } from '../../common/message-types.js';
import { ensureIndexes } from './indexes.js';

export interface UserContext {
  userTelegramId: number; // Reference to TelegramUser.telegramId
  currentTopic: Subject | null;
  lastIntent: Intent | null;
  lastSubject: Subject | null;
  lastQuery: string | null;
  queryCount: number;
  sessionStartedAt: Date;
  updatedAt: Date;
}

export type UserContextUpdate = Partial<
  Pick<UserContext, 'currentTopic' | 'lastIntent' | 'lastSubject' | 'lastQuery'>
>;

export class UserContextModel {
  constructor(private collection: Collection<UserContext>) {}

  async getContext(userTelegramId: number): Promise<UserContext | null> {
    return await this.collection.findOne({ userTelegramId });
  }

  async ensureContext(userTelegramId: number): Promise<UserContext> {
    const existing = await this.getContext(userTelegramId);
    if (existing) {
      return existing;
    }

    const now = new Date();
    const context: UserContext = {
      userTelegramId,
      currentTopic: null,
      lastIntent: null,
      lastSubject: null,
      lastQuery: null,
      queryCount: 0,
      sessionStartedAt: now,
      updatedAt: now,
    };
    await this.collection.insertOne(context);
    return context;
  }

  async updateContext(userTelegramId: number, update: UserContextUpdate): Promise<void> {
    const now = new Date();
    await this.collection.updateOne(
      { userTelegramId },
      {
        $set: { ...update, updatedAt: now },
        $setOnInsert: { queryCount: 0, sessionStartedAt: now },
      },
      { upsert: true },
    );
  }

  async recordQuery(userTelegramId: number, query: string): Promise<void> {
    await this.collection.updateOne(
      { userTelegramId },
      {
        $set: { lastQuery: query, updatedAt: new Date() },
        $inc: { queryCount: 1 },
      },
    );
  }

  async createIndexes(): Promise<void> {
    await ensureIndexes(this.collection, 'UserContext', [
      {
        keys: { userTelegramId: 1 },
        options: { unique: true },
        description: 'One context per user',
      },
    ]);
  }
}
