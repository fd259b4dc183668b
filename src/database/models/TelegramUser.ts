import { Collection } from 'mongodb';
import { ensureIndexes } from './indexes.js';

export interface TelegramUserHistory {
  username?: string | null;
  firstName?: string | null;
  lastName?: string | null;
  languageCode?: string | null;
  isPremium?: boolean | null;
  timestamp: Date;
}

export interface TelegramUser {
  telegramId: number;
  username?: string | null;
  firstName?: string | null;
  lastName?: string | null;
  isBot: boolean;
  isPremium?: boolean;
  languageCode?: string | null;
  history: TelegramUserHistory[];
  totalMessages: number;
  lastActiveAt: Date;
  createdAt: Date;
  updatedAt: Date;
}

export interface TelegramUserInput {
  telegramId: number;
  username?: string | null;
  firstName?: string | null;
  lastName?: string | null;
  isBot?: boolean;
  isPremium?: boolean | null;
  languageCode?: string | null;
}

const PROFILE_FIELDS = ['username', 'firstName', 'lastName', 'languageCode'] as const;

const clean = (value?: string | null): string => (value ?? '').trim();

export const profileChanged = (existing: TelegramUser, input: TelegramUserInput): boolean =>
  PROFILE_FIELDS.some((field) => clean(existing[field]) !== clean(input[field])) ||
  (existing.isPremium === true) !== (input.isPremium === true);

const snapshot = (user: TelegramUser, timestamp: Date): TelegramUserHistory => ({
  username: user.username,
  firstName: user.firstName,
  lastName: user.lastName,
  languageCode: user.languageCode,
  isPremium: user.isPremium,
  timestamp,
});

export class TelegramUserModel {
  constructor(private collection: Collection<TelegramUser>) {}

  async findByTelegramId(telegramId: number): Promise<TelegramUser | null> {
    return await this.collection.findOne({ telegramId });
  }

  async upsertUser(userData: TelegramUserInput): Promise<TelegramUser> {
    const { telegramId } = userData;
    const existingUser = await this.findByTelegramId(telegramId);
    const now = new Date();

    if (!existingUser) {
      const newUser: TelegramUser = {
        telegramId,
        username: userData.username ?? null,
        firstName: userData.firstName ?? null,
        lastName: userData.lastName ?? null,
        isBot: userData.isBot === true,
        isPremium: userData.isPremium === true,
        languageCode: userData.languageCode ?? null,
        history: [],
        totalMessages: 0,
        lastActiveAt: now,
        createdAt: now,
        updatedAt: now,
      };
      await this.collection.insertOne(newUser);
      return newUser;
    }

    // renames and language switches are kept as history entries
    const update = profileChanged(existingUser, userData)
      ? {
          $set: {
            username: userData.username ?? null,
            firstName: userData.firstName ?? null,
            lastName: userData.lastName ?? null,
            isPremium: userData.isPremium === true,
            languageCode: userData.languageCode ?? null,
            lastActiveAt: now,
            updatedAt: now,
          },
          $push: { history: snapshot(existingUser, now) },
        }
      : { $set: { lastActiveAt: now } };

    const updatedUser = await this.collection.findOneAndUpdate({ telegramId }, update, {
      returnDocument: 'after',
    });
    if (!updatedUser) {
      throw new Error(`User ${telegramId} disappeared during update`);
    }
    return updatedUser;
  }

  async recordActivity(telegramId: number): Promise<void> {
    await this.collection.updateOne(
      { telegramId },
      { $inc: { totalMessages: 1 }, $set: { lastActiveAt: new Date() } },
    );
  }

  async countUsers(): Promise<number> {
    return this.collection.countDocuments({ isBot: false });
  }

  async createIndexes(): Promise<void> {
    await ensureIndexes(this.collection, 'TelegramUser', [
      {
        keys: { telegramId: 1 },
        options: { unique: true },
        description: 'Primary lookup index',
      },
    ]);
  }
}
