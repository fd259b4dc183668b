import { Collection } from 'mongodb';
import { ensureIndexes } from './indexes.js';

export interface GroupSettings {
  questionTimeSec: number;
  questionsPerQuiz: number;
  joinWindowSec: number;
}

export interface Group {
  chatTelegramId: number;
  title: string;
  type: string;
  addedByTelegramId?: number;
  isActive: boolean;
  settings: GroupSettings;
  createdAt: Date;
  updatedAt: Date;
}

export interface GroupInput {
  chatTelegramId: number;
  title: string;
  type: string;
  addedByTelegramId?: number;
}

export class GroupModel {
  constructor(private collection: Collection<Group>) {}

  async findGroup(chatTelegramId: number): Promise<Group | null> {
    return await this.collection.findOne({ chatTelegramId });
  }

  /**
   * Registers the group or refreshes its title. Existing settings are kept.
   */
  async upsertGroup(input: GroupInput, defaults: GroupSettings): Promise<Group> {
    const now = new Date();
    await this.collection.updateOne(
      { chatTelegramId: input.chatTelegramId },
      {
        $set: { title: input.title, type: input.type, isActive: true, updatedAt: now },
        $setOnInsert: {
          addedByTelegramId: input.addedByTelegramId,
          settings: defaults,
          createdAt: now,
        },
      },
      { upsert: true },
    );

    const group = await this.findGroup(input.chatTelegramId);
    if (!group) {
      throw new Error('Failed to retrieve upserted group');
    }
    return group;
  }

  /**
   * Upserts, so groups that never went through registration keep their settings.
   */
  async updateSettings(input: GroupInput, settings: GroupSettings): Promise<void> {
    const now = new Date();
    await this.collection.updateOne(
      { chatTelegramId: input.chatTelegramId },
      {
        $set: { settings, updatedAt: now },
        $setOnInsert: { title: input.title, type: input.type, isActive: true, createdAt: now },
      },
      { upsert: true },
    );
  }

  async countActive(): Promise<number> {
    return this.collection.countDocuments({ isActive: true });
  }

  async createIndexes(): Promise<void> {
    await ensureIndexes(this.collection, 'Group', [
      {
        keys: { chatTelegramId: 1 },
        options: { unique: true },
        description: 'Primary lookup index',
      },
    ]);
  }
}
