import { Collection } from 'mongodb';
import { ensureIndexes } from './indexes.js';

export type GroupRole = 'member' | 'admin';

export interface GroupMember {
  chatTelegramId: number; // Reference to Group.chatTelegramId
  userTelegramId: number; // Reference to TelegramUser.telegramId
  firstName: string;
  role: GroupRole;
  isActive: boolean;
  joinedAt: Date;
}

export class GroupMemberModel {
  constructor(private collection: Collection<GroupMember>) {}

  async addMember(
    chatTelegramId: number,
    userTelegramId: number,
    firstName: string,
    role: GroupRole = 'member',
  ): Promise<void> {
    await this.collection.updateOne(
      { chatTelegramId, userTelegramId },
      {
        $set: { firstName, isActive: true },
        $setOnInsert: { role, joinedAt: new Date() },
      },
      { upsert: true },
    );
  }

  async countMembers(chatTelegramId: number): Promise<number> {
    return this.collection.countDocuments({ chatTelegramId, isActive: true });
  }

  async createIndexes(): Promise<void> {
    await ensureIndexes(this.collection, 'GroupMember', [
      {
        keys: { chatTelegramId: 1, userTelegramId: 1 },
        options: { unique: true },
        description: 'Membership uniqueness',
      },
    ]);
  }
}
