import { Collection, ObjectId } from 'mongodb';
import { Intent, MessageType, Subject } from '../../common/message-types.js';
import { ensureIndexes } from './indexes.js';

export type Sender = 'user' | 'bot';

export interface TurnContextData {
  intent: Intent;
  subject: Subject;
}

export interface ConversationTurn {
  _id?: ObjectId;
  userTelegramId: number; // Reference to TelegramUser.telegramId
  chatTelegramId: number;
  sender: Sender;
  text: string;
  messageType: MessageType;
  contextData?: TurnContextData;
  sentAt: Date;
}

export class ConversationModel {
  constructor(private collection: Collection<ConversationTurn>) {}

  async addTurn(turn: Omit<ConversationTurn, '_id' | 'sentAt'>): Promise<ConversationTurn> {
    const doc: ConversationTurn = { ...turn, sentAt: new Date() };
    await this.collection.insertOne(doc);
    return doc;
  }

  /**
   * Latest `limit` turns of a user, returned oldest first.
   */
  async getHistory(userTelegramId: number, limit: number): Promise<ConversationTurn[]> {
    const latest = await this.collection
      .find({ userTelegramId })
      .sort({ sentAt: -1 })
      .limit(limit)
      .toArray();

    return latest.reverse();
  }

  async countByUser(userTelegramId: number): Promise<number> {
    return this.collection.countDocuments({ userTelegramId });
  }

  async countAll(): Promise<number> {
    return this.collection.countDocuments({});
  }

  // only the user's side is pruned; bot replies stay for /memory context
  async deleteOlderThan(cutoff: Date): Promise<number> {
    const result = await this.collection.deleteMany({
      sentAt: { $lt: cutoff },
      sender: 'user',
    });
    return result.deletedCount;
  }

  async createIndexes(): Promise<void> {
    await ensureIndexes(this.collection, 'Conversation', [
      {
        keys: { userTelegramId: 1, sentAt: -1 },
        description: 'Main query index for getHistory',
      },
      {
        keys: { sentAt: 1, sender: 1 },
        description: 'Retention cleanup index',
      },
    ]);
  }
}
