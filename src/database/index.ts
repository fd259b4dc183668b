import { databaseConnection } from './connection.js';
import { TelegramUser, TelegramUserModel } from './models/TelegramUser.js';
import { ConversationTurn, ConversationModel } from './models/Conversation.js';
import { UserContext, UserContextModel } from './models/UserContext.js';
import { StoredFile, StoredFileModel } from './models/StoredFile.js';
import { Quiz, QuizModel } from './models/Quiz.js';
import { QuizAttempt, QuizAttemptModel } from './models/QuizAttempt.js';
import { Group, GroupModel } from './models/Group.js';
import { GroupMember, GroupMemberModel } from './models/GroupMember.js';
import { GroupQuizSession, GroupQuizSessionModel } from './models/GroupQuizSession.js';
import logger from '../common/logger.js';

interface Models {
  telegramUsers: TelegramUserModel;
  conversations: ConversationModel;
  userContexts: UserContextModel;
  files: StoredFileModel;
  quizzes: QuizModel;
  quizAttempts: QuizAttemptModel;
  groups: GroupModel;
  groupMembers: GroupMemberModel;
  groupQuizSessions: GroupQuizSessionModel;
}

export interface UserStats {
  totalMessages: number;
  storedTurns: number;
  files: number;
  memberSince: Date | null;
}

export interface BotStats {
  users: number;
  turns: number;
  files: number;
  quizzes: number;
  groups: number;
}

export class Database {
  private models: Models | null = null;

  async initialize(): Promise<void> {
    const db = await databaseConnection.connect();

    this.models = {
      telegramUsers: new TelegramUserModel(db.collection<TelegramUser>('telegramusers')),
      conversations: new ConversationModel(db.collection<ConversationTurn>('conversations')),
      userContexts: new UserContextModel(db.collection<UserContext>('usercontexts')),
      files: new StoredFileModel(db.collection<StoredFile>('files')),
      quizzes: new QuizModel(db.collection<Quiz>('quizzes')),
      quizAttempts: new QuizAttemptModel(db.collection<QuizAttempt>('quizattempts')),
      groups: new GroupModel(db.collection<Group>('groups')),
      groupMembers: new GroupMemberModel(db.collection<GroupMember>('groupmembers')),
      groupQuizSessions: new GroupQuizSessionModel(
        db.collection<GroupQuizSession>('groupquizsessions'),
      ),
    };

    await this.createIndexes(this.models);

    logger.info('Database models initialized successfully');
  }

  private async createIndexes(models: Models): Promise<void> {
    try {
      logger.info('Creating database indexes...');

      for (const model of Object.values(models)) {
        await model.createIndexes();
      }

      logger.info('Database indexes created successfully');
    } catch (error) {
      logger.error(error, 'Failed to create database indexes');
    }
  }

  private getModels(): Models {
    if (!this.models) {
      throw new Error('Database not initialized. Call initialize() first.');
    }
    return this.models;
  }

  getTelegramUserModel(): TelegramUserModel {
    return this.getModels().telegramUsers;
  }

  getConversationModel(): ConversationModel {
    return this.getModels().conversations;
  }

  getUserContextModel(): UserContextModel {
    return this.getModels().userContexts;
  }

  getStoredFileModel(): StoredFileModel {
    return this.getModels().files;
  }

  getQuizModel(): QuizModel {
    return this.getModels().quizzes;
  }

  getQuizAttemptModel(): QuizAttemptModel {
    return this.getModels().quizAttempts;
  }

  getGroupModel(): GroupModel {
    return this.getModels().groups;
  }

  getGroupMemberModel(): GroupMemberModel {
    return this.getModels().groupMembers;
  }

  getGroupQuizSessionModel(): GroupQuizSessionModel {
    return this.getModels().groupQuizSessions;
  }

  async getUserStats(telegramId: number): Promise<UserStats> {
    const models = this.getModels();
    const [user, storedTurns, files] = await Promise.all([
      models.telegramUsers.findByTelegramId(telegramId),
      models.conversations.countByUser(telegramId),
      models.files.listFiles(telegramId),
    ]);

    return {
      totalMessages: user?.totalMessages ?? 0,
      storedTurns,
      files: files.length,
      memberSince: user?.createdAt ?? null,
    };
  }

  async getBotStats(): Promise<BotStats> {
    const models = this.getModels();
    const [users, turns, files, quizzes, groups] = await Promise.all([
      models.telegramUsers.countUsers(),
      models.conversations.countAll(),
      models.files.countAll(),
      models.quizzes.countAll(),
      models.groups.countActive(),
    ]);
    return { users, turns, files, quizzes, groups };
  }

  async disconnect(): Promise<void> {
    await databaseConnection.disconnect();
  }
}

export const database = new Database();
