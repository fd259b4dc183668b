import { MongoClient, Db } from 'mongodb';
import { config } from '../common/config.js';
import logger from '../common/logger.js';

const SERVER_SELECTION_TIMEOUT_MS = 10_000;

class DatabaseConnection {
  private client: MongoClient | null = null;
  private db: Db | null = null;

  async connect(): Promise<Db> {
    if (this.db) {
      return this.db;
    }

    const client = new MongoClient(config.mongodb.uri, {
      appName: 'vidya-bot',
      serverSelectionTimeoutMS: SERVER_SELECTION_TIMEOUT_MS,
    });

    try {
      logger.info('Connecting to MongoDB...');
      await client.connect();

      const db = client.db();
      // fail at startup rather than on the first update
      await db.command({ ping: 1 });

      this.client = client;
      this.db = db;
      logger.info({ database: db.databaseName }, 'Connected to MongoDB');

      return db;
    } catch (error) {
      logger.error(error, 'Failed to connect to MongoDB');
      await client.close();
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    if (this.client) {
      await this.client.close();
      this.client = null;
      this.db = null;
      logger.info('Disconnected from MongoDB');
    }
  }

  getDb(): Db {
    if (!this.db) {
      throw new Error('Database not connected, call connect() first');
    }
    return this.db;
  }
}

export const databaseConnection = new DatabaseConnection();
