import { Collection, ObjectId } from 'mongodb';
import { FileType, Subject } from '../../common/message-types.js';
import { ensureIndexes } from './indexes.js';

export interface StoredFile {
  _id?: ObjectId;
  userTelegramId: number; // Reference to TelegramUser.telegramId
  fileName: string;
  storedName: string;
  filePath: string;
  telegramFileId?: string;
  fileType: FileType;
  mimeType?: string;
  fileSize: number;
  sha256: string;
  subject: Subject;
  description?: string;
  tags: string[];
  isActive: boolean;
  uploadedAt: Date;
}

export const toObjectId = (id: string): ObjectId | null =>
  ObjectId.isValid(id) ? new ObjectId(id) : null;

export class StoredFileModel {
  constructor(private collection: Collection<StoredFile>) {}

  async addFile(file: Omit<StoredFile, '_id'>): Promise<StoredFile> {
    const result = await this.collection.insertOne({ ...file });
    return { ...file, _id: result.insertedId };
  }

  async listFiles(userTelegramId: number, fileType?: FileType): Promise<StoredFile[]> {
    return await this.collection
      .find({
        userTelegramId,
        isActive: true,
        ...(fileType ? { fileType } : {}),
      })
      .sort({ uploadedAt: -1 })
      .toArray();
  }

  async findActiveByHash(userTelegramId: number, sha256: string): Promise<StoredFile | null> {
    return await this.collection.findOne({ userTelegramId, sha256, isActive: true });
  }

  async findById(id: string): Promise<StoredFile | null> {
    const _id = toObjectId(id);
    return _id ? await this.collection.findOne({ _id }) : null;
  }

  async softDelete(id: string, userTelegramId: number): Promise<boolean> {
    const _id = toObjectId(id);
    if (!_id) {
      return false;
    }
    const result = await this.collection.updateOne(
      { _id, userTelegramId, isActive: true },
      { $set: { isActive: false } },
    );
    return result.modifiedCount > 0;
  }

  async setTags(id: string, userTelegramId: number, tags: string[]): Promise<boolean> {
    const _id = toObjectId(id);
    if (!_id) {
      return false;
    }
    const result = await this.collection.updateOne(
      { _id, userTelegramId, isActive: true },
      { $set: { tags } },
    );
    return result.matchedCount > 0;
  }

  async countAll(): Promise<number> {
    return this.collection.countDocuments({ isActive: true });
  }

  async createIndexes(): Promise<void> {
    await ensureIndexes(this.collection, 'StoredFile', [
      {
        keys: { userTelegramId: 1, uploadedAt: -1 },
        description: 'User file listing index',
      },
      {
        keys: { userTelegramId: 1, sha256: 1 },
        description: 'Duplicate upload lookup',
      },
    ]);
  }
}
