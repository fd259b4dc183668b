import { createHash } from 'node:crypto';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { config } from '../common/config.js';
import { loadDataFile } from '../common/data.js';
import { FileTooLargeError } from '../common/errors.js';
import logger from '../common/logger.js';
import { FILE_TYPE, FileType } from '../common/message-types.js';
import { database } from '../database/index.js';
import { StoredFile } from '../database/models/StoredFile.js';
import { extractSubject } from './context.service.js';

export interface FileUpload {
  userId: number;
  fileName: string;
  data: Buffer;
  mimeType?: string;
  telegramFileId?: string;
  description?: string;
}

export interface StoreResult {
  file: StoredFile;
  duplicate: boolean;
}

export type MatchType = 'filename' | 'description' | 'tags' | 'subject' | 'recent';

export interface FileMatch {
  file: StoredFile;
  matchType: MatchType;
}

export interface FileStats {
  totalFiles: number;
  totalSize: number;
  byType: Partial<Record<FileType, { count: number; size: number }>>;
  recentUploads: number;
}

const TYPE_DIRS: Record<FileType, string> = {
  pdf: 'pdfs',
  image: 'images',
  document: 'documents',
  audio: 'audio',
  video: 'video',
  other: 'other',
};

const EXTENSION_TYPES: Record<string, FileType> = {
  '.pdf': FILE_TYPE.PDF,
  '.jpg': FILE_TYPE.IMAGE,
  '.jpeg': FILE_TYPE.IMAGE,
  '.png': FILE_TYPE.IMAGE,
  '.gif': FILE_TYPE.IMAGE,
  '.webp': FILE_TYPE.IMAGE,
  '.bmp': FILE_TYPE.IMAGE,
  '.doc': FILE_TYPE.DOCUMENT,
  '.docx': FILE_TYPE.DOCUMENT,
  '.txt': FILE_TYPE.DOCUMENT,
  '.rtf': FILE_TYPE.DOCUMENT,
  '.odt': FILE_TYPE.DOCUMENT,
  '.mp3': FILE_TYPE.AUDIO,
  '.wav': FILE_TYPE.AUDIO,
  '.ogg': FILE_TYPE.AUDIO,
  '.m4a': FILE_TYPE.AUDIO,
  '.mp4': FILE_TYPE.VIDEO,
  '.mkv': FILE_TYPE.VIDEO,
  '.mov': FILE_TYPE.VIDEO,
  '.webm': FILE_TYPE.VIDEO,
};

const DOCUMENT_MIME_TYPES = new Set([
  'application/msword',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  'text/plain',
  'application/rtf',
]);

const STOP_WORDS = new Set(loadDataFile('stop-words.json', z.array(z.string())));

const MAX_KEYWORDS = 10;
const MAX_SUGGESTIONS = 5;
const RECENT_FALLBACK = 3;
const RECENT_DAYS = 7;
const DAY_MS = 24 * 60 * 60 * 1000;

export const getFileType = (fileName: string, mimeType?: string): FileType => {
  if (mimeType) {
    if (mimeType.startsWith('image/')) return FILE_TYPE.IMAGE;
    if (mimeType === 'application/pdf') return FILE_TYPE.PDF;
    if (mimeType.startsWith('audio/')) return FILE_TYPE.AUDIO;
    if (mimeType.startsWith('video/')) return FILE_TYPE.VIDEO;
    if (DOCUMENT_MIME_TYPES.has(mimeType)) return FILE_TYPE.DOCUMENT;
  }
  return EXTENSION_TYPES[path.extname(fileName).toLowerCase()] ?? FILE_TYPE.OTHER;
};

const pad = (value: number): string => String(value).padStart(2, '0');

const formatStamp = (date: Date): string =>
  `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
  `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;

const HASH_PREFIX_LENGTH = 8;

/**
 * `<userId>_<yyyyMMdd_HHmmss>_<hash8>_<safe-name><ext>`, timestamp in UTC.
 * The content hash keeps two uploads within the same second apart.
 */
export const buildStoredName = (userId: number, fileName: string, now: Date, sha256: string): string => {
  const ext = path.extname(fileName);
  const base = path.basename(fileName, ext);
  const safe = base
    .replace(/[^\p{L}\p{N} _-]/gu, '')
    .trimEnd()
    .replaceAll(' ', '_');

  return `${userId}_${formatStamp(now)}_${sha256.slice(0, HASH_PREFIX_LENGTH)}_${safe || 'file'}${ext}`;
};

export const extractKeywords = (text: string): string[] =>
  text
    .toLowerCase()
    .split(/\s+/)
    .map((word) => word.replace(/^[.,!?;:'"()]+|[.,!?;:'"()]+$/g, ''))
    .filter((word) => word.length > 2 && !STOP_WORDS.has(word))
    .slice(0, MAX_KEYWORDS);

export const normalizeTags = (tags: string[]): string[] => [
  ...new Set(
    tags
      .map((tag) => tag.trim().replace(/^#+/, '').toLowerCase())
      .filter((tag) => tag.length > 0),
  ),
];

const fileKey = (file: StoredFile): string => file._id?.toHexString() ?? file.storedName;

export class FileService {
  async storeFile(upload: FileUpload): Promise<StoreResult> {
    const maxSize = config.files.maxFileSizeBytes;
    if (upload.data.length > maxSize) {
      throw new FileTooLargeError(upload.data.length, maxSize);
    }

    const files = database.getStoredFileModel();
    const sha256 = createHash('sha256').update(upload.data).digest('hex');

    const existing = await files.findActiveByHash(upload.userId, sha256);
    if (existing) {
      logger.info(
        { userId: upload.userId, fileName: upload.fileName, existingId: fileKey(existing) },
        'Duplicate upload, reusing stored file',
      );
      return { file: existing, duplicate: true };
    }

    const now = new Date();
    const fileType = getFileType(upload.fileName, upload.mimeType);
    const storedName = buildStoredName(upload.userId, upload.fileName, now, sha256);
    const targetDir = path.join(config.files.dir, TYPE_DIRS[fileType]);
    const filePath = path.join(targetDir, storedName);

    await mkdir(targetDir, { recursive: true });
    await writeFile(filePath, upload.data);

    const file = await files.addFile({
      userTelegramId: upload.userId,
      fileName: upload.fileName,
      storedName,
      filePath,
      telegramFileId: upload.telegramFileId,
      fileType,
      mimeType: upload.mimeType,
      fileSize: upload.data.length,
      sha256,
      subject: extractSubject(`${upload.fileName} ${upload.description ?? ''}`, []),
      description: upload.description,
      tags: [],
      isActive: true,
      uploadedAt: now,
    });

    logger.info(
      { userId: upload.userId, fileName: upload.fileName, storedName, fileType },
      'File stored successfully',
    );
    return { file, duplicate: false };
  }

  async listFiles(userId: number, fileType?: FileType): Promise<StoredFile[]> {
    return database.getStoredFileModel().listFiles(userId, fileType);
  }

  /**
   * Case-insensitive match on file name, then description, tags and subject.
   * Each file is reported once, under the first field that matched.
   */
  async searchFiles(userId: number, query: string, fileType?: FileType): Promise<FileMatch[]> {
    const needle = query.trim().toLowerCase();
    if (!needle) {
      return [];
    }

    const files = await this.listFiles(userId, fileType);
    return files.flatMap((file): FileMatch[] => {
      if (file.fileName.toLowerCase().includes(needle)) {
        return [{ file, matchType: 'filename' }];
      }
      if (file.description?.toLowerCase().includes(needle)) {
        return [{ file, matchType: 'description' }];
      }
      if (file.tags.some((tag) => tag.toLowerCase().includes(needle))) {
        return [{ file, matchType: 'tags' }];
      }
      if (file.subject !== 'general' && file.subject.includes(needle)) {
        return [{ file, matchType: 'subject' }];
      }
      return [];
    });
  }

  async findRelevantFiles(userId: number, text: string): Promise<FileMatch[]> {
    const found = new Map<string, FileMatch>();

    for (const keyword of extractKeywords(text)) {
      for (const match of await this.searchFiles(userId, keyword)) {
        const key = fileKey(match.file);
        if (!found.has(key)) {
          found.set(key, match);
        }
      }
    }

    if (found.size > 0) {
      return [...found.values()].slice(0, MAX_SUGGESTIONS);
    }

    const recent = await this.listFiles(userId);
    return recent.slice(0, RECENT_FALLBACK).map((file) => ({ file, matchType: 'recent' }));
  }

  async deleteFile(userId: number, fileId: string): Promise<boolean> {
    const deleted = await database.getStoredFileModel().softDelete(fileId, userId);
    logger.info({ userId, fileId, deleted }, 'File delete requested');
    return deleted;
  }

  async tagFile(userId: number, fileId: string, tags: string[]): Promise<string[] | null> {
    const normalized = normalizeTags(tags);
    const updated = await database.getStoredFileModel().setTags(fileId, userId, normalized);
    return updated ? normalized : null;
  }

  async getFileStats(userId: number, now: Date = new Date()): Promise<FileStats> {
    const files = await this.listFiles(userId);
    const since = now.getTime() - RECENT_DAYS * DAY_MS;

    const byType: FileStats['byType'] = {};
    for (const file of files) {
      const entry = byType[file.fileType] ?? { count: 0, size: 0 };
      entry.count += 1;
      entry.size += file.fileSize;
      byType[file.fileType] = entry;
    }

    return {
      totalFiles: files.length,
      totalSize: files.reduce((sum, file) => sum + file.fileSize, 0),
      byType,
      recentUploads: files.filter((file) => file.uploadedAt.getTime() >= since).length,
    };
  }

  async getFile(userId: number, fileId: string): Promise<StoredFile | null> {
    const file = await database.getStoredFileModel().findById(fileId);
    return file && file.isActive && file.userTelegramId === userId ? file : null;
  }

  async readFile(file: StoredFile): Promise<Buffer> {
    return readFile(file.filePath);
  }
}

export const formatFileSize = (bytes: number): string => {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
};
