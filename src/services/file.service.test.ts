import { rm } from 'node:fs/promises';
import { ObjectId } from 'mongodb';
import { describe, it, expect, vi, beforeEach, afterAll } from 'vitest';
import { config } from '../common/config.js';
import { FileTooLargeError } from '../common/errors.js';
import { FileType } from '../common/message-types.js';
import { StoredFile } from '../database/models/StoredFile.js';

vi.mock('../database/index.js', () => ({
  database: { getStoredFileModel: () => fakeFiles },
}));

import {
  FileService,
  buildStoredName,
  extractKeywords,
  getFileType,
  normalizeTags,
} from './file.service.js';

class FakeStoredFileModel {
  files: StoredFile[] = [];

  async addFile(file: Omit<StoredFile, '_id'>): Promise<StoredFile> {
    const stored = { ...file, _id: new ObjectId() };
    this.files.push(stored);
    return stored;
  }

  async listFiles(userId: number, fileType?: FileType): Promise<StoredFile[]> {
    return this.files
      .filter((f) => f.userTelegramId === userId && f.isActive && (!fileType || f.fileType === fileType))
      .sort((a, b) => b.uploadedAt.getTime() - a.uploadedAt.getTime());
  }

  async findActiveByHash(userId: number, sha256: string): Promise<StoredFile | null> {
    return this.files.find((f) => f.userTelegramId === userId && f.sha256 === sha256 && f.isActive) ?? null;
  }

  async findById(id: string): Promise<StoredFile | null> {
    return this.files.find((f) => f._id?.toHexString() === id) ?? null;
  }

  async softDelete(id: string, userId: number): Promise<boolean> {
    const file = this.files.find((f) => f._id?.toHexString() === id && f.userTelegramId === userId && f.isActive);
    if (!file) return false;
    file.isActive = false;
    return true;
  }

  async setTags(id: string, userId: number, tags: string[]): Promise<boolean> {
    const file = this.files.find((f) => f._id?.toHexString() === id && f.userTelegramId === userId && f.isActive);
    if (!file) return false;
    file.tags = tags;
    return true;
  }
}

const fakeFiles = new FakeStoredFileModel();

const seed = (overrides: Partial<StoredFile>): StoredFile => {
  const file: StoredFile = {
    _id: new ObjectId(),
    userTelegramId: 5,
    fileName: 'file.pdf',
    storedName: 'stored.pdf',
    filePath: '/nowhere/stored.pdf',
    fileType: 'pdf',
    fileSize: 100,
    sha256: 'hash',
    subject: 'general',
    tags: [],
    isActive: true,
    uploadedAt: new Date('2024-03-01T12:00:00Z'),
    ...overrides,
  };
  fakeFiles.files.push(file);
  return file;
};

describe('file helpers', () => {
  it('detects file types from mime type then extension', () => {
    expect(getFileType('notes.PDF')).toBe('pdf');
    expect(getFileType('scan.bin', 'image/png')).toBe('image');
    expect(getFileType('essay.docx')).toBe('document');
    expect(getFileType('x.txt', 'application/octet-stream')).toBe('document');
    expect(getFileType('song.xyz')).toBe('other');
  });

  it('builds safe stored names', () => {
    const now = new Date(Date.UTC(2024, 0, 5, 9, 3, 7));
    expect(buildStoredName(42, 'My Notes (v2)!.pdf', now, 'abcdef0123456789')).toBe(
      '42_20240105_090307_abcdef01_My_Notes_v2.pdf',
    );
    expect(buildStoredName(1, '???.png', now, '0011223344')).toBe('1_20240105_090307_00112233_file.png');
  });

  it('keeps same-second uploads with the same name apart', () => {
    const now = new Date(Date.UTC(2024, 0, 5, 9, 3, 7));
    expect(buildStoredName(1, 'notes.pdf', now, 'aaaaaaaa11')).not.toBe(buildStoredName(1, 'notes.pdf', now, 'bbbbbbbb22'));
  });

  it('extracts keywords without stop words', () => {
    expect(extractKeywords('Please send the Physics notes, and Chemistry PDF!!')).toEqual([
      'physics',
      'chemistry',
    ]);
    expect(
      extractKeywords('alpha beta gamma delta epsilon zeta theta iota kappa lambda omega sigma'),
    ).toEqual(['alpha', 'beta', 'gamma', 'delta', 'epsilon', 'zeta', 'theta', 'iota', 'kappa', 'lambda']);
  });

  it('normalizes tags', () => {
    expect(normalizeTags(['#Physics', ' physics ', '', 'Exam'])).toEqual(['physics', 'exam']);
  });
});

describe('FileService', () => {
  const service = new FileService();

  beforeEach(() => {
    fakeFiles.files = [];
  });

  afterAll(async () => {
    await rm(config.files.dir, { recursive: true, force: true });
  });

  it('stores a file on disk and deduplicates by content', async () => {
    const data = Buffer.from('hello world');

    const first = await service.storeFile({ userId: 5, fileName: 'Algebra notes.pdf', data });
    const second = await service.storeFile({ userId: 5, fileName: 'copy.pdf', data });

    expect(first.duplicate).toBe(false);
    expect(first.file.fileType).toBe('pdf');
    expect(first.file.subject).toBe('math');
    expect(first.file.sha256).toBe('b94d27b9934d3e08a52e52d7da7dabfac484efe37a5380ee9088f7ace2efcde9');
    expect(first.file.storedName).toMatch(/^5_\d{8}_\d{6}_b94d27b9_Algebra_notes\.pdf$/);
    expect(await service.readFile(first.file)).toEqual(data);
    expect(second.duplicate).toBe(true);
    expect(second.file._id).toEqual(first.file._id);
    expect(fakeFiles.files).toHaveLength(1);
  });

  it('rejects files over the size limit', async () => {
    const data = Buffer.alloc(config.files.maxFileSizeBytes + 1);

    await expect(service.storeFile({ userId: 5, fileName: 'big.pdf', data })).rejects.toBeInstanceOf(
      FileTooLargeError,
    );
    expect(fakeFiles.files).toHaveLength(0);
  });

  describe('with stored files', () => {
    let f1: StoredFile;
    let f2: StoredFile;
    let f3: StoredFile;

    beforeEach(() => {
      f1 = seed({ fileName: 'Physics formulas.pdf', subject: 'physics', uploadedAt: new Date('2024-03-04T12:00:00Z'), fileSize: 100 });
      f2 = seed({
        fileName: 'scan.jpg',
        fileType: 'image',
        description: 'optics diagram',
        subject: 'physics',
        uploadedAt: new Date('2024-03-03T12:00:00Z'),
        fileSize: 200,
      });
      f3 = seed({ fileName: 'doc.pdf', tags: ['exam'], uploadedAt: new Date('2024-03-02T12:00:00Z'), fileSize: 300 });
      seed({ fileName: 'x.pdf', subject: 'chemistry', uploadedAt: new Date('2024-02-20T12:00:00Z'), fileSize: 400 });
    });

    it('searches name, description, tags and subject', async () => {
      expect(await service.searchFiles(5, 'physics')).toEqual([
        { file: f1, matchType: 'filename' },
        { file: f2, matchType: 'subject' },
      ]);
      expect(await service.searchFiles(5, 'optics')).toEqual([{ file: f2, matchType: 'description' }]);
      expect(await service.searchFiles(5, 'EXAM')).toEqual([{ file: f3, matchType: 'tags' }]);
      expect(await service.searchFiles(5, '  ')).toEqual([]);
    });

    it('suggests files by keyword and falls back to recent ones', async () => {
      expect(await service.findRelevantFiles(5, 'physics exam ke notes')).toEqual([
        { file: f1, matchType: 'filename' },
        { file: f2, matchType: 'subject' },
        { file: f3, matchType: 'tags' },
      ]);
      expect(await service.findRelevantFiles(5, 'history')).toEqual([
        { file: f1, matchType: 'recent' },
        { file: f2, matchType: 'recent' },
        { file: f3, matchType: 'recent' },
      ]);
    });

    it('computes stats', async () => {
      expect(await service.getFileStats(5, new Date('2024-03-08T00:00:00Z'))).toEqual({
        totalFiles: 4,
        totalSize: 1000,
        byType: { pdf: { count: 3, size: 800 }, image: { count: 1, size: 200 } },
        recentUploads: 3,
      });
    });

    it('looks up only the owner\'s active files', async () => {
      const id = f1._id?.toHexString() ?? '';

      expect(await service.getFile(5, id)).toBe(f1);
      expect(await service.getFile(6, id)).toBeNull();
      await service.deleteFile(5, id);
      expect(await service.getFile(5, id)).toBeNull();
    });

    it('soft deletes and tags files', async () => {
      const id = f1._id?.toHexString() ?? '';

      expect(await service.tagFile(5, id, ['#Mechanics'])).toEqual(['mechanics']);
      expect(await service.deleteFile(5, id)).toBe(true);
      expect(await service.deleteFile(5, id)).toBe(false);
      expect(await service.tagFile(5, id, ['x'])).toBeNull();
      expect(await service.listFiles(5)).toEqual([f2, f3, expect.objectContaining({ fileName: 'x.pdf' })]);
    });
  });
});
