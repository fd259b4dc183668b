import { describe, it, expect } from 'vitest';
import { loadConfig, parseIdList } from './config.js';

const baseEnv = {
  BOT_TOKEN: 'test-token',
  OPENAI_API_KEY: 'test-key',
  MONGODB_URI: 'mongodb://localhost:27017/test',
};

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig(baseEnv);

    expect(config.telegram.mode).toBe('polling');
    expect(config.telegram.serverPort).toBe(5000);
    expect(config.telegram.serverHost).toBe('0.0.0.0');
    expect(config.openAi.chatModel).toBe('gpt-4o-mini');
    expect(config.files.maxFileSizeBytes).toBe(20 * 1024 * 1024);
    expect(config.quiz).toEqual({ maxQuestions: 10, questionTimeSec: 60, joinWindowSec: 30 });
    expect(config.memory.retentionDays).toBe(30);
  });

  it('throws when a required variable is missing', () => {
    expect(() => loadConfig({ ...baseEnv, BOT_TOKEN: '' })).toThrow(
      'Environment variable BOT_TOKEN is required but not set',
    );
  });

  it('reads overrides and falls back on invalid numbers', () => {
    const config = loadConfig({
      ...baseEnv,
      BOT_MODE: 'WEBHOOK',
      PORT: '8080',
      MAX_FILE_SIZE: 'lots',
      QUIZ_TIME_LIMIT: '-5',
    });

    expect(config.telegram.mode).toBe('webhook');
    expect(config.telegram.serverPort).toBe(8080);
    expect(config.files.maxFileSizeBytes).toBe(20 * 1024 * 1024);
    expect(config.quiz.questionTimeSec).toBe(60);
  });
});

describe('file size limit', () => {
  it('never exceeds what the Bot API can download', () => {
    expect(loadConfig({ ...baseEnv, MAX_FILE_SIZE: '100' }).files.maxFileSizeBytes).toBe(20 * 1024 * 1024);
    expect(loadConfig({ ...baseEnv, MAX_FILE_SIZE: '5' }).files.maxFileSizeBytes).toBe(5 * 1024 * 1024);
  });
});

describe('parseIdList', () => {
  it('parses comma separated ids and skips junk', () => {
    expect(parseIdList(' 12, 34 ,,abc')).toEqual([12, 34]);
    expect(parseIdList(undefined)).toEqual([]);
  });
});
