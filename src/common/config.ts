import dotenv from 'dotenv';

dotenv.config();

export type BotMode = 'webhook' | 'polling';

export interface Config {
  telegram: {
    botToken: string;
    mode: BotMode;
    webhookUrl?: string;
    webhookSecret?: string;
    serverHost: string;
    serverPort: number;
    adminIds: number[];
  };
  openAi: {
    apiKey: string;
    baseUrl?: string;
    chatModel: string;
    visionModel: string;
  };
  mongodb: {
    uri: string;
  };
  files: {
    dir: string;
    maxFileSizeBytes: number;
  };
  quiz: {
    maxQuestions: number;
    questionTimeSec: number;
    joinWindowSec: number;
  };
  memory: {
    maxHistoryMessages: number;
    contextWindowSize: number;
    retentionDays: number;
  };
  logLevel: string;
}

type Env = Record<string, string | undefined>;

// largest file the Bot API lets a bot download
export const TELEGRAM_DOWNLOAD_LIMIT_MB = 20;

const getRequiredEnvVar = (env: Env, name: string): string => {
  const value = env[name];

  if (!value) {
    throw new Error(`Environment variable ${name} is required but not set`);
  }

  return value;
};

const getIntEnvVar = (env: Env, name: string, fallback: number): number => {
  const parsed = parseInt(env[name] || '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

const parseMode = (value: string | undefined): BotMode =>
  value?.toLowerCase() === 'webhook' ? 'webhook' : 'polling';

export const parseIdList = (value: string | undefined): number[] =>
  (value || '')
    .split(',')
    .map((v) => v.trim())
    .filter((v) => v.length > 0)
    .map((v) => Number(v))
    .filter((v) => Number.isFinite(v));

export const loadConfig = (env: Env): Config => ({
  telegram: {
    botToken: getRequiredEnvVar(env, 'BOT_TOKEN'),
    mode: parseMode(env.BOT_MODE),
    webhookUrl: env.WEBHOOK_URL || undefined,
    webhookSecret: env.WEBHOOK_SECRET || undefined,
    serverHost: env.HOST || '0.0.0.0',
    serverPort: getIntEnvVar(env, 'PORT', 5000),
    adminIds: parseIdList(env.ADMIN_USER_IDS),
  },
  openAi: {
    apiKey: getRequiredEnvVar(env, 'OPENAI_API_KEY'),
    baseUrl: env.OPENAI_BASE_URL || undefined,
    chatModel: env.OPENAI_MODEL || 'gpt-4o-mini',
    visionModel: env.OPENAI_VISION_MODEL || 'gpt-4o-mini',
  },
  mongodb: {
    uri: getRequiredEnvVar(env, 'MONGODB_URI'),
  },
  files: {
    dir: env.FILES_DIR || 'files',
    maxFileSizeBytes:
      Math.min(getIntEnvVar(env, 'MAX_FILE_SIZE', TELEGRAM_DOWNLOAD_LIMIT_MB), TELEGRAM_DOWNLOAD_LIMIT_MB) * 1024 * 1024,
  },
  quiz: {
    maxQuestions: getIntEnvVar(env, 'MAX_QUIZ_QUESTIONS', 10),
    questionTimeSec: getIntEnvVar(env, 'QUIZ_TIME_LIMIT', 60),
    joinWindowSec: getIntEnvVar(env, 'QUIZ_JOIN_WINDOW', 30),
  },
  memory: {
    maxHistoryMessages: getIntEnvVar(env, 'MAX_HISTORY_MESSAGES', 100),
    contextWindowSize: getIntEnvVar(env, 'CONTEXT_WINDOW_SIZE', 10),
    retentionDays: getIntEnvVar(env, 'HISTORY_RETENTION_DAYS', 30),
  },
  logLevel: env.LOG_LEVEL || 'info',
});

export const config: Config = loadConfig(process.env);

export const isAdmin = (userId: number | undefined): boolean =>
  userId !== undefined && config.telegram.adminIds.includes(userId);
