import os from 'node:os';
import path from 'node:path';

process.env.BOT_TOKEN = 'test-token';
process.env.OPENAI_API_KEY = 'test-key';
process.env.MONGODB_URI = 'mongodb://localhost:27017/vidya-test';
process.env.FILES_DIR = path.join(os.tmpdir(), 'vidya-bot-tests');
process.env.LOG_LEVEL = 'silent';
