/**
 * Load environment variables FIRST before anything else
 * This file must be imported before any other modules
 */
import dotenv from 'dotenv';
import { existsSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const rootDir = join(__dirname, '../../');
const backendDir = join(__dirname, '../');

const envName = (process.env.DOSEBELL_ENV || process.env.NODE_ENV || 'development').trim();
const candidateFiles = [`.env.${envName}`, `.env.${envName}.local`];

const searchDirs = [rootDir, backendDir];
const loadedFiles: string[] = [];

for (const candidate of candidateFiles) {
  for (const dir of searchDirs) {
    const fullPath = join(dir, candidate);
    if (existsSync(fullPath) && !loadedFiles.includes(fullPath)) {
      dotenv.config({ path: fullPath, override: true });
      loadedFiles.push(fullPath);
    }
  }
}

if (loadedFiles.length > 0) {
  console.log('📝 Loaded environment files:', loadedFiles.join(', '));
} else {
  console.warn('⚠️  No environment files found. Expected one of', candidateFiles.join(', '));
}

const isTestEnv = process.env.NODE_ENV === 'test';

// Keep test runs hermetic; nothing in a test talks to Telegram.
if (isTestEnv) {
  process.env.TELEGRAM_BOT_TOKEN ??= 'test-bot-token';
}

interface RequiredSetting {
  key: string;
  description: string;
}

const requiredSettings: RequiredSetting[] = [
  { key: 'DATABASE_URL', description: 'Postgres connection string' },
  { key: 'TELEGRAM_BOT_TOKEN', description: 'Bot token issued by BotFather' }
];

const missing = requiredSettings
  .filter(({ key }) => !process.env[key])
  .map(({ key, description }) => `${key} (${description})`);

if (missing.length > 0) {
  console.error('❌ Missing required environment variables:\n  -', missing.join('\n  - '));
  console.error('Set the variables above before starting the bot.');
  process.exit(1);
}
