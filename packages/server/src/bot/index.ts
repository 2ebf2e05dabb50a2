import { logger } from '../utils/logger.js';
import { BotClient } from './BotClient.js';

// Parse optional config from environment
const config = {
  // biome-ignore lint/complexity/useLiteralKeys: TS noPropertyAccessFromIndexSignature
  host: process.env['HOST'] ?? '127.0.0.1',
  // biome-ignore lint/complexity/useLiteralKeys: TS noPropertyAccessFromIndexSignature
  port: Number(process.env['PORT']) || 5000,
  // biome-ignore lint/complexity/useLiteralKeys: TS noPropertyAccessFromIndexSignature
  thinkTimeMs: Number(process.env['BOT_THINK_TIME']) || 500,
};

logger.info('Starting bot player', config);

const bot = new BotClient(config);
bot.connect();

process.on('SIGTERM', () => {
  logger.info('SIGTERM received, disconnecting bot...');
  bot.disconnect();
  process.exit(0);
});

process.on('SIGINT', () => {
  logger.info('SIGINT received, disconnecting bot...');
  bot.disconnect();
  process.exit(0);
});
