import { config } from './common/config.js';
import logger from './common/logger.js';
import { database } from './database/index.js';
import { TelegramBotService } from './services/telegram-bot.service.js';
import { WebhookServer } from './servers/webhook.server.js';

type ExitReason = 'SIGINT' | 'SIGTERM' | 'uncaughtException' | 'unhandledRejection';

class VidyaApplication {
  private botService: TelegramBotService | null = null;
  private server: WebhookServer | null = null;
  private stopping: Promise<void> | null = null;

  async initialize(): Promise<void> {
    logger.info(
      {
        mode: config.telegram.mode,
        chatModel: config.openAi.chatModel,
        visionModel: config.openAi.visionModel,
        filesDir: config.files.dir,
      },
      'Starting Vidya bot',
    );

    await database.initialize();

    this.botService = new TelegramBotService();
    if (config.telegram.mode === 'webhook') {
      this.server = new WebhookServer(this.botService);
    }
  }

  async start(): Promise<void> {
    const botService = this.botService;
    if (!botService) {
      throw new Error('Application not initialized');
    }

    this.installProcessHandlers();

    await botService.start();
    this.server?.start();

    logger.info(
      { mode: config.telegram.mode, botUsername: botService.getBotUsername() },
      'Vidya bot is up',
    );
  }

  /**
   * Stops accepting updates, ends running group quizzes and closes MongoDB.
   * Safe to call more than once.
   */
  shutdown(): Promise<void> {
    this.stopping ??= this.stopAll();
    return this.stopping;
  }

  private async stopAll(): Promise<void> {
    logger.info('Shutting down...');
    try {
      await this.server?.stop();
      await this.botService?.stop();
      await database.disconnect();
      logger.info('Shutdown complete');
    } catch (error) {
      logger.error(error, 'Error during shutdown');
    }
  }

  private installProcessHandlers(): void {
    const exit = async (reason: ExitReason, code: number): Promise<void> => {
      logger.info({ reason }, 'Exiting');
      await this.shutdown();
      process.exit(code);
    };

    process.once('SIGINT', () => exit('SIGINT', 0));
    process.once('SIGTERM', () => exit('SIGTERM', 0));

    process.on('uncaughtException', (error) => {
      logger.error(error, 'Uncaught exception');
      return exit('uncaughtException', 1);
    });

    process.on('unhandledRejection', (reason) => {
      logger.error({ reason }, 'Unhandled promise rejection');
      return exit('unhandledRejection', 1);
    });
  }
}

const app = new VidyaApplication();

async function main() {
  try {
    await app.initialize();
    await app.start();
  } catch (error) {
    logger.error(error, 'Failed to start application');
    await app.shutdown();
    process.exit(1);
  }
}

main().catch((error) => {
  logger.error(error, 'Unhandled error in main');
  process.exit(1);
});
