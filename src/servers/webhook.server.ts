import { Hono } from 'hono';
import { bearerAuth } from 'hono/bearer-auth';
import { serve, ServerType } from '@hono/node-server';
import { webhookCallback } from 'grammy';
import { z } from 'zod';
import { config } from '../common/config.js';
import logger from '../common/logger.js';
import { TelegramBotService } from '../services/telegram-bot.service.js';

export type WebhookBot = Pick<
  TelegramBotService,
  'getBot' | 'setWebhook' | 'getWebhookInfo' | 'deleteWebhook'
>;

export interface WebhookServerOptions {
  secret?: string;
  webhookUrl?: string;
}

export const WEBHOOK_TIMEOUT_MS = 55_000;

const MANAGEMENT_PATHS = ['/set_webhook', '/get_webhook_info', '/delete_webhook'];

const setWebhookBodySchema = z.object({
  webhook_url: z.string().url().optional(),
});

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export class WebhookServer {
  private app: Hono;
  private server: ServerType | null = null;

  constructor(
    private readonly telegramBotService: WebhookBot,
    private readonly options: WebhookServerOptions = {
      secret: config.telegram.webhookSecret,
      webhookUrl: config.telegram.webhookUrl,
    },
  ) {
    this.app = new Hono();
    this.setupRoutes();
  }

  get routes(): Hono {
    return this.app;
  }

  private setupRoutes(): void {
    const { secret } = this.options;
    if (secret) {
      for (const path of MANAGEMENT_PATHS) {
        this.app.use(path, bearerAuth({ token: secret }));
      }
    }

    this.app.get('/', (c) =>
      c.json({
        status: 'ok',
        message: 'Vidya study bot is running',
        bot_initialized: this.telegramBotService.getBot().isInited(),
      }),
    );

    this.app.get('/health', (c) =>
      c.json({
        status: 'ok',
        timestamp: new Date().toISOString(),
        service: 'vidya-bot',
      }),
    );

    this.app.post('/set_webhook', async (c) => {
      const raw = await c.req.text();
      let body: unknown = {};
      if (raw.trim()) {
        try {
          body = JSON.parse(raw);
        } catch {
          return c.json({ error: 'Body must be JSON' }, 400);
        }
      }

      const parsed = setWebhookBodySchema.safeParse(body);
      if (!parsed.success) {
        return c.json({ error: 'webhook_url must be a valid URL' }, 400);
      }

      const url = parsed.data.webhook_url ?? this.options.webhookUrl;
      if (!url) {
        return c.json({ error: 'webhook_url is required' }, 400);
      }

      try {
        await this.telegramBotService.setWebhook(url);
        return c.json({ status: 'ok', webhook_url: url });
      } catch (error) {
        logger.error(error, 'Failed to set webhook');
        return c.json({ error: errorMessage(error) }, 500);
      }
    });

    this.app.get('/get_webhook_info', async (c) => {
      try {
        const info = await this.telegramBotService.getWebhookInfo();
        return c.json({ status: 'ok', webhook_info: info });
      } catch (error) {
        logger.error(error, 'Failed to get webhook info');
        return c.json({ error: errorMessage(error) }, 500);
      }
    });

    this.app.post('/delete_webhook', async (c) => {
      try {
        await this.telegramBotService.deleteWebhook();
        return c.json({ status: 'ok', message: 'Webhook deleted' });
      } catch (error) {
        logger.error(error, 'Failed to delete webhook');
        return c.json({ error: errorMessage(error) }, 500);
      }
    });

    // Telegram gets its 200 before slow AI handlers finish, so it does not redeliver
    this.app.post(
      '/webhook',
      webhookCallback(this.telegramBotService.getBot(), 'hono', {
        secretToken: secret,
        timeoutMilliseconds: WEBHOOK_TIMEOUT_MS,
        onTimeout: 'return',
      }),
    );

    this.app.notFound((c) => {
      logger.warn(
        {
          path: c.req.path,
          method: c.req.method,
          userAgent: c.req.header('user-agent'),
        },
        'Not found request',
      );

      return c.json({ error: 'Not found' }, 404);
    });

    this.app.onError((err, c) => {
      logger.error(
        {
          error: err,
          path: c.req.path,
          method: c.req.method,
        },
        'Server error',
      );

      return c.json({ error: 'Internal server error' }, 500);
    });
  }

  start(): void {
    const port = config.telegram.serverPort;
    const host = config.telegram.serverHost;

    logger.info({ host, port }, 'Starting webhook server');

    this.server = serve({
      fetch: this.app.fetch,
      port,
      hostname: host,
    });

    logger.info(`Webhook server started on ${host}:${port}`);
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;

    logger.info('Stopping webhook server');
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    this.server = null;
    logger.info('Webhook server stopped');
  }
}
