import { Bot } from 'grammy';
import { Update, WebhookInfo } from 'grammy/types';
import { describe, it, expect, vi, beforeEach, afterEach, Mock } from 'vitest';
import { BotContext } from '../services/telegram-bot.service.js';
import { WEBHOOK_TIMEOUT_MS, WebhookBot, WebhookServer } from './webhook.server.js';

const botInfo = {
  id: 999,
  is_bot: true as const,
  first_name: 'Vidya',
  username: 'vidya_test_bot',
  can_join_groups: true,
  can_read_all_group_messages: false,
  supports_inline_queries: false,
  can_connect_to_business: false,
  has_main_web_app: false,
  has_topics_enabled: false,
  allows_users_to_create_topics: false,
};

const SECRET = 'test-secret';
const auth = { Authorization: `Bearer ${SECRET}` };

describe('WebhookServer', () => {
  let setWebhook: Mock<(url: string) => Promise<void>>;
  let server: WebhookServer;

  const createServer = (
    webhookUrl?: string,
    bot: Bot<BotContext> = new Bot<BotContext>('test-token', { botInfo }),
  ): WebhookServer => {
    const service: WebhookBot = {
      getBot: () => bot,
      setWebhook,
      getWebhookInfo: vi.fn<() => Promise<WebhookInfo>>().mockResolvedValue({
        url: 'https://example.test/webhook',
        has_custom_certificate: false,
        pending_update_count: 0,
      }),
      deleteWebhook: vi.fn<() => Promise<void>>().mockResolvedValue(undefined),
    };
    return new WebhookServer(service, { secret: SECRET, webhookUrl });
  };

  beforeEach(() => {
    setWebhook = vi.fn<(url: string) => Promise<void>>().mockResolvedValue(undefined);
    server = createServer();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('reports health', async () => {
    const res = await server.routes.request('/health');

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok', service: 'vidya-bot' });
  });

  it('reports bot status on the root route', async () => {
    const res = await server.routes.request('/');

    expect(await res.json()).toEqual({
      status: 'ok',
      message: 'Vidya study bot is running',
      bot_initialized: true,
    });
  });

  it('requires the bearer token on management routes', async () => {
    const res = await server.routes.request('/delete_webhook', { method: 'POST' });

    expect(res.status).toBe(401);
  });

  it('sets the webhook from the request body', async () => {
    const res = await server.routes.request('/set_webhook', {
      method: 'POST',
      headers: { ...auth, 'Content-Type': 'application/json' },
      body: JSON.stringify({ webhook_url: 'https://example.test/hook' }),
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok', webhook_url: 'https://example.test/hook' });
    expect(setWebhook).toHaveBeenCalledWith('https://example.test/hook');
  });

  it('falls back to the configured webhook url', async () => {
    server = createServer('https://example.test/configured');

    const res = await server.routes.request('/set_webhook', { method: 'POST', headers: auth });

    expect(res.status).toBe(200);
    expect(setWebhook).toHaveBeenCalledWith('https://example.test/configured');
  });

  it('rejects a missing webhook url', async () => {
    const res = await server.routes.request('/set_webhook', { method: 'POST', headers: auth });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'webhook_url is required' });
  });

  it('returns 500 when telegram refuses the webhook', async () => {
    setWebhook.mockRejectedValue(new Error('Bad Request: bad webhook'));

    const res = await server.routes.request('/set_webhook', {
      method: 'POST',
      headers: auth,
      body: JSON.stringify({ webhook_url: 'https://example.test/hook' }),
    });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: 'Bad Request: bad webhook' });
  });

  it('returns webhook info', async () => {
    const res = await server.routes.request('/get_webhook_info', { headers: auth });

    expect(await res.json()).toEqual({
      status: 'ok',
      webhook_info: {
        url: 'https://example.test/webhook',
        has_custom_certificate: false,
        pending_update_count: 0,
      },
    });
  });

  it('acknowledges a slow update instead of failing the webhook call', async () => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
    const bot = new Bot<BotContext>('test-token', { botInfo });
    let release: () => void = () => undefined;
    let finished = false;
    bot.on('message', async () => {
      await new Promise<void>((resolve) => {
        release = resolve;
      });
      finished = true;
    });
    server = createServer(undefined, bot);

    const update: Update = {
      update_id: 7,
      message: {
        message_id: 1,
        date: 1_700_000_000,
        chat: { id: 42, type: 'private', first_name: 'Asha' },
        from: { id: 42, is_bot: false, first_name: 'Asha' },
        text: 'ek lamba sawaal',
      },
    };
    const pending = server.routes.request('/webhook', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', 'X-Telegram-Bot-Api-Secret-Token': SECRET },
      body: JSON.stringify(update),
    });

    await vi.advanceTimersByTimeAsync(WEBHOOK_TIMEOUT_MS);
    const res = await pending;

    expect(res.status).toBe(200);
    expect(finished).toBe(false);
    release();
  });

  it('answers unknown routes with 404', async () => {
    const res = await server.routes.request('/nope');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found' });
  });
});
