import { Telegraf, Context } from 'telegraf';
import { Update } from 'telegraf/typings/core/types/typegram';
import { AlertPriority, MessageSender } from '../types/notifications';
import { AppError, ErrorSeverity, toCollaboratorError } from '../utils/errorHandler';
import { logger } from '../utils/logger';

const PRIORITY_ICON: Record<AlertPriority, string> = {
  low: 'ℹ️',
  normal: '🔔',
  high: '🚨',
  critical: '🔥'
};

const SEND_CONTEXT = { operation: 'telegram_send', collaborator: 'telegram' };

function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(new AppError(
        `telegram unavailable: no response within ${timeoutMs}ms`,
        'COLLABORATOR_UNAVAILABLE',
        ErrorSeverity.MEDIUM,
        SEND_CONTEXT
      ));
    }, timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Secondary alert channel. Alerts go to one configured chat; `/status` in that
 * chat replies with the summary from `statusProvider` once polling is started.
 */
export class TelegramService implements MessageSender {
  readonly channel = 'telegram';
  private bot: Telegraf<Context<Update>>;
  private chatId: string;
  private statusProvider: (() => string) | null;
  private running = false;

  constructor(
    token: string,
    chatId: string,
    statusProvider?: () => string,
    private readonly timeoutMs: number = 10000
  ) {
    this.bot = new Telegraf(token);
    this.chatId = chatId;
    this.statusProvider = statusProvider ?? null;

    this.setupCommands();
  }

  private setupCommands(): void {
    this.bot.command('start', (ctx) => this.handleStart(String(ctx.message.chat.id)));
    this.bot.command('status', (ctx) => this.handleStatus(String(ctx.message.chat.id)));

    this.bot.catch((error: unknown) => {
      logger.error('Telegram bot error:', error);
    });
  }

  private isAuthorized(chatId: string): boolean {
    return chatId === this.chatId;
  }

  private async handleStart(chatId: string): Promise<void> {
    if (!this.isAuthorized(chatId)) return;
    await this.sendMessage(chatId, '🚀 Price alert monitor is running.\nSend /status for the current state.');
  }

  private async handleStatus(chatId: string): Promise<void> {
    if (!this.isAuthorized(chatId)) return;
    const text = this.statusProvider ? this.statusProvider() : 'Status is not available.';
    await this.sendMessage(chatId, text);
  }

  async sendMessage(chatId: string, text: string): Promise<void> {
    try {
      await withTimeout(
        this.bot.telegram.sendMessage(chatId, text, { link_preview_options: { is_disabled: true } }),
        this.timeoutMs
      );
      logger.debug(`Telegram message sent to ${chatId}, text length: ${text.length}`);
    } catch (error) {
      throw toCollaboratorError(error, SEND_CONTEXT);
    }
  }

  async send(title: string, message: string, priority: AlertPriority): Promise<void> {
    await this.sendMessage(this.chatId, `${PRIORITY_ICON[priority]} ${title}\n${message}`);
  }

  /** Starts long polling for commands; alert delivery works without it. */
  start(): void {
    if (this.running || !this.statusProvider) return;
    this.running = true;
    this.bot.launch().catch((error: unknown) => {
      this.running = false;
      logger.error('Telegram polling stopped:', error);
    });
    logger.info('Telegram command polling started');
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;
    this.bot.stop('shutdown');
    logger.info('Telegram command polling stopped');
  }
}
