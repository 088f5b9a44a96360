import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { AlertPriority, MessageSender } from '../types/notifications';
import { toCollaboratorError } from '../utils/errorHandler';
import { Formatters } from '../utils/formatters';
import { logger } from '../utils/logger';

const NTFY_PRIORITY: Record<AlertPriority, string> = {
  low: '2',
  normal: '3',
  high: '4',
  critical: '5'
};

export interface NtfyOptions {
  server: string;
  topic: string;
  timeoutMs?: number;
  adapter?: AxiosAdapter;
}

export class NtfyService implements MessageSender {
  readonly channel = 'ntfy';
  private readonly client: AxiosInstance;
  private readonly topic: string;

  constructor(options: NtfyOptions) {
    this.topic = options.topic;
    this.client = axios.create({
      baseURL: options.server.replace(/\/+$/, ''),
      timeout: options.timeoutMs ?? 10000,
      adapter: options.adapter
    });
  }

  async send(title: string, message: string, priority: AlertPriority): Promise<void> {
    try {
      await this.client.post(`/${encodeURIComponent(this.topic)}`, message, {
        headers: {
          'Content-Type': 'text/plain; charset=utf-8',
          Title: Formatters.toHeaderSafe(title).trim(),
          Priority: NTFY_PRIORITY[priority]
        }
      });
      logger.debug('ntfy notification sent', { topic: this.topic, title });
    } catch (error) {
      throw toCollaboratorError(error, { operation: 'ntfy_send', collaborator: 'ntfy' });
    }
  }
}
