export type AlertPriority = 'low' | 'normal' | 'high' | 'critical';

export interface MessageSender {
  readonly channel: string;
  send(title: string, message: string, priority: AlertPriority): Promise<void>;
}
