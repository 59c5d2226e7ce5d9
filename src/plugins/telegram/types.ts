import type { Telegraf } from 'telegraf';

export type ConnectorStatus = 'connecting' | 'connected' | 'disconnected';

export interface TelegramChatRef {
  id: number | string;
  type?: string;
}

export interface TelegramState {
  bot: Telegraf | null;
  status: ConnectorStatus;
}
