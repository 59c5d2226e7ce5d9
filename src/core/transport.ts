export type MessageId = number;

/** An inline button; `data` comes back through the transport's callback route. */
export interface ReplyButton {
  text: string;
  data: string;
}

export interface SendOptions {
  /** `markdown` is rendered by the transport; `plain` goes out verbatim. */
  format?: 'plain' | 'markdown';
  replyTo?: MessageId;
  silent?: boolean;
  /** Rows of inline buttons attached to a sent message. */
  buttons?: ReplyButton[][];
}

/**
 * Outbound chat operations. Failures are reported as `TransportError` with a
 * `kind` the presenter knows how to recover from.
 */
export interface Transport {
  sendMessage(chatId: string, text: string, opts?: SendOptions): Promise<MessageId>;
  editMessage(chatId: string, messageId: MessageId, text: string, opts?: SendOptions): Promise<void>;
  deleteMessage(chatId: string, messageId: MessageId): Promise<void>;
}
