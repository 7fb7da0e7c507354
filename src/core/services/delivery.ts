/**
 * Delivery contract between the refresh cycle and a chat transport
 */

export interface MessageSender {
  sendMessage(chatId: number, text: string): Promise<void>;
  /** True when the error means the chat will never accept messages again */
  isRecipientGone?(error: unknown): boolean;
}
