import { Context } from 'grammy';
import { getMainMenuKeyboard } from './buttons';

/**
 * Manage message lifecycle: delete old messages, keep chat clean
 */

const lastBotMessage = new Map<string, { chatId: number; messageId: number }>();

export async function deleteUserMessage(ctx: Context): Promise<void> {
  const chatId = ctx.chat?.id;
  const messageId = ctx.message?.message_id;
  if (!chatId || !messageId) return;

  try {
    await ctx.api.deleteMessage(chatId, messageId);
  } catch (error) {
    console.debug('[MessageManager] Could not delete user message:', error instanceof Error ? error.message : error);
  }
}

export async function deletePreviousBotMessage(ctx: Context, userId: string): Promise<void> {
  const previous = lastBotMessage.get(userId);
  if (!previous) return;

  lastBotMessage.delete(userId);
  try {
    await ctx.api.deleteMessage(previous.chatId, previous.messageId);
  } catch (error) {
    console.debug('[MessageManager] Previous message already gone:', error instanceof Error ? error.message : error);
  }
}

export function storeBotMessageId(userId: string, chatId: number, messageId: number): void {
  lastBotMessage.set(userId, { chatId, messageId });
}

/**
 * Send fresh response: delete old messages, send new with menu
 */
export async function sendFreshResponse(
  ctx: Context,
  userId: string,
  message: string,
  keyboard = getMainMenuKeyboard()
): Promise<void> {
  await deleteUserMessage(ctx);
  await deletePreviousBotMessage(ctx, userId);

  const response = await ctx.reply(message, { reply_markup: keyboard });
  storeBotMessageId(userId, response.chat.id, response.message_id);
}
