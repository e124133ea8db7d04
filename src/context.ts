/**
 * Where a command came from. Transports (console, Telegram, Discord) map
 * their own message metadata onto this shape; ids are strings because
 * Discord snowflakes overflow a JS number.
 *
 * @module context
 */

export type ChatType = 'private' | 'group' | 'supergroup' | 'channel'

export type CommandContext = {
  userId: string
  chatId: string
  chatType: ChatType
}
