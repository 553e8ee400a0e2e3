// Shared Slack utilities

// DMs carry channel_type "im"; older payloads only have the D-prefixed channel id
export const isDirectMessage = (channelType: string | undefined, channel: string): boolean =>
  channelType === 'im' || channel.startsWith('D');

// Strip bot mention from message
export const stripBotMention = (text: string): string => {
  if (!text) return '';

  // Remove <@USERID> mentions
  let cleaned = text.replace(/<@[A-Z0-9]+>/g, '').trim();

  // Remove multiple spaces
  cleaned = cleaned.replace(/\s+/g, ' ');

  return cleaned;
};

// Slack wraps links as <url> or <url|label>; keep the bare url
export const unwrapLinks = (text: string): string =>
  text.replace(/<(https?:\/\/[^|>]+)(?:\|[^>]*)?>/g, '$1');

// First image link in a message, used as the idea's image reference
export const extractImageUrl = (text: string): string | undefined => {
  const match = /https?:\/\/\S+\.(?:png|jpe?g|gif|webp)(?:\?\S*)?/i.exec(text);
  return match ? match[0] : undefined;
};

// Truncate text with ellipsis
export const truncate = (text: string, maxLength: number): string => {
  if (text.length <= maxLength) return text;
  return text.slice(0, maxLength - 3) + '...';
};
