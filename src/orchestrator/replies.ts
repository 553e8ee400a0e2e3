// Outbound chat message templates

import { Category, Client, Post, StageOutcome } from '../shared/types.js';
import { CATEGORY_MENU } from './interpreter.js';

const PREVIEW_LENGTH = 140;

const CHANNEL_LABELS: Record<Post['channel'], string> = {
  facebook: 'Facebook',
  instagram: 'Instagram',
  linkedin: 'LinkedIn'
};

export const channelLabel = (channel: Post['channel']): string => CHANNEL_LABELS[channel];

const preview = (body: string): string => {
  const flat = body.replace(/\s+/g, ' ').trim();
  return flat.length > PREVIEW_LENGTH ? `${flat.slice(0, PREVIEW_LENGTH - 1)}…` : flat;
};

export const greeting = (client: Client): string => {
  const menu = CATEGORY_MENU.map((category, index) => `${index + 1}. ${category.label}`).join('\n');
  return `Hi ${client.name}! What would you like to work on?\n\n${menu}\n\nReply with a number or a name.`;
};

export const categoryPrompt = (category: Category): string => {
  const entry = CATEGORY_MENU.find(candidate => candidate.id === category);
  const label = entry?.label ?? category;

  if (!entry?.available) {
    return `${label} is coming soon. For now I can help with *Social Media*. Say *hi* to see the menu again.`;
  }

  return `*${label}*\n\n` +
    '• Say *show* to see posts waiting for your approval\n' +
    '• Or describe an idea (you can attach a photo) and I will draft a post for it';
};

export const pendingList = (posts: Post[]): string => {
  if (posts.length === 0) {
    return 'Nothing is waiting for approval right now. Send me an idea and I will draft something.';
  }

  const lines = posts.map((post, index) => `${index + 1}. [${channelLabel(post.channel)}] ${preview(post.body)}`);
  return `Here ${posts.length === 1 ? 'is the post' : `are ${posts.length} posts`} waiting for approval:\n\n${lines.join('\n\n')}\n\nReply *first*, *second*… to look at one.`;
};

export const postDetail = (post: Post, ordinal?: number): string =>
  `${ordinal ? `Post #${ordinal} ` : ''}for ${channelLabel(post.channel)}:\n\n${post.body}\n\n` +
  'Reply *approve* to publish it or *reject* (with optional feedback).';

export const postUnavailable = (): string =>
  'That post is no longer waiting for approval. Say *show* to see the current list.';

export const approvalResult = (post: Post, outcome: StageOutcome): string => {
  const channel = channelLabel(post.channel);
  if (post.status === 'published') {
    return `✅ Approved and published to ${channel}!`;
  }
  if (post.status === 'failed') {
    return `Approved, but publishing to ${channel} failed: ${post.error ?? outcome.diagnostic ?? 'unknown error'}`;
  }
  return `✅ Approved. It will go out to ${channel} as soon as publishing is available.`;
};

export const rejected = (feedback?: string): string =>
  feedback ? `Got it, I rejected that post. Feedback noted: "${feedback}"` : 'Got it, I rejected that post.';

export const cancelled = (): string => 'No problem. Say *hi* whenever you want the menu again.';

export const ideaReceived = (): string =>
  "Thanks! I've saved your idea and I'm drafting a post for it now. I'll send the draft here shortly.";

export const duplicateIdea = (): string =>
  "I already have that idea on file, so I won't draft it twice. Say *show* to see what's waiting for approval.";

export const draftReady = (post: Post): string =>
  `Here's a draft for your idea (${channelLabel(post.channel)}):\n\n${post.body}\n\nReply *approve* to publish it or *reject* to discard it.`;

export const draftFailed = (reason?: string): string =>
  `I couldn't draft your idea right now${reason ? ` (${reason})` : ''}. It's saved and will be picked up in the next run.`;

export const unknownClient = (): string =>
  "I don't recognise this account yet. Please ask your account manager to register it.";

export const inactiveClient = (): string =>
  'Your account is not active right now, so I cannot work on posts. Please contact your account manager.';
