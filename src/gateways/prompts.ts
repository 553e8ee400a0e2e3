// Generation prompts

import { Channel, Client, Idea } from '../shared/types.js';

export const IDEA_SYSTEM_PROMPT = `You are a content strategist for small businesses. You propose social media post ideas that fit a client's brand and audience.

## Guidelines
- Each idea is one concrete angle, not a theme
- Headlines are short (under 80 characters) and specific
- Summaries explain the angle in 1-2 sentences
- Vary the ideas: stories, tips, announcements, behind-the-scenes, questions
- Never repeat the same angle twice

## Output
Return valid JSON only, no markdown and no commentary:
{ "ideas": [ { "headline": "...", "summary": "..." } ] }`;

export const POST_SYSTEM_PROMPT = `You write social media posts for small businesses in their own brand voice.

## Writing Principles
- Hook: open with an emoji and a bold question, claim or announcement
- Story: connect the reader to the experience or value in 2-3 short sentences
- Urgency: add a reason to act now when it fits
- CTA: end with a clear, soft call to action
- Hashtags: 3-6 relevant tags

## Rules
- Do NOT output section labels like "Hook:" or "Story:"
- Separate sections with blank lines
- Match the client's brand voice and follow their instructions

## Output
Return valid JSON only, no markdown and no commentary:
{ "body": "<full post text>", "hashtags": ["#tag", "#tag"] }`;

// Length guidance per platform
export const CHANNEL_GUIDELINES: Record<Channel, string> = {
  facebook: 'Facebook post, 80-150 words, conversational, emojis welcome',
  instagram: 'Instagram caption, 60-120 words, visual and punchy, hashtags at the end',
  linkedin: 'LinkedIn post, 120-250 words, professional but warm, at most 3 emojis'
};

const describeClient = (client: Client): string => {
  const lines = [`Client: ${client.name}`];
  if (client.brandVoice) lines.push(`Brand voice: ${client.brandVoice}`);
  if (client.instructions) lines.push(`Instructions: ${client.instructions}`);
  if (client.channels.length > 0) lines.push(`Channels: ${client.channels.join(', ')}`);
  lines.push(`Posting cadence: ${client.cadencePerWeek} posts per week`);
  return lines.join('\n');
};

export const buildIdeaPrompt = (client: Client, count: number): string =>
  `${describeClient(client)}

Propose exactly ${count} post ideas for this client.`;

export const buildDraftPrompt = (client: Client, idea: Idea, channel: Channel): string =>
  `${describeClient(client)}

Idea headline: ${idea.headline}
Idea summary: ${idea.summary}${idea.sourceDetail ? `\nSource: ${idea.sourceDetail}` : ''}

Format: ${CHANNEL_GUIDELINES[channel]}

Write the post.`;
