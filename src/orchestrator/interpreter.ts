// Session interpreter: inbound chat text + session -> pipeline command
//
// Rules are evaluated in order and the first match wins. Adding an intent means
// adding a rule, not another branch.

import { Category, Channel, Client, ItemRef, Session } from '../shared/types.js';

export type UnknownReason =
  | 'no_list'
  | 'out_of_range'
  | 'nothing_selected'
  | 'wrong_item'
  | 'expired'
  | 'unrecognized';

export type Command =
  | { type: 'greet' }
  | { type: 'cancel' }
  | { type: 'show_category'; category: Category }
  | { type: 'list_pending_posts' }
  | { type: 'select_item'; ordinal: number; item: ItemRef }
  | { type: 'approve'; postId: string }
  | { type: 'reject'; postId: string; feedback?: string }
  | { type: 'submit_idea'; text: string; imageUrl?: string; channel?: Channel }
  | { type: 'unknown'; reason: UnknownReason; reply: string };

export interface InterpretOptions {
  imageUrl?: string;
  expired?: boolean;
}

export interface CategoryEntry {
  id: Category;
  label: string;
  keywords: string[];
  available: boolean;
}

export const CATEGORY_MENU: readonly CategoryEntry[] = [
  { id: 'social_media', label: 'Social Media', keywords: ['social media', 'social'], available: true },
  { id: 'digital_presence', label: 'Digital Presence', keywords: ['digital presence', 'digital', 'website'], available: false },
  { id: 'lead_generation', label: 'Lead Generation', keywords: ['lead generation', 'leads', 'lead gen'], available: false },
  { id: 'email_campaigns', label: 'Email Campaigns', keywords: ['email campaigns', 'email campaign', 'email'], available: false }
];

export const HELP_TEXT =
  "I didn't catch that. Say *hi* for the menu, *show* to see posts waiting for approval, " +
  'or describe an idea in a sentence and I will draft a post for it.';

const ORDINAL_WORDS: Record<string, number> = {
  first: 1,
  second: 2,
  third: 3,
  fourth: 4,
  fifth: 5,
  sixth: 6,
  seventh: 7,
  eighth: 8,
  ninth: 9,
  tenth: 10,
  one: 1,
  two: 2,
  three: 3
};

const GREETINGS = new Set(['hi', 'hello', 'hey', 'hiya', 'start', 'menu', 'good morning', 'good afternoon', 'good evening']);
const CANCELS = new Set(['exit', 'back', 'cancel', 'stop', 'never mind', 'nevermind', 'done', 'skip', 'none', 'nothing']);
const APPROVE_WORDS = ['approve', 'approved', 'publish', 'accept', 'post it', 'go ahead', 'yes', 'ok', 'okay', 'lgtm'];
const REJECT_PATTERN = /^(?:rejected|reject|decline|discard)\b\s*(.*)$/i;
const FEEDBACK_LEAD = /^(?:[:,\-]+\s*|because\s+)/i;
const FILLER_BEFORE_FEEDBACK = /^(?:it|this(?: one)?|that(?: one)?|the post)\s*(?=[:,\-]|because\s)/i;
const FILLERS = new Set(['', 'it', 'this', 'that', 'this one', 'that one', 'the post', 'post', 'please', 'now', 'it please']);

const CHANNEL_ALIASES: Record<string, Channel> = {
  facebook: 'facebook',
  fb: 'facebook',
  instagram: 'instagram',
  insta: 'instagram',
  ig: 'instagram',
  linkedin: 'linkedin'
};

const MIN_IDEA_WORDS = 3;

// Case-fold, trim, collapse whitespace, drop trailing punctuation
export const normalize = (text: string): string =>
  text.toLowerCase().replace(/\s+/g, ' ').trim().replace(/[.!?,;:]+$/, '').trim();

// Whitespace-collapsed text with the original casing, for extracted free text
const clean = (text: string): string => text.replace(/\s+/g, ' ').trim();

const wordCount = (text: string): number => (text ? text.split(' ').length : 0);

const ORDINAL_PATTERN =
  /^(?:the\s+)?(?:#\s*|number\s+|option\s+|no\.?\s*|post\s+)?(\d{1,2}|[a-z]+)(?:st|nd|rd|th)?(?:\s+(?:one|post|option))?$/;

// "first", "2", "#2", "number 2", "the 3rd one"; null when the text is not an ordinal
export const parseOrdinal = (text: string): number | null => {
  const match = ORDINAL_PATTERN.exec(text);
  if (!match) return null;
  const token = match[1];
  if (/^\d+$/.test(token)) return parseInt(token, 10);
  return ORDINAL_WORDS[token] ?? null;
};

interface RuleContext {
  client: Client;
  session: Session;
  normalized: string;
  clean: string;
  options: InterpretOptions;
}

interface Rule {
  name: string;
  match: (context: RuleContext) => Command | null;
}

const unknown = (reason: UnknownReason, reply: string): Command => ({ type: 'unknown', reason, reply });

const expiredReply = (): Command =>
  unknown('expired', "Our last conversation timed out, so I can't tell which item you mean. Say *show* to see pending posts again.");

// Resolve a 1-based ordinal against the list the user last saw
const resolveOrdinal = (context: RuleContext, ordinal: number): { item: ItemRef } | { error: Command } => {
  const list = context.session.lastShownList;
  if (list.length === 0) {
    if (context.options.expired) return { error: expiredReply() };
    return { error: unknown('no_list', "There's no list to pick from yet. Say *show* to see posts waiting for approval.") };
  }
  if (ordinal < 1 || ordinal > list.length) {
    return {
      error: unknown('out_of_range', `I only showed ${list.length} item${list.length === 1 ? '' : 's'}. Pick a number between 1 and ${list.length}.`)
    };
  }
  return { item: list[ordinal - 1] };
};

// Post targeted by approve/reject: an explicit ordinal, else the selected post
const resolveTargetPost = (context: RuleContext, rest: string): { postId: string } | { error: Command } | null => {
  const [head, ...tail] = rest.split(' ');
  const ordinal = rest
    ? parseOrdinal(rest) ?? (FILLERS.has(tail.join(' ')) ? parseOrdinal(head) : null)
    : null;

  if (ordinal !== null) {
    const resolved = resolveOrdinal(context, ordinal);
    if ('error' in resolved) return resolved;
    if (resolved.item.kind !== 'post') {
      return { error: unknown('wrong_item', 'That item is a menu option, not a post. Say *show* to see posts waiting for approval.') };
    }
    return { postId: resolved.item.id };
  }

  if (!FILLERS.has(rest)) return null;

  const intent = context.session.lastIntent;
  if (!intent || context.session.state !== 'awaiting_confirmation') {
    if (context.options.expired) return { error: expiredReply() };
    return {
      error: unknown('nothing_selected', 'Select a post first. Say *show* to see posts waiting for approval, then pick one with *first*, *second* or a number.')
    };
  }
  return { postId: intent.postId };
};

const splitKeyword = (text: string, keywords: string[]): string | null => {
  for (const keyword of keywords) {
    if (text === keyword) return '';
    if (text.startsWith(`${keyword} `)) return text.slice(keyword.length + 1);
  }
  return null;
};

interface Rejection {
  target: string; // an ordinal, or '' for the selected post
  feedback?: string;
}

// "reject", "reject it", "reject 2", "reject 2 too salesy", "reject: too long", "reject because ..."
// Anything else after the keyword is not a rejection
const parseRejection = (text: string): Rejection | null => {
  const match = REJECT_PATTERN.exec(text);
  if (!match) return null;
  const rest = match[1].trim();
  const restKey = normalize(rest);
  if (restKey && parseOrdinal(restKey) !== null) return { target: restKey };

  const [head, ...tail] = rest.split(' ');
  const headKey = normalize(head);
  if (headKey && parseOrdinal(headKey) !== null) {
    const remainder = tail.join(' ');
    const feedback = FILLERS.has(normalize(remainder)) ? '' : remainder.replace(FEEDBACK_LEAD, '').trim();
    return { target: headKey, feedback: feedback || undefined };
  }

  if (FILLERS.has(normalize(rest))) return { target: '' };

  const withoutFiller = rest.replace(FILLER_BEFORE_FEEDBACK, '');
  if (!FEEDBACK_LEAD.test(withoutFiller)) return null;

  const feedback = withoutFiller.replace(FEEDBACK_LEAD, '').trim();
  return { target: '', feedback: feedback || undefined };
};

const RULES: Rule[] = [
  {
    name: 'greet',
    match: ({ normalized }) => {
      if (GREETINGS.has(normalized)) return { type: 'greet' };
      const [first] = normalized.split(' ');
      return GREETINGS.has(first) && wordCount(normalized) <= 3 ? { type: 'greet' } : null;
    }
  },
  {
    name: 'cancel',
    match: ({ normalized }) => (CANCELS.has(normalized) ? { type: 'cancel' } : null)
  },
  {
    name: 'approve',
    match: context => {
      const rest = splitKeyword(context.normalized, APPROVE_WORDS);
      if (rest === null) return null;
      const target = resolveTargetPost(context, rest);
      if (!target) return null;
      return 'error' in target ? target.error : { type: 'approve', postId: target.postId };
    }
  },
  {
    name: 'reject',
    match: context => {
      // A bare "no" is the whole message and only counts when a post is selected
      const rejection: Rejection | null = context.normalized === 'no'
        ? context.session.lastIntent ? { target: '' } : null
        : parseRejection(context.clean);
      if (!rejection) return null;

      const target = resolveTargetPost(context, rejection.target);
      if (!target) return null;
      if ('error' in target) return target.error;
      return { type: 'reject', postId: target.postId, feedback: rejection.feedback };
    }
  },
  {
    name: 'list',
    match: ({ normalized }) => {
      if (wordCount(normalized) > 8) return null;
      return /^(show|list|see|view|pending)\b/.test(normalized) || /^what('s| is)? (pending|waiting)/.test(normalized)
        ? { type: 'list_pending_posts' }
        : null;
    }
  },
  {
    name: 'category',
    match: ({ normalized }) => {
      if (wordCount(normalized) > 4) return null;
      const entry = CATEGORY_MENU.find(category => category.keywords.some(keyword => normalized === keyword || normalized.includes(keyword)));
      return entry ? { type: 'show_category', category: entry.id } : null;
    }
  },
  {
    name: 'ordinal',
    match: context => {
      const ordinal = parseOrdinal(context.normalized);
      if (ordinal === null) return null;
      const resolved = resolveOrdinal(context, ordinal);
      return 'error' in resolved ? resolved.error : { type: 'select_item', ordinal, item: resolved.item };
    }
  }
];

const IDEA_PREFIX = /^(?:please\s+)?(?:(?:post|write|create|make|share)\s+(?:a\s+|an\s+)?(?:post\s+|something\s+)?(?:about|on)\s+|idea:\s*|new idea:\s*)/i;
const CHANNEL_PATTERN = /\b(?:for|on|to)\s+(facebook|fb|instagram|insta|ig|linkedin)\b/i;

const extractChannel = (text: string): Channel | undefined => {
  const match = CHANNEL_PATTERN.exec(text);
  return match ? CHANNEL_ALIASES[match[1].toLowerCase()] : undefined;
};

const ideaCommand = (context: RuleContext): Command => {
  const text = context.clean.replace(IDEA_PREFIX, '').trim();
  const imageUrl = context.options.imageUrl;

  if (!imageUrl && wordCount(normalize(text)) < MIN_IDEA_WORDS) {
    return unknown('unrecognized', HELP_TEXT);
  }

  return {
    type: 'submit_idea',
    text: text || 'Shared image',
    imageUrl,
    channel: extractChannel(text)
  };
};

export const interpret = (
  client: Client,
  session: Session,
  text: string,
  options: InterpretOptions = {}
): Command => {
  const context: RuleContext = {
    client,
    session,
    normalized: normalize(text),
    clean: clean(text),
    options
  };

  for (const rule of RULES) {
    const command = rule.match(context);
    if (command) return command;
  }

  return ideaCommand(context);
};
