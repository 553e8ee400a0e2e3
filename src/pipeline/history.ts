// Duplicate detection against a client's ideas and posts

import { Idea, Post } from '../shared/types.js';

const HASHTAG_TAIL = /(?:\s+#[\p{L}\p{N}_-]+)+\s*$/u;

// Case, punctuation, spacing and trailing hashtags do not make two texts different
export const dedupKeyFor = (text: string): string =>
  text
    .replace(HASHTAG_TAIL, '')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();

export class ContentHistory {
  private keys = new Set<string>();

  constructor(ideas: Idea[] = [], posts: Post[] = []) {
    for (const idea of ideas) {
      this.remember(idea.headline, idea.summary);
    }
    for (const post of posts) {
      this.remember(post.body);
    }
  }

  // True when any of the texts matches something already on file
  has(...texts: string[]): boolean {
    return texts.some(text => {
      const key = dedupKeyFor(text);
      return key !== '' && this.keys.has(key);
    });
  }

  remember(...texts: string[]): void {
    for (const text of texts) {
      const key = dedupKeyFor(text);
      if (key) this.keys.add(key);
    }
  }

  get size(): number {
    return this.keys.size;
  }
}
