// Unit tests for content history de-duplication

import { describe, it, expect } from 'vitest';
import { ContentHistory, dedupKeyFor } from '../../../src/pipeline/history.js';
import { Idea, Post } from '../../../src/shared/types.js';

const idea = (headline: string, summary: string): Idea => ({
  id: `idea-${headline}`,
  clientId: 'client-1',
  headline,
  summary,
  origin: 'curated',
  state: 'new',
  createdAt: '2026-01-01T00:00:00.000Z',
  updatedAt: '2026-01-01T00:00:00.000Z'
});

const post = (body: string): Post => ({
  id: `post-${body}`,
  clientId: 'client-1',
  ideaId: 'idea-1',
  body,
  channel: 'facebook',
  status: 'published',
  attempts: 1,
  createdAt: '2026-01-01T00:00:00.000Z',
  updatedAt: '2026-01-01T00:00:00.000Z'
});

describe('dedupKeyFor', () => {
  it('ignores case, punctuation, spacing and trailing hashtags', () => {
    expect(dedupKeyFor('Fresh sourdough, every   morning!\n\n#bakery #local')).toBe('fresh sourdough every morning');
    expect(dedupKeyFor('Café #1 opens')).toBe('café 1 opens');
  });
});

describe('ContentHistory', () => {
  it('matches idea headlines, summaries and post bodies', () => {
    const history = new ContentHistory(
      [idea('Autumn menu', 'Pumpkin loaves are back')],
      [post('Fresh sourdough every morning\n\n#bakery')]
    );

    expect(history.has('autumn menu.')).toBe(true);
    expect(history.has('Something new', 'PUMPKIN LOAVES ARE BACK')).toBe(true);
    expect(history.has('Fresh sourdough every morning')).toBe(true);
    expect(history.has('Winter menu')).toBe(false);
  });

  it('never matches empty text', () => {
    const history = new ContentHistory([idea('Autumn menu', '')]);

    expect(history.size).toBe(1);
    expect(history.has('', '  !! ')).toBe(false);
  });

  it('remembers texts added later', () => {
    const history = new ContentHistory();
    history.remember('Open house on Sunday');

    expect(history.has('open house on sunday')).toBe(true);
  });
});
