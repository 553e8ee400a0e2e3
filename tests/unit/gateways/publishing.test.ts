// Unit tests for the publishing gateway

import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  composePostBody,
  createPublisherRegistry,
  FacebookPublisher,
  formatForPlatform,
  InstagramPublisher,
  LinkedInPublisher,
  PublisherRegistry
} from '../../../src/gateways/publishing/index.js';
import { ErrorCategory, isPipelineError } from '../../../src/shared/errors.js';
import { Client, Post } from '../../../src/shared/types.js';

// Mock fetch for the platform APIs
const mockFetch = vi.fn<typeof fetch>();
global.fetch = mockFetch;

const jsonResponse = (body: unknown, status = 200, headers: Record<string, string> = {}) =>
  new Response(JSON.stringify(body), { status, headers });

const formOf = (call: number) => new URLSearchParams(String(mockFetch.mock.calls[call][1]?.body));

const client: Client = {
  id: 'client-1',
  name: 'Sunrise Bakery',
  handle: 'U-SUNRISE',
  status: 'active',
  channels: ['facebook', 'instagram', 'linkedin'],
  cadencePerWeek: 3,
  brandVoice: '',
  instructions: '',
  approvalMode: 'manual',
  pageIds: { facebook: 'page-1', instagram: 'ig-1', linkedin: 'urn:li:organization:42' },
  createdAt: '2026-01-01T00:00:00.000Z',
  updatedAt: '2026-01-01T00:00:00.000Z'
};

const post = (overrides: Partial<Post> = {}): Post => ({
  id: 'post-1',
  clientId: 'client-1',
  ideaId: 'idea-1',
  body: 'Hook: **Fresh** sourdough today',
  channel: 'facebook',
  status: 'approved',
  attempts: 0,
  createdAt: '2026-01-01T00:00:00.000Z',
  updatedAt: '2026-01-01T00:00:00.000Z',
  ...overrides
});

describe('format', () => {
  it('strips section labels and markdown emphasis', () => {
    expect(formatForPlatform('Hook: **Big news** today\nCTA: *Visit* us')).toBe('Big news today\nVisit us');
  });

  it('appends only the hashtags the body lacks', () => {
    expect(composePostBody('Fresh bread #bakery', ['#bakery', 'local', ' '])).toBe('Fresh bread #bakery\n\n#local');
    expect(composePostBody(' Fresh bread #bakery ', ['#bakery'])).toBe('Fresh bread #bakery');
  });
});

describe('FacebookPublisher', () => {
  const publisher = new FacebookPublisher({ accessToken: 'test-token', timeoutMs: 1000 });

  beforeEach(() => {
    mockFetch.mockReset();
  });

  it('posts to the page feed with the page token', async () => {
    mockFetch
      .mockResolvedValueOnce(jsonResponse({ data: [{ id: 'page-1', access_token: 'page-token' }] }))
      .mockResolvedValueOnce(jsonResponse({ id: 'page-1_99' }));

    const result = await publisher.publish(post(), client);

    expect(result).toEqual({ platformPostId: 'page-1_99' });
    expect(mockFetch.mock.calls[0][0]).toBe('https://graph.facebook.com/v18.0/me/accounts?access_token=test-token');
    expect(mockFetch.mock.calls[1][0]).toBe('https://graph.facebook.com/v18.0/page-1/feed');
    expect(formOf(1).get('message')).toBe('Fresh sourdough today');
    expect(formOf(1).get('access_token')).toBe('page-token');
  });

  it('posts a photo when the post has media', async () => {
    mockFetch
      .mockResolvedValueOnce(jsonResponse({ data: [{ id: 'page-1', access_token: 'page-token' }] }))
      .mockResolvedValueOnce(jsonResponse({ id: 'photo-7' }));

    await publisher.publish(post({ mediaUrl: 'https://example.com/loaf.jpg' }), client);

    expect(mockFetch.mock.calls[1][0]).toBe('https://graph.facebook.com/v18.0/page-1/photos');
    expect(formOf(1).get('url')).toBe('https://example.com/loaf.jpg');
    expect(formOf(1).get('caption')).toBe('Fresh sourdough today');
  });

  it('fails permanently when the page is not among the accounts', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ data: [] }));

    const error = await publisher.publish(post(), client).catch((caught: unknown) => caught);

    expect(isPipelineError(error, ErrorCategory.PERMANENT_UPSTREAM)).toBe(true);
    expect(error).toHaveProperty('message', 'Facebook rejected the request: no page token for page page-1');
  });

  it('needs a page id before calling the API', async () => {
    const error = await publisher
      .publish(post(), { ...client, pageIds: {} })
      .catch((caught: unknown) => caught);

    expect(isPipelineError(error, ErrorCategory.CONFIGURATION_MISSING)).toBe(true);
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('classifies rate limiting as transient', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ error: { message: 'slow down' } }, 429, { 'Retry-After': '30' }));

    const error = await publisher.publish(post(), client).catch((caught: unknown) => caught);

    expect(isPipelineError(error, ErrorCategory.TRANSIENT_UPSTREAM)).toBe(true);
    expect(error).toHaveProperty('retryable', true);
    expect(error).toHaveProperty('details.retryAfterSeconds', 30);
  });

  it('classifies client errors as permanent with the platform message', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ error: { message: 'Invalid parameter' } }, 400));

    const error = await publisher.publish(post(), client).catch((caught: unknown) => caught);

    expect(error).toHaveProperty('message', 'Facebook rejected the request (400): Invalid parameter');
    expect(error).toHaveProperty('retryable', false);
  });

  it('classifies network failures as transient', async () => {
    mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));

    const error = await publisher.publish(post(), client).catch((caught: unknown) => caught);

    expect(error).toHaveProperty('message', 'Facebook error: fetch failed');
    expect(error).toHaveProperty('retryable', true);
  });
});

describe('InstagramPublisher', () => {
  const publisher = new InstagramPublisher({ accessToken: 'test-token', timeoutMs: 1000 });

  beforeEach(() => {
    mockFetch.mockReset();
  });

  it('requires an image', async () => {
    const error = await publisher
      .publish(post({ channel: 'instagram' }), client)
      .catch((caught: unknown) => caught);

    expect(error).toHaveProperty('message', 'Instagram rejected the request: Instagram posts require an image');
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('creates a container and publishes it', async () => {
    mockFetch
      .mockResolvedValueOnce(jsonResponse({ id: 'container-5' }))
      .mockResolvedValueOnce(jsonResponse({ id: 'media-6' }));

    const result = await publisher.publish(
      post({ channel: 'instagram', mediaUrl: 'https://example.com/loaf.jpg' }),
      client
    );

    expect(result).toEqual({ platformPostId: 'media-6' });
    expect(mockFetch.mock.calls[0][0]).toBe('https://graph.facebook.com/v18.0/ig-1/media');
    expect(formOf(0).get('image_url')).toBe('https://example.com/loaf.jpg');
    expect(mockFetch.mock.calls[1][0]).toBe('https://graph.facebook.com/v18.0/ig-1/media_publish');
    expect(formOf(1).get('creation_id')).toBe('container-5');
  });
});

describe('LinkedInPublisher', () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it('creates a public UGC post for the author', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ id: 'urn:li:share:1' }, 201));
    const publisher = new LinkedInPublisher({ accessToken: 'test-token', timeoutMs: 1000 });

    const result = await publisher.publish(post({ channel: 'linkedin' }), client);

    expect(result).toEqual({ platformPostId: 'urn:li:share:1' });
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('https://api.linkedin.com/v2/ugcPosts');
    expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-token' });
    const body = JSON.parse(String(init?.body));
    expect(body.author).toBe('urn:li:organization:42');
    expect(body.specificContent['com.linkedin.ugc.ShareContent'].shareCommentary.text).toBe('Fresh sourdough today');
  });
});

describe('PublisherRegistry', () => {
  it('reports a missing adapter as missing configuration', () => {
    const registry = new PublisherRegistry();

    try {
      registry.forChannel('linkedin');
      expect.unreachable();
    } catch (error) {
      expect(isPipelineError(error, ErrorCategory.CONFIGURATION_MISSING)).toBe(true);
      expect(error).toHaveProperty('message', 'Required setting LINKEDIN_ACCESS_TOKEN is not configured (needed for publishing to linkedin)');
    }
  });

  it('registers adapters for configured credentials only', () => {
    const registry = createPublisherRegistry({
      facebookAccessToken: 'test-token',
      timeoutMs: 1000,
      maxAttempts: 3,
      initialBackoffMs: 1
    });

    expect(registry.channels()).toEqual(['facebook']);
    expect(registry.has('instagram')).toBe(false);
  });
});
