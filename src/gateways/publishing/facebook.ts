// Facebook page publisher

import { z } from 'zod';
import { createConfigurationError, createPermanentError } from '../../shared/errors.js';
import { Client, Post } from '../../shared/types.js';
import { formatForPlatform } from './format.js';
import { requestJson } from './http.js';
import { Publisher, PublisherOptions, PublishResult } from './types.js';

const SERVICE = 'Facebook';
const GRAPH_API_BASE = 'https://graph.facebook.com/v18.0';

const accountsSchema = z.object({
  data: z.array(z.object({ id: z.string(), access_token: z.string() })).default([])
});

const createdSchema = z.object({ id: z.string() });

export class FacebookPublisher implements Publisher {
  readonly channel = 'facebook' as const;
  private accessToken: string;
  private timeoutMs: number;
  private apiBase: string;

  constructor(options: PublisherOptions) {
    this.accessToken = options.accessToken;
    this.timeoutMs = options.timeoutMs ?? 15000;
    this.apiBase = options.apiBase ?? GRAPH_API_BASE;
  }

  async publish(post: Post, client: Client): Promise<PublishResult> {
    const pageId = client.pageIds.facebook;
    if (!pageId) {
      throw createConfigurationError('pageIds.facebook', `publishing for ${client.name}`);
    }

    const pageToken = await this.getPageToken(pageId);
    const message = formatForPlatform(post.body);

    // Photo posts when the post carries media, plain feed posts otherwise
    const request: { url: string; form: Record<string, string> } = post.mediaUrl
      ? {
          url: `${this.apiBase}/${pageId}/photos`,
          form: { url: post.mediaUrl, caption: message, access_token: pageToken }
        }
      : {
          url: `${this.apiBase}/${pageId}/feed`,
          form: { message, access_token: pageToken }
        };

    const result = await requestJson(SERVICE, { method: 'POST', ...request }, createdSchema, this.timeoutMs);
    return { platformPostId: result.id };
  }

  // Exchange the user token for the page's own token
  private async getPageToken(pageId: string): Promise<string> {
    const accounts = await requestJson(
      SERVICE,
      {
        method: 'GET',
        url: `${this.apiBase}/me/accounts?access_token=${encodeURIComponent(this.accessToken)}`
      },
      accountsSchema,
      this.timeoutMs
    );

    const page = accounts.data.find(account => account.id === pageId);
    if (!page) {
      throw createPermanentError(SERVICE, undefined, `no page token for page ${pageId}`);
    }
    return page.access_token;
  }
}
