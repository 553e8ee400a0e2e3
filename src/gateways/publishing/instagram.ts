// Instagram business account publisher

import { z } from 'zod';
import { createConfigurationError, createPermanentError } from '../../shared/errors.js';
import { Client, Post } from '../../shared/types.js';
import { formatForPlatform } from './format.js';
import { requestJson } from './http.js';
import { Publisher, PublisherOptions, PublishResult } from './types.js';

const SERVICE = 'Instagram';
const GRAPH_API_BASE = 'https://graph.facebook.com/v18.0';

const createdSchema = z.object({ id: z.string() });

export class InstagramPublisher implements Publisher {
  readonly channel = 'instagram' as const;
  private accessToken: string;
  private timeoutMs: number;
  private apiBase: string;

  constructor(options: PublisherOptions) {
    this.accessToken = options.accessToken;
    this.timeoutMs = options.timeoutMs ?? 15000;
    this.apiBase = options.apiBase ?? GRAPH_API_BASE;
  }

  async publish(post: Post, client: Client): Promise<PublishResult> {
    const accountId = client.pageIds.instagram;
    if (!accountId) {
      throw createConfigurationError('pageIds.instagram', `publishing for ${client.name}`);
    }
    if (!post.mediaUrl) {
      throw createPermanentError(SERVICE, undefined, 'Instagram posts require an image');
    }

    // Create the media container, then publish it
    const container = await requestJson(
      SERVICE,
      {
        method: 'POST',
        url: `${this.apiBase}/${accountId}/media`,
        form: {
          image_url: post.mediaUrl,
          caption: formatForPlatform(post.body),
          access_token: this.accessToken
        }
      },
      createdSchema,
      this.timeoutMs
    );

    const published = await requestJson(
      SERVICE,
      {
        method: 'POST',
        url: `${this.apiBase}/${accountId}/media_publish`,
        form: { creation_id: container.id, access_token: this.accessToken }
      },
      createdSchema,
      this.timeoutMs
    );

    return { platformPostId: published.id };
  }
}
