// LinkedIn UGC post publisher

import { z } from 'zod';
import { createConfigurationError } from '../../shared/errors.js';
import { Client, Post } from '../../shared/types.js';
import { formatForPlatform } from './format.js';
import { requestJson } from './http.js';
import { Publisher, PublisherOptions, PublishResult } from './types.js';

const SERVICE = 'LinkedIn';
const LINKEDIN_API_BASE = 'https://api.linkedin.com/v2';

const createdSchema = z.object({ id: z.string() });

export class LinkedInPublisher implements Publisher {
  readonly channel = 'linkedin' as const;
  private accessToken: string;
  private timeoutMs: number;
  private apiBase: string;

  constructor(options: PublisherOptions) {
    this.accessToken = options.accessToken;
    this.timeoutMs = options.timeoutMs ?? 15000;
    this.apiBase = options.apiBase ?? LINKEDIN_API_BASE;
  }

  async publish(post: Post, client: Client): Promise<PublishResult> {
    const author = client.pageIds.linkedin;
    if (!author) {
      throw createConfigurationError('pageIds.linkedin', `publishing for ${client.name}`);
    }

    const result = await requestJson(
      SERVICE,
      {
        method: 'POST',
        url: `${this.apiBase}/ugcPosts`,
        headers: {
          'Authorization': `Bearer ${this.accessToken}`,
          'X-Restli-Protocol-Version': '2.0.0'
        },
        json: {
          author,
          lifecycleState: 'PUBLISHED',
          specificContent: {
            'com.linkedin.ugc.ShareContent': {
              shareCommentary: { text: formatForPlatform(post.body) },
              shareMediaCategory: 'NONE'
            }
          },
          visibility: { 'com.linkedin.ugc.MemberNetworkVisibility': 'PUBLIC' }
        }
      },
      createdSchema,
      this.timeoutMs
    );

    return { platformPostId: result.id };
  }
}
