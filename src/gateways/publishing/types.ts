// Publishing adapter contract

import { Channel, Client, Post } from '../../shared/types.js';

export interface PublishResult {
  platformPostId: string;
}

export interface Publisher {
  readonly channel: Channel;
  publish(post: Post, client: Client): Promise<PublishResult>;
}

export interface PublisherOptions {
  accessToken: string;
  timeoutMs?: number;
  apiBase?: string;
}
