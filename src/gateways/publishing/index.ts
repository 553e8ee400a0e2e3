// Publishing gateway: one adapter per channel

import { Config } from '../../config.js';
import { createConfigurationError } from '../../shared/errors.js';
import { Channel } from '../../shared/types.js';
import { FacebookPublisher } from './facebook.js';
import { InstagramPublisher } from './instagram.js';
import { LinkedInPublisher } from './linkedin.js';
import { Publisher } from './types.js';

export type { Publisher, PublishResult, PublisherOptions } from './types.js';
export { FacebookPublisher } from './facebook.js';
export { InstagramPublisher } from './instagram.js';
export { LinkedInPublisher } from './linkedin.js';
export { formatForPlatform, composePostBody } from './format.js';

const CREDENTIAL_SETTINGS: Record<Channel, string> = {
  facebook: 'FACEBOOK_ACCESS_TOKEN',
  instagram: 'INSTAGRAM_ACCESS_TOKEN',
  linkedin: 'LINKEDIN_ACCESS_TOKEN'
};

export class PublisherRegistry {
  private publishers = new Map<Channel, Publisher>();

  constructor(publishers: Publisher[] = []) {
    for (const publisher of publishers) {
      this.register(publisher);
    }
  }

  register(publisher: Publisher): void {
    this.publishers.set(publisher.channel, publisher);
  }

  has(channel: Channel): boolean {
    return this.publishers.has(channel);
  }

  channels(): Channel[] {
    return [...this.publishers.keys()];
  }

  // Missing adapters are a configuration problem, never retried
  forChannel(channel: Channel): Publisher {
    const publisher = this.publishers.get(channel);
    if (!publisher) {
      throw createConfigurationError(CREDENTIAL_SETTINGS[channel], `publishing to ${channel}`);
    }
    return publisher;
  }
}

// Adapters for every channel that has credentials configured
export const createPublisherRegistry = (config: Config['publishing']): PublisherRegistry => {
  const registry = new PublisherRegistry();
  const timeoutMs = config.timeoutMs;

  if (config.facebookAccessToken) {
    registry.register(new FacebookPublisher({ accessToken: config.facebookAccessToken, timeoutMs }));
  }
  if (config.instagramAccessToken) {
    registry.register(new InstagramPublisher({ accessToken: config.instagramAccessToken, timeoutMs }));
  }
  if (config.linkedinAccessToken) {
    registry.register(new LinkedInPublisher({ accessToken: config.linkedinAccessToken, timeoutMs }));
  }

  return registry;
};
