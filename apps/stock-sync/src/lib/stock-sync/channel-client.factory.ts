/**
 * Create the marketplace client for a configured channel.
 * Every call returns a fresh instance so channels never share session state.
 */

import type { ChannelConfig } from '@/lib/config/sync.config';
import type { ChannelClient } from '@/lib/marketplace';
import { OzonClient } from '@/lib/ozon';
import { YandexMarketClient } from '@/lib/yandex-market';

export function createChannelClient(config: ChannelConfig): ChannelClient {
  switch (config.channel) {
    case 'ozon':
      return new OzonClient(config.credentials, config.batchLimits);
    case 'market-fbs':
    case 'market-dbs':
      return new YandexMarketClient(config.placement, config.credentials, config.batchLimits);
  }
}
