export * from './errors';
export type { ChannelClient, BatchLimits } from './channel-client.interface';
export { parseMarketplaceResponse } from './response';
