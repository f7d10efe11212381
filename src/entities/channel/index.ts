/**
 * Channel entity - public API
 */
export type { Channel, ResolvedChannel } from './types';

export { parseChannelList, parseSubscriptionsCsv, mergeChannels } from './lib';
