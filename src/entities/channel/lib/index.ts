export { parseChannelList, parseSubscriptionsCsv, splitCsvLine, mergeChannels } from './channel-list';
