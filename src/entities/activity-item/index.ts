/**
 * Activity item entity - public API
 */
export { type ActivityItem, type BroadcastState, type ItemPosition } from './types';

export { compareItems, isAfter, sortOldestFirst, newestItem } from './ordering';
