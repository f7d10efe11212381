/**
 * Posted state entity - public API
 */
export { type ChannelState, type LastSeenMarker, DEFAULT_CHANNEL_STATE } from './types';

export {
  createStateManager,
  parseChannelState,
  markerPosition,
  type StateManager,
} from './state-manager';
