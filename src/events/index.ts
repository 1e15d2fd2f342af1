export { boostEmitter } from './emitter.js';
export { initWebSocketServer, closeWebSocketServer } from './ws-server.js';
export { BOOST_EVENT_TYPES } from './types.js';
export type { WSEvent, WSEventType, BoostEvents } from './types.js';
