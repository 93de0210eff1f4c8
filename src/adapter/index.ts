export { ITransportAdapter, ClientRef, TransportConfig, TransportEventHandlers } from './types';
export { SocketIOTransportAdapter, createSocketIOAdapter } from './socketio.adapter';
export { MockTransportAdapter, createMockAdapter, RecordedMessage } from './mock.adapter';
