// PV Web Socket gateway client
export { PvwsChannelSource } from './PvwsChannelSource';
export type { PvwsChannelSourceOptions } from './PvwsChannelSource';

export { PvwsTransport } from './transport/PvwsTransport';
export type { ConnectionState, TransportOptions } from './transport/PvwsTransport';

export { MessageCodec, PvwsProtocolError } from './protocol/MessageCodec';
export type { PvwsClientMessage, PvwsUpdate, PvwsEvents } from './types/messages';

export { GatewayConnectError } from './utils';
export type { BackoffPolicy } from './utils';
