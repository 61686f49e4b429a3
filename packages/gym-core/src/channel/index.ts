export { UNBOUNDED, BaseChannel, validateTimeouts, withDeadline, type Channel, type ChannelRole, type ChannelTimeouts } from './channel';
export { Mailbox } from './mailbox';
export { MemoryChannel, type MemoryPairOptions } from './memory';
export { HttpReplyChannel, HttpRequestChannel, type HttpReplyOptions, type HttpRequestOptions } from './http';
export { exchange, type ExchangeOutcome, type ExchangeStatus } from './exchange';
