export type { OptionalReading, Coordinate } from './common';
export type { AlertUserConfig, AlertAppConstants, AlertConfig } from './config';
export { ConfigurationError, TransportError, NotificationError } from './errors';
