export { SessionRegistry } from './sessionRegistry';
export type {
  OutboundChannel,
  DeliveryReport,
  SessionRegistryOptions,
} from './sessionRegistry';
