export type { WorkflowTransport } from "./types.js";
export { LocalTransport } from "./local-transport.js";
export { HttpTransport, deriveControlEndpoint, type HttpTransportConfig, type FetchLike } from "./http-transport.js";
export {
  NatsTransport,
  defaultNatsTransportConfig,
  type NatsTransportConfig,
  type NatsRequester,
} from "./nats-transport.js";
