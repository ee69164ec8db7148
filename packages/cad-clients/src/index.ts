export {
  Backend,
  BACKENDS,
  getBackendInfo,
  getBackendName,
  isBackend,
  parseBackend,
  resolveEndpoint,
  type BackendEndpoint,
  type BackendInfo
} from "./backends.js";
export {
  cadStatusSchema,
  planeInfoSchema,
  sketchInfoSchema,
  type CadStatus,
  type ClientFactory,
  type ICadClient,
  type PlaneInfo,
  type SketchInfo
} from "./types.js";
export { CadProtocolError, CadUnreachableError } from "./errors.js";
export {
  RpcCadClient,
  DEFAULT_CALL_TIMEOUT_MS,
  DEFAULT_CONNECT_TIMEOUT_MS,
  type RpcCadClientOptions
} from "./RpcCadClient.js";
export { FreeCadClient, InventorClient, SolidWorksClient, FusionClient, createCadClient } from "./clients.js";
export type { IRpcTransport, TransportFactory } from "./transport/RpcTransport.js";
export { BusRpcTransport, busServiceName, createBusTransportFactory } from "./transport/BusRpcTransport.js";
export { serveCadService, type CadServiceHandlers } from "./transport/serveCadService.js";
export {
  HttpRpcTransport,
  createHttpTransportFactory,
  type HttpTransportOptions
} from "./transport/HttpRpcTransport.js";
