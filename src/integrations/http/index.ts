export { AxiosTransport, TransportError } from './transport';
export type {
  AxiosTransportOptions,
  HttpTransport,
  TransportRequest,
  TransportResponse,
} from './transport';
