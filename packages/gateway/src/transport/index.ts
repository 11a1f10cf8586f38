export { createTransport, describeError } from './http.ts'
export type {
  FetchFn,
  HttpMethod,
  ResponseReader,
  Transport,
  TransportFault,
  TransportFaultKind,
  TransportOptions,
  TransportOutcome,
  TransportRequest,
} from './types.ts'
