export { ByteStreamAdapter, type ByteStream, type StreamFactory, type StreamRequest } from './stream.js';

export {
  DuplexByteStream,
  tcpClientStream,
  tcpHostStream,
  tcpStreamFactory,
  type DuplexConnection,
  type DuplexConnector,
} from './duplex.js';

export { MemoryLink, type MemoryLinkOptions, type LinkDirection } from './memory.js';
