export { WebSocketTransport, CLIENT_MANIFEST, SECURE_PORTS, SUBPROTOCOL, URIS, deviceUrl } from './websocket-transport.js';
export type { WebSocketTransportOptions, SsapMessage } from './websocket-transport.js';
export type {
  AppStatus,
  DeviceEndpoint,
  DeviceTarget,
  DeviceTransport,
  InstallOutcome,
  InstallRequest,
  LaunchOutcome,
  LogConnection,
  LogLevel,
  LogLine,
  PairingChallenge,
  PairingOutcome,
  ProbeInfo,
} from './types.js';
