/**
 * consensus-tcp-agent — TCP transport for a consensus engine.
 *
 * Peers exchange length-prefixed JSON envelopes over plain TCP, prove
 * ownership of their long-term keys with an ECDH challenge, and hand
 * consensus payloads to a single engine owned by a TCPAgent.
 */

export * from "./agent/types.js";
export { Logger, parseLevel, type LogLevel } from "./agent/logger.js";
export {
  FrameError,
  FrameReader,
  HEADER_SIZE,
  MAX_MESSAGE_LENGTH,
  DEFAULT_READ_TIMEOUT_MS,
  DEFAULT_WRITE_TIMEOUT_MS,
  readMessage,
  writeMessage,
  type FrameErrorKind,
} from "./agent/framing.js";
export {
  CHALLENGE_SIZE,
  IV_SIZE,
  COORDINATE_SIZE,
  DecodeError,
  decodeEnvelope,
  encodeEnvelope,
  decodeKeyAuthInit,
  encodeKeyAuthInit,
  decodeKeyAuthChallenge,
  encodeKeyAuthChallenge,
  decodeKeyAuthChallengeReply,
  encodeKeyAuthChallengeReply,
  envelopeBytes,
} from "./agent/codec.js";
export {
  DEFAULT_CURVE,
  InvalidPublicKeyError,
  generatePrivateKey,
  privateKeyFromHex,
  privateKeyToHex,
  publicKeysEqual,
} from "./agent/auth.js";
export {
  AuthStateError,
  ChallengeMismatchError,
  PeerAuthenticator,
  type AuthState,
  type InitiatorState,
} from "./agent/handshake.js";
export { TCPPeer, type PeerOwner, type TCPPeerOptions, type TCPPeerEvents } from "./agent/peer.js";
export { TCPAgent, DEFAULT_UPDATE_INTERVAL_MS, type TCPAgentOptions } from "./agent/agent.js";
export {
  AgentServer,
  DEFAULT_DIAL_TIMEOUT_MS,
  DEFAULT_KEEPALIVE_MS,
  loadConfig,
  parsePeerAddress,
  startAgent,
  type AgentConfig,
} from "./agent/server.js";
