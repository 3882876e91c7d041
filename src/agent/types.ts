/**
 * Shared types for the consensus TCP agent.
 *
 * The wire-level shapes (Envelope and the key authentication bodies) are
 * the decoded forms produced by codec.ts. The engine and peer interfaces
 * are the narrow seams between this transport and the consensus core.
 */

/** Command tags carried by every envelope on the wire. */
export const CommandType = {
  NOP: 0,
  KEY_AUTH_INIT: 1,
  KEY_AUTH_CHALLENGE: 2,
  KEY_AUTH_CHALLENGE_REPLY: 3,
  CONSENSUS: 4,
} as const;

export type CommandType = (typeof CommandType)[keyof typeof CommandType];

export interface Envelope {
  command: CommandType;
  message: Buffer;
}

/** Affine point coordinates, big-endian. */
export interface PublicKey {
  x: Buffer;
  y: Buffer;
}

export interface PrivateKey {
  d: Buffer;             // 32-byte scalar
  publicKey: PublicKey;
}

export interface KeyAuthInit {
  x: Buffer;
  y: Buffer;
}

export interface KeyAuthChallenge {
  x: Buffer;             // ephemeral public key
  y: Buffer;
  ciphertext: Buffer;    // CHALLENGE_SIZE bytes
  iv: Buffer;            // one AES block
}

export interface KeyAuthChallengeReply {
  plaintext: Buffer;
}

// --- Collaborator interfaces ---

/**
 * What the consensus engine sees of one connection.
 */
export interface PeerHandle {
  /** Queue bytes for delivery. Best-effort, never throws. */
  send(message: Buffer): void;
  remoteAddr(): string;
  /** The peer's key once authenticated, null before that. */
  getPublicKey(): PublicKey | null;
}

/**
 * The consensus core. Calls are never made concurrently; the agent
 * serializes them, including across awaits.
 */
export interface ConsensusEngine {
  addPeer(peer: PeerHandle): boolean;
  update(now: Date): void | Promise<void>;
  receiveMessage(message: Buffer, now: Date): void | Promise<void>;
}
