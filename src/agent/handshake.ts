/**
 * Public-key authentication handshake.
 *
 * A peer proves it holds the private key behind the public key it claims:
 *
 *   initiator                          responder
 *   KEY_AUTH_INIT {X, Y}           ->
 *                                  <-  KEY_AUTH_CHALLENGE {eph X, eph Y, ciphertext, iv}
 *   KEY_AUTH_CHALLENGE_REPLY {pt}  ->
 *
 * The responder derives the challenge key by ECDH between a fresh ephemeral
 * key and the claimed key; only the holder of the claimed private key can
 * derive it again from the ephemeral public key and decrypt the challenge.
 *
 * Both directions are forward-only state machines driven by an explicit
 * transition table. A responder that has issued a challenge or finished
 * authentication never restarts, so a peer cannot force a new shared
 * secret on an established connection.
 */

import { randomBytes } from "node:crypto";
import {
  DEFAULT_CURVE,
  computeSharedSecret,
  constantTimeEqual,
  decryptChallenge,
  encryptChallenge,
  generatePrivateKey,
} from "./auth.js";
import { CHALLENGE_SIZE, IV_SIZE } from "./codec.js";
import type {
  KeyAuthChallenge,
  KeyAuthChallengeReply,
  KeyAuthInit,
  PrivateKey,
  PublicKey,
} from "./types.js";

// --- States ---

/** Authentication of the remote peer's key (we are the responder). */
export type AuthState =
  | "not-authenticated"
  | "challenge-issued"
  | "authenticated"
  | "authentication-failed";

/** Authentication of our own key to the remote peer (we are the initiator). */
export type InitiatorState = "idle" | "auth-key-sent" | "challenge-answered";

const AUTH_TRANSITIONS: Record<AuthState, readonly AuthState[]> = {
  "not-authenticated": ["challenge-issued", "authentication-failed"],
  "challenge-issued": ["authenticated", "authentication-failed"],
  authenticated: [],
  "authentication-failed": [],
};

const INITIATOR_TRANSITIONS: Record<InitiatorState, readonly InitiatorState[]> = {
  idle: ["auth-key-sent"],
  "auth-key-sent": ["challenge-answered"],
  "challenge-answered": [],
};

// --- Errors ---

export class AuthStateError extends Error {
  readonly state: AuthState | InitiatorState;

  constructor(action: string, state: AuthState | InitiatorState) {
    super(`invalid authentication state: cannot ${action} while ${state}`);
    this.name = "AuthStateError";
    this.state = state;
  }
}

export class ChallengeMismatchError extends Error {
  constructor() {
    super("invalid challenge response");
    this.name = "ChallengeMismatchError";
  }
}

interface PendingChallenge {
  plaintext: Buffer;
  iv: Buffer;
}

// --- PeerAuthenticator ---

export class PeerAuthenticator {
  private authState: AuthState = "not-authenticated";
  private initiatorState: InitiatorState = "idle";
  private localKey: PrivateKey;
  private curve: string;

  /** Key announced in KEY_AUTH_INIT; trusted only once authenticated. */
  private claimedKey: PublicKey | null = null;

  /** Held only while a challenge is in flight. */
  private challenge: PendingChallenge | null = null;

  constructor(localKey: PrivateKey, curve = DEFAULT_CURVE) {
    this.localKey = localKey;
    this.curve = curve;
  }

  get state(): AuthState {
    return this.authState;
  }

  get localState(): InitiatorState {
    return this.initiatorState;
  }

  get hasPendingChallenge(): boolean {
    return this.challenge !== null;
  }

  getPublicKey(): PublicKey | null {
    return this.authState === "authenticated" ? this.claimedKey : null;
  }

  // --- Responder ---

  handleKeyAuthInit(init: KeyAuthInit): KeyAuthChallenge {
    if (this.authState !== "not-authenticated") {
      throw new AuthStateError("accept key auth init", this.authState);
    }

    const ephemeral = generatePrivateKey(this.curve);
    const claimed: PublicKey = { x: init.x, y: init.y };

    let secret: Buffer;
    try {
      secret = computeSharedSecret(ephemeral.d, claimed, this.curve);
    } catch (err) {
      this.advance("authentication-failed");
      throw err;
    }

    const plaintext = randomBytes(CHALLENGE_SIZE);
    const iv = randomBytes(IV_SIZE);
    const ciphertext = encryptChallenge(secret, iv, plaintext);

    this.claimedKey = claimed;
    this.challenge = { plaintext, iv };
    this.advance("challenge-issued");

    return {
      x: ephemeral.publicKey.x,
      y: ephemeral.publicKey.y,
      ciphertext,
      iv: Buffer.from(iv),
    };
  }

  handleKeyAuthChallengeReply(reply: KeyAuthChallengeReply): void {
    const challenge = this.challenge;
    if (this.authState !== "challenge-issued" || !challenge) {
      throw new AuthStateError("accept challenge reply", this.authState);
    }

    const matched = constantTimeEqual(challenge.plaintext, reply.plaintext);

    challenge.plaintext.fill(0);
    challenge.iv.fill(0);
    this.challenge = null;

    if (!matched) {
      this.advance("authentication-failed");
      throw new ChallengeMismatchError();
    }
    this.advance("authenticated");
  }

  // --- Initiator ---

  createKeyAuthInit(): KeyAuthInit {
    this.advanceLocal("auth-key-sent", "send key auth init");
    return { x: this.localKey.publicKey.x, y: this.localKey.publicKey.y };
  }

  /**
   * Answer a challenge for our own key. Only one challenge is answered per
   * KEY_AUTH_INIT we sent.
   */
  handleKeyAuthChallenge(challenge: KeyAuthChallenge): KeyAuthChallengeReply {
    if (this.initiatorState !== "auth-key-sent") {
      throw new AuthStateError("answer key auth challenge", this.initiatorState);
    }

    const ephemeral: PublicKey = { x: challenge.x, y: challenge.y };
    const secret = computeSharedSecret(this.localKey.d, ephemeral, this.curve);
    const plaintext = decryptChallenge(secret, challenge.iv, challenge.ciphertext);

    this.advanceLocal("challenge-answered", "answer key auth challenge");
    return { plaintext };
  }

  // --- Transitions ---

  private advance(next: AuthState): void {
    if (!AUTH_TRANSITIONS[this.authState].includes(next)) {
      throw new AuthStateError(`move to ${next}`, this.authState);
    }
    this.authState = next;
  }

  private advanceLocal(next: InitiatorState, action: string): void {
    if (!INITIATOR_TRANSITIONS[this.initiatorState].includes(next)) {
      throw new AuthStateError(action, this.initiatorState);
    }
    this.initiatorState = next;
  }
}
