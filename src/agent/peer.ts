/**
 * TCPPeer — one authenticated TCP connection to a consensus peer.
 *
 * Each peer runs two loops over its socket:
 *  - read loop: frame -> envelope -> key authentication or consensus
 *  - write loop: drains the internal queue (handshake, keepalive) and the
 *    consensus queue, in that order, whenever either notifier fires
 *
 * Node.js is single-threaded, so the queues and auth state need no lock:
 * every mutation completes between awaits, and nothing is held across a
 * socket operation. Any read, decode, handshake or write error ends both
 * loops and closes the connection. There is no reconnect; a closed peer is
 * done for good.
 */

import { EventEmitter } from "node:events";
import type { Socket } from "node:net";
import { v4 as uuidv4 } from "uuid";
import {
  DEFAULT_READ_TIMEOUT_MS,
  DEFAULT_WRITE_TIMEOUT_MS,
  FrameReader,
  MAX_MESSAGE_LENGTH,
  readMessage,
  writeMessage,
} from "./framing.js";
import {
  decodeEnvelope,
  decodeKeyAuthChallenge,
  decodeKeyAuthChallengeReply,
  decodeKeyAuthInit,
  encodeKeyAuthChallenge,
  encodeKeyAuthChallengeReply,
  encodeKeyAuthInit,
  envelopeBytes,
} from "./codec.js";
import { PeerAuthenticator, type AuthState } from "./handshake.js";
import { Notifier } from "./notifier.js";
import type { Logger } from "./logger.js";
import { CommandType } from "./types.js";
import type { Envelope, PeerHandle, PrivateKey, PublicKey } from "./types.js";

/** What a peer needs from the agent that owns it. */
export interface PeerOwner {
  readonly privateKey: PrivateKey;
  handleConsensusMessage(message: Buffer, from: TCPPeer): Promise<void>;
}

export interface TCPPeerOptions {
  readTimeoutMs?: number;
  writeTimeoutMs?: number;
  /** Interval for NOP keepalives; 0 disables them. */
  keepaliveIntervalMs?: number;
  /** Drop consensus messages until the peer's key is authenticated. */
  requireAuthentication?: boolean;
  curve?: string;
}

export interface TCPPeerEvents {
  authenticated: [key: PublicKey];
  close: [];
}

export class TCPPeer extends EventEmitter<TCPPeerEvents> implements PeerHandle {
  readonly id: string;

  /** Settles once both loops have exited. */
  readonly done: Promise<void>;

  private socket: Socket;
  private owner: PeerOwner;
  private logger: Logger;
  private reader: FrameReader;
  private authenticator: PeerAuthenticator;
  private address: string;

  private readTimeoutMs: number;
  private writeTimeoutMs: number;
  private requireAuthentication: boolean;

  private consensusMessages: Buffer[] = [];
  private internalMessages: Buffer[] = [];
  private consensusNotifier = new Notifier(() => this.wakeWriter());
  private internalNotifier = new Notifier(() => this.wakeWriter());
  private writerWake: (() => void) | null = null;

  private keepaliveTimer: ReturnType<typeof setInterval> | null = null;
  private closed = false;

  constructor(socket: Socket, owner: PeerOwner, logger: Logger, options: TCPPeerOptions = {}) {
    super();
    this.id = uuidv4();
    this.socket = socket;
    this.owner = owner;
    this.address = `${socket.remoteAddress ?? "unknown"}:${socket.remotePort ?? 0}`;
    this.logger = logger.withPrefix(`peer ${this.address}`);
    this.authenticator = new PeerAuthenticator(owner.privateKey, options.curve);

    this.readTimeoutMs = options.readTimeoutMs ?? DEFAULT_READ_TIMEOUT_MS;
    this.writeTimeoutMs = options.writeTimeoutMs ?? DEFAULT_WRITE_TIMEOUT_MS;
    this.requireAuthentication = options.requireAuthentication ?? true;

    this.reader = new FrameReader(socket);
    this.done = Promise.all([this.readLoop(), this.writeLoop()]).then(() => undefined);

    const keepalive = options.keepaliveIntervalMs ?? 0;
    if (keepalive > 0) this.startKeepalive(keepalive);

    this.logger.debug(`Connection ${this.id} opened`);
  }

  // --- PeerHandle ---

  /** Queue a consensus payload. Never blocks; dropped once closed. */
  send(message: Buffer): void {
    if (this.closed) return;
    this.consensusMessages.push(message);
    this.consensusNotifier.notify();
  }

  remoteAddr(): string {
    return this.address;
  }

  getPublicKey(): PublicKey | null {
    return this.authenticator.getPublicKey();
  }

  // --- Accessors ---

  get authState(): AuthState {
    return this.authenticator.state;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  // --- Lifecycle ---

  /** Announce our key and ask the remote side to challenge it. */
  initiateKeyAuth(): void {
    const init = this.authenticator.createKeyAuthInit();
    this.enqueueInternal(envelopeBytes(CommandType.KEY_AUTH_INIT, encodeKeyAuthInit(init)));
  }

  /** Safe to call any number of times, from either loop or from outside. */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    this.stopKeepalive();
    this.socket.destroy();
    this.consensusMessages = [];
    this.internalMessages = [];
    this.wakeWriter();

    this.logger.debug(`Connection ${this.id} closed`);
    this.emit("close");
  }

  private startKeepalive(intervalMs: number): void {
    const nop = envelopeBytes(CommandType.NOP, Buffer.alloc(0));
    this.keepaliveTimer = setInterval(() => this.enqueueInternal(nop), intervalMs);
  }

  private stopKeepalive(): void {
    if (this.keepaliveTimer) {
      clearInterval(this.keepaliveTimer);
      this.keepaliveTimer = null;
    }
  }

  // --- Reading ---

  private async readLoop(): Promise<void> {
    try {
      while (!this.closed) {
        const data = await readMessage(this.reader, this.readTimeoutMs);
        await this.handleEnvelope(decodeEnvelope(data));
      }
    } catch (err) {
      if (!this.closed) this.logger.warn(`Read loop ended: ${err}`);
    } finally {
      this.close();
    }
  }

  private async handleEnvelope(envelope: Envelope): Promise<void> {
    switch (envelope.command) {
      case CommandType.NOP:
        return;

      case CommandType.KEY_AUTH_INIT: {
        const init = decodeKeyAuthInit(envelope.message);
        const challenge = this.authenticator.handleKeyAuthInit(init);
        this.enqueueInternal(
          envelopeBytes(CommandType.KEY_AUTH_CHALLENGE, encodeKeyAuthChallenge(challenge)),
        );
        this.logger.debug("Key auth challenge issued");
        return;
      }

      case CommandType.KEY_AUTH_CHALLENGE: {
        const challenge = decodeKeyAuthChallenge(envelope.message);
        const reply = this.authenticator.handleKeyAuthChallenge(challenge);
        this.enqueueInternal(
          envelopeBytes(CommandType.KEY_AUTH_CHALLENGE_REPLY, encodeKeyAuthChallengeReply(reply)),
        );
        return;
      }

      case CommandType.KEY_AUTH_CHALLENGE_REPLY: {
        const reply = decodeKeyAuthChallengeReply(envelope.message);
        this.authenticator.handleKeyAuthChallengeReply(reply);
        const key = this.authenticator.getPublicKey();
        if (key) {
          this.logger.info(`Peer authenticated as ${key.x.toString("hex").slice(0, 16)}…`);
          this.emit("authenticated", key);
        }
        return;
      }

      case CommandType.CONSENSUS:
        if (this.requireAuthentication && this.authenticator.state !== "authenticated") {
          this.logger.warn(
            `Dropping consensus message from unauthenticated peer (state ${this.authenticator.state})`,
          );
          return;
        }
        await this.owner.handleConsensusMessage(envelope.message, this);
        return;
    }
  }

  // --- Writing ---

  private enqueueInternal(message: Buffer): void {
    if (this.closed) return;
    this.internalMessages.push(message);
    this.internalNotifier.notify();
  }

  private wakeWriter(): void {
    const wake = this.writerWake;
    this.writerWake = null;
    wake?.();
  }

  private async writeLoop(): Promise<void> {
    try {
      while (!this.closed) {
        if (this.internalNotifier.take()) {
          const pending = this.internalMessages;
          this.internalMessages = [];
          for (const out of pending) {
            await writeMessage(this.socket, out, this.writeTimeoutMs);
          }
        } else if (this.consensusNotifier.take()) {
          const pending = this.consensusMessages;
          this.consensusMessages = [];
          for (const message of pending) {
            const out = envelopeBytes(CommandType.CONSENSUS, message);
            if (out.length > MAX_MESSAGE_LENGTH) {
              this.logger.error(`Dropping consensus message of ${message.length} bytes: exceeds frame limit`);
              continue;
            }
            await writeMessage(this.socket, out, this.writeTimeoutMs);
          }
        } else {
          await new Promise<void>((resolve) => {
            this.writerWake = resolve;
          });
        }
      }
    } catch (err) {
      if (!this.closed) this.logger.warn(`Write loop ended: ${err}`);
    } finally {
      this.close();
    }
  }
}
