/**
 * TCPAgent — binds a consensus engine to a set of TCP peers.
 *
 * The agent is the only caller into the engine. Engine methods may be
 * async, so every call (addPeer, update, receiveMessage) runs through one
 * exclusive queue; a message from one peer never overlaps an update tick
 * or a message from another peer.
 *
 * The update tick is a self-rearming timeout rather than an interval: the
 * next tick is scheduled only after the previous update settles, so slow
 * updates delay the cadence instead of piling up.
 */

import type { Logger } from "./logger.js";
import type { PeerOwner, TCPPeer } from "./peer.js";
import type { ConsensusEngine, PrivateKey } from "./types.js";

/** Engine update cadence (ms). */
export const DEFAULT_UPDATE_INTERVAL_MS = 20;

export interface TCPAgentOptions {
  updateIntervalMs?: number;
}

export class TCPAgent implements PeerOwner {
  readonly privateKey: PrivateKey;

  private engine: ConsensusEngine;
  private logger: Logger;
  private updateIntervalMs: number;
  private peers: TCPPeer[] = [];

  private engineQueue: Promise<void> = Promise.resolve();
  private updateTimer: ReturnType<typeof setTimeout> | null = null;
  private started = false;
  private stopped = false;

  constructor(
    engine: ConsensusEngine,
    privateKey: PrivateKey,
    logger: Logger,
    options: TCPAgentOptions = {},
  ) {
    this.engine = engine;
    this.privateKey = privateKey;
    this.logger = logger;
    this.updateIntervalMs = options.updateIntervalMs ?? DEFAULT_UPDATE_INTERVAL_MS;
  }

  // --- Lifecycle ---

  start(): void {
    if (this.started || this.stopped) return;
    this.started = true;
    this.scheduleUpdate();
    this.logger.info(`Agent started (update every ${this.updateIntervalMs}ms)`);
  }

  /** Idempotent. Stops the update tick and closes every peer. */
  stop(): void {
    if (this.stopped) return;
    this.stopped = true;

    if (this.updateTimer) {
      clearTimeout(this.updateTimer);
      this.updateTimer = null;
    }

    for (const peer of [...this.peers]) {
      peer.close();
    }
    this.peers = [];
    this.logger.info("Agent stopped");
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  // --- Peers ---

  /**
   * Register a connection with the engine. A peer the engine refuses, or
   * one added after stop(), is closed. Resolves true only when the peer is
   * live and tracked.
   */
  async addPeer(peer: TCPPeer): Promise<boolean> {
    if (this.stopped) {
      peer.close();
      return false;
    }

    const added = await this.exclusive(() => this.engine.addPeer(peer));
    if (!added) {
      this.logger.warn(`Consensus engine refused peer ${peer.remoteAddr()}`);
      peer.close();
      return false;
    }
    if (peer.isClosed) {
      this.logger.debug(`Peer ${peer.remoteAddr()} closed during registration`);
      return false;
    }

    this.peers.push(peer);
    peer.once("close", () => this.removePeer(peer));
    this.logger.debug(`Peer ${peer.remoteAddr()} added (${this.peers.length} connected)`);
    return true;
  }

  getPeers(): TCPPeer[] {
    return [...this.peers];
  }

  private removePeer(peer: TCPPeer): void {
    const index = this.peers.indexOf(peer);
    if (index === -1) return;
    this.peers.splice(index, 1);
    this.logger.debug(`Peer ${peer.remoteAddr()} removed (${this.peers.length} connected)`);
  }

  // --- Engine entry points ---

  /** Called by a peer's read loop for every CONSENSUS envelope. */
  async handleConsensusMessage(message: Buffer, from: TCPPeer): Promise<void> {
    try {
      await this.exclusive(() => this.engine.receiveMessage(message, new Date()));
    } catch (err) {
      this.logger.warn(`Consensus message from ${from.remoteAddr()} rejected: ${err}`);
    }
  }

  private scheduleUpdate(): void {
    this.updateTimer = setTimeout(() => {
      this.updateTimer = null;
      this.runUpdate().catch((err) => {
        this.logger.error(`Update scheduling failed: ${err}`);
      });
    }, this.updateIntervalMs);
  }

  private async runUpdate(): Promise<void> {
    if (this.stopped) return;
    try {
      await this.exclusive(() => this.engine.update(new Date()));
    } catch (err) {
      this.logger.warn(`Consensus update failed: ${err}`);
    } finally {
      if (!this.stopped) this.scheduleUpdate();
    }
  }

  private exclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const run = this.engineQueue.then(fn);
    this.engineQueue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
