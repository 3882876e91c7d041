/**
 * AgentServer — accepts and dials TCP connections for a TCPAgent.
 *
 * Every connection, inbound or outbound, becomes a TCPPeer registered with
 * the agent and immediately announces our key, so both ends authenticate
 * each other over the same socket. Peer addresses come from configuration;
 * failed dials are logged and not retried.
 */

import * as net from "node:net";
import { TCPAgent, DEFAULT_UPDATE_INTERVAL_MS } from "./agent.js";
import { generatePrivateKey, privateKeyFromHex } from "./auth.js";
import { DEFAULT_READ_TIMEOUT_MS, DEFAULT_WRITE_TIMEOUT_MS } from "./framing.js";
import { Logger } from "./logger.js";
import { TCPPeer, type TCPPeerOptions } from "./peer.js";
import type { ConsensusEngine } from "./types.js";

/** Timeout for establishing an outbound connection (ms). */
export const DEFAULT_DIAL_TIMEOUT_MS = 10_000;

/** NOP interval; well under the read timeout so idle links stay up. */
export const DEFAULT_KEEPALIVE_MS = 5_000;

// ─── Configuration ───────────────────────────────────────────────────

export interface AgentConfig {
  listenHost: string;
  listenPort: number;
  peers: string[];          // host:port
  privateKey: string;       // hex; empty means generate
  readTimeoutMs: number;
  writeTimeoutMs: number;
  updateIntervalMs: number;
  keepaliveIntervalMs: number;
  requireAuthentication: boolean;
  logLevel: string;
}

export function loadConfig(): AgentConfig {
  return {
    listenHost: process.env.AGENT_LISTEN_HOST ?? "0.0.0.0",
    listenPort: envInt("AGENT_LISTEN_PORT", 9000),
    peers: (process.env.AGENT_PEERS ?? "").split(",").map((p) => p.trim()).filter(Boolean),
    privateKey: process.env.AGENT_PRIVATE_KEY ?? "",
    readTimeoutMs: envInt("AGENT_READ_TIMEOUT_MS", DEFAULT_READ_TIMEOUT_MS),
    writeTimeoutMs: envInt("AGENT_WRITE_TIMEOUT_MS", DEFAULT_WRITE_TIMEOUT_MS),
    updateIntervalMs: envInt("AGENT_UPDATE_INTERVAL_MS", DEFAULT_UPDATE_INTERVAL_MS),
    keepaliveIntervalMs: envInt("AGENT_KEEPALIVE_MS", DEFAULT_KEEPALIVE_MS),
    requireAuthentication: (process.env.AGENT_REQUIRE_AUTH ?? "true").toLowerCase() !== "false",
    logLevel: process.env.AGENT_LOG_LEVEL ?? "info",
  };
}

function envInt(key: string, defaultVal: number): number {
  const value = process.env[key];
  if (value) {
    const parsed = parseInt(value, 10);
    if (!isNaN(parsed)) return parsed;
  }
  return defaultVal;
}

/** Split "host:port" (or "[v6]:port"). Returns null when malformed. */
export function parsePeerAddress(address: string): { host: string; port: number } | null {
  const sep = address.lastIndexOf(":");
  if (sep <= 0) return null;

  const host = address.slice(0, sep).replace(/^\[(.*)\]$/, "$1");
  const port = parseInt(address.slice(sep + 1), 10);
  if (!host || isNaN(port) || port <= 0 || port > 65535) return null;
  return { host, port };
}

// ─── AgentServer ─────────────────────────────────────────────────────

export class AgentServer {
  readonly agent: TCPAgent;
  private logger: Logger;
  private peerOptions: TCPPeerOptions;
  private server: net.Server | null = null;

  constructor(agent: TCPAgent, logger: Logger, peerOptions: TCPPeerOptions = {}) {
    this.agent = agent;
    this.logger = logger;
    this.peerOptions = peerOptions;
  }

  /** Start accepting connections. Resolves with the bound port. */
  listen(port: number, host = "0.0.0.0"): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = net.createServer((socket) => {
        this.attach(socket).catch((err) => {
          this.logger.warn(`Failed to attach inbound connection: ${err}`);
          socket.destroy();
        });
      });

      server.once("error", reject);
      server.listen(port, host, () => {
        server.off("error", reject);
        server.on("error", (err) => this.logger.error(`Listener error: ${err.message}`));
        this.server = server;

        const bound = this.address() ?? port;
        this.logger.info(`Listening on ${host}:${bound}`);
        resolve(bound);
      });
    });
  }

  address(): number | null {
    const addr = this.server?.address();
    if (!addr || typeof addr === "string") return null;
    return addr.port;
  }

  async dial(host: string, port: number, timeoutMs = DEFAULT_DIAL_TIMEOUT_MS): Promise<TCPPeer> {
    const socket = await new Promise<net.Socket>((resolve, reject) => {
      const conn = net.connect({ host, port });

      const onError = (err: Error) => {
        clearTimeout(timer);
        reject(err);
      };
      const timer = setTimeout(() => {
        conn.off("error", onError);
        conn.destroy();
        reject(new Error(`connection to ${host}:${port} timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      conn.once("error", onError);
      conn.once("connect", () => {
        clearTimeout(timer);
        conn.off("error", onError);
        resolve(conn);
      });
    });

    this.logger.debug(`Connected to ${host}:${port}`);
    return this.attach(socket);
  }

  /** Dial every configured peer; failures are logged, not retried. */
  async dialAll(addresses: string[]): Promise<TCPPeer[]> {
    const peers: TCPPeer[] = [];
    for (const address of addresses) {
      const parsed = parsePeerAddress(address);
      if (!parsed) {
        this.logger.warn(`Ignoring malformed peer address "${address}"`);
        continue;
      }
      try {
        peers.push(await this.dial(parsed.host, parsed.port));
      } catch (err) {
        this.logger.warn(`Dial to ${address} failed: ${err}`);
      }
    }
    return peers;
  }

  async stop(): Promise<void> {
    this.agent.stop();

    const server = this.server;
    this.server = null;
    if (!server) return;
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }

  private async attach(socket: net.Socket): Promise<TCPPeer> {
    socket.setNoDelay(true);
    const peer = new TCPPeer(socket, this.agent, this.logger, this.peerOptions);

    await this.agent.addPeer(peer);
    if (!peer.isClosed) peer.initiateKeyAuth();
    return peer;
  }
}

// ─── Startup ─────────────────────────────────────────────────────────

/**
 * Wire a node together from config: key, agent, listener, outbound dials.
 * The caller supplies the consensus engine.
 */
export async function startAgent(
  engine: ConsensusEngine,
  config: AgentConfig = loadConfig(),
): Promise<AgentServer> {
  const logger = new Logger(config.logLevel);
  const privateKey = config.privateKey ? privateKeyFromHex(config.privateKey) : generatePrivateKey();
  if (!config.privateKey) {
    logger.warn("AGENT_PRIVATE_KEY not set, using a generated key for this run");
  }

  const agent = new TCPAgent(engine, privateKey, logger, {
    updateIntervalMs: config.updateIntervalMs,
  });
  const server = new AgentServer(agent, logger, {
    readTimeoutMs: config.readTimeoutMs,
    writeTimeoutMs: config.writeTimeoutMs,
    keepaliveIntervalMs: config.keepaliveIntervalMs,
    requireAuthentication: config.requireAuthentication,
  });

  await server.listen(config.listenPort, config.listenHost);
  agent.start();
  await server.dialAll(config.peers);
  return server;
}
