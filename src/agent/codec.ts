/**
 * Envelope and key authentication message codec.
 *
 * Every frame body is a UTF-8 JSON envelope `{ command, message }` whose
 * binary fields are base64. The key authentication bodies are themselves
 * JSON documents carried base64-encoded in `message`; a CONSENSUS
 * envelope's `message` is the engine's opaque payload.
 *
 * Decoding is fail-closed: any malformed field rejects the whole message.
 */

import { z } from "zod";
import { CommandType } from "./types.js";
import type {
  Envelope,
  KeyAuthChallenge,
  KeyAuthChallengeReply,
  KeyAuthInit,
} from "./types.js";

/** Size of the random challenge plaintext. */
export const CHALLENGE_SIZE = 128;

/** AES block size, used as the challenge IV length. */
export const IV_SIZE = 16;

/** Coordinate width on a 256-bit curve. */
export const COORDINATE_SIZE = 32;

export class DecodeError extends Error {
  constructor(what: string, reason: string) {
    super(`invalid ${what}: ${reason}`);
    this.name = "DecodeError";
  }
}

// --- Schemas ---

/** Canonical base64 only: the decoded bytes must re-encode to the input. */
const base64Bytes = z.string().transform((s, ctx) => {
  const bytes = Buffer.from(s, "base64");
  if (bytes.toString("base64") !== s) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "not base64" });
    return z.NEVER;
  }
  return bytes;
});

function exactBytes(size: number) {
  return base64Bytes.refine((b) => b.length === size, `expected ${size} bytes`);
}

const coordinate = base64Bytes
  .refine((b) => b.length > 0 && b.length <= COORDINATE_SIZE, `expected 1-${COORDINATE_SIZE} bytes`)
  .transform(leftPad);

const envelopeSchema = z.object({
  command: z.nativeEnum(CommandType),
  message: base64Bytes,
});

const keyAuthInitSchema = z.object({
  x: coordinate,
  y: coordinate,
});

const keyAuthChallengeSchema = z.object({
  x: coordinate,
  y: coordinate,
  ciphertext: exactBytes(CHALLENGE_SIZE),
  iv: exactBytes(IV_SIZE),
});

const keyAuthChallengeReplySchema = z.object({
  plaintext: exactBytes(CHALLENGE_SIZE),
});

// --- Helpers ---

function leftPad(value: Buffer): Buffer {
  if (value.length >= COORDINATE_SIZE) return value;
  const out = Buffer.alloc(COORDINATE_SIZE);
  value.copy(out, COORDINATE_SIZE - value.length);
  return out;
}

function toJson(value: Record<string, string | number>): Buffer {
  return Buffer.from(JSON.stringify(value), "utf-8");
}

function parseJson<S extends z.ZodTypeAny>(schema: S, data: Buffer, what: string): z.output<S> {
  let raw: unknown;
  try {
    raw = JSON.parse(data.toString("utf-8"));
  } catch {
    throw new DecodeError(what, "malformed JSON");
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new DecodeError(what, `${path}${issue.message}`);
  }
  return result.data;
}

// --- Envelope ---

export function encodeEnvelope(envelope: Envelope): Buffer {
  return toJson({
    command: envelope.command,
    message: envelope.message.toString("base64"),
  });
}

export function decodeEnvelope(data: Buffer): Envelope {
  const wire = parseJson(envelopeSchema, data, "envelope");
  return { command: wire.command, message: wire.message };
}

// --- Key authentication bodies ---

export function encodeKeyAuthInit(msg: KeyAuthInit): Buffer {
  return toJson({
    x: leftPad(msg.x).toString("base64"),
    y: leftPad(msg.y).toString("base64"),
  });
}

export function decodeKeyAuthInit(data: Buffer): KeyAuthInit {
  return parseJson(keyAuthInitSchema, data, "key auth init");
}

export function encodeKeyAuthChallenge(msg: KeyAuthChallenge): Buffer {
  return toJson({
    x: leftPad(msg.x).toString("base64"),
    y: leftPad(msg.y).toString("base64"),
    ciphertext: msg.ciphertext.toString("base64"),
    iv: msg.iv.toString("base64"),
  });
}

export function decodeKeyAuthChallenge(data: Buffer): KeyAuthChallenge {
  return parseJson(keyAuthChallengeSchema, data, "key auth challenge");
}

export function encodeKeyAuthChallengeReply(msg: KeyAuthChallengeReply): Buffer {
  return toJson({ plaintext: msg.plaintext.toString("base64") });
}

export function decodeKeyAuthChallengeReply(data: Buffer): KeyAuthChallengeReply {
  return parseJson(keyAuthChallengeReplySchema, data, "key auth challenge reply");
}

/** Wrap an already-encoded body in an envelope, ready for the internal queue. */
export function envelopeBytes(command: CommandType, body: Buffer): Buffer {
  return encodeEnvelope({ command, message: body });
}
