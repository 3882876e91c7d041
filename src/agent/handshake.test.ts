import { describe, it, expect } from "vitest";
import { InvalidPublicKeyError, generatePrivateKey, publicKeysEqual } from "./auth.js";
import { AuthStateError, ChallengeMismatchError, PeerAuthenticator } from "./handshake.js";
import {
  decodeKeyAuthChallenge,
  decodeKeyAuthChallengeReply,
  decodeKeyAuthInit,
  encodeKeyAuthChallenge,
  encodeKeyAuthChallengeReply,
  encodeKeyAuthInit,
} from "./codec.js";
import type { PrivateKey } from "./types.js";

/** Run init and challenge; return the reply the initiator produced. */
function runUntilReply(initiatorKey: PrivateKey, responder: PeerAuthenticator) {
  const initiator = new PeerAuthenticator(initiatorKey);
  const init = initiator.createKeyAuthInit();
  const challenge = responder.handleKeyAuthInit(init);
  const reply = initiator.handleKeyAuthChallenge(challenge);
  return { initiator, init, challenge, reply };
}

describe("PeerAuthenticator full handshake", () => {
  it("authenticates the initiator's exact public key", () => {
    const ka = generatePrivateKey();
    const responder = new PeerAuthenticator(generatePrivateKey());

    const { initiator, reply } = runUntilReply(ka, responder);
    responder.handleKeyAuthChallengeReply(reply);

    expect(responder.state).toBe("authenticated");
    expect(initiator.localState).toBe("challenge-answered");
    const key = responder.getPublicKey();
    expect(key).not.toBeNull();
    expect(key && publicKeysEqual(key, ka.publicKey)).toBe(true);
  });

  it("survives the wire encoding of every message", () => {
    const ka = generatePrivateKey();
    const initiator = new PeerAuthenticator(ka);
    const responder = new PeerAuthenticator(generatePrivateKey());

    const init = decodeKeyAuthInit(encodeKeyAuthInit(initiator.createKeyAuthInit()));
    const challenge = decodeKeyAuthChallenge(encodeKeyAuthChallenge(responder.handleKeyAuthInit(init)));
    const reply = decodeKeyAuthChallengeReply(
      encodeKeyAuthChallengeReply(initiator.handleKeyAuthChallenge(challenge)),
    );
    responder.handleKeyAuthChallengeReply(reply);

    expect(responder.state).toBe("authenticated");
  });

  it("sends distinct ephemeral X and Y and a fresh ephemeral per handshake", () => {
    const ka = generatePrivateKey();
    const first = runUntilReply(ka, new PeerAuthenticator(generatePrivateKey())).challenge;
    const second = runUntilReply(ka, new PeerAuthenticator(generatePrivateKey())).challenge;

    expect(first.x.equals(first.y)).toBe(false);
    expect(first.x.equals(second.x)).toBe(false);
    expect(first.ciphertext.length).toBe(128);
    expect(first.iv.length).toBe(16);
  });

  it("erases the retained challenge once authenticated", () => {
    const responder = new PeerAuthenticator(generatePrivateKey());
    const { reply } = runUntilReply(generatePrivateKey(), responder);
    expect(responder.hasPendingChallenge).toBe(true);

    responder.handleKeyAuthChallengeReply(reply);
    expect(responder.hasPendingChallenge).toBe(false);
  });

  it("does not expose the claimed key before authentication", () => {
    const responder = new PeerAuthenticator(generatePrivateKey());
    runUntilReply(generatePrivateKey(), responder);

    expect(responder.state).toBe("challenge-issued");
    expect(responder.getPublicKey()).toBeNull();
  });
});

describe("PeerAuthenticator failures", () => {
  it.each([0, 1, 64, 127])("fails when reply byte %i is flipped", (index) => {
    const responder = new PeerAuthenticator(generatePrivateKey());
    const { reply } = runUntilReply(generatePrivateKey(), responder);
    reply.plaintext[index] ^= 0xff;

    expect(() => responder.handleKeyAuthChallengeReply(reply)).toThrow(ChallengeMismatchError);
    expect(responder.state).toBe("authentication-failed");
    expect(responder.getPublicKey()).toBeNull();
  });

  it("never authenticates after a failed reply", () => {
    const responder = new PeerAuthenticator(generatePrivateKey());
    const { reply } = runUntilReply(generatePrivateKey(), responder);
    const good = Buffer.from(reply.plaintext);
    reply.plaintext[5] ^= 0x01;

    expect(() => responder.handleKeyAuthChallengeReply(reply)).toThrow(ChallengeMismatchError);
    expect(() => responder.handleKeyAuthChallengeReply({ plaintext: good })).toThrow(AuthStateError);
    expect(responder.state).toBe("authentication-failed");
  });

  it("rejects a peer claiming a key it does not hold", () => {
    const victim = generatePrivateKey();
    const attacker = new PeerAuthenticator(generatePrivateKey());
    const responder = new PeerAuthenticator(generatePrivateKey());

    attacker.createKeyAuthInit();
    const challenge = responder.handleKeyAuthInit({ x: victim.publicKey.x, y: victim.publicKey.y });
    const reply = attacker.handleKeyAuthChallenge(challenge);

    expect(() => responder.handleKeyAuthChallengeReply(reply)).toThrow(ChallengeMismatchError);
    expect(responder.state).toBe("authentication-failed");
  });

  it("rejects a reply before any init without changing state", () => {
    const responder = new PeerAuthenticator(generatePrivateKey());

    expect(() => responder.handleKeyAuthChallengeReply({ plaintext: Buffer.alloc(128) })).toThrow(
      "invalid authentication state: cannot accept challenge reply while not-authenticated",
    );
    expect(responder.state).toBe("not-authenticated");
  });

  it("rejects a second init once authenticated", () => {
    const responder = new PeerAuthenticator(generatePrivateKey());
    const { reply } = runUntilReply(generatePrivateKey(), responder);
    responder.handleKeyAuthChallengeReply(reply);
    const key = responder.getPublicKey();

    const other = generatePrivateKey();
    expect(() => responder.handleKeyAuthInit({ x: other.publicKey.x, y: other.publicKey.y })).toThrow(AuthStateError);
    expect(responder.state).toBe("authenticated");
    expect(responder.getPublicKey()).toBe(key);
  });

  it("rejects a second init while a challenge is in flight", () => {
    const responder = new PeerAuthenticator(generatePrivateKey());
    const { init } = runUntilReply(generatePrivateKey(), responder);

    expect(() => responder.handleKeyAuthInit(init)).toThrow(AuthStateError);
    expect(responder.state).toBe("challenge-issued");
  });

  it("fails terminally on a claimed key that is not on the curve", () => {
    const responder = new PeerAuthenticator(generatePrivateKey());

    expect(() => responder.handleKeyAuthInit({ x: Buffer.alloc(32, 1), y: Buffer.alloc(32, 2) })).toThrow(
      InvalidPublicKeyError,
    );
    expect(responder.state).toBe("authentication-failed");
  });
});

describe("PeerAuthenticator initiator guard", () => {
  it("refuses a challenge it did not ask for", () => {
    const responder = new PeerAuthenticator(generatePrivateKey());
    const bystander = new PeerAuthenticator(generatePrivateKey());
    const { challenge } = runUntilReply(generatePrivateKey(), responder);

    expect(() => bystander.handleKeyAuthChallenge(challenge)).toThrow(
      "invalid authentication state: cannot answer key auth challenge while idle",
    );
  });

  it("answers at most one challenge per init", () => {
    const responder = new PeerAuthenticator(generatePrivateKey());
    const { initiator, challenge } = runUntilReply(generatePrivateKey(), responder);

    expect(() => initiator.handleKeyAuthChallenge(challenge)).toThrow(AuthStateError);
    expect(initiator.localState).toBe("challenge-answered");
  });

  it("sends its key only once", () => {
    const initiator = new PeerAuthenticator(generatePrivateKey());
    initiator.createKeyAuthInit();
    expect(() => initiator.createKeyAuthInit()).toThrow(
      "invalid authentication state: cannot send key auth init while auth-key-sent",
    );
  });
});
