/**
 * Unit tests for API token signing
 */

import * as crypto from "crypto";
import { describe, it, expect } from "vitest";
import { decodeProtectedHeader, jwtVerify } from "jose";
import {
  TokenSigner,
  TOKEN_AUDIENCE,
  TOKEN_TTL_SECONDS,
} from "../../../src/auth/token-signer.js";
import { CredentialError } from "../../../src/errors.js";

function keyPair() {
  const { privateKey, publicKey } = crypto.generateKeyPairSync("ec", {
    namedCurve: "P-256",
  });
  return {
    pem: privateKey.export({ type: "pkcs8", format: "pem" }).toString(),
    publicKey,
  };
}

describe("TokenSigner", () => {
  it("should sign an ES256 token with the expected header and claims", async () => {
    const { pem, publicKey } = keyPair();
    const issuedAtMs = 1_760_000_000_000;
    const signer = new TokenSigner(
      { issuerId: "test-issuer", keyId: "TESTKEY123", privateKey: pem },
      () => issuedAtMs
    );

    const token = await signer.getToken();

    expect(decodeProtectedHeader(token)).toEqual({
      alg: "ES256",
      kid: "TESTKEY123",
      typ: "JWT",
    });
    const { payload } = await jwtVerify(token, publicKey, {
      audience: TOKEN_AUDIENCE,
      issuer: "test-issuer",
      currentDate: new Date(issuedAtMs),
    });
    expect(payload.iat).toBe(issuedAtMs / 1000);
    expect(payload.exp).toBe(issuedAtMs / 1000 + TOKEN_TTL_SECONDS);
    expect(payload.aud).toBe("appstoreconnect-v1");
  });

  it("should reuse the cached token until the refresh margin", async () => {
    const { pem } = keyPair();
    let now = 1_760_000_000_000;
    const signer = new TokenSigner(
      { issuerId: "test-issuer", keyId: "TESTKEY123", privateKey: pem },
      () => now
    );

    const first = await signer.getToken();
    now += 10 * 60 * 1000;
    expect(await signer.getToken()).toBe(first);

    // 61 s before expiry is still outside the 60 s margin
    now = 1_760_000_000_000 + (TOKEN_TTL_SECONDS - 61) * 1000;
    expect(await signer.getToken()).toBe(first);

    // Within the margin a fresh token is signed
    now = 1_760_000_000_000 + (TOKEN_TTL_SECONDS - 30) * 1000;
    expect(await signer.getToken()).not.toBe(first);
  });

  it("should sign again after invalidate", async () => {
    const { pem } = keyPair();
    let now = 1_760_000_000_000;
    const signer = new TokenSigner(
      { issuerId: "test-issuer", keyId: "TESTKEY123", privateKey: pem },
      () => now
    );

    const first = await signer.getToken();
    signer.invalidate();
    now += 1000;
    expect(await signer.getToken()).not.toBe(first);
  });

  it("should reject a malformed key", async () => {
    const signer = new TokenSigner({
      issuerId: "test-issuer",
      keyId: "TESTKEY123",
      privateKey: "not a key",
    });

    await expect(signer.getToken()).rejects.toBeInstanceOf(CredentialError);
  });

  it("should reject a key on the wrong curve", async () => {
    const { privateKey } = crypto.generateKeyPairSync("ec", {
      namedCurve: "secp384r1",
    });
    const signer = new TokenSigner({
      issuerId: "test-issuer",
      keyId: "TESTKEY123",
      privateKey: privateKey.export({ type: "pkcs8", format: "pem" }).toString(),
    });

    await expect(signer.getToken()).rejects.toThrow(/EC P-256/);
  });

  it("should reject an RSA key", async () => {
    const { privateKey } = crypto.generateKeyPairSync("rsa", {
      modulusLength: 2048,
    });
    const signer = new TokenSigner({
      issuerId: "test-issuer",
      keyId: "TESTKEY123",
      privateKey: privateKey.export({ type: "pkcs8", format: "pem" }).toString(),
    });

    await expect(signer.getToken()).rejects.toThrow(
      "Private key must be an EC P-256 key, got rsa"
    );
  });
});
