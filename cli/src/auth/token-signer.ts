/**
 * ES256 token signing for App Store Connect API authentication
 */

import * as crypto from "crypto";
import { SignJWT } from "jose";
import { CredentialError } from "../errors.js";

export const TOKEN_AUDIENCE = "appstoreconnect-v1";

/** Tokens are valid for 20 minutes */
export const TOKEN_TTL_SECONDS = 20 * 60;

/** A cached token this close to expiry is replaced */
export const REFRESH_MARGIN_SECONDS = 60;

export interface SignerCredentials {
  issuerId: string;
  keyId: string;
  /** PEM-encoded EC P-256 private key (.p8) */
  privateKey: string;
}

/**
 * Issues short-lived API tokens and caches the last one in memory.
 * One instance is shared by reference with every API client; tokens are
 * never written to disk.
 */
export class TokenSigner {
  private key: crypto.KeyObject | null = null;
  private cached: { token: string; expiresAt: number } | null = null;

  constructor(
    private credentials: SignerCredentials,
    private now: () => number = Date.now
  ) {}

  /**
   * Return the cached token, or sign a fresh one when none is cached or the
   * cached one is within the refresh margin of expiry
   */
  async getToken(): Promise<string> {
    const nowSeconds = Math.floor(this.now() / 1000);
    if (
      this.cached &&
      this.cached.expiresAt - REFRESH_MARGIN_SECONDS > nowSeconds
    ) {
      return this.cached.token;
    }
    return this.sign();
  }

  /**
   * Sign a new token unconditionally
   */
  async sign(): Promise<string> {
    const key = this.loadKey();
    const issuedAt = Math.floor(this.now() / 1000);
    const expiresAt = issuedAt + TOKEN_TTL_SECONDS;

    let token: string;
    try {
      token = await new SignJWT({})
        .setProtectedHeader({
          alg: "ES256",
          kid: this.credentials.keyId,
          typ: "JWT",
        })
        .setIssuer(this.credentials.issuerId)
        .setIssuedAt(issuedAt)
        .setExpirationTime(expiresAt)
        .setAudience(TOKEN_AUDIENCE)
        .sign(key);
    } catch (error) {
      throw new CredentialError("Failed to sign API token", { cause: error });
    }

    this.cached = { token, expiresAt };
    return token;
  }

  /**
   * Drop the cached token, e.g. after the server rejected it
   */
  invalidate(): void {
    this.cached = null;
  }

  private loadKey(): crypto.KeyObject {
    if (this.key) {
      return this.key;
    }

    let key: crypto.KeyObject;
    try {
      key = crypto.createPrivateKey(this.credentials.privateKey);
    } catch (error) {
      throw new CredentialError(
        "Failed to parse private key (expected a PEM-encoded .p8 key)",
        { cause: error }
      );
    }

    if (
      key.asymmetricKeyType !== "ec" ||
      key.asymmetricKeyDetails?.namedCurve !== "prime256v1"
    ) {
      throw new CredentialError(
        `Private key must be an EC P-256 key, got ${key.asymmetricKeyType ?? "unknown"}`
      );
    }

    this.key = key;
    return key;
  }
}
