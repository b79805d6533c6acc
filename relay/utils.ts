/**
 * Security helpers shared by the relay: secret loading, key validation,
 * and URL handling.
 */

import * as fs from "fs";
import type { Logger } from "winston";

// ============================================================
//  TLS Security Enforcement
// ============================================================

/**
 * Enforce TLS certificate validation at process level.
 * Must be called before any network I/O.
 * Refuses `NODE_TLS_REJECT_UNAUTHORIZED=0` outside development and test,
 * and keeps re-checking it so it cannot be flipped at runtime.
 */
export function enforceTLSSecurity(logger: Logger, env: NodeJS.ProcessEnv = process.env): void {
  if (env.NODE_ENV === "development" || env.NODE_ENV === "test") {
    return;
  }
  if (env.NODE_TLS_REJECT_UNAUTHORIZED === "0") {
    logger.error("[SECURITY] NODE_TLS_REJECT_UNAUTHORIZED=0 is FORBIDDEN in production. Overriding to 1.");
  }
  env.NODE_TLS_REJECT_UNAUTHORIZED = "1";

  // Node.js 22+ forbids accessor descriptors on process.env, hence a watchdog
  const TLS_WATCHDOG_INTERVAL_MS = 5000;
  setInterval(() => {
    if (env.NODE_TLS_REJECT_UNAUTHORIZED === "0") {
      logger.error("[SECURITY] Attempt to disable TLS cert validation blocked at runtime.");
      env.NODE_TLS_REJECT_UNAUTHORIZED = "1";
    }
  }, TLS_WATCHDOG_INTERVAL_MS).unref();
}

/**
 * Returns an error message when `url` is plaintext outside development/test,
 * null when it is acceptable.
 */
export function checkHTTPS(url: string, label: string, env: NodeJS.ProcessEnv = process.env): string | null {
  if (url.startsWith("https://") || url.startsWith("wss://")) return null;
  if (env.NODE_ENV === "development" || env.NODE_ENV === "test") return null;
  return `SECURITY: ${label} must use HTTPS in production. Got: ${sanitizeUrl(url)}`;
}

/**
 * Sanitize a URL for safe logging by masking API keys in the path/query.
 * RPC providers embed credentials in the path (e.g. https://mainnet.infura.io/v3/SECRET).
 */
export function sanitizeUrl(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.protocol}//${parsed.host}/***`;
  } catch {
    return url.substring(0, 40) + "...";
  }
}

// secp256k1 curve order - private keys must be in range [1, n-1]
const SECP256K1_N = BigInt(
  "0xFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFEBAAEDCE6AF48A03BBFD25E8CD0364141"
);

/**
 * Read Docker secrets from /run/secrets/ with env var fallback.
 * Synchronous because it runs once while the configuration is loaded.
 */
export function readSecret(
  name: string,
  envVar: string,
  env: NodeJS.ProcessEnv = process.env,
  secretsDir = "/run/secrets"
): string {
  const secretPath = `${secretsDir}/${name}`;
  if (fs.existsSync(secretPath)) {
    return fs.readFileSync(secretPath, "utf-8").trim();
  }
  return env[envVar] || "";
}

/**
 * Validate that a private key is in the valid secp256k1 range [1, n-1].
 * Accepts keys with or without the 0x prefix.
 */
export function isValidSecp256k1PrivateKey(privateKey: string): boolean {
  const normalized = privateKey.startsWith("0x") ? privateKey.slice(2) : privateKey;

  if (!/^[0-9a-fA-F]{64}$/.test(normalized)) {
    return false;
  }

  const keyValue = BigInt("0x" + normalized);
  if (keyValue === 0n) {
    return false;
  }
  if (keyValue >= SECP256K1_N) {
    return false;
  }

  return true;
}

/**
 * Read and validate a private key from Docker secret or env var.
 * Throws if the key is not in the valid secp256k1 range; returns "" when absent.
 *
 * After validation the env var is overwritten so the key only survives in
 * the caller's credential object.
 */
export function readAndValidatePrivateKey(
  secretName: string,
  envVar: string,
  env: NodeJS.ProcessEnv = process.env,
  secretsDir?: string
): string {
  const key = readSecret(secretName, envVar, env, secretsDir);

  if (!key) {
    return "";
  }

  if (!isValidSecp256k1PrivateKey(key)) {
    throw new Error(
      `SECURITY: ${envVar} is not a valid secp256k1 private key. ` +
      `Key must be 32 bytes (64 hex chars) in range [1, curve order-1]`
    );
  }

  if (env[envVar] && env.NODE_ENV !== "test") {
    env[envVar] = "0".repeat(64);
  }

  return key;
}
