/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces a consistent
 * error envelope. Domain errors carry a string `code` that maps to an
 * HTTP status; anything else is a 500 that reveals nothing.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

type ErrorStatus = 400 | 403 | 404 | 409 | 422 | 500;

const STATUS_MAP: Readonly<Record<string, ErrorStatus>> = {
  // Oracle consensus
  ACCESS_DENIED: 403,
  INVALID_ROOT: 400,
  INVALID_TIMESTAMP: 400,
  FUTURE_TIMESTAMP: 422,
  TOO_EARLY_UPDATE: 409,
  NOT_ENOUGH_SIGNATURES: 422,
  INVALID_SIGNER: 422,

  // Attestor registry
  INVALID_ADDRESS: 400,
  ATTESTOR_EXISTS: 409,
  ATTESTOR_NOT_FOUND: 404,
  INVALID_QUORUM: 400,

  // Keeper
  INVALID_PROOF: 422,
  INVALID_AMOUNT: 400,
  VAULT_EXISTS: 409,
  VAULT_NOT_FOUND: 404,

  // Exit queue
  INVALID_TICKET: 400,
  INVALID_CHECKPOINT_INDEX: 422,
  OVERFLOW: 422,
  POSITION_EXISTS: 409,
  POSITION_NOT_FOUND: 404,
  INVALID_SNAPSHOT: 400,

  // Vault
  INVALID_CONFIG: 400,
  INSUFFICIENT_SHARES: 422,
  INSUFFICIENT_ASSETS: 422,
  NOT_COLLATERALIZED: 409,
  COLLATERALIZED: 409,
  NOT_HARVESTED: 409,
  EXIT_REQUEST_NOT_PROCESSED: 409,

  // Rewards tree
  EMPTY_TREE: 400,
  DUPLICATE_VAULT: 409,
  INVALID_LEAF: 400,
  INVALID_PAYLOAD: 400,

  // Audit log
  INVALID_QUERY: 400,
};

function domainCode(err: Error): string | undefined {
  if ("code" in err && typeof err.code === "string" && err.code in STATUS_MAP) {
    return err.code;
  }
  return undefined;
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Build the handler registered with `app.onError`. `onInternalError`
 * receives every error that becomes a 500.
 */
export function createErrorHandler(
  onInternalError?: (err: Error) => void,
): (err: Error, c: Context) => Response {
  return (err, c) => {
    if (err instanceof HTTPException) {
      if (err.status === 400) {
        return c.json(createErrorEnvelope("VALIDATION_ERROR", err.message), 400);
      }
      return err.getResponse();
    }

    const code = domainCode(err);
    if (code === undefined) {
      onInternalError?.(err);
      return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
    }

    const status = STATUS_MAP[code] ?? 500;
    return c.json(createErrorEnvelope(code, err.message), status);
  };
}
