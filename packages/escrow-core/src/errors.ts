// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vote-escrow/escrow-core/errors`
 * Purpose: Domain error classes for vote-escrow operations.
 * Scope: Error definitions and type guards. Does not perform I/O or contain business logic.
 * Invariants: All errors have a readonly `code` discriminant for type guards.
 * Side-effects: none
 * Links: docs/VOTING_ESCROW.md
 * @public
 */

export class InvalidStateError extends Error {
  public readonly code = "INVALID_STATE" as const;
  constructor(public readonly reason: string) {
    super(reason);
    this.name = "InvalidStateError";
  }
}

export type TransferDirection = "in" | "out";

export class TransferFailedError extends Error {
  public readonly code = "TRANSFER_FAILED" as const;
  constructor(
    public readonly direction: TransferDirection,
    public readonly account: string,
    public readonly amount: bigint
  ) {
    super(
      `Token transfer ${direction === "in" ? "from" : "to"} ${account} of ${amount} failed`
    );
    this.name = "TransferFailedError";
  }
}

export class UnauthorizedError extends Error {
  public readonly code = "UNAUTHORIZED" as const;
  constructor(
    public readonly caller: string,
    public readonly action: string
  ) {
    super(`${caller} is not allowed to ${action}`);
    this.name = "UnauthorizedError";
  }
}

export class ReentrantCallError extends Error {
  public readonly code = "REENTRANT_CALL" as const;
  constructor(public readonly action: string) {
    super(`Re-entrant call to ${action} while another operation is in flight`);
    this.name = "ReentrantCallError";
  }
}

export type EscrowError =
  | InvalidStateError
  | TransferFailedError
  | UnauthorizedError
  | ReentrantCallError;

// Type guards

export function isInvalidStateError(
  error: unknown
): error is InvalidStateError {
  return error instanceof Error && error.name === "InvalidStateError";
}

export function isTransferFailedError(
  error: unknown
): error is TransferFailedError {
  return error instanceof Error && error.name === "TransferFailedError";
}

export function isUnauthorizedError(
  error: unknown
): error is UnauthorizedError {
  return error instanceof Error && error.name === "UnauthorizedError";
}

export function isReentrantCallError(
  error: unknown
): error is ReentrantCallError {
  return error instanceof Error && error.name === "ReentrantCallError";
}

export function isEscrowError(error: unknown): error is EscrowError {
  return (
    isInvalidStateError(error) ||
    isTransferFailedError(error) ||
    isUnauthorizedError(error) ||
    isReentrantCallError(error)
  );
}
