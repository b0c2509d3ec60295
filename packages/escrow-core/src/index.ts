// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vote-escrow/escrow-core`
 * Purpose: Pure domain logic for vote-escrowed voting power: decay points, checkpoint planning and historical queries.
 * Scope: Re-exports constants, model types, errors, rules, planner, queries and the store port. Does not contain I/O or infrastructure code.
 * Invariants: No imports from src/ or third-party packages. Pure domain logic only.
 * Side-effects: none
 * Links: docs/VOTING_ESCROW.md
 * @public
 */

// Planner
export { planCheckpoint } from "./checkpoint";
// Constants
export {
  MAX_SEARCH_ITERATIONS,
  MAX_WALK_STEPS,
  MAXTIME,
  MULTIPLIER,
  WEEK,
  ZERO_ADDRESS,
} from "./constants";
// Errors
export {
  type EscrowError,
  InvalidStateError,
  isEscrowError,
  isInvalidStateError,
  isReentrantCallError,
  isTransferFailedError,
  isUnauthorizedError,
  ReentrantCallError,
  type TransferDirection,
  TransferFailedError,
  UnauthorizedError,
} from "./errors";
// Model types
export type {
  Address,
  ChainInstant,
  CheckpointPlan,
  DepositType,
  EscrowControl,
  LockChange,
  LockedBalance,
  Point,
  SlopeChangeWrite,
} from "./model";
export { DEPOSIT_TYPES, EMPTY_LOCK, EMPTY_POINT } from "./model";
// Point arithmetic
export { clampToZero, decay, floorToWeek, type Line, lineFor } from "./point";
// Queries
export {
  type BlockTimeEstimate,
  estimateBlockTime,
  lastUserSlope,
  lockedEnd,
  totalSupplyAt,
  totalSupplyAtBlock,
  userPointHistoryTs,
  votingPowerAt,
  votingPowerAtBlock,
} from "./queries";
// Rules
export {
  depositInto,
  resolveCreateLock,
  resolveDepositFor,
  resolveIncreaseAmount,
  resolveIncreaseUnlockTime,
  resolveWithdraw,
} from "./rules";
export { epochBeforeBlock } from "./search";
// Store port
export type { EscrowStore, EscrowView } from "./store";
// Walker
export { type GlobalWalk, type SlopeLookup, supplyAt, walkGlobal } from "./walker";
