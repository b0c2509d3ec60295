// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vote-escrow/escrow-core/tests/queries`
 * Purpose: Unit tests for voting-power and total-supply lookups by time and by block.
 * Scope: Test-only. Does not contain production code.
 * Invariants: Block queries reject future blocks and extrapolate in the newest interval.
 * Side-effects: none
 * Links: packages/escrow-core/src/queries.ts
 * @internal
 */

import { beforeEach, describe, expect, it } from "vitest";

import {
  estimateBlockTime,
  InvalidStateError,
  lastUserSlope,
  lockedEnd,
  MAXTIME,
  totalSupplyAt,
  totalSupplyAtBlock,
  userPointHistoryTs,
  votingPowerAt,
  votingPowerAtBlock,
  WEEK,
} from "../src";
import { ALICE, at, BOB, GENESIS, TestView } from "./fixtures";

const G = GENESIS.timestamp;
const B = GENESIS.blockNumber;

// Alice: 100 slope until week 4, locked at genesis.
// Bob: 50 slope until week 8, locked one week later.
let view: TestView;

beforeEach(() => {
  view = new TestView();
  view.relock(ALICE, { amount: MAXTIME * 100n, end: G + 4n * WEEK }, GENESIS);
  view.relock(BOB, { amount: MAXTIME * 50n, end: G + 8n * WEEK }, at(1n));
});

describe("votingPowerAt", () => {
  it("projects the latest account point to the requested time", () => {
    expect(votingPowerAt(view, ALICE, G + 2n * WEEK)).toBe(200n * WEEK);
    expect(votingPowerAt(view, BOB, G + 2n * WEEK)).toBe(300n * WEEK);
  });

  it("is zero at and after expiry", () => {
    expect(votingPowerAt(view, ALICE, G + 4n * WEEK)).toBe(0n);
    expect(votingPowerAt(view, ALICE, G + 9n * WEEK)).toBe(0n);
  });

  it("is zero for accounts that never locked", () => {
    expect(votingPowerAt(view, "0x0000000000000000000000000000000000000003", G)).toBe(0n);
  });
});

describe("totalSupplyAt", () => {
  it("equals the sum of account voting power across scheduled expiries", () => {
    for (const week of [2n, 5n, 8n]) {
      const time = G + week * WEEK;
      expect(totalSupplyAt(view, time)).toBe(
        votingPowerAt(view, ALICE, time) + votingPowerAt(view, BOB, time)
      );
    }
    expect(totalSupplyAt(view, G + 5n * WEEK)).toBe(150n * WEEK);
    expect(totalSupplyAt(view, G + 8n * WEEK)).toBe(0n);
  });
});

describe("estimateBlockTime", () => {
  it("interpolates between bracketing global points", () => {
    const estimate = estimateBlockTime(view, B + 25_200n, at(1n));
    expect(estimate.epoch).toBe(1);
    expect(estimate.timestamp).toBe(G + WEEK / 2n);
  });

  it("extrapolates towards now in the newest interval", () => {
    const estimate = estimateBlockTime(view, B + 75_600n, at(2n));
    expect(estimate.epoch).toBe(2);
    expect(estimate.timestamp).toBe(G + WEEK + WEEK / 2n);
  });
});

describe("votingPowerAtBlock", () => {
  it("decays the bracketing account point to the block's timestamp", () => {
    expect(votingPowerAtBlock(view, ALICE, B + 25_200n, at(1n))).toBe(350n * WEEK);
  });

  it("is zero before the account's first checkpoint", () => {
    expect(votingPowerAtBlock(view, BOB, B + 25_200n, at(1n))).toBe(0n);
  });

  it("extrapolates past the last checkpoint with the current instant", () => {
    expect(votingPowerAtBlock(view, BOB, B + 75_600n, at(2n))).toBe(325n * WEEK);
  });

  it("rejects blocks after the current block", () => {
    const now = at(1n);
    expect(() =>
      votingPowerAtBlock(view, ALICE, now.blockNumber + 1n, now)
    ).toThrow(InvalidStateError);
    expect(() =>
      votingPowerAtBlock(view, ALICE, now.blockNumber + 1n, now)
    ).toThrow(`Block ${now.blockNumber + 1n} is after the current block ${now.blockNumber}`);
  });
});

describe("totalSupplyAtBlock", () => {
  it("matches the time-based total at the current block", () => {
    const now = at(1n);
    expect(totalSupplyAtBlock(view, now.blockNumber, now)).toBe(
      totalSupplyAt(view, now.timestamp)
    );
    expect(totalSupplyAtBlock(view, now.blockNumber, now)).toBe(650n * WEEK);
  });

  it("uses the latest point for blocks shared by several epochs", () => {
    expect(totalSupplyAtBlock(view, B, at(1n))).toBe(400n * WEEK);
  });

  it("extrapolates inside the newest interval", () => {
    expect(totalSupplyAtBlock(view, B + 75_600n, at(2n))).toBe(575n * WEEK);
  });

  it("rejects blocks after the current block", () => {
    expect(() => totalSupplyAtBlock(view, B + 50_401n, at(1n))).toThrow(
      InvalidStateError
    );
  });
});

describe("raw lookups", () => {
  it("reads lock end, last slope and point timestamps", () => {
    expect(lockedEnd(view, BOB)).toBe(G + 8n * WEEK);
    expect(lastUserSlope(view, ALICE)).toBe(100n);
    expect(userPointHistoryTs(view, BOB, 1)).toBe(G + WEEK);
    expect(userPointHistoryTs(view, BOB, 0)).toBe(0n);
  });
});
