// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/adapters/test/escrow/fakes`
 * Purpose: Verifies the behavior of the escrow test doubles other suites rely on.
 * Scope: Fake chain clock, scripted token transfer and wallet checker. Does not exercise the service.
 * Invariants: Fake clock never moves backwards; scripted failures apply to exactly one transfer.
 * Side-effects: none
 * Links: src/adapters/test
 * @internal
 */

import { getAddress } from "viem";
import { describe, expect, it } from "vitest";

import {
  FAKE_GENESIS,
  FakeChainClock,
  FakeTokenTransfer,
  FakeWalletChecker,
  getTestChainClock,
  resetTestChainClock,
} from "@/adapters/test";
import {
  TEST_ALICE,
  TEST_CHECKER,
  TEST_CONTRACT,
  TEST_WALLET_LOWER,
  TEST_WALLET_UPPER,
} from "@tests/_fakes";

describe("FakeChainClock", () => {
  it("advances one block per twelve seconds by default", async () => {
    const clock = new FakeChainClock();
    clock.advance(120n);

    expect(await clock.current()).toEqual({
      timestamp: FAKE_GENESIS.timestamp + 120n,
      blockNumber: FAKE_GENESIS.blockNumber + 10n,
    });
  });

  it("refuses to move backwards", () => {
    const clock = new FakeChainClock();
    expect(() =>
      clock.set({ timestamp: FAKE_GENESIS.timestamp - 1n, blockNumber: FAKE_GENESIS.blockNumber })
    ).toThrow("Chain clock cannot move backwards");
  });

  it("shares one test clock until reset", () => {
    const clock = getTestChainClock();
    expect(getTestChainClock()).toBe(clock);
    resetTestChainClock();
    expect(getTestChainClock()).not.toBe(clock);
  });
});

describe("FakeTokenTransfer", () => {
  it("fails exactly one scripted transfer", async () => {
    const token = new FakeTokenTransfer();
    token.vault.mint(TEST_ALICE, 10n);
    token.failNextTransfer();

    expect(await token.transferIn(TEST_ALICE, 1n)).toBe(false);
    expect(await token.transferIn(TEST_ALICE, 1n)).toBe(true);
    expect(token.calls).toHaveLength(2);
  });
});

describe("FakeWalletChecker", () => {
  it("answers per checker and honours revocation", async () => {
    const checker = new FakeWalletChecker();
    checker.approve(TEST_CHECKER, TEST_CONTRACT);

    expect(await checker.isApproved(TEST_CHECKER, TEST_CONTRACT)).toBe(true);
    expect(await checker.isApproved(TEST_CHECKER, TEST_ALICE)).toBe(false);

    checker.revoke(TEST_CHECKER, TEST_CONTRACT);
    expect(await checker.isApproved(TEST_CHECKER, TEST_CONTRACT)).toBe(false);
  });

  it("matches accounts regardless of casing", async () => {
    const checker = new FakeWalletChecker();
    checker.approve(TEST_CHECKER, TEST_WALLET_LOWER);

    expect(await checker.isApproved(TEST_CHECKER, TEST_WALLET_UPPER)).toBe(true);
    expect(checker.checks).toEqual([
      { checker: TEST_CHECKER, account: getAddress(TEST_WALLET_LOWER) },
    ]);

    checker.revoke(TEST_CHECKER, TEST_WALLET_UPPER);
    expect(await checker.isApproved(TEST_CHECKER, TEST_WALLET_LOWER)).toBe(false);
  });
});
