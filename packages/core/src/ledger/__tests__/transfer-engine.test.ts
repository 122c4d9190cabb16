/**
 * Transfer Engine Unit Tests
 *
 * Drives the four operations against a fresh in-memory ledger per test
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { signed, ROOT_ORIGIN, NONE_ORIGIN } from '../origin.js';
import type { LedgerResult } from '../ledger-types.js';
import { createTestLedger } from './ledger-fixtures.js';

const alice = signed('alice');
const bob = signed('bob');
const carol = signed('carol');
const dave = signed('dave');

function errorCode(result: LedgerResult): string | null {
  return result.ok ? null : result.error.code;
}

describe('TransferEngine', () => {
  let ledger: ReturnType<typeof createTestLedger>;

  beforeEach(() => {
    ledger = createTestLedger();
  });

  describe('issue → transfer → approve → transferFrom walkthrough', () => {
    it('keeps balances, allowances and events consistent at every step', () => {
      const { engine, events } = ledger;

      // Issue
      expect(engine.issue(alice, 'Tok', 'TOK', 1000n).ok).toBe(true);
      expect(engine.balanceOf('alice')).toBe(1000n);
      expect(engine.tokenDetails()?.totalSupply).toBe(1000n);
      expect(events.drain()).toEqual([]);

      // Transfer
      expect(engine.transfer(alice, 'bob', 300n).ok).toBe(true);
      expect(engine.balanceOf('alice')).toBe(700n);
      expect(engine.balanceOf('bob')).toBe(300n);
      expect(events.drain()).toEqual([{ type: 'Transfer', from: 'alice', to: 'bob', value: 300n }]);

      // Approve
      expect(engine.approve(alice, 'carol', 200n).ok).toBe(true);
      expect(engine.allowance('alice', 'carol')).toBe(200n);
      expect(events.drain()).toEqual([
        { type: 'Approval', owner: 'alice', spender: 'carol', value: 200n },
      ]);

      // Delegated transfer
      expect(engine.transferFrom(carol, 'alice', 'dave', 150n).ok).toBe(true);
      expect(engine.allowance('alice', 'carol')).toBe(50n);
      expect(engine.balanceOf('alice')).toBe(550n);
      expect(engine.balanceOf('dave')).toBe(150n);
      expect(events.drain()).toEqual([
        { type: 'Approval', owner: 'alice', spender: 'carol', value: 150n },
        { type: 'Transfer', from: 'alice', to: 'dave', value: 150n },
      ]);

      // Over the remaining allowance
      const result = engine.transferFrom(carol, 'alice', 'dave', 100n);
      expect(errorCode(result)).toBe('InsufficientAllowance');
      expect(engine.allowance('alice', 'carol')).toBe(50n);
      expect(engine.balanceOf('alice')).toBe(550n);
      expect(engine.balanceOf('bob')).toBe(300n);
      expect(engine.balanceOf('dave')).toBe(150n);
      expect(events.drain()).toEqual([]);
      expect(engine.totalBalance()).toBe(1000n);
    });
  });

  describe('issue', () => {
    it('rejects a name longer than 64 bytes', () => {
      const result = ledger.engine.issue(alice, 'n'.repeat(65), 'TOK', 1n);

      expect(errorCode(result)).toBe('NameTooLong');
      expect(ledger.engine.tokenDetails()).toBeNull();
      expect(ledger.engine.balanceOf('alice')).toBe(0n);
    });

    it('measures text labels in UTF-8 bytes', () => {
      // 33 two-byte characters = 66 bytes
      const result = ledger.engine.issue(alice, 'é'.repeat(33), 'TOK', 1n);

      expect(errorCode(result)).toBe('NameTooLong');
    });

    it('rejects a ticker longer than 32 bytes', () => {
      const result = ledger.engine.issue(alice, 'Tok', new Uint8Array(33), 1n);

      expect(errorCode(result)).toBe('TickerTooLong');
    });

    it('accepts labels at the byte limits', () => {
      const result = ledger.engine.issue(alice, 'n'.repeat(64), 't'.repeat(32), 5n);

      expect(result.ok).toBe(true);
      expect(ledger.engine.tokenDetails()?.name).toHaveLength(64);
      expect(ledger.engine.tokenDetails()?.ticker).toHaveLength(32);
    });

    it('rejects a supply wider than the balance width', () => {
      const narrow = createTestLedger({ balanceBits: 8 });

      expect(errorCode(narrow.engine.issue(alice, 'Tok', 'TOK', 256n))).toBe('Overflow');
      expect(narrow.engine.issue(alice, 'Tok', 'TOK', 255n).ok).toBe(true);
    });

    it('rejects a negative supply', () => {
      expect(errorCode(ledger.engine.issue(alice, 'Tok', 'TOK', -1n))).toBe('InvalidAmount');
    });

    it('rejects a second issuance by default', () => {
      ledger.engine.issue(alice, 'Tok', 'TOK', 1000n);

      const result = ledger.engine.issue(bob, 'Other', 'OTH', 5n);

      expect(errorCode(result)).toBe('AlreadyIssued');
      expect(ledger.engine.balanceOf('bob')).toBe(0n);
      expect(ledger.engine.tokenDetails()?.totalSupply).toBe(1000n);
    });

    it('overwrites the token and only the caller balance under the overwrite policy', () => {
      const legacy = createTestLedger({ reissuePolicy: 'overwrite' });
      legacy.engine.issue(alice, 'Tok', 'TOK', 1000n);
      legacy.engine.transfer(alice, 'bob', 300n);

      const result = legacy.engine.issue(alice, 'Tok2', 'TK2', 50n);

      expect(result.ok).toBe(true);
      expect(legacy.engine.balanceOf('alice')).toBe(50n);
      expect(legacy.engine.balanceOf('bob')).toBe(300n);
      expect(legacy.engine.tokenDetails()?.totalSupply).toBe(50n);
    });

    it('returns a copy of the token record', () => {
      ledger.engine.issue(alice, 'Tok', 'TOK', 1n);

      const details = ledger.engine.tokenDetails();
      details?.name.fill(0);

      expect(ledger.engine.tokenDetails()?.name).toEqual(new TextEncoder().encode('Tok'));
    });
  });

  describe('transfer', () => {
    beforeEach(() => {
      ledger.engine.issue(alice, 'Tok', 'TOK', 1000n);
      ledger.events.drain();
    });

    it('fails with InsufficientBalance and writes nothing', () => {
      const result = ledger.engine.transfer(bob, 'alice', 1n);

      expect(errorCode(result)).toBe('InsufficientBalance');
      expect(ledger.engine.balanceOf('bob')).toBe(0n);
      expect(ledger.engine.balanceOf('alice')).toBe(1000n);
      expect(ledger.events.peek()).toEqual([]);
    });

    it('allows moving the whole balance', () => {
      expect(ledger.engine.transfer(alice, 'bob', 1000n).ok).toBe(true);
      expect(ledger.engine.balanceOf('alice')).toBe(0n);
      expect(ledger.engine.balanceOf('bob')).toBe(1000n);
    });

    it('leaves a self transfer balance unchanged and still emits', () => {
      expect(ledger.engine.transfer(alice, 'alice', 400n).ok).toBe(true);

      expect(ledger.engine.balanceOf('alice')).toBe(1000n);
      expect(ledger.events.drain()).toEqual([
        { type: 'Transfer', from: 'alice', to: 'alice', value: 400n },
      ]);
    });

    it('rejects a self transfer above the balance', () => {
      expect(errorCode(ledger.engine.transfer(alice, 'alice', 1001n))).toBe('InsufficientBalance');
    });

    it('fails with Overflow when the receiver balance would exceed the width', () => {
      const narrow = createTestLedger({ balanceBits: 8 });
      narrow.store.setBalance('alice', 200n);
      narrow.store.setBalance('bob', 100n);

      const result = narrow.engine.transfer(alice, 'bob', 200n);

      expect(errorCode(result)).toBe('Overflow');
      expect(narrow.engine.balanceOf('alice')).toBe(200n);
      expect(narrow.engine.balanceOf('bob')).toBe(100n);
      expect(narrow.events.peek()).toEqual([]);
    });

    it('rejects a negative value', () => {
      expect(errorCode(ledger.engine.transfer(alice, 'bob', -5n))).toBe('InvalidAmount');
      expect(ledger.engine.balanceOf('alice')).toBe(1000n);
    });

    it('permits a zero-value transfer', () => {
      expect(ledger.engine.transfer(bob, 'carol', 0n).ok).toBe(true);
      expect(ledger.events.drain()).toEqual([
        { type: 'Transfer', from: 'bob', to: 'carol', value: 0n },
      ]);
    });
  });

  describe('approve', () => {
    it('adds to the existing allowance', () => {
      ledger.engine.approve(alice, 'carol', 10n);
      ledger.engine.approve(alice, 'carol', 5n);

      expect(ledger.engine.allowance('alice', 'carol')).toBe(15n);
      expect(ledger.events.drain()).toEqual([
        { type: 'Approval', owner: 'alice', spender: 'carol', value: 10n },
        { type: 'Approval', owner: 'alice', spender: 'carol', value: 5n },
      ]);
    });

    it('does not require a balance', () => {
      expect(ledger.engine.approve(bob, 'carol', 500n).ok).toBe(true);
      expect(ledger.engine.allowance('bob', 'carol')).toBe(500n);
    });

    it('fails with Overflow and keeps the previous allowance', () => {
      const narrow = createTestLedger({ balanceBits: 8 });
      narrow.engine.approve(alice, 'carol', 200n);
      narrow.events.drain();

      const result = narrow.engine.approve(alice, 'carol', 100n);

      expect(errorCode(result)).toBe('Overflow');
      expect(narrow.engine.allowance('alice', 'carol')).toBe(200n);
      expect(narrow.events.peek()).toEqual([]);
    });

    it('keys allowances by owner and spender', () => {
      ledger.engine.approve(alice, 'carol', 10n);

      expect(ledger.engine.allowance('carol', 'alice')).toBe(0n);
      expect(ledger.engine.allowance('alice', 'bob')).toBe(0n);
    });
  });

  describe('transferFrom', () => {
    beforeEach(() => {
      ledger.engine.issue(alice, 'Tok', 'TOK', 100n);
    });

    it('rolls back the allowance decrement when the balance move fails', () => {
      ledger.engine.approve(alice, 'carol', 500n);
      ledger.events.drain();

      const result = ledger.engine.transferFrom(carol, 'alice', 'dave', 300n);

      expect(errorCode(result)).toBe('InsufficientBalance');
      expect(ledger.engine.allowance('alice', 'carol')).toBe(500n);
      expect(ledger.engine.balanceOf('alice')).toBe(100n);
      expect(ledger.engine.balanceOf('dave')).toBe(0n);
      expect(ledger.events.peek()).toEqual([]);
    });

    it('spends only the caller allowance', () => {
      ledger.engine.approve(alice, 'carol', 50n);

      const result = ledger.engine.transferFrom(dave, 'alice', 'dave', 10n);

      expect(errorCode(result)).toBe('InsufficientAllowance');
      expect(ledger.engine.allowance('alice', 'carol')).toBe(50n);
      expect(ledger.engine.balanceOf('dave')).toBe(0n);
    });

    it('lets a spender pay itself', () => {
      ledger.engine.approve(alice, 'carol', 40n);

      expect(ledger.engine.transferFrom(carol, 'alice', 'carol', 40n).ok).toBe(true);
      expect(ledger.engine.allowance('alice', 'carol')).toBe(0n);
      expect(ledger.engine.balanceOf('carol')).toBe(40n);
      expect(ledger.engine.balanceOf('alice')).toBe(60n);
    });

    it('rejects a negative value', () => {
      ledger.engine.approve(alice, 'carol', 40n);

      const result = ledger.engine.transferFrom(carol, 'alice', 'bob', -1n);

      expect(errorCode(result)).toBe('InvalidAmount');
      expect(ledger.engine.allowance('alice', 'carol')).toBe(40n);
    });
  });

  describe('origins', () => {
    it('rejects root and unsigned origins', () => {
      expect(errorCode(ledger.engine.issue(ROOT_ORIGIN, 'Tok', 'TOK', 1n))).toBe('BadOrigin');
      expect(errorCode(ledger.engine.transfer(NONE_ORIGIN, 'bob', 0n))).toBe('BadOrigin');
      expect(errorCode(ledger.engine.approve(ROOT_ORIGIN, 'bob', 1n))).toBe('BadOrigin');
      expect(errorCode(ledger.engine.transferFrom(NONE_ORIGIN, 'a', 'b', 0n))).toBe('BadOrigin');
    });

    it('rejects a signed origin with an empty account', () => {
      expect(errorCode(ledger.engine.transfer(signed(''), 'bob', 0n))).toBe('BadOrigin');
    });
  });

  describe('counterparty accounts', () => {
    beforeEach(() => {
      ledger.engine.issue(alice, 'Tok', 'TOK', 100n);
      ledger.engine.approve(alice, 'carol', 50n);
      ledger.events.drain();
    });

    it('rejects an empty receiver on transfer', () => {
      const result = ledger.engine.transfer(alice, '', 5n);

      expect(errorCode(result)).toBe('InvalidAccount');
      expect(ledger.engine.balanceOf('')).toBe(0n);
      expect(ledger.engine.balanceOf('alice')).toBe(100n);
      expect(ledger.events.peek()).toEqual([]);
    });

    it('rejects an empty spender on approve', () => {
      const result = ledger.engine.approve(alice, '', 5n);

      expect(errorCode(result)).toBe('InvalidAccount');
      expect(ledger.engine.allowance('alice', '')).toBe(0n);
    });

    it('rejects an empty owner or receiver on transferFrom', () => {
      expect(errorCode(ledger.engine.transferFrom(carol, '', 'dave', 5n))).toBe('InvalidAccount');
      expect(errorCode(ledger.engine.transferFrom(carol, 'alice', '', 5n))).toBe('InvalidAccount');
      expect(ledger.engine.allowance('alice', 'carol')).toBe(50n);
      expect(ledger.engine.balanceOf('')).toBe(0n);
    });

    it('names the offending role', () => {
      const result = ledger.engine.transferFrom(carol, 'alice', '', 5n);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('Account id for to is required');
      }
    });
  });

  describe('reads', () => {
    it('return zero for unseen accounts and pairs', () => {
      expect(ledger.engine.balanceOf('nobody')).toBe(0n);
      expect(ledger.engine.allowance('nobody', 'else')).toBe(0n);
      expect(ledger.engine.tokenDetails()).toBeNull();
      expect(ledger.engine.totalBalance()).toBe(0n);
    });
  });
});
