/**
 * Unit Tests for the Card Model
 */

import {
  ALL_CARDS,
  Room,
  Suspect,
  Weapon,
  cardFromName,
  caseFileCards,
  dealHands,
  drawCaseFile,
  findConservationProblems,
  matchingCards,
  pickOne,
  shuffle,
} from '../../src/game/cards';
import { CASE_FILE, R, S, W, firstPick } from '../helpers/fixtures';

describe('Cards', () => {
  it('should define 21 distinct cards', () => {
    expect(ALL_CARDS).toHaveLength(21);
    expect(new Set(ALL_CARDS.map((c) => c.name)).size).toBe(21);
  });

  describe('cardFromName', () => {
    it('should resolve exact names of every kind', () => {
      expect(cardFromName('Knife')).toEqual(W(Weapon.KNIFE));
      expect(cardFromName('Mr. Green')).toEqual(S(Suspect.GREEN));
      expect(cardFromName('Ballroom')).toEqual(R(Room.BALLROOM));
    });

    it('should return null for anything else', () => {
      expect(cardFromName('knife')).toBeNull();
    });
  });

  describe('shuffle', () => {
    it('should not modify its input', () => {
      const input = [1, 2, 3, 4];
      shuffle(input, firstPick);
      expect(input).toEqual([1, 2, 3, 4]);
    });

    it('should rotate left when the source always returns zero', () => {
      expect(shuffle([1, 2, 3, 4], firstPick)).toEqual([2, 3, 4, 1]);
    });
  });

  describe('pickOne', () => {
    it('should map the random value onto an index', () => {
      expect(pickOne(['a', 'b', 'c', 'd'], () => 0.5)).toBe('c');
    });

    it('should refuse an empty list', () => {
      expect(() => pickOne([], firstPick)).toThrow(RangeError);
    });
  });

  describe('drawCaseFile', () => {
    it('should take one card of each kind', () => {
      expect(drawCaseFile(firstPick)).toEqual({
        suspect: Suspect.SCARLET,
        weapon: Weapon.ROPE,
        room: Room.STUDY,
      });
    });
  });

  describe('dealHands', () => {
    it('should deal the 18 remaining cards without loss or duplication', () => {
      for (const seats of [3, 4, 5, 6]) {
        const hands = dealHands(CASE_FILE, seats, Math.random);
        expect(hands).toHaveLength(seats);
        expect(findConservationProblems(CASE_FILE, hands)).toEqual([]);
      }
    });

    it('should balance hands to within one card, earlier seats first', () => {
      const hands = dealHands(CASE_FILE, 4, Math.random);
      expect(hands.map((h) => h.length)).toEqual([5, 5, 4, 4]);
    });

    it('should keep case file cards out of every hand', () => {
      const secret = caseFileCards(CASE_FILE).map((c) => c.name);
      const dealt = dealHands(CASE_FILE, 5, Math.random).flat().map((c) => c.name);
      for (const name of secret) {
        expect(dealt).not.toContain(name);
      }
    });

    it('should refuse an empty table', () => {
      expect(() => dealHands(CASE_FILE, 0)).toThrow(RangeError);
    });
  });

  describe('matchingCards', () => {
    it('should return matches in suspect, weapon, room order', () => {
      const hand = [R(Room.HALL), W(Weapon.KNIFE), S(Suspect.PLUM), W(Weapon.WRENCH)];
      expect(matchingCards(hand, Suspect.PLUM, Weapon.KNIFE, Room.HALL)).toEqual([
        S(Suspect.PLUM),
        W(Weapon.KNIFE),
        R(Room.HALL),
      ]);
    });

    it('should return nothing when no card matches', () => {
      expect(matchingCards([W(Weapon.ROPE)], Suspect.PLUM, Weapon.KNIFE, Room.HALL)).toEqual([]);
    });
  });

  describe('findConservationProblems', () => {
    it('should report a duplicated card', () => {
      const hands = dealHands(CASE_FILE, 3, firstPick);
      hands[1].push(S(Suspect.SCARLET));
      expect(findConservationProblems(CASE_FILE, hands)).toEqual(['Miss Scarlet appears 2 times']);
    });

    it('should report a missing card', () => {
      const hands = dealHands(CASE_FILE, 3, firstPick);
      const dropped = hands[0].pop();
      expect(dropped).toBeDefined();
      expect(findConservationProblems(CASE_FILE, hands)).toEqual([`${dropped?.name} appears 0 times`]);
    });
  });
});
