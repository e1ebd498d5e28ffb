import { canDouble, canSplit, createHand, handTotal, isBlackjack, isBust, isNatural, value } from '../hand.js';
import type { HandState } from '../types.js';
import { cards } from './helpers.js';

function hand(codes: string, fromSplit = false): HandState {
  const h = createHand(10, fromSplit);
  h.cards.push(...cards(codes));
  return h;
}

describe('hand totals', () => {
  test('10♠ + A♦ => 21', () => {
    expect(handTotal(cards('10S AD'))).toEqual({ total: 21, soft: true });
  });

  test('A♠ + A♦ + 9♥ => 21', () => {
    expect(handTotal(cards('AS AD 9H')).total).toBe(21);
  });

  test('aces drop to 1 one at a time', () => {
    expect(handTotal(cards('AS 5H AD 7C'))).toEqual({ total: 14, soft: false });
    expect(handTotal(cards('AS 6H'))).toEqual({ total: 17, soft: true });
    expect(handTotal(cards('AS 6H 10D'))).toEqual({ total: 17, soft: false });
  });

  test('face cards count ten', () => {
    expect(value(hand('KS QH'))).toBe(20);
    expect(isBust(hand('KS QH JD'))).toBe(true);
  });
});

describe('hand checks', () => {
  test('a natural from a split is not a blackjack', () => {
    expect(isNatural(cards('AS KD'))).toBe(true);
    expect(isBlackjack(hand('AS KD'))).toBe(true);
    expect(isBlackjack(hand('AS KD', true))).toBe(false);
    expect(isNatural(cards('AS 5D 5H'))).toBe(false);
  });

  test('only a pair of equal ranks splits', () => {
    expect(canSplit(hand('8S 8D'))).toBe(true);
    expect(canSplit(hand('KS QD'))).toBe(false);
    expect(canSplit(hand('8S 8D 8H'))).toBe(false);
  });

  test('doubling on two cards or a 9, 10 or 11', () => {
    const rules = { doubleAfterSplit: true };
    expect(canDouble(hand('KS 7D'), rules)).toBe(true);
    expect(canDouble(hand('2S 3D 5H'), rules)).toBe(true);
    expect(canDouble(hand('2S 3D 6H'), rules)).toBe(true);
    expect(canDouble(hand('2S 3D 9H'), rules)).toBe(false);
  });

  test('no doubling after a split when the table forbids it', () => {
    expect(canDouble(hand('5S 6D', true), { doubleAfterSplit: false })).toBe(false);
    expect(canDouble(hand('5S 6D', true), { doubleAfterSplit: true })).toBe(true);
  });

  test('a doubled or finished hand cannot double', () => {
    const h = hand('5S 6D');
    h.doubled = true;
    expect(canDouble(h, { doubleAfterSplit: true })).toBe(false);
    const stood = hand('5S 6D');
    stood.status = 'stood';
    expect(canDouble(stood, { doubleAfterSplit: true })).toBe(false);
  });
});
