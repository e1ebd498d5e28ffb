import type { Card, HandState, Rank, Rules } from './types.js';

export function createHand(bet: number, fromSplit = false): HandState {
  return { cards: [], bet, status: 'active', doubled: false, fromSplit };
}

export function valueOfCard(r: Rank): number {
  if (r === 'A') return 11; // reduced to 1 by handTotal when needed
  if (r === 'K' || r === 'Q' || r === 'J' || r === '10') return 10;
  return parseInt(r, 10);
}

export function handTotal(cards: readonly Card[]): { total: number; soft: boolean } {
  let total = 0;
  let aces = 0;
  for (const c of cards) {
    total += valueOfCard(c.r);
    if (c.r === 'A') aces++;
  }
  while (total > 21 && aces > 0) {
    total -= 10;
    aces--;
  }
  // soft while at least one Ace still counts as 11
  return { total, soft: aces > 0 };
}

export function value(hand: HandState): number {
  return handTotal(hand.cards).total;
}

export function isBust(hand: HandState): boolean {
  return value(hand) > 21;
}

/** Two-card 21, regardless of how the hand came about. */
export function isNatural(cards: readonly Card[]): boolean {
  return cards.length === 2 && handTotal(cards).total === 21;
}

/** Blackjack only counts on the initial deal, never on a hand built from a split. */
export function isBlackjack(hand: HandState): boolean {
  return !hand.fromSplit && isNatural(hand.cards);
}

export function canSplit(hand: HandState): boolean {
  return hand.cards.length === 2 && hand.cards[0].r === hand.cards[1].r;
}

export function canDouble(hand: HandState, rules: Pick<Rules, 'doubleAfterSplit'>): boolean {
  if (hand.status !== 'active' || hand.doubled) return false;
  if (hand.fromSplit && !rules.doubleAfterSplit) return false;
  const total = value(hand);
  return hand.cards.length === 2 || total === 9 || total === 10 || total === 11;
}
