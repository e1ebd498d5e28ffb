import type { Card, Rank, Suit } from '../games/blackjack/types.js';

// Unicode Playing Cards block mapping (no Knights)
// Suits base code points (Ace): Spades U+1F0A1, Hearts U+1F0B1, Diamonds U+1F0C1, Clubs U+1F0D1
const SUIT_BASE: Record<Suit, number> = { S: 0x1f0a1, H: 0x1f0b1, D: 0x1f0c1, C: 0x1f0d1 };

const RANK_OFFSET: Record<Rank, number> = {
  A: 0, '2': 1, '3': 2, '4': 3, '5': 4, '6': 5, '7': 6, '8': 7, '9': 8, '10': 9,
  J: 10, Q: 12, K: 13,
};

const SUIT_GLYPH: Record<Suit, string> = { S: '♠', H: '♥', D: '♦', C: '♣' };

export const PLAYING_CARD_BACK = String.fromCodePoint(0x1f0a0);

export type CardStyle = 'text' | 'unicode';

export function cardToUnicode(card: Card): string {
  // offset 11 is the Knight, which RANK_OFFSET never produces
  return String.fromCodePoint(SUIT_BASE[card.s] + RANK_OFFSET[card.r]);
}

export function cardToText(card: Card): string {
  return `${card.r}${SUIT_GLYPH[card.s]}`;
}

export function isRed(card: Card): boolean {
  return card.s === 'H' || card.s === 'D';
}

export function handToText(cards: readonly Card[], style: CardStyle = 'text'): string {
  if (style === 'unicode') return cards.map(cardToUnicode).join(' ');
  return cards.map(cardToText).join('  ');
}
