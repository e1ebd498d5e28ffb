import { RNG, cryptoRNG, shuffle } from '../../util/rng.js';
import { ConfigError, ShoeExhausted } from './errors.js';
import type { Card, Rank, Shoe, Suit } from './types.js';

export const RANKS: readonly Rank[] = ['A', 'K', 'Q', 'J', '10', '9', '8', '7', '6', '5', '4', '3', '2'];
export const SUITS: readonly Suit[] = ['S', 'H', 'D', 'C'];
export const DECK_SIZE = RANKS.length * SUITS.length;

function freshCards(decks: number): Card[] {
  const cards: Card[] = [];
  for (let d = 0; d < decks; d++) {
    for (const s of SUITS) {
      for (const r of RANKS) cards.push({ r, s });
    }
  }
  return cards;
}

export function buildShoe(decks: number, rng: RNG = cryptoRNG): Shoe {
  if (!Number.isInteger(decks) || decks < 1) {
    throw new ConfigError(`A shoe needs at least one whole deck (got ${decks})`);
  }
  const cards = shuffle(freshCards(decks), rng);
  return { cards, decks, size: cards.length };
}

/** Takes the top card. The top of the shoe is the end of the array. */
export function draw(shoe: Shoe): Card {
  const card = shoe.cards.pop();
  if (!card) throw new ShoeExhausted();
  return card;
}

export function remaining(shoe: Shoe): number {
  return shoe.cards.length;
}

export function needsReshuffle(shoe: Shoe, threshold: number): boolean {
  return shoe.cards.length < shoe.size * threshold;
}

export function reshuffle(shoe: Shoe, rng: RNG = cryptoRNG): void {
  shoe.cards = shuffle(freshCards(shoe.decks), rng);
  shoe.size = shoe.cards.length;
}

