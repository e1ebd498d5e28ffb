import { canDouble, canSplit, createHand, handTotal, isBlackjack, isNatural, value } from './hand.js';
import { draw } from './shoe.js';
import { IllegalDouble, IllegalSplit, InsufficientChips, InvalidBet } from './errors.js';
import type { Card, HandState, Outcome, Player, Results, Rules, Shoe } from './types.js';

export function createPlayer(id: string, name: string, chips: number, results?: Results): Player {
  if (!Number.isInteger(chips) || chips < 0) throw new InvalidBet(`Chip balance must be a whole number >= 0 (got ${chips})`);
  return {
    id,
    name,
    chips,
    hands: [],
    insurance: 0,
    results: results ? { ...results } : { wins: 0, losses: 0, ties: 0 },
  };
}

function debit(player: Player, amount: number): number {
  if (!Number.isInteger(amount) || amount <= 0) throw new InvalidBet(`Bets must be positive whole numbers (got ${amount})`);
  if (amount > player.chips) throw new InsufficientChips(amount, player.chips);
  player.chips -= amount;
  return amount;
}

/** Deducts the bet and opens the player's first hand for the round. */
export function placeBet(player: Player, amount: number): HandState {
  debit(player, amount);
  const hand = createHand(amount);
  player.hands = [hand];
  player.insurance = 0;
  return hand;
}

export function placeInsurance(player: Player, amount: number, max: number): number {
  if (amount > max) throw new InvalidBet(`Insurance is capped at ${max}`);
  player.insurance = debit(player, amount);
  return player.insurance;
}

/**
 * Splits a pair into two hands. The new hand goes after every hand the player
 * already holds, so hands stay in the order they were created. Each hand is
 * then dealt one card, original first.
 */
export function splitHand(player: Player, handIndex: number, shoe: Shoe): HandState {
  const hand = player.hands[handIndex];
  if (!hand || hand.status !== 'active') throw new IllegalSplit('That hand is not in play');
  if (!canSplit(hand)) throw new IllegalSplit('Only a pair of equal ranks can be split');
  if (player.chips < hand.bet) throw new InsufficientChips(hand.bet, player.chips);

  debit(player, hand.bet);
  const moved = hand.cards.pop();
  if (!moved) throw new IllegalSplit('That hand is empty');
  const created = createHand(hand.bet, true);
  created.cards.push(moved);
  hand.fromSplit = true;
  hand.cards.push(draw(shoe));
  created.cards.push(draw(shoe));
  player.hands.push(created);
  return created;
}

/** Doubles the bet and draws exactly one card; the hand then stands or busts. */
export function doubleDown(player: Player, hand: HandState, shoe: Shoe, rules: Pick<Rules, 'doubleAfterSplit'>): Card {
  if (!canDouble(hand, rules)) throw new IllegalDouble('This hand cannot double down');
  if (player.chips < hand.bet) throw new InsufficientChips(hand.bet, player.chips);
  debit(player, hand.bet);
  hand.bet *= 2;
  hand.doubled = true;
  const card = draw(shoe);
  hand.cards.push(card);
  hand.status = value(hand) > 21 ? 'busted' : 'stood';
  return card;
}

/** Pays or forfeits the insurance bet. Returns the net chip change. */
export function resolveInsurance(player: Player, dealerHasBlackjack: boolean, rules: Pick<Rules, 'insurancePayout'>): number {
  const stake = player.insurance;
  if (stake <= 0) return 0;
  player.insurance = 0;
  if (dealerHasBlackjack) {
    const winnings = Math.floor(stake * rules.insurancePayout);
    player.chips += stake + winnings;
    return winnings;
  }
  return -stake;
}

export function decideOutcome(hand: HandState, dealer: readonly Card[]): Outcome {
  const total = value(hand);
  if (total > 21) return 'lose';
  const playerBJ = isBlackjack(hand);
  const dealerBJ = isNatural(dealer);
  if (playerBJ) return dealerBJ ? 'push' : 'blackjack';
  if (dealerBJ) return 'lose';
  const dealerTotal = handTotal(dealer).total;
  if (dealerTotal > 21 || total > dealerTotal) return 'win';
  if (total === dealerTotal) return 'push';
  return 'lose';
}

/** Settles one hand against the dealer and credits the winnings. Returns the net chip change. */
export function settleHand(player: Player, hand: HandState, dealer: readonly Card[], rules: Pick<Rules, 'blackjackPayout'>): number {
  const outcome = decideOutcome(hand, dealer);
  hand.outcome = outcome;
  switch (outcome) {
    case 'blackjack': {
      const winnings = Math.floor(hand.bet * rules.blackjackPayout);
      player.chips += hand.bet + winnings;
      player.results.wins++;
      return winnings;
    }
    case 'win':
      player.chips += hand.bet * 2;
      player.results.wins++;
      return hand.bet;
    case 'push':
      player.chips += hand.bet;
      player.results.ties++;
      return 0;
    default:
      player.results.losses++;
      return -hand.bet;
  }
}

/** Takes back a settled hand or insurance bet: the net change and its tally. */
export function reverseSettlement(player: Player, delta: number, outcome?: Outcome): void {
  player.chips -= delta;
  if (outcome === 'win' || outcome === 'blackjack') player.results.wins--;
  else if (outcome === 'push') player.results.ties--;
  else if (outcome === 'lose') player.results.losses--;
}

/** Returns every unresolved stake. Returns the amount refunded. */
export function refundRound(player: Player): number {
  let refund = player.insurance;
  for (const hand of player.hands) {
    if (!hand.outcome) refund += hand.bet;
  }
  player.chips += refund;
  player.insurance = 0;
  player.hands = [];
  return refund;
}

export function activeHands(player: Player): HandState[] {
  return player.hands.filter((h) => !h.outcome);
}
