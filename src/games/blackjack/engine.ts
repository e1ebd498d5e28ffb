import { RNG, cryptoRNG, shuffle } from '../../util/rng.js';
import { createLogger } from '../../log.js';
import { InvalidBet, IllegalAction, InsufficientChips, isRecoverable } from './errors.js';
import { canDouble, canSplit, handTotal, isBlackjack, isNatural, value } from './hand.js';
import {
  activeHands,
  doubleDown,
  placeBet,
  placeInsurance,
  refundRound,
  resolveInsurance,
  reverseSettlement,
  settleHand,
  splitHand,
} from './player.js';
import { draw, needsReshuffle, remaining, reshuffle } from './shoe.js';
import type {
  Action,
  Card,
  HandState,
  InsuranceToken,
  Outcome,
  Phase,
  Player,
  Rules,
  Shoe,
  TableInput,
  TableOutput,
} from './types.js';

const log = createLogger('round');

const ACTIONS: readonly Action[] = ['hit', 'stand', 'double', 'split'];
const ACTION_ALIASES: Record<string, Action> = { h: 'hit', s: 'stand', d: 'double', p: 'split' };

export interface RoundOptions {
  players: Player[];
  shoe: Shoe;
  rules: Rules;
  input: TableInput;
  output: TableOutput;
  rng?: RNG;
}

export interface SettledHand {
  player: string;
  hand: number;
  bet: number;
  outcome: Outcome;
  delta: number;
}

export interface RoundSummary {
  order: string[];
  dealer: Card[];
  dealerTotal: number;
  reshuffled: boolean;
  insuranceOffered: boolean;
  hands: SettledHand[];
  insurance: { player: string; delta: number }[];
  /** Net chip change per player id, bets included. */
  net: Record<string, number>;
}

interface TurnEntry {
  player: Player;
  hand: HandState;
}

export function parseAction(raw: string): Action {
  const token = raw.trim().toLowerCase();
  const found = ACTIONS.find((a) => a === token) ?? ACTION_ALIASES[token];
  if (!found) throw new IllegalAction(`Unknown action "${raw}"`);
  return found;
}

export function parseInsurance(raw: string): InsuranceToken {
  const token = raw.trim().toLowerCase();
  if (token === 'insurance-yes' || token === 'y' || token === 'yes') return 'insurance-yes';
  if (token === 'insurance-no' || token === 'n' || token === 'no') return 'insurance-no';
  throw new IllegalAction(`Answer insurance-yes or insurance-no (got "${raw}")`);
}

export function validateBet(amount: number, min: number, max: number, multiple: number): number {
  if (!Number.isInteger(amount)) throw new InvalidBet(`Bets must be whole numbers (got ${amount})`);
  if (amount > max) throw new InsufficientChips(amount, max);
  if (amount < min) throw new InvalidBet(`Minimum bet is ${min}`);
  if (amount % multiple !== 0) throw new InvalidBet(`Bets must be multiples of ${multiple}`);
  return amount;
}

export function dealerShouldHit(cards: readonly Card[], rules: Pick<Rules, 'dealerHitsSoft17'>): boolean {
  const { total, soft } = handTotal(cards);
  if (total < 17) return true;
  return total === 17 && soft && rules.dealerHitsSoft17;
}

/**
 * One round of play. Walks BETTING through DONE, asking `input` for every
 * decision and reporting each step to `output`.
 */
export class Round {
  phase: Phase = 'BETTING';
  readonly dealer: Card[] = [];
  order: Player[] = [];
  insuranceOffered = false;
  reshuffled = false;

  private queue: TurnEntry[] = [];
  private revealed = false;
  private readonly settled: SettledHand[] = [];
  private readonly insurance: { player: string; delta: number }[] = [];
  private readonly startChips = new Map<string, number>();
  private readonly rng: RNG;

  constructor(private readonly opts: RoundOptions) {
    this.rng = opts.rng ?? cryptoRNG;
  }

  get rules(): Rules {
    return this.opts.rules;
  }

  async play(): Promise<RoundSummary> {
    await this.collectBets();
    if (this.order.length === 0) {
      this.transition('DONE');
      return this.summary();
    }

    this.transition('DEALING');
    this.deal();

    if (this.dealer[0].r === 'A') {
      this.transition('INSURANCE_OFFER');
      await this.offerInsurance();
    }

    this.transition('PEEK');
    if (this.peek()) {
      this.transition('SETTLEMENT');
      this.settleAll();
      this.transition('DONE');
      return this.summary();
    }

    this.transition('PLAYER_TURNS');
    await this.playerTurns();

    if (this.order.some((p) => activeHands(p).length > 0)) {
      this.transition('DEALER_TURN');
      this.dealerTurn();
    }

    this.transition('SETTLEMENT');
    this.settleAll();
    this.transition('DONE');
    return this.summary();
  }

  /**
   * Puts every seat back where it was before the round: unresolved stakes are
   * refunded and hands already settled are taken back. Returns the net amount
   * returned to the players.
   */
  abandon(): number {
    let total = 0;
    for (const p of this.order) {
      let amount = refundRound(p);
      for (const h of this.settled) {
        if (h.player !== p.id) continue;
        reverseSettlement(p, h.delta, h.outcome);
        amount -= h.delta;
      }
      for (const ins of this.insurance) {
        if (ins.player !== p.id) continue;
        reverseSettlement(p, ins.delta);
        amount -= ins.delta;
      }
      if (amount !== 0) this.opts.output.emit({ type: 'refund', player: p.name, amount });
      total += amount;
    }
    this.settled.length = 0;
    this.insurance.length = 0;
    this.queue = [];
    this.phase = 'DONE';
    log.warn({ msg: 'round_abandoned', refunded: total });
    return total;
  }

  private transition(phase: Phase) {
    log.debug({ msg: 'phase', from: this.phase, to: phase });
    this.phase = phase;
    this.opts.output.emit({ type: 'phase', phase });
  }

  private async until<T>(player: Player, prompt: () => Promise<string | number>, apply: (raw: string | number) => T): Promise<T> {
    for (;;) {
      const raw = await prompt();
      try {
        return apply(raw);
      } catch (err) {
        if (!isRecoverable(err)) throw err;
        this.opts.output.emit({ type: 'rejected', player: player.name, input: String(raw), reason: err.message });
      }
    }
  }

  private async collectBets() {
    const { players, rules, input, output } = this.opts;
    const eligible = players.filter((p) => p.chips >= rules.minBet);
    for (const p of players) {
      p.hands = [];
      p.insurance = 0;
    }
    this.order = shuffle(eligible, this.rng);
    for (const p of this.order) this.startChips.set(p.id, p.chips);

    for (const p of this.order) {
      const hand = await this.until(
        p,
        () => input.amount({ kind: 'bet', player: p, min: rules.minBet, max: p.chips, multiple: rules.betMultiple }),
        (raw) => placeBet(p, validateBet(Number(raw), rules.minBet, p.chips, rules.betMultiple)),
      );
      output.emit({ type: 'bet', player: p.name, amount: hand.bet });
    }
  }

  private deal() {
    const { shoe, rules, output } = this.opts;
    if (needsReshuffle(shoe, rules.reshuffleThreshold)) {
      const before = remaining(shoe);
      reshuffle(shoe, this.rng);
      this.reshuffled = true;
      output.emit({ type: 'shuffle', remaining: before, size: shoe.size });
      log.info({ msg: 'shoe_reshuffled', remaining: before, size: shoe.size });
    }
    for (let pass = 0; pass < 2; pass++) {
      for (const p of this.order) p.hands[0].cards.push(draw(shoe));
      this.dealer.push(draw(shoe));
    }
    output.emit({
      type: 'deal',
      seats: this.order.map((p) => ({ player: p.name, cards: p.hands[0].cards.slice(), total: value(p.hands[0]) })),
      dealerUp: this.dealer[0],
    });
  }

  private async offerInsurance() {
    const { rules, input, output } = this.opts;
    this.insuranceOffered = true;
    for (const p of this.order) {
      const max = Math.min(Math.floor(p.hands[0].bet * rules.insuranceRatio), p.chips);
      if (max < 1) continue;
      const choice = await this.until(
        p,
        () => input.decide({ kind: 'insurance', player: p, max, options: ['insurance-yes', 'insurance-no'] }),
        (raw) => parseInsurance(String(raw)),
      );
      if (choice === 'insurance-no') continue;
      const amount = await this.until(
        p,
        () => input.amount({ kind: 'insurance', player: p, min: 0, max }),
        (raw) => (Number(raw) === 0 ? 0 : placeInsurance(p, Number(raw), max)),
      );
      if (amount === 0) continue;
      output.emit({ type: 'insurance', player: p.name, amount });
    }
  }

  /** Dealer checks for blackjack. Settles insurance and player naturals. */
  private peek(): boolean {
    const { rules, output } = this.opts;
    const dealerBJ = isNatural(this.dealer);
    output.emit({ type: 'peek', blackjack: dealerBJ });

    for (const p of this.order) {
      if (p.insurance <= 0) continue;
      const delta = resolveInsurance(p, dealerBJ, rules);
      this.insurance.push({ player: p.id, delta });
      output.emit({ type: 'insurance-settle', player: p.name, won: delta > 0, delta });
    }

    if (dealerBJ) {
      this.reveal();
      return true;
    }
    for (const p of this.order) {
      const hand = p.hands[0];
      if (isBlackjack(hand)) {
        hand.status = 'blackjack';
        this.settle(p, hand);
      }
    }
    return false;
  }

  private async playerTurns() {
    this.queue = this.order.flatMap((player) =>
      activeHands(player).map((hand) => ({ player, hand })),
    );
    for (let i = 0; i < this.queue.length; i++) {
      await this.playHand(i);
    }
  }

  legalActions(player: Player, hand: HandState): Action[] {
    const options: Action[] = ['hit', 'stand'];
    if (canDouble(hand, this.rules) && player.chips >= hand.bet) options.push('double');
    if (canSplit(hand) && player.chips >= hand.bet) options.push('split');
    return options;
  }

  private async playHand(i: number) {
    const { input, output } = this.opts;
    const { player, hand } = this.queue[i];
    while (hand.status === 'active') {
      const handIndex = player.hands.indexOf(hand);
      if (value(hand) === 21) {
        hand.status = 'stood';
        output.emit({ type: 'stand', player: player.name, hand: handIndex, total: 21, auto: true });
        return;
      }
      const options = this.legalActions(player, hand);
      const raw = await input.decide({ kind: 'action', player, hand, handIndex, dealerUp: this.dealer[0], options });
      try {
        this.act(i, parseAction(raw));
      } catch (err) {
        if (!isRecoverable(err)) throw err;
        output.emit({ type: 'rejected', player: player.name, input: raw, reason: err.message });
      }
    }
  }

  private act(i: number, action: Action) {
    const { shoe, rules, output } = this.opts;
    const { player, hand } = this.queue[i];
    const handIndex = player.hands.indexOf(hand);
    switch (action) {
      case 'hit': {
        const card = draw(shoe);
        hand.cards.push(card);
        output.emit({ type: 'hit', player: player.name, hand: handIndex, card, cards: hand.cards.slice(), total: value(hand) });
        if (value(hand) > 21) this.bust(player, hand);
        return;
      }
      case 'stand':
        hand.status = 'stood';
        output.emit({ type: 'stand', player: player.name, hand: handIndex, total: value(hand), auto: false });
        return;
      case 'double': {
        const card = doubleDown(player, hand, shoe, rules);
        output.emit({ type: 'double', player: player.name, hand: handIndex, card, bet: hand.bet, total: value(hand) });
        if (hand.status === 'busted') this.bust(player, hand);
        return;
      }
      case 'split': {
        const created = splitHand(player, handIndex, shoe);
        // after this player's last queued hand: split hands play in creation order
        let at = i + 1;
        while (at < this.queue.length && this.queue[at].player === player) at++;
        this.queue.splice(at, 0, { player, hand: created });
        output.emit({
          type: 'split',
          player: player.name,
          hand: handIndex,
          hands: [hand, created].map((h) => ({ hand: player.hands.indexOf(h), cards: h.cards.slice(), total: value(h) })),
        });
        return;
      }
    }
  }

  private bust(player: Player, hand: HandState) {
    hand.status = 'busted';
    this.opts.output.emit({ type: 'bust', player: player.name, hand: player.hands.indexOf(hand), total: value(hand) });
    this.settle(player, hand);
  }

  private reveal() {
    if (this.revealed) return;
    this.revealed = true;
    const { total, soft } = handTotal(this.dealer);
    this.opts.output.emit({ type: 'dealer-reveal', cards: this.dealer.slice(), total, soft });
  }

  private dealerTurn() {
    const { shoe, rules, output } = this.opts;
    this.reveal();
    while (dealerShouldHit(this.dealer, rules)) {
      const card = draw(shoe);
      this.dealer.push(card);
      output.emit({ type: 'dealer-hit', card, cards: this.dealer.slice(), total: handTotal(this.dealer).total });
    }
    const total = handTotal(this.dealer).total;
    if (total > 21) output.emit({ type: 'dealer-bust', total });
  }

  private settleAll() {
    this.reveal();
    for (const p of this.order) {
      for (const hand of activeHands(p)) this.settle(p, hand);
    }
  }

  private settle(player: Player, hand: HandState) {
    const delta = settleHand(player, hand, this.dealer, this.rules);
    const handIndex = player.hands.indexOf(hand);
    const outcome = hand.outcome ?? 'lose';
    this.settled.push({ player: player.id, hand: handIndex, bet: hand.bet, outcome, delta });
    this.opts.output.emit({
      type: 'settle',
      player: player.name,
      hand: handIndex,
      outcome,
      bet: hand.bet,
      delta,
      total: value(hand),
      dealerTotal: this.revealed ? handTotal(this.dealer).total : null,
    });
  }

  private summary(): RoundSummary {
    const net: Record<string, number> = {};
    for (const p of this.order) net[p.id] = p.chips - (this.startChips.get(p.id) ?? p.chips);
    const summary: RoundSummary = {
      order: this.order.map((p) => p.id),
      dealer: this.dealer.slice(),
      dealerTotal: handTotal(this.dealer).total,
      reshuffled: this.reshuffled,
      insuranceOffered: this.insuranceOffered,
      hands: this.settled.slice(),
      insurance: this.insurance.slice(),
      net,
    };
    log.info({ msg: 'round_done', order: summary.order, dealerTotal: summary.dealerTotal, net });
    return summary;
  }
}
