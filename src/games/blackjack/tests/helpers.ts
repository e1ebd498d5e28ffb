import { DEFAULT_RULES } from '../../../config/index.js';
import type { RNG } from '../../../util/rng.js';
import { RANKS, SUITS } from '../shoe.js';
import type {
  AmountRequest,
  Card,
  DecisionRequest,
  RoundEvent,
  Rules,
  Shoe,
  TableInput,
  TableOutput,
} from '../types.js';

/** `c('10H')` is the ten of hearts. */
export function c(code: string): Card {
  const r = RANKS.find((rank) => rank === code.slice(0, -1));
  const s = SUITS.find((suit) => suit === code.slice(-1));
  if (!r || !s) throw new Error(`bad card code ${code}`);
  return { r, s };
}

export function cards(codes: string): Card[] {
  return codes.split(/\s+/).filter(Boolean).map(c);
}

/** A shoe that deals exactly these cards, first one first. */
export function stackedShoe(codes: string): Shoe {
  const stack = cards(codes).reverse();
  return { cards: stack, decks: 1, size: stack.length };
}

/** Leaves every shuffle as it is, so seats play in the order given. */
export const inOrder: RNG = (maxExclusive) => maxExclusive - 1;

export function testRules(overrides: Partial<Rules> = {}): Rules {
  return { ...DEFAULT_RULES, ...overrides };
}

type Script = {
  bets?: Record<string, number[]>;
  insurance?: Record<string, number[]>;
  decisions?: Record<string, string[]>;
};

/**
 * Answers from a per-player script. Unscripted decisions stand and decline
 * insurance; an unscripted bet fails the round.
 */
export class ScriptedInput implements TableInput {
  readonly asked: (AmountRequest | DecisionRequest)[] = [];

  constructor(private readonly script: Script) {}

  async amount(req: AmountRequest): Promise<number> {
    this.asked.push(req);
    const queue = req.kind === 'bet' ? this.script.bets : this.script.insurance;
    const next = queue?.[req.player.name]?.shift();
    if (next !== undefined) return next;
    if (req.kind === 'insurance') return req.max;
    throw new Error(`no bet scripted for ${req.player.name}`);
  }

  async decide(req: DecisionRequest): Promise<string> {
    this.asked.push(req);
    const next = this.script.decisions?.[req.player.name]?.shift();
    if (next !== undefined) return next;
    return req.kind === 'insurance' ? 'insurance-no' : 'stand';
  }

  actions() {
    return this.asked.filter((r): r is Extract<DecisionRequest, { kind: 'action' }> => r.kind === 'action');
  }
}

/** Like ScriptedInput, but one player's turn decisions throw. */
export class FailingInput extends ScriptedInput {
  constructor(script: Script, private readonly failing: string) {
    super(script);
  }

  override async decide(req: DecisionRequest): Promise<string> {
    if (req.kind === 'action' && req.player.name === this.failing) throw new Error('keyboard unplugged');
    return super.decide(req);
  }
}

/** Bets the minimum, never insures, always stands. */
export class AutoInput implements TableInput {
  async amount(req: AmountRequest): Promise<number> {
    return req.min;
  }

  async decide(req: DecisionRequest): Promise<string> {
    return req.kind === 'insurance' ? 'insurance-no' : 'stand';
  }
}

export class RecordingOutput implements TableOutput {
  readonly events: RoundEvent[] = [];

  emit(event: RoundEvent) {
    this.events.push(event);
  }

  of<T extends RoundEvent['type']>(type: T): Extract<RoundEvent, { type: T }>[] {
    return this.events.filter((e): e is Extract<RoundEvent, { type: T }> => e.type === type);
  }

  phases() {
    return this.of('phase').map((e) => e.phase);
  }
}
