export type Suit = 'S' | 'H' | 'D' | 'C';
export type Rank = 'A' | 'K' | 'Q' | 'J' | '10' | '9' | '8' | '7' | '6' | '5' | '4' | '3' | '2';
export interface Card { readonly r: Rank; readonly s: Suit }

export type HandStatus = 'active' | 'stood' | 'busted' | 'blackjack';
export type Outcome = 'win' | 'blackjack' | 'push' | 'lose';

export interface HandState {
  cards: Card[];
  bet: number;
  status: HandStatus;
  doubled: boolean;
  fromSplit: boolean;
  outcome?: Outcome;
}

export interface Results { wins: number; losses: number; ties: number }

export interface Player {
  id: string;
  name: string;
  chips: number;
  hands: HandState[];
  insurance: number;
  results: Results;
}

export interface Shoe {
  cards: Card[];
  decks: number;
  size: number;
}

export interface Rules {
  decks: number;
  reshuffleThreshold: number;
  minBet: number;
  betMultiple: number;
  startingChips: number;
  maxPlayers: number;
  blackjackPayout: number;
  insuranceRatio: number;
  insurancePayout: number;
  doubleAfterSplit: boolean;
  dealerHitsSoft17: boolean;
}

export type Phase =
  | 'BETTING'
  | 'DEALING'
  | 'INSURANCE_OFFER'
  | 'PEEK'
  | 'PLAYER_TURNS'
  | 'DEALER_TURN'
  | 'SETTLEMENT'
  | 'DONE';

export type Action = 'hit' | 'stand' | 'double' | 'split';
export type InsuranceToken = 'insurance-yes' | 'insurance-no';

export type AmountRequest =
  | { kind: 'bet'; player: Player; min: number; max: number; multiple: number }
  | { kind: 'insurance'; player: Player; min: number; max: number };

export type DecisionRequest =
  | { kind: 'insurance'; player: Player; max: number; options: InsuranceToken[] }
  | { kind: 'action'; player: Player; hand: HandState; handIndex: number; dealerUp: Card; options: Action[] };

/** Source of player decisions. Implementations may block on a human. */
export interface TableInput {
  amount(req: AmountRequest): Promise<number>;
  decide(req: DecisionRequest): Promise<string>;
}

export type RoundEvent =
  | { type: 'phase'; phase: Phase }
  | { type: 'shuffle'; remaining: number; size: number }
  | { type: 'bet'; player: string; amount: number }
  | { type: 'deal'; seats: { player: string; cards: Card[]; total: number }[]; dealerUp: Card }
  | { type: 'insurance'; player: string; amount: number }
  | { type: 'peek'; blackjack: boolean }
  | { type: 'hit'; player: string; hand: number; card: Card; cards: Card[]; total: number }
  | { type: 'stand'; player: string; hand: number; total: number; auto: boolean }
  | { type: 'double'; player: string; hand: number; card: Card; bet: number; total: number }
  | { type: 'split'; player: string; hand: number; hands: { hand: number; cards: Card[]; total: number }[] }
  | { type: 'bust'; player: string; hand: number; total: number }
  | { type: 'dealer-reveal'; cards: Card[]; total: number; soft: boolean }
  | { type: 'dealer-hit'; card: Card; cards: Card[]; total: number }
  | { type: 'dealer-bust'; total: number }
  | { type: 'settle'; player: string; hand: number; outcome: Outcome; bet: number; delta: number; total: number; dealerTotal: number | null }
  | { type: 'insurance-settle'; player: string; won: boolean; delta: number }
  | { type: 'rejected'; player: string; input: string; reason: string }
  | { type: 'refund'; player: string; amount: number };

export interface TableOutput {
  emit(event: RoundEvent): void;
}
