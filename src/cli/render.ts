import chalk from 'chalk';
import { CardStyle, handToText, isRed } from '../cards/unicode.js';
import type { Card, Outcome, RoundEvent, TableOutput } from '../games/blackjack/types.js';
import { Palette, colorsDisabled, getPalette } from './theme.js';
import { ui } from './ui.js';

export interface RendererOptions {
  names: string[];
  style?: CardStyle;
  noColor?: boolean;
  write?: (line: string) => void;
}

const DEALER = 'Dealer';

const OUTCOME_TEXT: Record<Outcome, (bet: number, delta: number) => string> = {
  blackjack: (_bet, delta) => `blackjack pays ${delta} :)`,
  win: (_bet, delta) => `you beat the dealer! +${delta} :)`,
  push: () => 'you tied with the dealer, bet returned :|',
  lose: (bet) => `you lost to the dealer, -${bet} :(`,
};

/** Prints table events as `name > text` lines, one color per seat. */
export class TerminalRenderer implements TableOutput {
  private readonly width: number;
  private readonly paints = new Map<string, (s: string) => string>();
  private readonly palette: Palette;
  private readonly red: (s: string) => string;
  private readonly style: CardStyle;
  private readonly write: (line: string) => void;

  constructor(opts: RendererOptions) {
    const noColor = opts.noColor ?? colorsDisabled();
    this.palette = getPalette(noColor);
    this.red = new chalk.Instance({ level: noColor ? 0 : 3 }).red;
    this.style = opts.style ?? 'text';
    this.write = opts.write ?? ui.line;
    this.width = Math.max(DEALER.length, ...opts.names.map((n) => n.length));
    opts.names.forEach((n, i) => this.paints.set(n, this.palette.seats[i % this.palette.seats.length]));
  }

  emit(event: RoundEvent) {
    for (const l of this.format(event)) this.write(l);
  }

  format(event: RoundEvent): string[] {
    switch (event.type) {
      case 'phase':
        return event.phase === 'DEALING' ? [''] : [];
      case 'shuffle':
        return [this.dealer(`shuffling a fresh shoe of ${event.size} cards (${event.remaining} were left)`)];
      case 'bet':
        return [this.seat(event.player, `bets ${event.amount}`)];
      case 'deal':
        return [
          ...event.seats.map((s) => this.seat(s.player, `hand dealt ${pad(s.total)} : ${this.cards(s.cards)}`)),
          this.dealer(`face up card  : ${this.cards([event.dealerUp])}`),
        ];
      case 'insurance':
        return [this.seat(event.player, `takes insurance for ${event.amount}`)];
      case 'peek':
        return event.blackjack ? [this.dealer('scored blackjack!')] : [];
      case 'insurance-settle':
        return [this.seat(event.player, event.won
          ? `you won your insurance bet! +${event.delta}`
          : `you lost your insurance bet, ${event.delta}`)];
      case 'hit':
        return [this.seat(event.player, `dealt ${this.cards([event.card])}  ${pad(event.total)} : ${this.cards(event.cards)}`)];
      case 'stand':
        return [this.seat(event.player, event.auto ? 'scored 21! :)' : `stands on ${event.total}`)];
      case 'double':
        return [this.seat(event.player, `doubles down to ${event.bet}, dealt ${this.cards([event.card])}  ${pad(event.total)}`)];
      case 'split':
        return event.hands.map((h) => this.seat(event.player, `split hand ${h.hand + 1} ${pad(h.total)} : ${this.cards(h.cards)}`));
      case 'bust':
        return [this.seat(event.player, `busted with ${event.total}! :(`)];
      case 'dealer-reveal':
        return [this.dealer(`turns ${this.cards(event.cards.slice(-1))}  ${pad(event.total)}${event.soft ? ' soft' : ''} : ${this.cards(event.cards)}`)];
      case 'dealer-hit':
        return [this.dealer(`dealt ${this.cards([event.card])}  ${pad(event.total)} : ${this.cards(event.cards)}`)];
      case 'dealer-bust':
        return [this.dealer(`busted with ${event.total}!`)];
      case 'settle':
        return [this.seat(event.player, `hand ${event.hand + 1}: ${OUTCOME_TEXT[event.outcome](event.bet, event.delta)}`)];
      case 'rejected':
        return [this.seat(event.player, this.palette.warn(`"${event.input}" not accepted: ${event.reason}`))];
      case 'refund':
        return [this.seat(event.player, event.amount >= 0
          ? `round abandoned, ${event.amount} returned`
          : `round abandoned, ${-event.amount} in winnings back to the house`)];
    }
  }

  private cards(cards: readonly Card[]): string {
    if (this.style === 'unicode') return handToText(cards, 'unicode');
    return cards.map((c) => (isRed(c) ? this.red(handToText([c])) : handToText([c]))).join('  ');
  }

  private seat(name: string, text: string): string {
    const paint = this.paints.get(name) ?? this.palette.info;
    return paint(`${name.padStart(this.width)} > ${text}`);
  }

  private dealer(text: string): string {
    return this.palette.dealer(`${DEALER.padStart(this.width)} > ${text}`);
  }
}

function pad(n: number): string {
  return String(n).padStart(2);
}
