import { RNG, cryptoRNG } from '../../util/rng.js';
import { normalizeError } from '../../util/errors.js';
import { createLogger } from '../../log.js';
import { Round, RoundSummary } from './engine.js';
import { ConfigError, GameError, InputClosed } from './errors.js';
import { createPlayer } from './player.js';
import { buildShoe } from './shoe.js';
import type { Player, Results, Rules, Shoe, TableInput, TableOutput } from './types.js';

const log = createLogger('session');

/** Consecutive failed rounds after which the session gives up. */
const MAX_FAILED_ROUNDS = 3;

export interface PlayerRecord {
  name: string;
  chips: number;
  results: Results;
}

/** Where balances and lifetime results live between sessions. */
export interface PlayerStore {
  load(name: string): PlayerRecord | undefined;
  save(record: PlayerRecord): void;
}

export interface SessionOptions {
  names: string[];
  rules: Rules;
  input: TableInput;
  output: TableOutput;
  /** Starting balance for players the store does not know. Defaults to rules.startingChips. */
  chips?: number;
  rng?: RNG;
  store?: PlayerStore;
  shoe?: Shoe;
  /** Awaited before every round `run()` plays, e.g. a "press enter" pause. */
  beforeRound?: () => Promise<void>;
}

export interface SessionStats {
  rounds: number;
  wins: number;
  losses: number;
  ties: number;
  blackjacks: number;
  /** Chips won by the house, negative when the table is up. */
  houseNet: number;
}

export type EndReason = 'broke' | 'stopped' | 'input_closed' | 'failed';

export interface SessionReport {
  players: PlayerRecord[];
  stats: SessionStats;
  reason: EndReason | null;
  durationMs: number;
}

export class Session {
  readonly players: Player[];
  readonly shoe: Shoe;
  readonly stats: SessionStats = { rounds: 0, wins: 0, losses: 0, ties: 0, blackjacks: 0, houseNet: 0 };
  current: Round | null = null;

  private stopReason: EndReason | null = null;
  private failures = 0;
  private readonly startedAt = Date.now();
  private readonly rng: RNG;

  constructor(private readonly opts: SessionOptions) {
    const { names, rules, store } = opts;
    if (names.length === 0) throw new ConfigError('At least one player is needed');
    if (names.length > rules.maxPlayers) throw new ConfigError(`At most ${rules.maxPlayers} players can sit at the table`);
    if (new Set(names).size !== names.length) throw new ConfigError('Player names must be unique');

    this.rng = opts.rng ?? cryptoRNG;
    this.shoe = opts.shoe ?? buildShoe(rules.decks, this.rng);
    const chips = opts.chips ?? rules.startingChips;
    this.players = names.map((name) => {
      const saved = store?.load(name);
      if (saved) log.info({ msg: 'player_loaded', name, chips: saved.chips });
      return saved ? createPlayer(name, name, saved.chips, saved.results) : createPlayer(name, name, chips);
    });
  }

  get rules(): Rules {
    return this.opts.rules;
  }

  stop(reason: EndReason = 'stopped') {
    if (!this.stopReason) this.stopReason = reason;
  }

  endReason(): EndReason | null {
    if (this.stopReason) return this.stopReason;
    if (this.players.every((p) => p.chips < this.rules.minBet)) return 'broke';
    return null;
  }

  isOver(): boolean {
    return this.endReason() !== null;
  }

  /**
   * Plays one round. A failed round is abandoned with every stake refunded;
   * only fatal errors escape.
   */
  async runRound(): Promise<RoundSummary | null> {
    if (this.isOver()) return null;
    const round = new Round({
      players: this.players,
      shoe: this.shoe,
      rules: this.rules,
      input: this.opts.input,
      output: this.opts.output,
      rng: this.rng,
    });
    this.current = round;
    try {
      const summary = await round.play();
      this.record(summary);
      this.failures = 0;
      return summary;
    } catch (err) {
      round.abandon();
      if (err instanceof InputClosed) {
        this.stop('input_closed');
        return null;
      }
      if (err instanceof GameError && err.fatal) throw err;
      log.error({ msg: 'round_failed', error: normalizeError(err) });
      if (++this.failures >= MAX_FAILED_ROUNDS) this.stop('failed');
      return null;
    } finally {
      this.current = null;
      this.persist();
    }
  }

  async run(): Promise<SessionReport> {
    while (!this.isOver()) {
      try {
        await this.opts.beforeRound?.();
      } catch (err) {
        if (!(err instanceof InputClosed)) throw err;
        this.stop('input_closed');
        break;
      }
      await this.runRound();
    }
    this.persist();
    const report = this.report();
    log.info({ msg: 'session_done', reason: report.reason, stats: report.stats });
    return report;
  }

  report(): SessionReport {
    return {
      players: this.players
        .map((p) => ({ name: p.name, chips: p.chips, results: { ...p.results } }))
        .sort((a, b) => b.chips - a.chips),
      stats: { ...this.stats },
      reason: this.endReason(),
      durationMs: Date.now() - this.startedAt,
    };
  }

  private record(summary: RoundSummary) {
    if (summary.order.length === 0) return;
    this.stats.rounds++;
    for (const h of summary.hands) {
      if (h.outcome === 'win' || h.outcome === 'blackjack') this.stats.wins++;
      else if (h.outcome === 'push') this.stats.ties++;
      else this.stats.losses++;
      if (h.outcome === 'blackjack') this.stats.blackjacks++;
    }
    for (const delta of Object.values(summary.net)) this.stats.houseNet -= delta;
  }

  private persist() {
    const { store } = this.opts;
    if (!store) return;
    for (const p of this.players) store.save({ name: p.name, chips: p.chips, results: { ...p.results } });
  }
}
