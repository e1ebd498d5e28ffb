import { openDb } from '../../../db/connection.js';
import { SqlitePlayerStore } from '../../../game/blackjack/playerStore.js';
import { seededRNG } from '../../../util/rng.js';
import { ConfigError, InputClosed, ShoeExhausted } from '../errors.js';
import { Session } from '../session.js';
import type { AmountRequest, DecisionRequest, TableInput } from '../types.js';
import { AutoInput, FailingInput, RecordingOutput, ScriptedInput, inOrder, stackedShoe, testRules } from './helpers.js';

class ClosingInput implements TableInput {
  constructor(private readonly betFirst: boolean) {}

  async amount(req: AmountRequest): Promise<number> {
    if (this.betFirst) return req.min;
    throw new InputClosed();
  }

  async decide(_req: DecisionRequest): Promise<string> {
    throw new InputClosed();
  }
}

describe('session setup', () => {
  const base = { rules: testRules(), input: new AutoInput(), output: new RecordingOutput() };

  test('names must be present, unique and fit the table', () => {
    expect(() => new Session({ ...base, names: [] })).toThrow(ConfigError);
    expect(() => new Session({ ...base, names: ['Ann', 'Ann'] })).toThrow(ConfigError);
    expect(() => new Session({ ...base, names: ['a', 'b', 'c', 'd', 'e', 'f', 'g'] })).toThrow(ConfigError);
  });

  test('everyone starts with the same stack', () => {
    const session = new Session({ ...base, names: ['Ann', 'Bo'], chips: 250 });
    expect(session.players.map((p) => p.chips)).toEqual([250, 250]);
    expect(session.shoe.size).toBe(312);
  });
});

describe('session', () => {
  test('ends once nobody can cover the minimum bet', async () => {
    const session = new Session({
      names: ['Ann'],
      rules: testRules(),
      chips: 10,
      input: new ScriptedInput({ bets: { Ann: [10] } }),
      output: new RecordingOutput(),
      shoe: stackedShoe('10S 10H 6D 9C'),
      rng: inOrder,
    });
    const report = await session.run();

    expect(report.reason).toBe('broke');
    expect(report.players).toEqual([{ name: 'Ann', chips: 0, results: { wins: 0, losses: 1, ties: 0 } }]);
    expect(report.stats).toEqual({ rounds: 1, wins: 0, losses: 1, ties: 0, blackjacks: 0, houseNet: 10 });
  });

  test('a broke table plays no rounds', async () => {
    const session = new Session({
      names: ['Ann'],
      rules: testRules(),
      chips: 4,
      input: new AutoInput(),
      output: new RecordingOutput(),
    });
    expect(session.isOver()).toBe(true);
    expect(await session.runRound()).toBeNull();
    expect((await session.run()).stats.rounds).toBe(0);
  });

  test('closed input ends the session without losing chips', async () => {
    const output = new RecordingOutput();
    const session = new Session({
      names: ['Ann'],
      rules: testRules(),
      input: new ClosingInput(true),
      output,
      shoe: stackedShoe('10S 10H 6D 9C'),
      rng: inOrder,
    });
    const report = await session.run();

    expect(report.reason).toBe('input_closed');
    expect(session.players[0].chips).toBe(100);
    expect(output.of('refund')).toEqual([{ type: 'refund', player: 'Ann', amount: 10 }]);
    expect(report.stats.rounds).toBe(0);
  });

  test('closing during the pause between rounds ends the session', async () => {
    const session = new Session({
      names: ['Ann'],
      rules: testRules(),
      input: new ClosingInput(false),
      output: new RecordingOutput(),
      beforeRound: async () => {
        throw new InputClosed();
      },
    });
    expect((await session.run()).reason).toBe('input_closed');
  });

  test('an empty shoe mid-round is fatal, stakes go back first', async () => {
    const session = new Session({
      names: ['Ann'],
      rules: testRules(),
      input: new AutoInput(),
      output: new RecordingOutput(),
      shoe: stackedShoe('10S 10H 6D'),
      rng: inOrder,
    });
    await expect(session.runRound()).rejects.toBeInstanceOf(ShoeExhausted);
    expect(session.players[0].chips).toBe(100);
    expect(session.current).toBeNull();
  });

  test('a failed round leaves chips, results and house net untouched', async () => {
    const output = new RecordingOutput();
    const session = new Session({
      names: ['Ann', 'Bo'],
      rules: testRules(),
      input: new FailingInput({ bets: { Ann: [10], Bo: [10] }, decisions: { Ann: ['hit'] } }, 'Bo'),
      output,
      shoe: stackedShoe('10S 9S 7H 6D 8D 9C KS'),
      rng: inOrder,
    });
    expect(await session.runRound()).toBeNull();

    expect(output.of('bust')).toHaveLength(1);
    const chips = session.players.reduce((n, p) => n + p.chips, 0);
    expect(chips + session.stats.houseNet).toBe(200);
    expect(session.players.map((p) => p.chips)).toEqual([100, 100]);
    expect(session.players[0].results).toEqual({ wins: 0, losses: 0, ties: 0 });
    expect(session.stats).toEqual({ rounds: 0, wins: 0, losses: 0, ties: 0, blackjacks: 0, houseNet: 0 });
  });

  test('repeated failures stop the session', async () => {
    const session = new Session({
      names: ['Ann'],
      rules: testRules(),
      input: new ScriptedInput({}),
      output: new RecordingOutput(),
      rng: seededRNG(2),
    });
    const report = await session.run();
    expect(report.reason).toBe('failed');
    expect(session.players[0].chips).toBe(100);
  });

  test('stop() finishes after the current round', async () => {
    let rounds = 0;
    const session: Session = new Session({
      names: ['Ann', 'Bo'],
      rules: testRules(),
      input: new AutoInput(),
      output: new RecordingOutput(),
      rng: seededRNG(5),
      beforeRound: async () => {
        if (++rounds > 3) session.stop();
      },
    });
    const report = await session.run();
    expect(report.reason).toBe('stopped');
    expect(report.stats.rounds).toBe(3);
  });

  test('chips are conserved between the players and the house', async () => {
    const session = new Session({
      names: ['Ann', 'Bo', 'Cy'],
      rules: testRules(),
      input: new AutoInput(),
      output: new RecordingOutput(),
      rng: seededRNG(42),
    });
    for (let i = 0; i < 40; i++) await session.runRound();

    const chips = session.players.reduce((n, p) => n + p.chips, 0);
    expect(chips + session.stats.houseNet).toBe(300);
    const { wins, losses, ties } = session.stats;
    const tallied = session.players.reduce((n, p) => n + p.results.wins + p.results.losses + p.results.ties, 0);
    expect(wins + losses + ties).toBe(tallied);
    expect(session.players.every((p) => p.chips >= 0)).toBe(true);
  });

  test('seating order changes from round to round', async () => {
    const session = new Session({
      names: ['Ann', 'Bo', 'Cy', 'Di'],
      rules: testRules({ startingChips: 1000 }),
      input: new AutoInput(),
      output: new RecordingOutput(),
      rng: seededRNG(9),
    });
    const firsts = new Set<string>();
    for (let i = 0; i < 20; i++) {
      const summary = await session.runRound();
      if (summary) firsts.add(summary.order[0]);
    }
    expect(firsts.size).toBeGreaterThan(1);
  });

  test('balances and results are saved and picked up again', async () => {
    const store = new SqlitePlayerStore(openDb(':memory:'));
    store.save({ name: 'Ann', chips: 40, results: { wins: 2, losses: 1, ties: 0 } });

    const session = new Session({
      names: ['Ann', 'Bo'],
      rules: testRules(),
      input: new ScriptedInput({ bets: { Ann: [10], Bo: [10] } }),
      output: new RecordingOutput(),
      shoe: stackedShoe('10S 9S 10H 9H 9D 8C'),
      rng: inOrder,
      store,
    });
    expect(session.players.map((p) => p.chips)).toEqual([40, 100]);

    await session.runRound();
    expect(store.load('Ann')).toEqual({ name: 'Ann', chips: 50, results: { wins: 3, losses: 1, ties: 0 } });
    expect(store.load('Bo')).toEqual({ name: 'Bo', chips: 100, results: { wins: 0, losses: 0, ties: 1 } });
  });
});
