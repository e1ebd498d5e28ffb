#!/usr/bin/env node
import 'dotenv/config';
import { loadRules } from './config/index.js';
import { resolveRuntime } from './config/runtime.js';
import { closeAll, getDbPath, openDb } from './db/connection.js';
import { SqlitePlayerStore } from './game/blackjack/playerStore.js';
import { Session } from './games/blackjack/session.js';
import type { Rules } from './games/blackjack/types.js';
import { TerminalRenderer } from './cli/render.js';
import { ReadlineInput } from './cli/prompt.js';
import { ui } from './cli/ui.js';
import log from './cli/logger.js';
import { flushLogs } from './log.js';
import { buildErrorId, formatUserError, normalizeError } from './util/errors.js';
import { InputClosed } from './games/blackjack/errors.js';

const runtime = resolveRuntime();

const cli = log.withScope('main');

async function askNames(input: ReadlineInput, rules: Rules): Promise<string[]> {
  for (;;) {
    const raw = await input.ask(`Enter up to ${rules.maxPlayers} player names or return for single player game: `);
    const names = raw === '' ? ['Player'] : raw.split(/\s+/);
    if (names.length > rules.maxPlayers) {
      ui.say(`Maximum of ${rules.maxPlayers} players only please!`, 'warn');
    } else if (new Set(names).size !== names.length) {
      ui.say('Each player needs a different name.', 'warn');
    } else {
      return names;
    }
  }
}

async function askChips(input: ReadlineInput, rules: Rules): Promise<number> {
  for (;;) {
    const raw = await input.ask(`Enter starting number of chips (${rules.startingChips}): `);
    if (raw === '') return rules.startingChips;
    const n = Number(raw);
    if (Number.isInteger(n) && n >= rules.minBet) return n;
    ui.say(`Starting chips must be a whole number of at least ${rules.minBet}.`, 'warn');
  }
}

async function main() {
  if (runtime.pretty) ui.banner();
  const rules = loadRules();
  const input = new ReadlineInput();
  const store = runtime.save ? new SqlitePlayerStore(openDb()) : undefined;
  if (store) cli.debug(`Saving balances to ${getDbPath()}`);

  try {
    const names = await askNames(input, rules);
    const chips = await askChips(input, rules);
    const output = new TerminalRenderer({ names, style: process.env.CARDS_STYLE === 'unicode' ? 'unicode' : 'text' });
    const session = new Session({
      names,
      rules,
      input,
      output,
      chips,
      store,
      beforeRound: async () => {
        ui.line('');
        await input.ask('Hit enter to continue - ctrl-c to exit: ');
      },
    });
    process.once('SIGINT', () => {
      session.stop();
      input.close();
    });

    const report = await session.run();

    ui.line('');
    if (report.reason === 'broke') ui.say('No one with enough chips remaining - game over', 'warn');
    ui.table(report.players.map((p) => ({
      player: p.name,
      chips: p.chips,
      wins: p.results.wins,
      ties: p.results.ties,
      losses: p.results.losses,
    })));
    ui.line('');
    ui.say(`${report.stats.rounds} rounds in ${ui.duration(report.durationMs)}, house net ${report.stats.houseNet}`, 'dim');
    ui.say('Thanks for playing.', 'success');
  } catch (err) {
    if (!(err instanceof InputClosed)) throw err;
    ui.line('');
  } finally {
    input.close();
    closeAll();
  }
}

main()
  .catch((err) => {
    const id = buildErrorId();
    cli.error('Blackjack stopped on an error', { errorId: id, error: normalizeError(err) });
    console.error(formatUserError('blackjack', err, runtime.verbose, id));
    process.exitCode = 1;
  })
  .finally(flushLogs);
