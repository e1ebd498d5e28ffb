import { createInterface, Interface } from 'node:readline/promises';
import type { Readable, Writable } from 'node:stream';
import { InputClosed } from '../games/blackjack/errors.js';
import type { AmountRequest, DecisionRequest, TableInput } from '../games/blackjack/types.js';

export interface PromptStreams {
  input: Readable;
  output: Writable;
}

const ACTION_PROMPT: Record<string, string> = {
  hit: 'hit',
  stand: 'stand',
  double: 'double down',
  split: 'split',
};

/**
 * Asks the people at the keyboard. Ctrl-C or end of input rejects the
 * pending question with InputClosed.
 */
export class ReadlineInput implements TableInput {
  private readonly rl: Interface;
  private readonly abort = new AbortController();
  private closed = false;

  constructor(streams: PromptStreams = { input: process.stdin, output: process.stdout }) {
    this.rl = createInterface({ input: streams.input, output: streams.output });
    this.rl.on('SIGINT', () => this.close());
    this.rl.on('close', () => {
      this.closed = true;
      this.abort.abort();
    });
  }

  async ask(question: string): Promise<string> {
    if (this.closed) throw new InputClosed();
    try {
      return (await this.rl.question(question, { signal: this.abort.signal })).trim();
    } catch (err) {
      if (this.closed) throw new InputClosed();
      throw err;
    }
  }

  async amount(req: AmountRequest): Promise<number> {
    const name = req.player.name;
    if (req.kind === 'bet') {
      const raw = await this.ask(
        `${name} > ${req.max} available, ${req.min} minimum, multiples of ${req.multiple} only\n` +
        `${name} > how much would you like to bet? (${req.min}): `,
      );
      return raw === '' ? req.min : Number(raw);
    }
    const raw = await this.ask(`${name} > insurance amount, up to ${req.max}, 0 to decline (${req.max}): `);
    return raw === '' ? req.max : Number(raw);
  }

  async decide(req: DecisionRequest): Promise<string> {
    const name = req.player.name;
    if (req.kind === 'insurance') {
      const raw = await this.ask(`${name} > dealer shows an ace, would you like insurance? (y/N): `);
      return raw === '' ? 'insurance-no' : raw;
    }
    const words = req.options.map((o) => ACTION_PROMPT[o]);
    const keys = req.options.map((o, i) => (i === 0 ? o[0].toUpperCase() : o === 'split' ? 'p' : o[0]));
    const question = words.length > 1
      ? `${words.slice(0, -1).join(', ')} or ${words[words.length - 1]}`
      : words[0];
    const raw = await this.ask(`${name} > would you like to ${question}? (${keys.join('/')}): `);
    return raw === '' ? req.options[0] : raw;
  }

  close() {
    if (!this.closed) this.rl.close();
  }
}
