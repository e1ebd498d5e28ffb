import { PassThrough } from 'node:stream';
import { ReadlineInput } from '../src/cli/prompt.js';
import { InputClosed } from '../src/games/blackjack/errors.js';
import { createHand } from '../src/games/blackjack/hand.js';
import { createPlayer } from '../src/games/blackjack/player.js';

function keyboard() {
  const input = new PassThrough();
  const output = new PassThrough();
  const ri = new ReadlineInput({ input, output });
  return { ri, type: (text: string) => input.write(`${text}\n`) };
}

const player = createPlayer('Ann', 'Ann', 100);

describe('readline input', () => {
  test('enter takes the default bet', async () => {
    const { ri, type } = keyboard();
    const answer = ri.amount({ kind: 'bet', player, min: 10, max: 100, multiple: 2 });
    type('');
    await expect(answer).resolves.toBe(10);
    ri.close();
  });

  test('typed answers are trimmed', async () => {
    const { ri, type } = keyboard();
    const answer = ri.decide({
      kind: 'action', player, hand: createHand(10), handIndex: 0, dealerUp: { r: '9', s: 'H' }, options: ['hit', 'stand'],
    });
    type('  s ');
    await expect(answer).resolves.toBe('s');
    ri.close();
  });

  test('enter declines insurance', async () => {
    const { ri, type } = keyboard();
    const answer = ri.decide({ kind: 'insurance', player, max: 5, options: ['insurance-yes', 'insurance-no'] });
    type('');
    await expect(answer).resolves.toBe('insurance-no');
    ri.close();
  });

  test('nothing is asked once closed', async () => {
    const { ri } = keyboard();
    ri.close();
    await expect(ri.ask('Hit enter to continue: ')).rejects.toBeInstanceOf(InputClosed);
  });
});
