import { UserError } from '../../util/errors.js';

export type GameErrorCode =
  | 'config'
  | 'insufficient_chips'
  | 'invalid_bet'
  | 'illegal_split'
  | 'illegal_double'
  | 'illegal_action'
  | 'shoe_exhausted'
  | 'input_closed';

export abstract class GameError extends UserError {
  abstract readonly code: GameErrorCode;
  /** Fatal errors end the session; the rest are rejected and re-prompted. */
  readonly fatal: boolean = false;
}

export class ConfigError extends GameError {
  readonly code = 'config';
  override readonly fatal = true;
}

export class InsufficientChips extends GameError {
  readonly code = 'insufficient_chips';
  constructor(readonly needed: number, readonly available: number) {
    super(`Not enough chips: need ${needed}, have ${available}`);
  }
}

export class InvalidBet extends GameError {
  readonly code = 'invalid_bet';
}

export class IllegalSplit extends GameError {
  readonly code = 'illegal_split';
}

export class IllegalDouble extends GameError {
  readonly code = 'illegal_double';
}

export class IllegalAction extends GameError {
  readonly code = 'illegal_action';
}

export class ShoeExhausted extends GameError {
  readonly code = 'shoe_exhausted';
  override readonly fatal = true;
  constructor() {
    super('The shoe ran out of cards mid-round');
  }
}

export class InputClosed extends GameError {
  readonly code = 'input_closed';
  constructor() {
    super('Input closed');
  }
}

export function isRecoverable(err: unknown): err is GameError {
  return err instanceof GameError && !err.fatal && !(err instanceof InputClosed);
}
