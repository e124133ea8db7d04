/**
 * Error types raised by the dice core and the NPC registry.
 *
 * Every error carries a stable `code` so handlers can map it to a user-facing
 * reply without matching on message text.
 *
 * @module errors
 */

export class BotError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** The roll command's mandatory dice token is missing or not an integer. */
export class MalformedArgumentsError extends BotError {
  constructor(message = 'Malformed roll arguments') {
    super(message, 'MALFORMED_ARGUMENTS');
  }
}

export class InvalidDicePoolError extends BotError {
  constructor(public readonly dicePool: number) {
    super(`Dice pool must be a positive integer, got ${dicePool}`, 'INVALID_DICE_POOL');
  }
}

export class InvalidLimitError extends BotError {
  constructor(public readonly limit: number) {
    super(`Limit must be a non-negative integer, got ${limit}`, 'INVALID_LIMIT');
  }
}

export class TemplateNotFoundError extends BotError {
  constructor(public readonly alias: string) {
    super(`No template found with alias '${alias}'`, 'TEMPLATE_NOT_FOUND');
  }
}
