/** Human-readable messages for the game's status codes. */
export const STATUS_MESSAGES: Readonly<Record<number, string>> = {
  404: "Resource not found",
  429: "Too many requests - rate limit exceeded",
  471: "Insufficient quantity of item",
  472: "Invalid equipment item",
  478: "Missing required items or materials",
  483: "Character does not have enough HP",
  485: "Item is already equipped",
  486: "Character is locked",
  490: "Character is already at this location",
  491: "Equipment slot error",
  493: "Character does not meet skill level requirements",
  496: "Character does not meet requirements",
  497: "Character inventory is full",
  498: "Character not found",
  499: "Character is on cooldown",
  500: "Server error - please try again later",
  503: "Server is under maintenance",
  597: "Map location not found",
  598: "Wrong location for this action - content not found at this location",
};

export function statusMessage(code: number): string {
  return STATUS_MESSAGES[code] ?? `Unknown error (code: ${code})`;
}

/** A game-level refusal. Actions translate these into failed results. */
export class GameApiError extends Error {
  readonly code: number;

  constructor(code: number, message?: string) {
    super(message ?? statusMessage(code));
    this.name = "GameApiError";
    this.code = code;
  }
}

export class CooldownActiveError extends GameApiError {
  readonly remainingSeconds: number;

  constructor(remainingSeconds: number, message?: string) {
    super(499, message ?? `${statusMessage(499)} (${remainingSeconds}s remaining)`);
    this.name = "CooldownActiveError";
    this.remainingSeconds = remainingSeconds;
  }
}

export class InventoryFullError extends GameApiError {
  constructor(message?: string) {
    super(497, message);
    this.name = "InventoryFullError";
  }
}

export class AlreadyAtDestinationError extends GameApiError {
  constructor(message?: string) {
    super(490, message);
    this.name = "AlreadyAtDestinationError";
  }
}

export class ContentNotFoundError extends GameApiError {
  constructor(message?: string) {
    super(598, message);
    this.name = "ContentNotFoundError";
  }
}

export class MissingItemsError extends GameApiError {
  constructor(message?: string) {
    super(478, message);
    this.name = "MissingItemsError";
  }
}

export class SkillLevelTooLowError extends GameApiError {
  constructor(message?: string) {
    super(493, message);
    this.name = "SkillLevelTooLowError";
  }
}

export class InsufficientHpError extends GameApiError {
  constructor(message?: string) {
    super(483, message);
    this.name = "InsufficientHpError";
  }
}

export class CharacterNotFoundError extends GameApiError {
  constructor(message?: string) {
    super(498, message);
    this.name = "CharacterNotFoundError";
  }
}

export class RateLimitedError extends GameApiError {
  readonly retryAfterSeconds: number;

  constructor(retryAfterSeconds: number, message?: string) {
    super(429, message);
    this.name = "RateLimitedError";
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

/**
 * The request never produced a game answer (connection reset, malformed
 * body). Actions let these propagate.
 */
export class TransportError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "TransportError";
  }
}

/** Builds the most specific error for a status code returned by the game. */
export function errorFromStatus(
  code: number,
  message?: string,
  details: { cooldownSeconds?: number; retryAfterSeconds?: number } = {},
): GameApiError {
  switch (code) {
    case 499:
      return new CooldownActiveError(details.cooldownSeconds ?? 0, message);
    case 497:
      return new InventoryFullError(message);
    case 490:
      return new AlreadyAtDestinationError(message);
    case 598:
      return new ContentNotFoundError(message);
    case 478:
    case 471:
      return new MissingItemsError(message);
    case 493:
      return new SkillLevelTooLowError(message);
    case 483:
      return new InsufficientHpError(message);
    case 498:
      return new CharacterNotFoundError(message);
    case 429:
      return new RateLimitedError(details.retryAfterSeconds ?? 1, message);
    default:
      return new GameApiError(code, message);
  }
}
