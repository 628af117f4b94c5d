import { describe, it, expect } from "vitest";
import {
  CooldownActiveError,
  GameApiError,
  InventoryFullError,
  MissingItemsError,
  RateLimitedError,
  TransportError,
  errorFromStatus,
  statusMessage,
} from "./errors.js";

describe("errorFromStatus", () => {
  it("builds a cooldown error carrying the remaining seconds", () => {
    const err = errorFromStatus(499, undefined, { cooldownSeconds: 7 });
    expect(err).toBeInstanceOf(CooldownActiveError);
    expect(err).toMatchObject({ code: 499, remainingSeconds: 7, message: "Character is on cooldown (7s remaining)" });
  });

  it("maps distinguished codes onto their classes", () => {
    expect(errorFromStatus(497)).toBeInstanceOf(InventoryFullError);
    expect(errorFromStatus(471)).toBeInstanceOf(MissingItemsError);
    expect(errorFromStatus(429, "slow down", { retryAfterSeconds: 3 })).toMatchObject({ retryAfterSeconds: 3, message: "slow down" });
    expect(errorFromStatus(429)).toBeInstanceOf(RateLimitedError);
  });

  it("falls back to a plain game error with the table message", () => {
    const err = errorFromStatus(486);
    expect(err.constructor).toBe(GameApiError);
    expect(err.message).toBe("Character is locked");
  });

  it("keeps every subclass a GameApiError", () => {
    expect(errorFromStatus(598)).toBeInstanceOf(GameApiError);
    expect(new TransportError("reset")).not.toBeInstanceOf(GameApiError);
  });
});

describe("statusMessage", () => {
  it("describes unknown codes", () => {
    expect(statusMessage(418)).toBe("Unknown error (code: 418)");
  });
});
