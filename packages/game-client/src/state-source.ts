import { characterToStateDict, validateStateDict } from "@goapbot/schemas";
import type { WorldSnapshot, WorldState } from "@goapbot/schemas";
import type { GameApiClient } from "./client.js";

/** Live character state, already passed through the vocabulary gate. */
export interface StateSource {
  fetchState(characterId: string): Promise<WorldState>;
}

export class GameClientStateSource implements StateSource {
  private client: GameApiClient;
  private snapshot: WorldSnapshot | undefined;

  constructor(client: GameApiClient, snapshot?: WorldSnapshot) {
    this.client = client;
    this.snapshot = snapshot;
  }

  async fetchState(characterId: string): Promise<WorldState> {
    const character = await this.client.getCharacter(characterId);
    return validateStateDict(characterToStateDict(character, this.snapshot));
  }
}
