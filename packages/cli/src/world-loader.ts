import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { fileURLToPath } from "node:url";
import yaml from "js-yaml";
import { errorMessage, parseCharacter, parseWorldSnapshot } from "@goapbot/schemas";
import type { Character, WorldSnapshot } from "@goapbot/schemas";

export const EXAMPLE_WORLD_PATH = fileURLToPath(new URL("../config/world.example.yaml", import.meta.url));
export const EXAMPLE_CHARACTER_PATH = fileURLToPath(new URL("../config/character.example.yaml", import.meta.url));

/** YAML or JSON; JSON is read by the YAML parser as well. */
async function readDataFile(filePath: string, label: string): Promise<unknown> {
  if (!existsSync(filePath)) throw new Error(`${label} file not found: ${filePath}`);
  const content = await readFile(filePath, "utf-8");
  try {
    return yaml.load(content);
  } catch (err) {
    throw new Error(`Cannot parse ${label.toLowerCase()} file "${filePath}": ${errorMessage(err)}`);
  }
}

export async function loadWorld(filePath: string = EXAMPLE_WORLD_PATH): Promise<WorldSnapshot> {
  return parseWorldSnapshot(await readDataFile(filePath, "World"));
}

export async function loadCharacter(filePath: string = EXAMPLE_CHARACTER_PATH): Promise<Character> {
  return parseCharacter(await readDataFile(filePath, "Character"));
}
