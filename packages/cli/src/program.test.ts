import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { Journal } from "@goapbot/journal";
import { createProgram, parsePositiveInt } from "./program.js";

const TEST_DIR = resolve(fileURLToPath(new URL(".", import.meta.url)), "../../.test-data/cli");
const JOURNAL = resolve(TEST_DIR, "runs.jsonl");

describe("parsePositiveInt", () => {
  it("accepts positive integers", () => {
    expect(parsePositiveInt("3")).toBe(3);
    expect(parsePositiveInt("12")).toBe(12);
  });

  it("rejects zero and non-numbers", () => {
    expect(() => parsePositiveInt("0")).toThrow('"0" is not a positive integer.');
    expect(() => parsePositiveInt("2x")).toThrow('"2x" is not a positive integer.');
  });
});

describe("goapbot program", () => {
  let lines: string[];

  async function run(...args: string[]): Promise<void> {
    const program = createProgram();
    program.exitOverride();
    await program.parseAsync(args, { from: "user" });
  }

  beforeEach(async () => {
    await rm(TEST_DIR, { recursive: true, force: true });
    await mkdir(TEST_DIR, { recursive: true });
    vi.stubEnv("GOAPBOT_LOG_LEVEL", "warn");
    lines = [];
    vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
      lines.push(args.map(String).join(" "));
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    process.exitCode = undefined;
    await rm(TEST_DIR, { recursive: true, force: true });
  });

  it("plans a goal against the example world", async () => {
    await run("plan", "level 2");
    expect(lines[0]).toBe("Plan for level_2: 2 steps, total cost 15");
    expect(lines).toContain("  1. move_to_4_1 (cost 5)");
    expect(lines).toContain("  2. fight_chicken (cost 10)");
  });

  it("fails the plan command when nothing reaches the goal", async () => {
    await expect(run("plan", "item_obtained=dragon_scale")).rejects.toThrow(/^No plan for goal /);
  });

  it("lists only executable actions when asked", async () => {
    await run("actions", "--executable");
    expect(lines).toContain("move_to_4_1 [move] cost 5");
    expect(lines.some((l) => l.startsWith("fight_chicken"))).toBe(false);
  });

  it("evaluates a hand-written sequence", async () => {
    await run("evaluate", "move_to_4_1", "fight_chicken");
    expect(lines).toEqual([
      "  1. ok    move_to_4_1 (cost 5)",
      "  2. ok    fight_chicken (cost 10)",
      "Total cost: 15",
      "Preconditions: all met",
    ]);
    expect(process.exitCode).toBeUndefined();
  });

  it("flags a sequence whose preconditions fail", async () => {
    await run("evaluate", "fight_chicken");
    expect(lines).toEqual([
      "  1. UNMET fight_chicken (cost 10)",
      "       current_x: needs 4, has 0",
      "       current_y: needs 1, has 0",
      "Total cost: 10",
      "Preconditions: some unmet",
    ]);
    expect(process.exitCode).toBe(1);
  });

  it("simulates a run and reads it back from the journal", async () => {
    const character = resolve(TEST_DIR, "fighter.json");
    await writeFile(character, JSON.stringify({
      name: "ranger",
      level: 1,
      xp: 0,
      max_xp: 150,
      gold: 0,
      hp: 100,
      max_hp: 100,
      x: 4,
      y: 1,
      cooldown: 0,
      skills: {},
      equipment: { weapon: "copper_dagger" },
      inventory: [],
      inventory_max_items: 20,
    }));

    await run("simulate", "level 2", "--character", character, "--journal", JOURNAL, "--quiet");
    expect(lines).toContain("Character: ranger");
    expect(lines).toContain("Status: completed");
    expect(lines).toContain("Cycles: 5");
    expect(lines).toContain("Simulated time: 50s");
    expect(process.exitCode).toBeUndefined();

    const runId = lines.find((l) => l.startsWith("Run "))?.slice(4) ?? "";
    lines = [];
    await run("journal", "ls", "--journal", JOURNAL);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(new RegExp(`^${runId}  \\[completed\\]  level_2  \\d+ events  `));

    lines = [];
    await run("journal", "show", runId, "--journal", JOURNAL);
    expect(lines[0]).toContain("run.started");
    expect(lines[lines.length - 1]).toBe("\nJournal integrity: OK");
  });

  it("reports a tampered journal without repairing it", async () => {
    const journal = new Journal(JOURNAL, { fsync: false, lock: false });
    await journal.init();
    await journal.emit("run-1", "run.started", { goal: "level_2" });
    await journal.emit("run-1", "action.started", { action: "rest" });
    await journal.emit("run-1", "run.completed", {});
    await journal.close();
    const original = (await readFile(JOURNAL, "utf-8")).trim().split("\n");
    original[1] = (original[1] ?? "").replace('"rest"', '"fight_chicken"');
    const tampered = original.join("\n") + "\n";
    await writeFile(JOURNAL, tampered, "utf-8");
    vi.spyOn(console, "error").mockImplementation(() => undefined);

    await run("journal", "show", "run-1", "--journal", JOURNAL);
    expect(lines).toHaveLength(3);
    expect(lines[2]).toBe("\nJournal integrity: BROKEN at event 2");
    expect(await readFile(JOURNAL, "utf-8")).toBe(tampered);
  });

  it("reports an empty journal", async () => {
    await run("journal", "ls", "--journal", JOURNAL);
    expect(lines).toEqual(["No runs found."]);
  });
});
