import { Command, InvalidArgumentError } from "commander";
import { resolve } from "node:path";
import { characterToWorldState } from "@goapbot/schemas";
import type { Character, WorldSnapshot, WorldState } from "@goapbot/schemas";
import { GameClientStateSource, InMemoryGameClient, ManualClock } from "@goapbot/game-client";
import { createDefaultRegistry } from "@goapbot/actions";
import type { ActionRegistry } from "@goapbot/actions";
import { DEFAULT_MAX_NODES, createGridPathCost } from "@goapbot/planner";
import { GoalManager, loadGoalTemplates } from "@goapbot/goals";
import { CharacterAgent, DEFAULT_MAX_ATTEMPTS, DEFAULT_MAX_CYCLES, DEFAULT_MAX_DEPTH } from "@goapbot/kernel";
import { Journal, createLogger } from "@goapbot/journal";
import { loadCharacter, loadWorld } from "./world-loader.js";
import { evaluateSequence } from "./evaluate.js";
import {
  formatActionDescription,
  formatEvaluation,
  formatEvent,
  formatPlan,
  formatRunSummary,
  isQuietEvent,
} from "./formatters.js";

export const DEFAULT_JOURNAL_PATH = "journal/goapbot.jsonl";

export function parsePositiveInt(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!/^\s*\d+\s*$/.test(value) || n < 1) {
    throw new InvalidArgumentError(`"${value}" is not a positive integer.`);
  }
  return n;
}

function envPositiveInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  try {
    return parsePositiveInt(raw);
  } catch (err) {
    throw new Error(`Invalid ${name}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

interface WorldOptions {
  world?: string;
  character?: string;
  templates?: string;
  maxNodes?: number;
  gridPaths?: boolean;
}

interface Workspace {
  world: WorldSnapshot;
  character: Character;
  state: WorldState;
  client: InMemoryGameClient;
  registry: ActionRegistry;
  goals: GoalManager;
}

function withWorldOptions(command: Command): Command {
  return command
    .option("-w, --world <file>", "World snapshot (YAML or JSON); defaults to the bundled example")
    .option("-c, --character <file>", "Character (YAML or JSON); defaults to the bundled example")
    .option("--templates <file>", "Goal templates file (env GOAPBOT_GOAL_TEMPLATES)")
    .option("--max-nodes <n>", "Planner node budget (env GOAPBOT_PLANNER_MAX_NODES)", parsePositiveInt)
    .option("--grid-paths", "Cost moves by walkable path length instead of Manhattan distance");
}

async function openWorkspace(opts: WorldOptions, now?: () => number): Promise<Workspace> {
  const world = await loadWorld(opts.world ? resolve(opts.world) : undefined);
  const character = await loadCharacter(opts.character ? resolve(opts.character) : undefined);
  const templatesPath = opts.templates ?? process.env.GOAPBOT_GOAL_TEMPLATES;
  const templates = await loadGoalTemplates(templatesPath ? resolve(templatesPath) : undefined);
  const client = new InMemoryGameClient(world, [character], now ? { now } : {});
  const registry = createDefaultRegistry(
    client,
    opts.gridPaths ? { movement: { costProvider: createGridPathCost } } : {},
  );
  const goals = new GoalManager({
    templates,
    planner: { maxNodes: opts.maxNodes ?? envPositiveInt("GOAPBOT_PLANNER_MAX_NODES", DEFAULT_MAX_NODES) },
    logger: createLogger("goals"),
  });
  return { world, character, state: characterToWorldState(character, world), client, registry, goals };
}

/** Inspection never locks, repairs or appends. */
function inspectJournal(path: string | undefined): Journal {
  return new Journal(resolve(path ?? process.env.GOAPBOT_JOURNAL_PATH ?? DEFAULT_JOURNAL_PATH), { readOnly: true });
}

function print(lines: string[]): void {
  for (const line of lines) console.log(line);
}

export function createProgram(): Command {
  const program = new Command();
  program.name("goapbot").description("GOAP planning and recursive sub-goal execution for an MMO character").version("0.1.0");

  withWorldOptions(program.command("actions").description("List the actions generated for the character's state"))
    .option("--executable", "Only actions whose preconditions hold now")
    .action(async (opts: WorldOptions & { executable?: boolean }) => {
      const { world, state, registry } = await openWorkspace(opts);
      const actions = registry
        .generateActionsForState(state, world)
        .filter((a) => !opts.executable || a.canExecute(state));
      if (actions.length === 0) { console.log("No actions."); return; }
      for (const action of actions) print(formatActionDescription(action.describe()));
      console.log(`${actions.length} action(s)`);
    });

  withWorldOptions(program.command("plan").description("Plan a goal without executing it"))
    .argument("<goal>", 'Goal: a template name, "level 5", "mining 3" or "key=value,..."')
    .action(async (goalText: string, opts: WorldOptions) => {
      const { world, state, registry, goals } = await openWorkspace(opts);
      const outcome = goals.plan(goalText, state, registry.generateActionsForState(state, world));
      if (!outcome.ok) throw new Error(outcome.message);
      print(formatPlan(outcome.plan));
    });

  withWorldOptions(program.command("evaluate").description("Check an action sequence against declared effects"))
    .argument("<actions...>", "Action names, in order")
    .option("-g, --goal <goal>", "Goal the final state should satisfy")
    .action(async (names: string[], opts: WorldOptions & { goal?: string }) => {
      const { world, state, registry, goals } = await openWorkspace(opts);
      const goal = opts.goal ? goals.resolveGoal(opts.goal) : undefined;
      const evaluation = evaluateSequence(state, registry.generateActionsForState(state, world), names, goal);
      print(formatEvaluation(evaluation));
      if (!evaluation.all_preconditions_met || evaluation.goal_satisfied === false) process.exitCode = 1;
    });

  withWorldOptions(program.command("simulate").description("Run a goal against the in-memory game server"))
    .argument("<goal>", "Goal to pursue")
    .option("--max-cycles <n>", "Plan-and-execute cycles", parsePositiveInt)
    .option("--max-depth <n>", "Sub-goal depth bound (env GOAPBOT_MAX_DEPTH)", parsePositiveInt)
    .option("--max-attempts <n>", "Attempts per action (env GOAPBOT_MAX_ATTEMPTS)", parsePositiveInt)
    .option("--journal <file>", "Journal file (env GOAPBOT_JOURNAL_PATH)")
    .option("-q, --quiet", "Only print the summary")
    .action(async (goalText: string, opts: WorldOptions & {
      maxCycles?: number; maxDepth?: number; maxAttempts?: number; journal?: string; quiet?: boolean;
    }) => {
      const clock = new ManualClock();
      const { world, character, client, registry, goals } = await openWorkspace(opts, clock.now);

      const journal = new Journal(resolve(opts.journal ?? process.env.GOAPBOT_JOURNAL_PATH ?? DEFAULT_JOURNAL_PATH));
      await journal.init();
      const unsubscribe = opts.quiet
        ? () => undefined
        : journal.on((event) => { if (!isQuietEvent(event.type)) console.log(formatEvent(event)); });
      try {
        const agent = new CharacterAgent({
          characterId: character.name,
          goals,
          registry,
          stateSource: new GameClientStateSource(client, world),
          snapshot: world,
          journal,
          logger: createLogger(`agent:${character.name}`),
          executor: {
            maxDepth: opts.maxDepth ?? envPositiveInt("GOAPBOT_MAX_DEPTH", DEFAULT_MAX_DEPTH),
            maxAttempts: opts.maxAttempts ?? envPositiveInt("GOAPBOT_MAX_ATTEMPTS", DEFAULT_MAX_ATTEMPTS),
            sleep: clock.sleep,
            now: clock.now,
          },
        });
        const summary = await agent.runGoal(goalText, { maxCycles: opts.maxCycles ?? DEFAULT_MAX_CYCLES });
        console.log("");
        print(formatRunSummary(summary));
        console.log(`Simulated time: ${clock.now() / 1000}s`);
        if (summary.status === "failed") process.exitCode = 1;
      } finally {
        unsubscribe();
        await journal.close();
      }
    });

  const journalCmd = program.command("journal").description("Inspect recorded runs");
  journalCmd.command("ls").description("List runs in the journal")
    .option("--journal <file>", "Journal file (env GOAPBOT_JOURNAL_PATH)")
    .action(async (opts: { journal?: string }) => {
      const journal = inspectJournal(opts.journal);
      await journal.init();
      const runs = new Map<string, { goal: string; status: string; started: string; events: number }>();
      for (const event of await journal.readAll()) {
        let run = runs.get(event.session_id);
        if (!run) {
          run = { goal: "", status: "running", started: event.timestamp, events: 0 };
          runs.set(event.session_id, run);
        }
        run.events++;
        if (event.type === "run.started" && typeof event.payload.goal === "string") run.goal = event.payload.goal;
        if (event.type === "run.completed") run.status = "completed";
        if (event.type === "run.failed") run.status = "failed";
      }
      await journal.close();
      if (runs.size === 0) { console.log("No runs found."); return; }
      for (const [id, run] of runs) console.log(`${id}  [${run.status}]  ${run.goal}  ${run.events} events  ${run.started}`);
    });

  journalCmd.command("show").description("Print a run's events").argument("<run-id>", "Run id")
    .option("--journal <file>", "Journal file (env GOAPBOT_JOURNAL_PATH)")
    .action(async (runId: string, opts: { journal?: string }) => {
      const journal = inspectJournal(opts.journal);
      await journal.init();
      const events = journal.readRun(runId);
      const integrity = await journal.verifyIntegrity();
      await journal.close();
      if (events.length === 0) { console.log(`No events found for run ${runId}`); return; }
      for (const event of events) console.log(formatEvent(event));
      console.log(`\nJournal integrity: ${integrity.valid ? "OK" : `BROKEN at event ${integrity.brokenAt ?? 0}`}`);
    });

  return program;
}
