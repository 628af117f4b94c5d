export { MoveAction, moveActionName } from "./move.js";
export { FightAction } from "./fight.js";
export { GatherAction } from "./gather.js";
export { RestAction } from "./rest.js";
export { CraftAction } from "./craft.js";
export { EquipAction } from "./equip.js";
export { DepositAction } from "./deposit.js";
export { WaitAction } from "./wait.js";
