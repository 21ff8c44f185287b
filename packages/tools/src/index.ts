export { FrotzEmulator, parseOutput, DFROTZ_BIN, NO_RESPONSE } from "./frotz-emulator.js";
export type { FrotzResult, GameEmulator, FrotzProcess, SpawnFrotz, FrotzEmulatorOptions } from "./frotz-emulator.js";
export { EmulatorSession, GAME_OVER, isEndOfGame } from "./emulator-session.js";
export type { EmulatorSessionOptions, OperationResult, TextContent } from "./emulator-session.js";
export { candidateActions, suggestActions, mentionedExits, mentionedObjects } from "./action-candidates.js";
export type { ValidActionsContext, ValidActionsProvider } from "./action-candidates.js";
