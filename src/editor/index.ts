// Barrel exports for editor module

export type { GamePatch, UpsertResult } from './upsert.js';
export { findGameIndex, upsertGame, upsertGameInFile } from './upsert.js';
